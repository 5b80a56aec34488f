// Turns object-detector boxes into hazards, PPE compliance and an overall risk.
//
// Label vocabulary follows the site detector model: scene objects map to a
// hazard rule, while person / PPE labels feed the compliance check.

import { v4 as uuidv4 } from "uuid";
import { buildPpeStatus, riskLevelFor, uniqueLines } from "./analysis-payload.js";
import { mean } from "./utils.js";
import { AnalysisType, WorkType } from "./types.js";
import type { Detection, Hazard, HazardType, PpeItem, PpeKind, PpeStatus, SafetyAnalysis, Severity } from "./types.js";

// ─── Scene Rules ────────────────────────────────────────────────────────────────

interface LabelRule {
  type: HazardType;
  severity: Severity;
  description: string;
  oshaCode: string;
  recommendation: string;
}

export const LABEL_RULES: Readonly<Record<string, LabelRule>> = {
  ladder: {
    type: "fall_protection",
    severity: "medium",
    description: "Ladder in use",
    oshaCode: "1926.1053",
    recommendation: "Inspect the ladder and keep three points of contact while climbing",
  },
  scaffold: {
    type: "scaffolding",
    severity: "high",
    description: "Scaffold structure in the work area",
    oshaCode: "1926.451",
    recommendation: "Confirm the scaffold is inspected, fully planked and guardrailed",
  },
  open_edge: {
    type: "fall_protection",
    severity: "critical",
    description: "Unprotected edge or floor opening",
    oshaCode: "1926.501",
    recommendation: "Install guardrails or covers, or tie off to an anchor at unprotected edges",
  },
  excavation: {
    type: "excavation",
    severity: "high",
    description: "Open excavation or trench",
    oshaCode: "1926.651",
    recommendation: "Provide a protective system and safe egress for trenches deeper than 5 feet",
  },
  crane: {
    type: "crane_lift",
    severity: "high",
    description: "Crane or suspended load overhead",
    oshaCode: "1926.1400",
    recommendation: "Keep workers out of the fall zone beneath suspended loads",
  },
  exposed_wiring: {
    type: "electrical",
    severity: "critical",
    description: "Exposed electrical conductors",
    oshaCode: "1926.405",
    recommendation: "De-energize and cover exposed conductors before work continues",
  },
  fire: {
    type: "fire",
    severity: "critical",
    description: "Open flame or fire",
    oshaCode: "1926.150",
    recommendation: "Clear combustibles and keep a charged extinguisher within reach",
  },
  debris: {
    type: "housekeeping",
    severity: "low",
    description: "Debris or clutter in walkways",
    oshaCode: "1926.25",
    recommendation: "Clear walkways and remove scrap on a regular schedule",
  },
  gas_cylinder: {
    type: "chemical",
    severity: "medium",
    description: "Compressed gas cylinder",
    oshaCode: "1926.350",
    recommendation: "Secure cylinders upright with valve caps in place",
  },
  heavy_equipment: {
    type: "struck_by",
    severity: "high",
    description: "Heavy equipment operating near workers",
    oshaCode: "1926.600",
    recommendation: "Set exclusion zones and use a spotter around moving equipment",
  },
};

// ─── PPE Rules ──────────────────────────────────────────────────────────────────

const FALL_EXPOSED_WORK: ReadonlySet<WorkType> = new Set([
  WorkType.ROOFING,
  WorkType.FALL_PROTECTION,
  WorkType.STEEL_WORK,
]);

const EYE_PROTECTION_WORK: ReadonlySet<WorkType> = new Set([WorkType.WELDING, WorkType.DEMOLITION]);

interface PpeViolationRule {
  kind: PpeKind;
  severity: Severity;
  description: string;
  oshaCode: string;
  recommendation: string;
}

const PPE_VIOLATIONS: readonly PpeViolationRule[] = [
  {
    kind: "hardHat",
    severity: "high",
    description: "Worker without a hard hat",
    oshaCode: "1926.100",
    recommendation: "Require hard hats wherever there is an overhead or impact hazard",
  },
  {
    kind: "safetyVest",
    severity: "medium",
    description: "Worker without a high-visibility vest",
    oshaCode: "1926.201",
    recommendation: "Issue high-visibility vests to everyone near traffic or equipment",
  },
  {
    kind: "fallProtection",
    severity: "critical",
    description: "Worker at height without fall protection",
    oshaCode: "1926.502",
    recommendation: "Provide and inspect personal fall arrest systems before work at height",
  },
];

const NO_HAZARDS_LINE = "No hazards identified by object detection";

function byLabel(detections: readonly Detection[], label: string): Detection[] {
  return detections.filter((d) => d.label === label);
}

/**
 * Worn-item check: missing when a negative label fires or fewer positives than
 * people were seen.
 */
function wornItem(persons: number, worn: Detection[], notWorn: Detection[], required: boolean): PpeItem {
  const evidence = [...worn, ...notWorn].map((d) => d.score);
  const confidence = evidence.length > 0 ? mean(evidence) : 0.5;
  const missing = notWorn.length > 0 || worn.length < persons;
  return { status: missing ? "missing" : "present", confidence, required };
}

function assessPpe(detections: readonly Detection[], workType: WorkType, fallExposure: boolean): PpeStatus | null {
  const persons = byLabel(detections, "person").length;
  if (persons === 0) return null;

  const harnesses = byLabel(detections, "harness");
  const fallRequired = fallExposure || FALL_EXPOSED_WORK.has(workType);
  let fallProtection: PpeItem;
  if (harnesses.length > 0 || fallRequired) {
    fallProtection = wornItem(persons, harnesses, [], fallRequired);
  } else {
    fallProtection = { status: "unknown", confidence: 0, required: false };
  }

  return buildPpeStatus({
    hardHat: wornItem(persons, byLabel(detections, "hard_hat"), byLabel(detections, "no_hard_hat"), true),
    safetyVest: wornItem(persons, byLabel(detections, "safety_vest"), byLabel(detections, "no_safety_vest"), true),
    safetyGlasses: { status: "unknown", confidence: 0, required: EYE_PROTECTION_WORK.has(workType) },
    fallProtection,
  });
}

// ─── Mapping ────────────────────────────────────────────────────────────────────

export function mapDetectionsToAnalysis(
  detections: readonly Detection[],
  workType: WorkType,
  now: () => Date = () => new Date(),
): SafetyAnalysis {
  const hazards: Hazard[] = [];

  for (const detection of detections) {
    const rule = LABEL_RULES[detection.label];
    if (!rule) continue;
    hazards.push({
      id: uuidv4(),
      type: rule.type,
      severity: rule.severity,
      description: rule.description,
      confidence: detection.score,
      boundingBox: detection.box,
      oshaCode: rule.oshaCode,
      recommendations: [rule.recommendation],
    });
  }

  const fallExposure = hazards.some((h) => h.type === "fall_protection" || h.type === "scaffolding");
  const ppeStatus = assessPpe(detections, workType, fallExposure);

  if (ppeStatus) {
    for (const rule of PPE_VIOLATIONS) {
      const item = ppeStatus.items[rule.kind];
      if (!item.required || item.status !== "missing") continue;
      const negative = rule.kind === "hardHat" ? "no_hard_hat" : rule.kind === "safetyVest" ? "no_safety_vest" : null;
      const [evidence] = negative ? byLabel(detections, negative) : [];
      hazards.push({
        id: uuidv4(),
        type: "ppe_violation",
        severity: rule.severity,
        description: rule.description,
        confidence: item.confidence,
        boundingBox: evidence ? evidence.box : null,
        oshaCode: rule.oshaCode,
        recommendations: [rule.recommendation],
      });
    }
  }

  const recommendations = uniqueLines(hazards.flatMap((h) => h.recommendations));

  return {
    id: uuidv4(),
    workType,
    analysisType: AnalysisType.LOCAL_DETECTOR_FALLBACK,
    hazards,
    ppeStatus,
    recommendations: recommendations.length > 0 ? recommendations : [NO_HAZARDS_LINE],
    overallRiskLevel: riskLevelFor(hazards),
    confidence: detections.length > 0 ? mean(detections.map((d) => d.score)) : 0.5,
    processingTimeMs: 0,
    analyzedAt: now().toISOString(),
  };
}
