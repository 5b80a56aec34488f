/**
 * Validation of analysis payloads coming back from model runtimes (the cloud
 * vision model's JSON reply and the local runtime sidecar), plus the helpers
 * every strategy uses to assemble a SafetyAnalysis.
 */

import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { InferenceError } from "./errors.js";
import { clamp01, mean } from "./utils.js";
import type {
  AnalysisType,
  Hazard,
  HazardType,
  PpeItem,
  PpeKind,
  PpeStatus,
  RiskLevel,
  SafetyAnalysis,
  Severity,
  WorkType,
} from "./types.js";

// ─── Vocabulary ─────────────────────────────────────────────────────────────────

export const HAZARD_TYPES: readonly HazardType[] = [
  "fall_protection",
  "ppe_violation",
  "electrical",
  "struck_by",
  "caught_in",
  "fire",
  "chemical",
  "crane_lift",
  "housekeeping",
  "confined_space",
  "scaffolding",
  "excavation",
  "equipment",
  "other",
];

const SEVERITIES: readonly Severity[] = ["low", "medium", "high", "critical"];
const RISK_LEVELS: readonly RiskLevel[] = ["minimal", "low", "moderate", "high", "severe"];
export const PPE_KINDS: readonly PpeKind[] = ["hardHat", "safetyVest", "safetyGlasses", "gloves", "fallProtection"];

const SEVERITY_RISK: Record<Severity, RiskLevel> = {
  low: "low",
  medium: "moderate",
  high: "high",
  critical: "severe",
};

function token(value: string): string {
  return value.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

export function normalizeHazardType(value: string): HazardType {
  const t = token(value);
  return HAZARD_TYPES.find((type) => type === t) ?? "other";
}

export function normalizeSeverity(value: string): Severity {
  const t = token(value);
  return SEVERITIES.find((s) => s === t) ?? "medium";
}

function normalizeRiskLevel(value: string): RiskLevel | null {
  const t = token(value);
  return RISK_LEVELS.find((r) => r === t) ?? null;
}

/** Overall risk follows the worst hazard; no hazards is "minimal". */
export function riskLevelFor(hazards: readonly Hazard[]): RiskLevel {
  let worst = -1;
  for (const hazard of hazards) {
    worst = Math.max(worst, SEVERITIES.indexOf(hazard.severity));
  }
  return worst < 0 ? "minimal" : SEVERITY_RISK[SEVERITIES[worst]];
}

const UNKNOWN_PPE_ITEM: PpeItem = { status: "unknown", confidence: 0, required: false };

/** Fill absent PPE items as unknown and compute compliance over required items. */
export function buildPpeStatus(items: Partial<Record<PpeKind, PpeItem>>): PpeStatus {
  const full: Record<PpeKind, PpeItem> = {
    hardHat: items.hardHat ?? UNKNOWN_PPE_ITEM,
    safetyVest: items.safetyVest ?? UNKNOWN_PPE_ITEM,
    safetyGlasses: items.safetyGlasses ?? UNKNOWN_PPE_ITEM,
    gloves: items.gloves ?? UNKNOWN_PPE_ITEM,
    fallProtection: items.fallProtection ?? UNKNOWN_PPE_ITEM,
  };
  const required = PPE_KINDS.map((kind) => full[kind]).filter((item) => item.required);
  const present = required.filter((item) => item.status === "present").length;
  return {
    items: full,
    overallCompliance: required.length === 0 ? 1 : present / required.length,
  };
}

/** Order-preserving de-duplication of recommendation lines. */
export function uniqueLines(lines: Iterable<string>): string[] {
  return [...new Set([...lines].map((line) => line.trim()).filter(Boolean))];
}

// ─── Wire Schema ────────────────────────────────────────────────────────────────

const boundingBoxSchema = z.object({
  left: z.number(),
  top: z.number(),
  width: z.number(),
  height: z.number(),
});

const hazardSchema = z.object({
  type: z.string(),
  severity: z.string(),
  description: z.string().min(1),
  confidence: z.number().optional(),
  oshaCode: z.string().nullish(),
  boundingBox: boundingBoxSchema.nullish(),
  recommendations: z.array(z.string()).optional(),
});

const ppeItemSchema = z.object({
  status: z.enum(["present", "missing", "unknown"]),
  confidence: z.number().optional(),
  required: z.boolean().optional(),
});

const ppeSchema = z.object({
  hardHat: ppeItemSchema.optional(),
  safetyVest: ppeItemSchema.optional(),
  safetyGlasses: ppeItemSchema.optional(),
  gloves: ppeItemSchema.optional(),
  fallProtection: ppeItemSchema.optional(),
});

export const analysisPayloadSchema = z.object({
  hazards: z.array(hazardSchema),
  ppe: ppeSchema.nullish(),
  recommendations: z.array(z.string()).optional(),
  overallRiskLevel: z.string().optional(),
  confidence: z.number().optional(),
});

export type AnalysisPayload = z.infer<typeof analysisPayloadSchema>;

// ─── Parsing ────────────────────────────────────────────────────────────────────

export interface PayloadContext {
  analysisType: AnalysisType;
  workType: WorkType;
  now?: () => Date;
}

/** Parse a JSON reply body; malformed JSON or shape is an InferenceError. */
export function parseAnalysisJson(text: string, context: PayloadContext): SafetyAnalysis {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    throw new InferenceError(`Analysis reply is not valid JSON: ${text.slice(0, 200)}`);
  }
  return parseAnalysisPayload(value, context);
}

export function parseAnalysisPayload(value: unknown, context: PayloadContext): SafetyAnalysis {
  const result = analysisPayloadSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "<root>"}: ${issue.message}` : "unknown issue";
    throw new InferenceError(`Analysis reply has an invalid shape (${where})`, { cause: result.error });
  }
  const payload = result.data;

  const hazardConfidences = payload.hazards.flatMap((h) => (h.confidence === undefined ? [] : [h.confidence]));
  const confidence = clamp01(
    payload.confidence ?? (hazardConfidences.length > 0 ? mean(hazardConfidences) : 0.5),
  );

  const hazards: Hazard[] = payload.hazards.map((h) => ({
    id: uuidv4(),
    type: normalizeHazardType(h.type),
    severity: normalizeSeverity(h.severity),
    description: h.description,
    confidence: clamp01(h.confidence ?? confidence),
    boundingBox: h.boundingBox
      ? {
          left: clamp01(h.boundingBox.left),
          top: clamp01(h.boundingBox.top),
          width: clamp01(h.boundingBox.width),
          height: clamp01(h.boundingBox.height),
        }
      : null,
    oshaCode: h.oshaCode ?? null,
    recommendations: uniqueLines(h.recommendations ?? []),
  }));

  let ppeStatus: PpeStatus | null = null;
  if (payload.ppe) {
    const items: Partial<Record<PpeKind, PpeItem>> = {};
    for (const kind of PPE_KINDS) {
      const item = payload.ppe[kind];
      if (item) {
        items[kind] = {
          status: item.status,
          confidence: clamp01(item.confidence ?? confidence),
          required: item.required ?? false,
        };
      }
    }
    ppeStatus = buildPpeStatus(items);
  }

  const declaredRisk = payload.overallRiskLevel ? normalizeRiskLevel(payload.overallRiskLevel) : null;

  return {
    id: uuidv4(),
    workType: context.workType,
    analysisType: context.analysisType,
    hazards,
    ppeStatus,
    recommendations: uniqueLines([...(payload.recommendations ?? []), ...hazards.flatMap((h) => h.recommendations)]),
    overallRiskLevel: declaredRisk ?? riskLevelFor(hazards),
    confidence,
    processingTimeMs: 0,
    analyzedAt: (context.now ?? (() => new Date()))().toISOString(),
  };
}
