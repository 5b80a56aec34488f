/**
 * Cloud vision strategy: sends the photo to an OpenAI vision model in JSON mode
 * and validates the reply into a SafetyAnalysis.
 */

import { parseAnalysisJson } from "./analysis-payload.js";
import { ConfigurationError, describeError, InferenceError, toAnalysisError, UnavailableError } from "./errors.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";
import { AnalysisCapability, AnalysisType } from "./types.js";
import type { AnalyzerStrategy, ConnectivityMonitor, SafetyAnalysis, WorkType } from "./types.js";

// ─── OpenAI client interface (for testability / dependency injection) ────────────

export type VisionContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string; detail?: "low" | "high" | "auto" } };

export type VisionMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: VisionContentPart[] };

/**
 * Minimal surface of the OpenAI chat completions API used here, so tests can
 * inject a fake without the SDK.
 */
export interface OpenAIVisionClient {
  chat: {
    completions: {
      create(
        params: {
          model: string;
          messages: VisionMessage[];
          response_format?: { type: string };
          temperature?: number;
          max_tokens?: number;
        },
        options?: { signal?: AbortSignal },
      ): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

export type OpenAIClientFactory = (apiKey: string) => OpenAIVisionClient;

// ─── Prompt ─────────────────────────────────────────────────────────────────────

export function detectImageMimeType(image: Uint8Array): string {
  if (image[0] === 0x89 && image[1] === 0x50 && image[2] === 0x4e && image[3] === 0x47) return "image/png";
  if (
    image[0] === 0x52 &&
    image[1] === 0x49 &&
    image[2] === 0x46 &&
    image[3] === 0x46 &&
    image[8] === 0x57 &&
    image[9] === 0x45 &&
    image[10] === 0x42 &&
    image[11] === 0x50
  ) {
    return "image/webp";
  }
  return "image/jpeg";
}

export function buildSystemPrompt(workType: WorkType): string {
  return [
    "You are a construction site safety inspector reviewing a single jobsite photo.",
    `Work type: ${workType.replace(/_/g, " ")}.`,
    "Identify hazards and PPE compliance and cite OSHA 29 CFR 1926 sections where they apply.",
    "Reply with one JSON object and nothing else, shaped as:",
    "{",
    '  "hazards": [{ "type": string, "severity": "low"|"medium"|"high"|"critical", "description": string,',
    '    "confidence": number 0-1, "oshaCode": string|null,',
    '    "boundingBox": { "left", "top", "width", "height" as 0-1 fractions } | null, "recommendations": string[] }],',
    '  "ppe": { "hardHat"|"safetyVest"|"safetyGlasses"|"gloves"|"fallProtection":',
    '    { "status": "present"|"missing"|"unknown", "confidence": number, "required": boolean } },',
    '  "recommendations": string[],',
    '  "overallRiskLevel": "minimal"|"low"|"moderate"|"high"|"severe",',
    '  "confidence": number 0-1',
    "}",
    "Hazard types: fall_protection, ppe_violation, electrical, struck_by, caught_in, fire, chemical,",
    "crane_lift, housekeeping, confined_space, scaffolding, excavation, equipment, other.",
    "Report only what is visible. Use an empty hazards array for a safe scene.",
  ].join("\n");
}

export function buildMessages(image: Buffer, workType: WorkType, detail: "low" | "high" | "auto"): VisionMessage[] {
  const url = `data:${detectImageMimeType(image)};base64,${image.toString("base64")}`;
  return [
    { role: "system", content: buildSystemPrompt(workType) },
    {
      role: "user",
      content: [
        { type: "text", text: "Analyze this photo for safety hazards." },
        { type: "image_url", image_url: { url, detail } },
      ],
    },
  ];
}

// ─── Strategy ───────────────────────────────────────────────────────────────────

export interface CloudVisionOptions {
  clientFactory: OpenAIClientFactory;
  connectivity: ConnectivityMonitor;
  apiKey?: string | null;
  model?: string;
  detail?: "low" | "high" | "auto";
  logger?: Logger;
  now?: () => Date;
}

function httpStatusOf(err: unknown): number | null {
  if (err instanceof Error && "status" in err && typeof err.status === "number") return err.status;
  return null;
}

export class CloudVisionStrategy implements AnalyzerStrategy {
  readonly name = "Cloud vision";
  readonly analysisType = AnalysisType.CLOUD_VISION;
  readonly kind = "cloud";
  readonly priority = 100;
  readonly capabilities: ReadonlySet<AnalysisCapability> = new Set([
    AnalysisCapability.MULTIMODAL_VISION,
    AnalysisCapability.PPE_DETECTION,
    AnalysisCapability.HAZARD_IDENTIFICATION,
    AnalysisCapability.OSHA_COMPLIANCE,
  ]);

  private client: OpenAIVisionClient | null = null;
  private readonly clientFactory: OpenAIClientFactory;
  private readonly connectivity: ConnectivityMonitor;
  private readonly defaultApiKey: string | null;
  private readonly model: string;
  private readonly detail: "low" | "high" | "auto";
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: CloudVisionOptions) {
    this.clientFactory = options.clientFactory;
    this.connectivity = options.connectivity;
    this.defaultApiKey = options.apiKey ?? null;
    this.model = options.model ?? "gpt-4o-mini";
    this.detail = options.detail ?? "high";
    this.logger = options.logger ?? createConsoleLogger("CloudVision");
    this.now = options.now ?? (() => new Date());
  }

  isAvailable(): boolean {
    return this.client !== null && this.connectivity.isConnected;
  }

  async configure(apiKey?: string): Promise<void> {
    const key = apiKey ?? this.defaultApiKey;
    if (!key) {
      this.client = null;
      throw new ConfigurationError("Cloud vision needs an API key");
    }
    this.client = this.clientFactory(key);
    this.logger.info(`Cloud vision configured with model ${this.model}`);
  }

  async analyze(image: Buffer, workType: WorkType, signal: AbortSignal): Promise<SafetyAnalysis> {
    const client = this.client;
    if (!client) throw new UnavailableError(this.name, "not configured");
    if (!this.connectivity.isConnected) throw new UnavailableError(this.name, "no network connectivity");

    let content: string | null | undefined;
    try {
      const response = await client.chat.completions.create(
        {
          model: this.model,
          messages: buildMessages(image, workType, this.detail),
          response_format: { type: "json_object" },
          temperature: 0.2,
          max_tokens: 1500,
        },
        { signal },
      );
      content = response.choices[0]?.message?.content;
    } catch (err) {
      if (signal.aborted) throw err;
      const status = httpStatusOf(err);
      if (status === 401 || status === 403) {
        throw new ConfigurationError(`Cloud vision rejected the API key (${status})`, { cause: err });
      }
      this.logger.warn(`Cloud vision request failed: ${describeError(err)}`);
      throw toAnalysisError(err);
    }

    if (!content) throw new InferenceError("Cloud vision returned an empty response");
    return parseAnalysisJson(content, { analysisType: this.analysisType, workType, now: this.now });
  }

  async release(): Promise<void> {
    this.client = null;
  }
}
