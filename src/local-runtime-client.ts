// HTTP clients for the local model sidecars: the multimodal runtime behind
// OnDeviceVisionStrategy and the object detector behind the degraded fallback.
//
// Error mapping: 507 or an "out_of_memory" error code is OutOfMemoryError, a
// 503 "thermal" code is ThermalThrottlingError, everything else InferenceError.

import { z } from "zod";
import { parseAnalysisJson } from "./analysis-payload.js";
import type { ObjectDetector } from "./detector-fallback-strategy.js";
import { InferenceError, OutOfMemoryError, ThermalThrottlingError } from "./errors.js";
import type { InferenceEngine } from "./on-device-strategy.js";
import { AnalysisType } from "./types.js";
import type { Backend, Detection, SafetyAnalysis, WorkType } from "./types.js";

export type FetchFn = typeof fetch;

const errorBodySchema = z.object({
  error: z.string().optional(),
  message: z.string().optional(),
  thermalState: z.enum(["nominal", "light", "moderate", "severe", "critical"]).optional(),
});

const detectionsSchema = z.object({
  detections: z.array(
    z.object({
      label: z.string(),
      score: z.number(),
      box: z.object({ left: z.number(), top: z.number(), width: z.number(), height: z.number() }),
    }),
  ),
});

function endpoint(baseUrl: string, path: string): string {
  const base = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
  return new URL(path, base).toString();
}

async function readErrorBody(response: Response): Promise<z.infer<typeof errorBodySchema>> {
  const text = await response.text();
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return { message: text.slice(0, 200) };
  }
  const parsed = errorBodySchema.safeParse(json);
  return parsed.success ? parsed.data : { message: text.slice(0, 200) };
}

/** Throw the taxonomy error matching a failed sidecar response. */
export async function throwForResponse(response: Response, context: string, backend: Backend | null = null): Promise<never> {
  const body = await readErrorBody(response);
  const detail = body.message ?? body.error ?? response.statusText;
  if (response.status === 507 || body.error === "out_of_memory") {
    throw new OutOfMemoryError(`${context}: ${detail}`, backend);
  }
  if (response.status === 503 && body.error === "thermal") {
    throw new ThermalThrottlingError(body.thermalState ?? "severe", `${context}: ${detail}`);
  }
  throw new InferenceError(`${context} failed with HTTP ${response.status}: ${detail}`);
}

// ─── Multimodal Runtime ─────────────────────────────────────────────────────────

export interface LocalRuntimeOptions {
  baseUrl: string;
  supportedBackends: ReadonlySet<Backend>;
  fetchFn?: FetchFn;
  now?: () => Date;
}

export class LocalRuntimeEngine implements InferenceEngine {
  readonly supportedBackends: ReadonlySet<Backend>;
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;
  private readonly now: () => Date;
  private backend: Backend | null = null;

  constructor(options: LocalRuntimeOptions) {
    this.baseUrl = options.baseUrl;
    this.supportedBackends = options.supportedBackends;
    this.fetchFn = options.fetchFn ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  async initialize(backend: Backend): Promise<void> {
    const response = await this.fetchFn(endpoint(this.baseUrl, "initialize"), {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ backend }),
    });
    if (!response.ok) await throwForResponse(response, `Runtime initialize on ${backend}`, backend);
    this.backend = backend;
  }

  async run(image: Buffer, workType: WorkType, signal: AbortSignal): Promise<SafetyAnalysis> {
    const response = await this.fetchFn(endpoint(this.baseUrl, "analyze"), {
      method: "POST",
      headers: { "Content-Type": "application/octet-stream", "X-Work-Type": workType },
      body: image,
      signal,
    });
    if (!response.ok) await throwForResponse(response, "Runtime analyze", this.backend);
    return parseAnalysisJson(await response.text(), {
      analysisType: AnalysisType.ON_DEVICE_MULTIMODAL,
      workType,
      now: this.now,
    });
  }

  async release(): Promise<void> {
    const response = await this.fetchFn(endpoint(this.baseUrl, "release"), { method: "POST" });
    if (!response.ok) await throwForResponse(response, "Runtime release", this.backend);
    this.backend = null;
  }
}

// ─── Object Detector ────────────────────────────────────────────────────────────

export interface LocalDetectorOptions {
  baseUrl: string;
  fetchFn?: FetchFn;
}

export class LocalDetectorClient implements ObjectDetector {
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;

  constructor(options: LocalDetectorOptions) {
    this.baseUrl = options.baseUrl;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async detect(image: Buffer, signal: AbortSignal): Promise<Detection[]> {
    const response = await this.fetchFn(endpoint(this.baseUrl, "detect"), {
      method: "POST",
      headers: { "Content-Type": "application/octet-stream" },
      body: image,
      signal,
    });
    if (!response.ok) await throwForResponse(response, "Detector");

    let json: unknown;
    try {
      json = await response.json();
    } catch (err) {
      throw new InferenceError("Detector reply is not valid JSON", { cause: err });
    }
    const parsed = detectionsSchema.safeParse(json);
    if (!parsed.success) {
      throw new InferenceError("Detector reply has an invalid shape", { cause: parsed.error });
    }
    return parsed.data.detections;
  }
}
