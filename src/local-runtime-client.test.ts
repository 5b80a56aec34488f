import { describe, it, expect, vi } from "vitest";
import { InferenceError, OutOfMemoryError, ThermalThrottlingError } from "./errors.js";
import { LocalDetectorClient, LocalRuntimeEngine } from "./local-runtime-client.js";
import type { FetchFn } from "./local-runtime-client.js";
import { AnalysisType, Backend, WorkType } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function makeFetch(...responses: Response[]) {
  const queue = [...responses];
  return vi.fn<FetchFn>(async () => {
    const next = queue.shift();
    if (!next) throw new Error("unexpected fetch");
    return next;
  });
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function makeEngine(fetchFn: FetchFn) {
  return new LocalRuntimeEngine({
    baseUrl: "http://runtime.test:8600",
    supportedBackends: new Set([Backend.GPU, Backend.CPU]),
    fetchFn,
    now: () => new Date("2026-02-02T00:00:00.000Z"),
  });
}

const signal = () => new AbortController().signal;

// ─── LocalRuntimeEngine ─────────────────────────────────────────────────────────

describe("LocalRuntimeEngine", () => {
  it("should post the backend to the initialize endpoint", async () => {
    const fetchFn = makeFetch(json({ ok: true }));
    await makeEngine(fetchFn).initialize(Backend.GPU);
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe("http://runtime.test:8600/initialize");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"backend":"gpu"}');
  });

  it("should map HTTP 507 during initialize to out-of-memory", async () => {
    const engine = makeEngine(makeFetch(json({ message: "vram exhausted" }, 507)));
    const err = await engine.initialize(Backend.GPU).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(OutOfMemoryError);
    expect(err).toHaveProperty("message", "Runtime initialize on gpu: vram exhausted");
    expect(err).toHaveProperty("backend", Backend.GPU);
  });

  it("should map an out_of_memory error code regardless of status", async () => {
    const engine = makeEngine(makeFetch(json({ error: "out_of_memory" }, 500)));
    await expect(engine.initialize(Backend.GPU)).rejects.toBeInstanceOf(OutOfMemoryError);
  });

  it("should send the image with the work type header and parse the analysis", async () => {
    const fetchFn = makeFetch(
      json({
        hazards: [{ type: "fire", severity: "critical", description: "Open flame near fuel", confidence: 0.7 }],
        confidence: 0.7,
      }),
    );
    const image = Buffer.from("jpeg-bytes");
    const s = signal();
    const analysis = await makeEngine(fetchFn).run(image, WorkType.WELDING, s);

    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe("http://runtime.test:8600/analyze");
    expect(init?.headers).toEqual({ "Content-Type": "application/octet-stream", "X-Work-Type": "welding" });
    expect(init?.body).toBe(image);
    expect(init?.signal).toBe(s);

    expect(analysis.analysisType).toBe(AnalysisType.ON_DEVICE_MULTIMODAL);
    expect(analysis.overallRiskLevel).toBe("severe");
    expect(analysis.analyzedAt).toBe("2026-02-02T00:00:00.000Z");
  });

  it("should map a thermal 503 to thermal throttling", async () => {
    const engine = makeEngine(makeFetch(json({ error: "thermal", thermalState: "critical", message: "too hot" }, 503)));
    const attempt = engine.run(Buffer.from("x"), WorkType.OTHER, signal());
    await expect(attempt).rejects.toBeInstanceOf(ThermalThrottlingError);
  });

  it("should map other failures, including plain-text bodies, to inference errors", async () => {
    const engine = makeEngine(makeFetch(new Response("model crashed", { status: 500 })));
    await expect(engine.run(Buffer.from("x"), WorkType.OTHER, signal())).rejects.toThrow(
      "Runtime analyze failed with HTTP 500: model crashed",
    );
  });

  it("should post to the release endpoint", async () => {
    const fetchFn = makeFetch(json({ ok: true }));
    await makeEngine(fetchFn).release();
    expect(fetchFn.mock.calls[0][0]).toBe("http://runtime.test:8600/release");
  });
});

// ─── LocalDetectorClient ────────────────────────────────────────────────────────

describe("LocalDetectorClient", () => {
  it("should return validated detections", async () => {
    const detections = [{ label: "person", score: 0.9, box: { left: 0.1, top: 0.1, width: 0.2, height: 0.5 } }];
    const fetchFn = makeFetch(json({ detections }));
    const client = new LocalDetectorClient({ baseUrl: "http://detector.test/v1/", fetchFn });
    expect(await client.detect(Buffer.from("x"), signal())).toEqual(detections);
    expect(fetchFn.mock.calls[0][0]).toBe("http://detector.test/v1/detect");
  });

  it("should reject a reply with an invalid shape", async () => {
    const client = new LocalDetectorClient({
      baseUrl: "http://detector.test",
      fetchFn: makeFetch(json({ boxes: [] })),
    });
    await expect(client.detect(Buffer.from("x"), signal())).rejects.toThrow("Detector reply has an invalid shape");
  });

  it("should raise an inference error for failed requests", async () => {
    const client = new LocalDetectorClient({
      baseUrl: "http://detector.test",
      fetchFn: makeFetch(json({ message: "busy" }, 429)),
    });
    const attempt = client.detect(Buffer.from("x"), signal());
    await expect(attempt).rejects.toBeInstanceOf(InferenceError);
  });
});
