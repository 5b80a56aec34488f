import { describe, it, expect, vi } from "vitest";
import type { Mock } from "vitest";
import { buildMessages, CloudVisionStrategy, detectImageMimeType } from "./cloud-strategy.js";
import type { OpenAIVisionClient } from "./cloud-strategy.js";
import { StaticConnectivity } from "./connectivity.js";
import { ConfigurationError, InferenceError, UnavailableError } from "./errors.js";
import type { Logger } from "./logger.js";
import { AnalysisType, WorkType } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function makeSilentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

type CreateFn = OpenAIVisionClient["chat"]["completions"]["create"];

function makeClient(reply: string | null): { client: OpenAIVisionClient; create: Mock<CreateFn> } {
  const create = vi.fn<CreateFn>(async () => ({ choices: [{ message: { content: reply } }] }));
  return { client: { chat: { completions: { create } } }, create };
}

const PNG = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

const VALID_REPLY = JSON.stringify({
  hazards: [{ type: "electrical", severity: "critical", description: "Open panel", confidence: 0.9 }],
  recommendations: ["Lock out the panel"],
  confidence: 0.88,
});

function makeStrategy(reply: string | null = VALID_REPLY, connected = true) {
  const { client, create } = makeClient(reply);
  const clientFactory = vi.fn((_apiKey: string) => client);
  const connectivity = new StaticConnectivity(connected);
  const strategy = new CloudVisionStrategy({
    clientFactory,
    connectivity,
    model: "vision-test-model",
    logger: makeSilentLogger(),
    now: () => new Date("2026-04-01T12:00:00.000Z"),
  });
  return { strategy, create, clientFactory, connectivity };
}

// ─── Prompt building ────────────────────────────────────────────────────────────

describe("detectImageMimeType", () => {
  it("should sniff PNG and WebP and default to JPEG", () => {
    expect(detectImageMimeType(PNG)).toBe("image/png");
    expect(detectImageMimeType(Buffer.from("RIFF\0\0\0\0WEBPVP8 ", "latin1"))).toBe("image/webp");
    expect(detectImageMimeType(Buffer.from([0xff, 0xd8, 0xff]))).toBe("image/jpeg");
  });
});

describe("buildMessages", () => {
  it("should embed the image as a base64 data URL after the system prompt", () => {
    const messages = buildMessages(PNG, WorkType.STEEL_WORK, "low");
    expect(messages[0].role).toBe("system");
    expect(messages[0].content).toContain("Work type: steel work.");
    expect(messages[1]).toEqual({
      role: "user",
      content: [
        { type: "text", text: "Analyze this photo for safety hazards." },
        { type: "image_url", image_url: { url: `data:image/png;base64,${PNG.toString("base64")}`, detail: "low" } },
      ],
    });
  });
});

// ─── Strategy ───────────────────────────────────────────────────────────────────

describe("CloudVisionStrategy", () => {
  it("should fail configuration without an API key", async () => {
    const { strategy, clientFactory } = makeStrategy();
    await expect(strategy.configure()).rejects.toBeInstanceOf(ConfigurationError);
    expect(clientFactory).not.toHaveBeenCalled();
    expect(strategy.isAvailable()).toBe(false);
  });

  it("should build the client from the supplied key", async () => {
    const { strategy, clientFactory } = makeStrategy();
    await strategy.configure("test-secret");
    expect(clientFactory).toHaveBeenCalledWith("test-secret");
    expect(strategy.isAvailable()).toBe(true);
  });

  it("should use the key given at construction when configure gets none", async () => {
    const { client } = makeClient(VALID_REPLY);
    const clientFactory = vi.fn((_apiKey: string) => client);
    const strategy = new CloudVisionStrategy({
      clientFactory,
      connectivity: new StaticConnectivity(),
      apiKey: "test-secret",
      logger: makeSilentLogger(),
    });
    await strategy.configure();
    expect(clientFactory).toHaveBeenCalledWith("test-secret");
  });

  it("should be unavailable while offline", async () => {
    const { strategy, connectivity } = makeStrategy(VALID_REPLY, false);
    await strategy.configure("test-secret");
    expect(strategy.isAvailable()).toBe(false);
    await expect(
      strategy.analyze(PNG, WorkType.OTHER, new AbortController().signal),
    ).rejects.toThrow("Cloud vision unavailable: no network connectivity");
    connectivity.isConnected = true;
    expect(strategy.isAvailable()).toBe(true);
  });

  it("should request JSON mode with the caller's signal and parse the reply", async () => {
    const { strategy, create } = makeStrategy();
    await strategy.configure("test-secret");
    const signal = new AbortController().signal;
    const analysis = await strategy.analyze(PNG, WorkType.ELECTRICAL, signal);

    const [params, options] = create.mock.calls[0];
    expect(params.model).toBe("vision-test-model");
    expect(params.response_format).toEqual({ type: "json_object" });
    expect(options).toEqual({ signal });

    expect(analysis.analysisType).toBe(AnalysisType.CLOUD_VISION);
    expect(analysis.workType).toBe(WorkType.ELECTRICAL);
    expect(analysis.overallRiskLevel).toBe("severe");
    expect(analysis.confidence).toBe(0.88);
    expect(analysis.analyzedAt).toBe("2026-04-01T12:00:00.000Z");
  });

  it("should raise an inference error for an empty reply", async () => {
    const { strategy } = makeStrategy(null);
    await strategy.configure("test-secret");
    await expect(strategy.analyze(PNG, WorkType.OTHER, new AbortController().signal)).rejects.toThrow(
      "Cloud vision returned an empty response",
    );
  });

  it("should raise an inference error for a malformed reply", async () => {
    const { strategy } = makeStrategy('{"findings": []}');
    await strategy.configure("test-secret");
    await expect(
      strategy.analyze(PNG, WorkType.OTHER, new AbortController().signal),
    ).rejects.toBeInstanceOf(InferenceError);
  });

  it("should classify rejected credentials as a configuration error", async () => {
    const { strategy, create } = makeStrategy();
    create.mockRejectedValueOnce(Object.assign(new Error("Incorrect API key"), { status: 401 }));
    await strategy.configure("test-secret");
    await expect(strategy.analyze(PNG, WorkType.OTHER, new AbortController().signal)).rejects.toThrow(
      "Cloud vision rejected the API key (401)",
    );
  });

  it("should wrap other request failures as inference errors", async () => {
    const { strategy, create } = makeStrategy();
    create.mockRejectedValueOnce(new Error("socket hang up"));
    await strategy.configure("test-secret");
    const attempt = strategy.analyze(PNG, WorkType.OTHER, new AbortController().signal);
    await expect(attempt).rejects.toBeInstanceOf(InferenceError);
  });

  it("should be unavailable before configuration and after release", async () => {
    const { strategy } = makeStrategy();
    await expect(
      strategy.analyze(PNG, WorkType.OTHER, new AbortController().signal),
    ).rejects.toBeInstanceOf(UnavailableError);
    await strategy.configure("test-secret");
    await strategy.release();
    expect(strategy.isAvailable()).toBe(false);
  });
});
