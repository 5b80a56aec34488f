// Site Safety Dispatcher - Express Server
// HTTP surface over one AnalysisCoordinator: photo analysis, health, stats and
// the operator controls (detection thresholds, emergency strategy switch).

import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { z } from "zod";
import type { AnalysisCoordinator } from "./analysis-coordinator.js";
import { isAnalysisType, isWorkType } from "./config.js";
import { AnalysisError, RateLimitedError, describeError } from "./errors.js";
import type { AnalysisErrorCode } from "./errors.js";
import { createConsoleLogger } from "./logger.js";
import type { Logger } from "./logger.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Largest photo accepted by POST /analyze. */
export const MAX_IMAGE_BYTES = "15mb";

const STATUS_BY_CODE: Partial<Record<AnalysisErrorCode, number>> = {
  validation: 400,
  rate_limited: 429,
  all_strategies_exhausted: 503,
  // only reaches a client that is still connected, e.g. during shutdown
  aborted: 503,
};

const detectionParametersSchema = z.object({
  confidenceThreshold: z.number(),
  iouThreshold: z.number(),
});

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  coordinator: AnalysisCoordinator;
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  coordinator: AnalysisCoordinator;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Stop accepting connections and wait for open ones to finish. */
  close(): Promise<void>;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/**
 * Creates the Express app and HTTP server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const { coordinator, logger = createConsoleLogger("Server") } = options;

  const app = express();
  const httpServer = createServer(app);

  const route =
    (handler: AsyncHandler) =>
    (req: Request, res: Response): void => {
      void handler(req, res).catch((err: unknown) => sendError(res, err, logger));
    };

  app.get("/health", (_req, res) => {
    const health = coordinator.healthCheck();
    res.status(health.overallHealthy ? 200 : 503).json(health);
  });

  app.get(
    "/capability",
    route(async (_req, res) => {
      res.json(await coordinator.getDeviceCapability());
    }),
  );

  app.get("/stats", (_req, res) => {
    res.json(coordinator.getStats());
  });

  app.delete("/stats", (_req, res) => {
    coordinator.resetStats();
    res.status(204).end();
  });

  app.post(
    "/analyze",
    express.raw({ type: () => true, limit: MAX_IMAGE_BYTES }),
    route(async (req, res) => {
      const workType = req.query.workType;
      if (typeof workType !== "string" || !isWorkType(workType)) {
        res.status(400).json(errorBody("validation", `Unknown or missing workType "${String(workType ?? "")}"`));
        return;
      }
      const image = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

      // Client went away before the answer: stop the cascade.
      const controller = new AbortController();
      res.on("close", () => {
        if (!res.writableFinished) controller.abort();
      });

      const analysis = await coordinator.analyze(image, workType, { signal: controller.signal });
      res.json(analysis);
    }),
  );

  app.put("/detection-parameters", express.json(), (req, res) => {
    const parsed = detectionParametersSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(errorBody("validation", "Body must be { confidenceThreshold: number, iouThreshold: number }"));
      return;
    }
    try {
      coordinator.updateDetectionParameters(parsed.data.confidenceThreshold, parsed.data.iouThreshold);
    } catch (err) {
      sendError(res, err, logger);
      return;
    }
    res.json(parsed.data);
  });

  app.post("/strategies/:analysisType/:action", (req, res) => {
    const { analysisType, action } = req.params;
    if (!isAnalysisType(analysisType)) {
      res.status(404).json(errorBody("validation", `Unknown strategy "${analysisType}"`));
      return;
    }
    if (action !== "enable" && action !== "disable") {
      res.status(404).json(errorBody("validation", `Unknown action "${action}"`));
      return;
    }
    coordinator.setStrategyEnabled(analysisType, action === "enable");
    res.json({ analysisType, enabled: coordinator.isStrategyEnabled(analysisType) });
  });

  // Body parser failures (malformed JSON, oversized photo) arrive here.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status =
      typeof err === "object" && err !== null && "status" in err && typeof err.status === "number" ? err.status : 500;
    if (status >= 500) logger.error(`Unhandled request error: ${describeError(err)}`);
    res.status(status).json(errorBody(status === 413 ? "validation" : "internal", describeError(err)));
  });

  return {
    app,
    httpServer,
    coordinator,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
        httpServer.on("error", reject);
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    },
  };
}

// ─── Error Responses ────────────────────────────────────────────────────────────

export interface ErrorBody {
  error: { code: AnalysisErrorCode | "internal"; message: string };
}

function errorBody(code: AnalysisErrorCode | "internal", message: string): ErrorBody {
  return { error: { code, message } };
}

/** HTTP status for an error thrown by the coordinator. */
export function statusForError(err: unknown): number {
  if (err instanceof AnalysisError) return STATUS_BY_CODE[err.code] ?? 500;
  return 500;
}

function sendError(res: Response, err: unknown, logger: Logger): void {
  if (res.headersSent) {
    logger.error(`Error after response started: ${describeError(err)}`);
    return;
  }

  const status = statusForError(err);
  if (err instanceof RateLimitedError) {
    res.setHeader("Retry-After", String(Math.max(1, Math.ceil(err.retryAfterMs / 1000))));
  }
  if (err instanceof AnalysisError && err.code === "aborted") logger.info(`Analysis aborted: ${err.message}`);
  else if (status === 500) logger.error(`Request failed: ${describeError(err)}`);
  else logger.warn(`Request failed (${status}): ${describeError(err)}`);

  res
    .status(status)
    .json(errorBody(err instanceof AnalysisError ? err.code : "internal", describeError(err)));
}
