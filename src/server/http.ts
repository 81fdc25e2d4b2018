import express, { NextFunction, Request, Response, Router } from "express";
import cors from "cors";
import bodyParser from "body-parser";
import { InternalError, ProtocolError, ToolgateError, toErrorPayload } from "../core/errors";
import type { Logger } from "../core/logger";
import type { ExecutionEngine } from "../core/tool-engine";
import { RateLimiter, rateLimit } from "./middleware/rateLimit";
import { dispatchRpc, parseRpcRequest, statusForResponse } from "./protocol";

export const SERVICE_NAME = "toolgate";
export const SERVICE_VERSION = "1.0.0";

export interface HttpServerDeps {
  engine: ExecutionEngine;
  logger: Logger;
  routes: { tools: Router; events: Router };
  allowedOrigins: string[];
  /** Omit to disable rate limiting. */
  rateLimiter?: RateLimiter;
  /** Include causes of internal errors in responses. */
  debug?: boolean;
  activeConnections: () => number;
}

export function createHttpServer(deps: HttpServerDeps) {
  const app = express();
  const { engine, logger } = deps;

  const allowAny = deps.allowedOrigins.includes("*");
  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || allowAny || deps.allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          callback(null, false);
        }
      },
    })
  );

  app.use((req, res, next) => {
    const started = performance.now();
    res.on("finish", () => {
      logger.traceRequest(req.method, req.originalUrl, res.statusCode, Math.round(performance.now() - started));
    });
    next();
  });

  app.use(bodyParser.json({ limit: "1mb" }));

  if (deps.rateLimiter) {
    app.use(rateLimit(deps.rateLimiter));
  }

  // Root route - API info
  app.get("/", (req, res) => {
    res.json({
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      status: "running",
      endpoints: {
        health: "GET /health",
        listTools: "GET /tools",
        describeTool: "GET /tools/:name",
        invoke: "POST /tools/invoke",
        rpc: "POST /rpc",
        events: "GET /events/history",
        clearCache: "DELETE /tools/cache",
        invalidateTool: "DELETE /tools/:name/cache",
        websocket: "WS /ws",
      },
    });
  });

  // Health check endpoint
  app.get("/health", (req, res) => {
    const stats = engine.stats();
    res.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      activeConnections: deps.activeConnections(),
      registeredTools: stats.tools,
      inFlight: stats.inFlight,
      cache: stats.cache,
    });
  });

  app.post("/rpc", (req, res, next) => {
    const parsed = parseRpcRequest(req.body);
    if (!parsed.ok) {
      res.status(statusForResponse(parsed.response)).json(parsed.response);
      return;
    }
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableEnded) controller.abort();
    };
    res.on("close", onClose);

    dispatchRpc(engine, parsed.request, controller.signal)
      .then(response => {
        res.off("close", onClose);
        res.status(statusForResponse(response)).json(response);
      })
      .catch(next);
  });

  // register route modules
  app.use("/tools", deps.routes.tools);
  app.use("/events", deps.routes.events);

  // 404 handler
  app.use((req, res) => {
    const error = new ProtocolError(`Route ${req.method} ${req.path} not found`, "METHOD_NOT_FOUND", {
      method: req.method,
      path: req.path,
    });
    res.status(404).json({ ok: false, error: toErrorPayload(error) });
  });

  // Error handler: body-parser failures carry a 4xx status; everything else is internal
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    let error: ToolgateError;
    if (err instanceof ToolgateError) {
      error = err;
    } else if (isClientError(err)) {
      error = new ProtocolError(err.message, "INVALID_REQUEST");
    } else {
      logger.error(err instanceof Error ? err : new Error(String(err)), { path: req.path });
      error = new InternalError(
        deps.debug && err instanceof Error ? `Internal server error: ${err.message}` : "Internal server error",
        err
      );
    }
    res.status(error.statusCode).json({ ok: false, error: toErrorPayload(error) });
  });

  return app;
}

function isClientError(err: unknown): err is Error & { status: number } {
  return (
    err instanceof Error &&
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 500
  );
}
