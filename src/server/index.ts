import http from "http";
import type { ToolgateConfig } from "../core/config";
import type { EventBus } from "../core/eventBus";
import type { Logger } from "../core/logger";
import type { ExecutionEngine } from "../core/tool-engine";
import { createHttpServer } from "./http";
import { RateLimiter } from "./middleware/rateLimit";
import { eventRoutes } from "./routes/events";
import { toolsRoutes } from "./routes/tools";
import { WS_PATH, createWsServer } from "./websocket";

export interface StartServerDeps {
  engine: ExecutionEngine;
  eventBus: EventBus;
  logger: Logger;
  config: Pick<ToolgateConfig, "host" | "port" | "debug" | "allowedOrigins" | "rateLimit">;
}

export interface RunningServer {
  server: http.Server;
  /** Base HTTP URL with the bound port */
  url: string;
  port: number;
  close: () => Promise<void>;
}

/**
 * Start HTTP + WebSocket on one port. Port 0 binds an ephemeral port.
 */
export async function startServer({ engine, eventBus, logger, config }: StartServerDeps): Promise<RunningServer> {
  const rateLimiter = config.rateLimit.enabled
    ? new RateLimiter({ windowMs: config.rateLimit.windowMs, maxRequests: config.rateLimit.requests })
    : undefined;
  rateLimiter?.start();

  const server = http.createServer();
  const ws = createWsServer(server, { engine, eventBus, logger, rateLimiter });

  const app = createHttpServer({
    engine,
    logger,
    routes: {
      tools: toolsRoutes(engine),
      events: eventRoutes(eventBus),
    },
    allowedOrigins: config.allowedOrigins,
    rateLimiter,
    debug: config.debug,
    activeConnections: ws.activeConnections,
  });
  server.on("request", app);

  await new Promise<void>((resolve, reject) => {
    const onError = (error: NodeJS.ErrnoException) => {
      if (error.code === "EADDRINUSE") {
        logger.fatal(`Port ${config.port} is already in use`, { host: config.host, port: config.port });
      }
      reject(error);
    };
    server.once("error", onError);
    server.listen(config.port, config.host, () => {
      server.off("error", onError);
      resolve();
    });
  });

  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : config.port;
  const url = `http://${config.host}:${port}`;

  logger.info("Toolgate server is running", {
    http: url,
    websocket: `ws://${config.host}:${port}${WS_PATH}`,
    tools: engine.stats().tools,
  });

  let closing: Promise<void> | undefined;
  const close = () => {
    closing ??= (async () => {
      rateLimiter?.stop();
      await ws.close();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      });
      logger.info("Toolgate server stopped");
    })();
    return closing;
  };

  return { server, url, port, close };
}
