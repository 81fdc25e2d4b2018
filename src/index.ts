/**
 * Bootstrap core + server
 */

import "dotenv/config";
import { createApplication } from "./bootstrap";
import { LoadConfigOptions, loadConfig } from "./core/config";
import { RunningServer, startServer } from "./server";

export interface ServeHandle {
  running: RunningServer;
  shutdown: () => Promise<void>;
}

/**
 * Load configuration, start the server and install signal handlers.
 */
export async function serve(options: LoadConfigOptions = {}): Promise<ServeHandle> {
  const config = loadConfig(options);
  const app = createApplication(config);
  const { logger } = app;

  logger.info("Starting Toolgate", {
    host: config.host,
    port: config.port,
    logLevel: config.logging.level,
    cacheEnabled: config.cache.enabled,
    workspaceRoot: config.workspaceRoot,
  });

  const running = await startServer({
    engine: app.engine,
    eventBus: app.eventBus,
    logger,
    config,
  });

  const shutdown = async () => {
    logger.info("Shutting down");
    await app.dispose();
    await running.close();
  };

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info("Received signal", { signal });
    shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.fatal(error instanceof Error ? error : new Error(String(error)));
        process.exit(1);
      });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  return { running, shutdown };
}

export { createApplication } from "./bootstrap";
export type { Application, CreateApplicationOptions } from "./bootstrap";
export { loadConfig, validateConfig, DEFAULT_CONFIG } from "./core/config";
export type { ToolgateConfig, ConfigOverrides, LoadConfigOptions } from "./core/config";
export * from "./core/errors";
export { EventBus } from "./core/eventBus";
export type { EventEnvelope, EventPayloads, EventType } from "./core/eventBus";
export { Logger, bridgeEventBus } from "./core/logger";
export * from "./core/tool-engine";
export * from "./core/tool-engine/arguments";
export type {
  ArgumentValue,
  ToolArguments,
  ToolDescriptor,
  ToolDescriptorInput,
  ToolHandler,
  ToolContext,
  InvocationResult,
  ToolSummary,
} from "./core/types";
export { registerBuiltinTools } from "./core/tools/builtinTools";
export { startServer } from "./server";
export type { RunningServer } from "./server";

if (require.main === module) {
  serve().catch(err => {
    console.error("Fatal error:", err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
