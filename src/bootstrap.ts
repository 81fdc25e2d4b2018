/**
 * Wire configuration, logging, registry, cache and engine together
 */

import type { ToolgateConfig } from "./core/config";
import { EventBus } from "./core/eventBus";
import { Logger, bridgeEventBus } from "./core/logger";
import { ExecutionEngine, ResultCache, ToolRegistry } from "./core/tool-engine";
import { registerBuiltinTools } from "./core/tools/builtinTools";

export interface Application {
  config: ToolgateConfig;
  eventBus: EventBus;
  logger: Logger;
  registry: ToolRegistry;
  engine: ExecutionEngine;
  /** Abort in-flight work, detach the log bridge and flush the logger. */
  dispose: () => Promise<void>;
}

export interface CreateApplicationOptions {
  /** Replaces the logger built from config.logging. */
  logger?: Logger;
  /** Skip the built-in tools. */
  builtinTools?: boolean;
}

export function createApplication(config: ToolgateConfig, options: CreateApplicationOptions = {}): Application {
  const logger =
    options.logger ??
    Logger.create({
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.file,
      source: "toolgate",
    });

  const eventBus = new EventBus();
  const detachLogBridge = bridgeEventBus(eventBus, logger.child({ component: "events" }));

  const registry = new ToolRegistry({
    eventBus,
    defaults: {
      timeoutMs: config.tools.timeoutMs,
      maxRetries: config.tools.retryAttempts,
      retryDelayMs: config.tools.retryDelayMs,
      cacheTtlMs: config.cache.ttlMs,
    },
  });

  const cache = config.cache.enabled
    ? new ResultCache({
        maxSize: config.cache.maxSize,
        defaultTtlMs: config.cache.ttlMs,
        onEvict: (key) => logger.debug("Cache entry evicted", { key }),
      })
    : undefined;

  const engine = new ExecutionEngine({ registry, cache, eventBus, logger: logger.child({ component: "engine" }) });

  if (options.builtinTools !== false) {
    registerBuiltinTools(registry, { workspaceRoot: config.workspaceRoot });
  }

  return {
    config,
    eventBus,
    logger,
    registry,
    engine,
    dispose: async () => {
      engine.shutdown();
      detachLogBridge();
      await logger.flush();
    },
  };
}
