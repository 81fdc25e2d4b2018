/**
 * Pino-based structured logging
 *
 * - pretty output for development, JSON for production
 * - optional file target
 * - Event Bus bridge so engine events land in the log stream
 */

import pino from "pino";
import type { EventBus, EventType } from "../eventBus";
import type { ToolArguments } from "../types";
import { LoggerConfig, resolveLoggerConfig } from "./config";
import { redactArguments } from "./formatters";

export interface LoggerContext {
  requestId?: string;
  toolName?: string;
  connectionId?: string;
  correlationId?: string;
  [key: string]: unknown;
}

type Level = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

function buildTargets(config: LoggerConfig): pino.TransportTargetOptions[] {
  const targets: pino.TransportTargetOptions[] = [];
  if (config.level === "silent") return targets;

  if (config.format === "pretty") {
    targets.push({
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
      level: config.level,
    });
  } else {
    targets.push({
      target: "pino/file",
      options: { destination: 1 },
      level: config.level,
    });
  }

  if (config.file) {
    targets.push({
      target: "pino/file",
      options: {
        destination: config.file,
        mkdir: true,
      },
      level: config.level,
    });
  }
  return targets;
}

export class Logger {
  private constructor(
    private readonly pinoLogger: pino.Logger,
    private readonly config: LoggerConfig
  ) {}

  /**
   * Build a logger. A destination stream bypasses the transport worker,
   * which is how tests capture output.
   */
  static create(config: Partial<LoggerConfig> = {}, destination?: pino.DestinationStream): Logger {
    const resolved = resolveLoggerConfig(config);
    const options: pino.LoggerOptions = {
      level: resolved.level,
      formatters: {
        log: (obj) => (resolved.source ? { ...obj, source: resolved.source } : obj),
      },
      serializers: {
        err: pino.stdSerializers.err,
      },
    };

    if (destination) {
      return new Logger(pino(options, destination), resolved);
    }
    const targets = buildTargets(resolved);
    if (targets.length === 0) {
      return new Logger(pino(options), resolved);
    }
    return new Logger(pino(options, pino.transport({ targets })), resolved);
  }

  /**
   * Create child logger with context
   */
  child(context: LoggerContext): Logger {
    return new Logger(this.pinoLogger.child(context), this.config);
  }

  get level(): string {
    return this.pinoLogger.level;
  }

  trace(message: string, context?: LoggerContext): void {
    this.pinoLogger.trace(context ?? {}, message);
  }

  debug(message: string, context?: LoggerContext): void {
    this.pinoLogger.debug(context ?? {}, message);
  }

  info(message: string, context?: LoggerContext): void {
    this.pinoLogger.info(context ?? {}, message);
  }

  warn(message: string, context?: LoggerContext): void {
    this.pinoLogger.warn(context ?? {}, message);
  }

  error(message: string | Error, context?: LoggerContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.error({ ...context, err: error }, error.message);
  }

  fatal(message: string | Error, context?: LoggerContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.fatal({ ...context, err: error }, error.message);
  }

  /**
   * Tool execution tracing. Failures log at warn, successes at debug.
   */
  traceToolExecution(
    toolName: string,
    args: ToolArguments,
    durationMs: number,
    success: boolean,
    error?: string,
    context?: LoggerContext
  ): void {
    const level: Level = success ? "debug" : "warn";
    this.pinoLogger[level](
      {
        ...context,
        toolName,
        args: redactArguments(args),
        durationMs,
        success,
        error,
        type: "tool_execution",
      },
      `Tool ${toolName} ${success ? "succeeded" : "failed"} (${durationMs}ms)`
    );
  }

  traceRequest(method: string, url: string, statusCode: number, durationMs: number): void {
    const level: Level = statusCode >= 400 ? "warn" : "info";
    this.pinoLogger[level](
      { method, url, statusCode, durationMs, type: "request" },
      `${method} ${url} ${statusCode} (${durationMs}ms)`
    );
  }

  async flush(): Promise<void> {
    await new Promise<void>((resolve) => {
      this.pinoLogger.flush(() => resolve());
    });
  }
}

const EVENT_LEVELS: ReadonlyArray<{ event: EventType; level: Level; message: string }> = [
  { event: "ToolRegisteredEvent", level: "info", message: "Tool registered" },
  { event: "ToolInvocationEvent", level: "debug", message: "Tool invoked" },
  { event: "ToolRetryEvent", level: "warn", message: "Tool attempt failed, retrying" },
  { event: "ToolCacheHitEvent", level: "debug", message: "Tool result served from cache" },
  { event: "ToolResultEvent", level: "debug", message: "Tool completed" },
  { event: "ToolErrorEvent", level: "warn", message: "Tool error" },
  { event: "OutputContractEvent", level: "warn", message: "Tool output does not match its declared schema" },
  { event: "ConnectionEvent", level: "info", message: "WebSocket connection changed" },
  { event: "ListenerErrorEvent", level: "error", message: "Event listener failed" },
];

/**
 * Mirror Event Bus traffic into the log. Returns a detach function.
 */
export function bridgeEventBus(eventBus: EventBus, logger: Logger): () => void {
  const wanted = new Map(EVENT_LEVELS.map(m => [m.event, m]));
  const listener = (evt: { id: string; type: EventType; payload: unknown }) => {
    const mapping = wanted.get(evt.type);
    if (!mapping) return;
    const context: LoggerContext = { event: evt.type, payload: evt.payload, correlationId: evt.id, type: "eventbus" };
    switch (mapping.level) {
      case "warn":
        logger.warn(mapping.message, context);
        break;
      case "error":
        logger.error(mapping.message, context);
        break;
      case "info":
        logger.info(mapping.message, context);
        break;
      default:
        logger.debug(mapping.message, context);
    }
  };
  eventBus.onAny(listener);
  return () => eventBus.offAny(listener);
}

export type { LoggerConfig, LogLevel, LogFormat } from "./config";
export { DEFAULT_LOGGER_CONFIG, resolveLoggerConfig, parseLogLevel, parseLogFormat } from "./config";
