/**
 * Tool Execution Engine
 *
 * Per invocation:
 *   Received → Validated → CacheCheck → (CacheHit | Dispatching) → (Succeeded | Failed)
 *
 * `invoke` never throws; every outcome is an InvocationResult. Concurrent
 * calls are independent, including identical ones that miss the cache
 * together.
 */

import { ulid } from "ulid";
import {
  CancelledError,
  ErrorPayload,
  ExecutionError,
  InternalError,
  NotFoundError,
  ToolgateError,
  ValidationError,
  toErrorPayload,
} from "../errors";
import { EventBus } from "../eventBus";
import { Logger } from "../logger";
import { redactArguments } from "../logger/formatters";
import type {
  ArgumentValue,
  InvocationResult,
  InvocationState,
  StateTransition,
  ToolArguments,
  ToolSummary,
} from "../types";
import { CacheStats, ResultCache, cacheKey } from "./resultCache";
import { executeWithPolicy } from "./retryPolicy";
import { ToolRegistry } from "./toolRegistry";

export interface ExecutionEngineOptions {
  registry: ToolRegistry;
  /** Omit to disable result caching entirely. */
  cache?: ResultCache;
  eventBus?: EventBus;
  logger?: Logger;
}

export interface InvokeOptions {
  signal?: AbortSignal;
}

export interface EngineStats {
  tools: number;
  inFlight: number;
  cache: CacheStats | null;
}

/**
 * Combine several abort signals into one.
 */
function linkSignals(signals: Array<AbortSignal | undefined>): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  for (const s of signals) {
    if (!s) continue;
    if (s.aborted) {
      controller.abort(s.reason);
      break;
    }
    const onAbort = () => controller.abort(s.reason);
    s.addEventListener("abort", onAbort, { once: true });
    cleanups.push(() => s.removeEventListener("abort", onAbort));
  }

  return {
    signal: controller.signal,
    dispose: () => cleanups.forEach(fn => fn()),
  };
}

export class ExecutionEngine {
  private readonly registry: ToolRegistry;
  private readonly cache?: ResultCache;
  private readonly eventBus: EventBus;
  private readonly logger: Logger;
  private readonly shutdownController = new AbortController();
  private inFlight = 0;

  constructor(options: ExecutionEngineOptions) {
    this.registry = options.registry;
    this.cache = options.cache;
    this.eventBus = options.eventBus ?? new EventBus();
    this.logger = options.logger ?? Logger.create({ level: "silent" });
  }

  async invoke(
    toolName: string,
    args: ToolArguments,
    requestId: string = ulid(),
    options: InvokeOptions = {}
  ): Promise<InvocationResult> {
    const startedAt = performance.now();
    const elapsed = () => Math.round(performance.now() - startedAt);
    const transitions: StateTransition[] = [];
    const enter = (state: InvocationState) => transitions.push({ state, atMs: elapsed() });

    const fail = (error: ToolgateError): InvocationResult => {
      enter("Failed");
      const payload: ErrorPayload = toErrorPayload(error);
      const durationMs = elapsed();
      this.eventBus.emit("ToolErrorEvent", { toolName, requestId, durationMs, error: payload });
      this.logger.traceToolExecution(toolName, args, durationMs, false, payload.message, { requestId });
      return { ok: false, requestId, toolName, error: payload, fromCache: false, durationMs, transitions };
    };

    const succeed = (value: ArgumentValue, fromCache: boolean): InvocationResult => {
      enter("Succeeded");
      const durationMs = elapsed();
      this.eventBus.emit("ToolResultEvent", { toolName, requestId, durationMs, value });
      this.logger.traceToolExecution(toolName, args, durationMs, true, undefined, { requestId, fromCache });
      return { ok: true, requestId, toolName, value, fromCache, durationMs, transitions };
    };

    enter("Received");
    this.inFlight++;
    const linked = linkSignals([this.shutdownController.signal, options.signal]);

    try {
      if (!this.registry.has(toolName)) {
        return fail(new NotFoundError(toolName));
      }
      const { descriptor, handler } = this.registry.lookup(toolName);

      const input = this.registry.validator.validateInput(descriptor, args);
      if (!input.ok) {
        return fail(new ValidationError(input.violations, toolName));
      }
      enter("Validated");

      enter("CacheCheck");
      const useCache = descriptor.cacheable && this.cache !== undefined;
      const key = useCache ? cacheKey(toolName, descriptor.version, args) : undefined;
      if (key !== undefined) {
        const cached = this.cache?.get(key);
        if (cached !== undefined) {
          enter("CacheHit");
          this.eventBus.emit("ToolCacheHitEvent", { toolName, requestId });
          return succeed(cached, true);
        }
      }

      enter("Dispatching");
      this.eventBus.emit("ToolInvocationEvent", { toolName, requestId, args: redactArguments(args) });
      const toolLogger = this.logger.child({ toolName, requestId });

      let value: ArgumentValue;
      try {
        value = await executeWithPolicy(handler, args, {
          toolName,
          requestId,
          timeoutMs: descriptor.timeoutMs,
          maxRetries: descriptor.maxRetries,
          retryDelayMs: descriptor.retryDelayMs,
          logger: toolLogger,
          signal: linked.signal,
          onRetry: (failure) =>
            this.eventBus.emit("ToolRetryEvent", {
              toolName,
              requestId,
              attempt: failure.attempt,
              error: failure.message,
            }),
        });
      } catch (error: unknown) {
        if (error instanceof ExecutionError || error instanceof CancelledError) {
          return fail(error);
        }
        throw error;
      }

      const output = this.registry.validator.validateOutput(descriptor, value);
      if (!output.ok) {
        const violations = output.violations.map(v => v.message);
        toolLogger.warn("Tool output does not match its declared schema", { violations });
        this.eventBus.emit("OutputContractEvent", { toolName, requestId, violations });
      }

      if (key !== undefined) {
        this.cache?.put(key, value, descriptor.cacheTtlMs);
      }
      return succeed(value, false);
    } catch (error: unknown) {
      this.logger.error(error instanceof Error ? error : new Error(String(error)), { toolName, requestId });
      return fail(
        error instanceof ToolgateError ? error : new InternalError(`Unexpected engine fault while running ${toolName}`, error)
      );
    } finally {
      linked.dispose();
      this.inFlight--;
    }
  }

  listTools(): ToolSummary[] {
    return this.registry.list().map(d => ({
      name: d.name,
      description: d.description,
      version: d.version,
      tags: [...d.tags],
      inputSchema: d.inputSchema,
      outputSchema: d.outputSchema,
      timeoutMs: d.timeoutMs,
      maxRetries: d.maxRetries,
      cacheable: d.cacheable,
    }));
  }

  /**
   * Drop cached results for one call (when `args` is given) or for every call
   * of a tool. Returns the number of entries removed.
   *
   * @throws NotFoundError
   */
  invalidate(toolName: string, args?: ToolArguments): number {
    const { descriptor } = this.registry.lookup(toolName);
    if (!this.cache) return 0;
    if (args === undefined) return this.cache.invalidateTool(toolName);
    return this.cache.invalidate(cacheKey(toolName, descriptor.version, args)) ? 1 : 0;
  }

  clearCache(): void {
    this.cache?.clear();
  }

  stats(): EngineStats {
    return {
      tools: this.registry.size,
      inFlight: this.inFlight,
      cache: this.cache ? this.cache.stats() : null,
    };
  }

  /**
   * Abort every in-flight invocation. Later invocations fail with CANCELLED.
   */
  shutdown(reason: string = "engine shutting down"): void {
    this.shutdownController.abort(new CancelledError(reason));
  }

  get isShutdown(): boolean {
    return this.shutdownController.signal.aborted;
  }
}

export { ToolRegistry, DEFAULT_TOOL_DEFAULTS } from "./toolRegistry";
export type { ToolDefaults, ToolRegistryOptions } from "./toolRegistry";
export { ResultCache, cacheKey } from "./resultCache";
export type { CacheEntry, CacheStats, ResultCacheOptions } from "./resultCache";
export { SchemaValidator } from "./validator";
export type { ValidationOutcome } from "./validator";
export { executeWithPolicy, runWithTimeout, sleep } from "./retryPolicy";
export { ToolArgumentsSchema, ArgumentValueSchema, ToolDescriptorInputSchema } from "./toolSchema";
