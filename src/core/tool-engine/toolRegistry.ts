/**
 * Tool Registry: name → (descriptor, handler).
 *
 * Written during startup, read by every invocation. Descriptors are frozen on
 * insertion and never replaced; there is no unregister.
 */

import { DuplicateNameError, InvalidDescriptorError, NotFoundError } from "../errors";
import type { EventBus } from "../eventBus";
import { MAX_TIMER_MS, parseDurationMs } from "../utils/duration";
import type {
  DurationInput,
  JsonSchema,
  RegisteredTool,
  ToolDescriptor,
  ToolDescriptorInput,
  ToolHandler,
} from "../types";
import { ToolDescriptorInputSchema } from "./toolSchema";
import { SchemaValidator } from "./validator";

export interface ToolDefaults {
  version: string;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  cacheable: boolean;
  cacheTtlMs: number;
}

export const DEFAULT_TOOL_DEFAULTS: ToolDefaults = {
  version: "1.0.0",
  timeoutMs: 30_000,
  maxRetries: 3,
  retryDelayMs: 1_000,
  cacheable: true,
  cacheTtlMs: 3_600_000,
};

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) deepFreeze(nested);
  }
  return value;
}

export interface ToolRegistryOptions {
  defaults?: Partial<ToolDefaults>;
  validator?: SchemaValidator;
  eventBus?: EventBus;
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly defaults: ToolDefaults;
  private readonly eventBus?: EventBus;
  readonly validator: SchemaValidator;

  constructor(options: ToolRegistryOptions = {}) {
    this.defaults = { ...DEFAULT_TOOL_DEFAULTS, ...options.defaults };
    this.validator = options.validator ?? new SchemaValidator();
    this.eventBus = options.eventBus;
  }

  /**
   * @throws DuplicateNameError when the name is taken
   * @throws InvalidDescriptorError when the descriptor is malformed
   */
  register(input: ToolDescriptorInput, handler: ToolHandler): ToolDescriptor {
    if (this.tools.has(input.name)) {
      throw new DuplicateNameError(input.name);
    }

    const descriptor = this.normalize(input);
    this.tools.set(descriptor.name, { descriptor, handler });

    this.eventBus?.emit("ToolRegisteredEvent", {
      toolName: descriptor.name,
      version: descriptor.version,
      cacheable: descriptor.cacheable,
    });
    return descriptor;
  }

  /**
   * @throws NotFoundError
   */
  lookup(name: string): RegisteredTool {
    const tool = this.tools.get(name);
    if (!tool) throw new NotFoundError(name);
    return tool;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Descriptors in registration order.
   */
  list(): ToolDescriptor[] {
    return Array.from(this.tools.values(), t => t.descriptor);
  }

  get size(): number {
    return this.tools.size;
  }

  private normalize(input: ToolDescriptorInput): ToolDescriptor {
    const parsed = ToolDescriptorInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidDescriptorError(
        input.name,
        parsed.error.errors.map(e => `${e.path.join(".") || "descriptor"}: ${e.message}`)
      );
    }
    const def = parsed.data;
    const problems: string[] = [];

    const duration = (value: DurationInput | undefined, fallback: number, field: string): number => {
      if (value === undefined) return fallback;
      const ms = parseDurationMs(value);
      if (ms === undefined) {
        problems.push(`${field}: not a duration (${JSON.stringify(value)})`);
        return fallback;
      }
      return ms;
    };

    const timeoutMs = duration(def.timeout, this.defaults.timeoutMs, "timeout");
    const retryDelayMs = duration(def.retryDelay, this.defaults.retryDelayMs, "retryDelay");
    const cacheTtlMs = duration(def.cacheTtl, this.defaults.cacheTtlMs, "cacheTtl");

    if (timeoutMs <= 0) problems.push(`timeout: must be positive, got ${timeoutMs}ms`);
    if (timeoutMs > MAX_TIMER_MS) problems.push(`timeout: must be at most ${MAX_TIMER_MS}ms, got ${timeoutMs}ms`);
    if (retryDelayMs < 0) problems.push(`retryDelay: must not be negative, got ${retryDelayMs}ms`);
    if (retryDelayMs > MAX_TIMER_MS) {
      problems.push(`retryDelay: must be at most ${MAX_TIMER_MS}ms, got ${retryDelayMs}ms`);
    }
    if (cacheTtlMs < 0) problems.push(`cacheTtl: must not be negative, got ${cacheTtlMs}ms`);

    // private frozen copies; later edits to the caller's objects change nothing here
    const ownSchema = (schema: JsonSchema, field: string): JsonSchema => {
      try {
        const copy = deepFreeze(structuredClone(schema));
        this.validator.assertSchema(copy);
        return copy;
      } catch (error: unknown) {
        problems.push(`${field}: ${error instanceof Error ? error.message : String(error)}`);
        return schema;
      }
    };
    const inputSchema = ownSchema(def.inputSchema, "inputSchema");
    const outputSchema = ownSchema(def.outputSchema ?? {}, "outputSchema");

    if (problems.length > 0) {
      throw new InvalidDescriptorError(def.name, problems);
    }

    return Object.freeze({
      name: def.name,
      description: def.description,
      version: def.version ?? this.defaults.version,
      tags: Object.freeze([...new Set(def.tags ?? [])]),
      inputSchema,
      outputSchema,
      timeoutMs,
      maxRetries: def.maxRetries ?? this.defaults.maxRetries,
      retryDelayMs,
      cacheable: def.cacheable ?? this.defaults.cacheable,
      cacheTtlMs,
    });
  }
}
