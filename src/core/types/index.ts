/**
 * Core type definitions for Toolgate
 */

import type { SchemaObject } from "ajv";
import type { ErrorPayload } from "../errors";
import type { Logger } from "../logger";

/**
 * Tagged argument values: everything a JSON payload can carry.
 */
export type ArgumentValue =
  | string
  | number
  | boolean
  | null
  | ArgumentValue[]
  | { [key: string]: ArgumentValue };

export type ToolArguments = Readonly<Record<string, ArgumentValue>>;

/**
 * JSON Schema document describing a tool's input or output.
 */
export type JsonSchema = SchemaObject;

/** Milliseconds, or a duration string like "500ms", "30s", "2m". */
export type DurationInput = number | string;

/**
 * What callers hand to `ToolRegistry.register`.
 */
export interface ToolDescriptorInput {
  name: string;
  description: string;
  version?: string;
  tags?: string[];
  inputSchema: JsonSchema;
  outputSchema?: JsonSchema;
  timeout?: DurationInput;
  maxRetries?: number;
  retryDelay?: DurationInput;
  cacheable?: boolean;
  cacheTtl?: DurationInput;
}

/**
 * Immutable metadata for a registered tool.
 */
export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly version: string;
  readonly tags: readonly string[];
  readonly inputSchema: JsonSchema;
  readonly outputSchema: JsonSchema;
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly cacheable: boolean;
  readonly cacheTtlMs: number;
}

export interface ToolContext {
  signal: AbortSignal;
  /** 1-based */
  attempt: number;
  requestId: string;
  logger: Logger;
}

export type ToolHandler = (
  args: ToolArguments,
  ctx: ToolContext
) => ArgumentValue | Promise<ArgumentValue>;

export interface RegisteredTool {
  descriptor: ToolDescriptor;
  handler: ToolHandler;
}

export interface InvocationRequest {
  toolName: string;
  arguments: ToolArguments;
  requestId: string;
}

export type InvocationState =
  | "Received"
  | "Validated"
  | "CacheCheck"
  | "CacheHit"
  | "Dispatching"
  | "Succeeded"
  | "Failed";

export interface StateTransition {
  state: InvocationState;
  /** Milliseconds since Received */
  atMs: number;
}

interface InvocationResultBase {
  requestId: string;
  toolName: string;
  durationMs: number;
  transitions: StateTransition[];
}

export interface InvocationSuccess extends InvocationResultBase {
  ok: true;
  value: ArgumentValue;
  fromCache: boolean;
}

export interface InvocationFailure extends InvocationResultBase {
  ok: false;
  error: ErrorPayload;
  fromCache: false;
}

export type InvocationResult = InvocationSuccess | InvocationFailure;

/**
 * Wire shape for enumeration.
 */
export interface ToolSummary {
  name: string;
  description: string;
  version: string;
  tags: string[];
  inputSchema: JsonSchema;
  outputSchema: JsonSchema;
  timeoutMs: number;
  maxRetries: number;
  cacheable: boolean;
}
