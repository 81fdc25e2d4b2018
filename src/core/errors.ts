/**
 * Error taxonomy for Toolgate
 *
 * Every failure that crosses the engine boundary is one of these classes.
 */

export type ErrorCode =
  | "DUPLICATE_NAME"
  | "INVALID_DESCRIPTOR"
  | "NOT_FOUND"
  | "INVALID_ARGUMENTS"
  | "TIMEOUT"
  | "EXECUTION_FAILED"
  | "CANCELLED"
  | "CONFIG_ERROR"
  | "INVALID_REQUEST"
  | "METHOD_NOT_FOUND"
  | "RATE_LIMITED"
  | "INTERNAL_ERROR";

export type ErrorKind =
  | "DuplicateNameError"
  | "InvalidDescriptorError"
  | "NotFoundError"
  | "ValidationError"
  | "TimeoutError"
  | "ExecutionError"
  | "CancelledError"
  | "ConfigError"
  | "ProtocolError"
  | "InternalError";

export type ViolationKind = "missing" | "type" | "enum" | "constraint";

export interface FieldViolation {
  field: string;
  kind: ViolationKind;
  message: string;
}

export interface AttemptFailure {
  attempt: number;
  kind: "TimeoutError" | "ExecutionError";
  message: string;
}

export class ToolgateError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly statusCode: number = 500,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ToolgateError";
    Object.setPrototypeOf(this, ToolgateError.prototype);
  }

  get kind(): ErrorKind {
    return "InternalError";
  }
}

export class DuplicateNameError extends ToolgateError {
  constructor(public readonly toolName: string) {
    super(`Tool already registered: ${toolName}`, "DUPLICATE_NAME", 409, { toolName });
    this.name = "DuplicateNameError";
    Object.setPrototypeOf(this, DuplicateNameError.prototype);
  }

  get kind(): ErrorKind {
    return "DuplicateNameError";
  }
}

export class InvalidDescriptorError extends ToolgateError {
  constructor(toolName: string, public readonly problems: string[]) {
    super(
      `Invalid descriptor for tool ${toolName}: ${problems.join("; ")}`,
      "INVALID_DESCRIPTOR",
      500,
      { toolName, problems }
    );
    this.name = "InvalidDescriptorError";
    Object.setPrototypeOf(this, InvalidDescriptorError.prototype);
  }

  get kind(): ErrorKind {
    return "InvalidDescriptorError";
  }
}

export class NotFoundError extends ToolgateError {
  constructor(public readonly toolName: string) {
    super(`Tool not found: ${toolName}`, "NOT_FOUND", 404, { toolName });
    this.name = "NotFoundError";
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }

  get kind(): ErrorKind {
    return "NotFoundError";
  }
}

export class ValidationError extends ToolgateError {
  constructor(public readonly violations: FieldViolation[], toolName?: string) {
    super(
      `Invalid arguments${toolName ? ` for tool ${toolName}` : ""}: ${violations.map(v => v.message).join("; ")}`,
      "INVALID_ARGUMENTS",
      400,
      toolName ? { toolName, violations } : { violations }
    );
    this.name = "ValidationError";
    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  get kind(): ErrorKind {
    return "ValidationError";
  }
}

export class TimeoutError extends ToolgateError {
  constructor(public readonly timeoutMs: number, public readonly attempt: number) {
    super(`Attempt ${attempt} timed out after ${timeoutMs}ms`, "TIMEOUT", 504, { timeoutMs, attempt });
    this.name = "TimeoutError";
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }

  get kind(): ErrorKind {
    return "TimeoutError";
  }
}

export class ExecutionError extends ToolgateError {
  constructor(
    toolName: string,
    public readonly attempts: number,
    public readonly lastError: Error,
    public readonly failures: AttemptFailure[] = []
  ) {
    super(
      `Tool ${toolName} failed after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${lastError.message}`,
      "EXECUTION_FAILED",
      502,
      {
        toolName,
        attempts,
        cause: { name: lastError.name, message: lastError.message },
        failures,
      },
      { cause: lastError }
    );
    this.name = "ExecutionError";
    Object.setPrototypeOf(this, ExecutionError.prototype);
  }

  get kind(): ErrorKind {
    return "ExecutionError";
  }
}

export class CancelledError extends ToolgateError {
  constructor(reason: string = "Invocation cancelled", public readonly attempts: number = 0) {
    super(reason, "CANCELLED", 499, { attempts });
    this.name = "CancelledError";
    Object.setPrototypeOf(this, CancelledError.prototype);
  }

  get kind(): ErrorKind {
    return "CancelledError";
  }
}

export class ConfigError extends ToolgateError {
  constructor(public readonly problems: string[]) {
    super(`Configuration errors: ${problems.join(", ")}`, "CONFIG_ERROR", 500, { problems });
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  get kind(): ErrorKind {
    return "ConfigError";
  }
}

/**
 * Malformed envelopes and transport-level refusals, raised before any tool runs.
 */
export class ProtocolError extends ToolgateError {
  constructor(
    message: string,
    code: "INVALID_REQUEST" | "METHOD_NOT_FOUND" | "RATE_LIMITED",
    details?: Record<string, unknown>
  ) {
    super(message, code, code === "METHOD_NOT_FOUND" ? 404 : code === "RATE_LIMITED" ? 429 : 400, details);
    this.name = "ProtocolError";
    Object.setPrototypeOf(this, ProtocolError.prototype);
  }

  get kind(): ErrorKind {
    return "ProtocolError";
  }
}

export class InternalError extends ToolgateError {
  constructor(message: string, cause?: unknown) {
    super(message, "INTERNAL_ERROR", 500, undefined, { cause });
    this.name = "InternalError";
    Object.setPrototypeOf(this, InternalError.prototype);
  }

  get kind(): ErrorKind {
    return "InternalError";
  }
}

export class PathTraversalError extends ToolgateError {
  constructor(reason: string) {
    super(`Path rejected: ${reason}`, "INVALID_ARGUMENTS", 400, { reason });
    this.name = "PathTraversalError";
    Object.setPrototypeOf(this, PathTraversalError.prototype);
  }

  get kind(): ErrorKind {
    return "ValidationError";
  }
}

export interface ErrorPayload {
  kind: ErrorKind;
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Normalize any thrown value into the wire shape. Anything that is not a
 * ToolgateError becomes INTERNAL_ERROR with a generic message.
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof ToolgateError) {
    return {
      kind: error.kind,
      code: error.code,
      message: error.message,
      ...(error.details ? { details: error.details } : {}),
    };
  }
  return { kind: "InternalError", code: "INTERNAL_ERROR", message: "Internal server error" };
}

export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === "string" ? value : JSON.stringify(value) ?? String(value));
}
