/**
 * Error taxonomy tests
 */

import {
  CancelledError,
  ConfigError,
  DuplicateNameError,
  ExecutionError,
  InternalError,
  NotFoundError,
  PathTraversalError,
  ProtocolError,
  TimeoutError,
  ToolgateError,
  ValidationError,
  toError,
  toErrorPayload,
} from "../src/core/errors";

describe("Errors", () => {
  test("subclasses keep instanceof across the hierarchy", () => {
    const error = new NotFoundError("missing_tool");
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toBeInstanceOf(ToolgateError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("NotFoundError");
  });

  test("each class carries a stable code and status", () => {
    const cases: Array<[ToolgateError, string, number]> = [
      [new DuplicateNameError("echo"), "DUPLICATE_NAME", 409],
      [new NotFoundError("echo"), "NOT_FOUND", 404],
      [new ValidationError([]), "INVALID_ARGUMENTS", 400],
      [new TimeoutError(100, 1), "TIMEOUT", 504],
      [new ExecutionError("echo", 1, new Error("x")), "EXECUTION_FAILED", 502],
      [new CancelledError(), "CANCELLED", 499],
      [new ConfigError(["bad"]), "CONFIG_ERROR", 500],
      [new InternalError("oops"), "INTERNAL_ERROR", 500],
      [new ProtocolError("bad", "INVALID_REQUEST"), "INVALID_REQUEST", 400],
      [new ProtocolError("nope", "METHOD_NOT_FOUND"), "METHOD_NOT_FOUND", 404],
      [new ProtocolError("slow down", "RATE_LIMITED"), "RATE_LIMITED", 429],
    ];
    for (const [error, code, status] of cases) {
      expect(error.code).toBe(code);
      expect(error.statusCode).toBe(status);
    }
  });

  test("ValidationError lists every violation in its message", () => {
    const error = new ValidationError(
      [
        { field: "text", kind: "missing", message: "text is required" },
        { field: "count", kind: "type", message: "count must be integer" },
      ],
      "echo"
    );
    expect(error.message).toBe("Invalid arguments for tool echo: text is required; count must be integer");
    expect(error.details).toEqual({
      toolName: "echo",
      violations: [
        { field: "text", kind: "missing", message: "text is required" },
        { field: "count", kind: "type", message: "count must be integer" },
      ],
    });
  });

  test("ExecutionError wraps the final cause and attempt count", () => {
    const error = new ExecutionError("flaky", 3, new Error("boom"), [
      { attempt: 1, kind: "ExecutionError", message: "boom" },
    ]);
    expect(error.message).toBe("Tool flaky failed after 3 attempts: boom");
    expect(error.attempts).toBe(3);
    expect(error.details).toEqual({
      toolName: "flaky",
      attempts: 3,
      cause: { name: "Error", message: "boom" },
      failures: [{ attempt: 1, kind: "ExecutionError", message: "boom" }],
    });
  });

  test("singular attempt wording", () => {
    expect(new ExecutionError("once", 1, new Error("nope")).message).toBe("Tool once failed after 1 attempt: nope");
  });

  test("PathTraversalError surfaces as an argument error", () => {
    const error = new PathTraversalError("absolute paths not allowed");
    expect(error.message).toBe("Path rejected: absolute paths not allowed");
    expect(toErrorPayload(error)).toEqual({
      kind: "ValidationError",
      code: "INVALID_ARGUMENTS",
      message: "Path rejected: absolute paths not allowed",
      details: { reason: "absolute paths not allowed" },
    });
  });

  describe("toErrorPayload", () => {
    test("maps a ToolgateError to its wire shape", () => {
      expect(toErrorPayload(new NotFoundError("missing_tool"))).toEqual({
        kind: "NotFoundError",
        code: "NOT_FOUND",
        message: "Tool not found: missing_tool",
        details: { toolName: "missing_tool" },
      });
    });

    test("omits details when there are none", () => {
      expect(toErrorPayload(new InternalError("oops"))).toEqual({
        kind: "InternalError",
        code: "INTERNAL_ERROR",
        message: "oops",
      });
    });

    test("hides the message of foreign errors", () => {
      expect(toErrorPayload(new Error("secret stack detail"))).toEqual({
        kind: "InternalError",
        code: "INTERNAL_ERROR",
        message: "Internal server error",
      });
      expect(toErrorPayload("just a string")).toEqual({
        kind: "InternalError",
        code: "INTERNAL_ERROR",
        message: "Internal server error",
      });
    });
  });

  test("toError normalizes thrown values", () => {
    const original = new Error("x");
    expect(toError(original)).toBe(original);
    expect(toError("plain").message).toBe("plain");
    expect(toError({ code: 1 }).message).toBe('{"code":1}');
  });
});
