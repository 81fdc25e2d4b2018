import Ajv, { ErrorObject, ValidateFunction } from "ajv";
import type { FieldViolation } from "../errors";
import type { ArgumentValue, JsonSchema, ToolArguments, ToolDescriptor } from "../types";

export type ValidationOutcome =
  | { ok: true }
  | { ok: false; violations: FieldViolation[] };

/**
 * JSON Schema checks for tool inputs and outputs.
 *
 * Input validation rejects the call; output validation is advisory and only
 * reported back to the caller. Unknown properties are tolerated even where a
 * schema sets `additionalProperties: false`.
 */
export class SchemaValidator {
  private readonly ajv = new Ajv({ allErrors: true, strict: false });
  private readonly compiled = new WeakMap<JsonSchema, ValidateFunction>();

  /**
   * Compile a schema, throwing if it is not a valid JSON Schema document.
   */
  assertSchema(schema: JsonSchema): void {
    this.compile(schema);
  }

  validateInput(descriptor: ToolDescriptor, args: ToolArguments): ValidationOutcome {
    return this.check(descriptor.inputSchema, args);
  }

  validateOutput(descriptor: ToolDescriptor, value: ArgumentValue): ValidationOutcome {
    return this.check(descriptor.outputSchema, value);
  }

  private check(schema: JsonSchema, value: unknown): ValidationOutcome {
    const validate = this.compile(schema);
    if (validate(value)) return { ok: true };

    const violations = (validate.errors ?? [])
      .filter(err => err.keyword !== "additionalProperties")
      .map(toViolation);
    return violations.length === 0 ? { ok: true } : { ok: false, violations };
  }

  private compile(schema: JsonSchema): ValidateFunction {
    const cached = this.compiled.get(schema);
    if (cached) return cached;
    const validate = this.ajv.compile(schema);
    this.compiled.set(schema, validate);
    return validate;
  }
}

function fieldPath(instancePath: string): string {
  return instancePath
    .split("/")
    .filter(Boolean)
    .map(segment => segment.replace(/~1/g, "/").replace(/~0/g, "~"))
    .join(".");
}

function toViolation(err: ErrorObject): FieldViolation {
  const base = fieldPath(err.instancePath);

  switch (err.keyword) {
    case "required": {
      const missing = String(err.params.missingProperty);
      const field = base ? `${base}.${missing}` : missing;
      return { field, kind: "missing", message: `${field} is required` };
    }
    case "type": {
      const field = base || "(root)";
      return { field, kind: "type", message: `${field} must be ${String(err.params.type)}` };
    }
    case "enum": {
      const field = base || "(root)";
      const allowed: unknown[] = Array.isArray(err.params.allowedValues) ? err.params.allowedValues : [];
      return {
        field,
        kind: "enum",
        message: `${field} must be one of: ${allowed.map(v => JSON.stringify(v)).join(", ")}`,
      };
    }
    default: {
      const field = base || "(root)";
      return { field, kind: "constraint", message: `${field} ${err.message ?? "is invalid"}` };
    }
  }
}
