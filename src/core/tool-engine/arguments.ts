/**
 * Typed readers over validated tool arguments.
 *
 * Handlers run after schema validation, so a failing read means the handler
 * and its declared input schema disagree.
 */

import { ValidationError } from "../errors";
import type { ArgumentValue, ToolArguments } from "../types";

function mismatch(key: string, expected: string): ValidationError {
  return new ValidationError([{ field: key, kind: "type", message: `${key} must be ${expected}` }]);
}

export function readString(args: ToolArguments, key: string): string {
  const value = args[key];
  if (typeof value !== "string") throw mismatch(key, "string");
  return value;
}

export function readOptionalString(args: ToolArguments, key: string, fallback: string): string {
  return args[key] === undefined ? fallback : readString(args, key);
}

export function readNumber(args: ToolArguments, key: string): number {
  const value = args[key];
  if (typeof value !== "number") throw mismatch(key, "number");
  return value;
}

export function readOptionalNumber(args: ToolArguments, key: string, fallback: number): number {
  return args[key] === undefined ? fallback : readNumber(args, key);
}

export function readBoolean(args: ToolArguments, key: string): boolean {
  const value = args[key];
  if (typeof value !== "boolean") throw mismatch(key, "boolean");
  return value;
}

export function readEnum<T extends string>(args: ToolArguments, key: string, allowed: readonly T[]): T {
  const value = args[key];
  const match = allowed.find(candidate => candidate === value);
  if (match === undefined) throw mismatch(key, `one of ${allowed.join(", ")}`);
  return match;
}

export function readObject(args: ToolArguments, key: string): Readonly<Record<string, ArgumentValue>> {
  const value = args[key];
  if (value === null || typeof value !== "object" || Array.isArray(value)) throw mismatch(key, "object");
  return value;
}

export function readArray(args: ToolArguments, key: string): readonly ArgumentValue[] {
  const value = args[key];
  if (!Array.isArray(value)) throw mismatch(key, "array");
  return value;
}
