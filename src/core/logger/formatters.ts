/**
 * Logger Formatters
 */

import type { ArgumentValue, ToolArguments } from "../types";

const SENSITIVE_KEYS = ["password", "token", "key", "secret", "auth"];

/**
 * Format duration for display
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(2);
    return `${minutes}m ${seconds}s`;
  }
}

/**
 * Redact sensitive argument values before they reach a log line
 */
export function redactArguments(args: ToolArguments): Record<string, ArgumentValue> {
  const sanitized: Record<string, ArgumentValue> = {};
  for (const [key, value] of Object.entries(args)) {
    sanitized[key] = SENSITIVE_KEYS.some(s => key.toLowerCase().includes(s))
      ? "[REDACTED]"
      : redactValue(value);
  }
  return sanitized;
}

function redactValue(value: ArgumentValue): ArgumentValue {
  if (Array.isArray(value)) return value.map(redactValue);
  if (value !== null && typeof value === "object") return redactArguments(value);
  return value;
}
