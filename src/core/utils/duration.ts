/**
 * Duration parsing: milliseconds, or strings like "500ms", "30s", "2m", "1h".
 */

import type { DurationInput } from "../types";

/** Largest delay setTimeout honours; anything above fires after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

const UNIT_TO_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
};

/**
 * Returns undefined for anything that is not a finite duration. Negative
 * numbers are returned as-is so callers can report them as invalid.
 */
export function parseDurationMs(value: DurationInput | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : undefined;
  }
  const raw = value.trim().toLowerCase();
  if (raw.length === 0) return undefined;
  if (/^-?\d+(\.\d+)?$/.test(raw)) {
    return Math.trunc(Number.parseFloat(raw));
  }
  const match = /^(\d+(?:\.\d+)?)(ms|s|m|h|d)$/.exec(raw);
  if (match === null) return undefined;
  return Math.trunc(Number.parseFloat(match[1]) * UNIT_TO_MS[match[2]]);
}

export function parseDurationMsStrict(value: DurationInput, context: string): number {
  const parsed = parseDurationMs(value);
  if (parsed === undefined) {
    throw new Error(`${context} must be a millisecond number or a duration like 500ms/30s/2m`);
  }
  return parsed;
}
