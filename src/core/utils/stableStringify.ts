import { createHash } from "crypto";

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === "object" && !Array.isArray(value)
  && [Object.prototype, null].includes(Object.getPrototypeOf(value));

const sortObject = (value: Record<string, unknown>): Record<string, unknown> =>
  Object.keys(value)
    .sort()
    .reduce<Record<string, unknown>>((acc, key) => {
      acc[key] = value[key];
      return acc;
    }, {});

/**
 * JSON with object keys sorted at every depth. Array order is significant and
 * kept as-is.
 */
export const stableStringify = (value: unknown): string => {
  const replacer = (_key: string, val: unknown): unknown => (isPlainObject(val) ? sortObject(val) : val);
  return JSON.stringify(value, replacer) ?? "null";
};

export const sha256Hex = (input: string): string => createHash("sha256").update(input).digest("hex");
