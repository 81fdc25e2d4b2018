/**
 * Zod schemas for tool descriptors and argument payloads
 */

import { z } from "zod";
import type { ArgumentValue, JsonSchema } from "../types";

export const TOOL_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

const DurationSchema = z.union([z.number(), z.string().min(1)]);

const JsonSchemaDocument = z.custom<JsonSchema>(
  (val) => typeof val === "object" && val !== null && !Array.isArray(val),
  { message: "must be a JSON Schema object" }
);

/**
 * Shape check for `ToolRegistry.register` input. Range checks on the
 * resolved durations happen in the registry.
 */
export const ToolDescriptorInputSchema = z.object({
  name: z
    .string()
    .min(1)
    .max(100)
    .regex(TOOL_NAME_PATTERN, "name may only contain letters, digits, '_', '.' and '-'"),
  description: z.string().min(1).max(500),
  version: z.string().min(1).max(50).optional(),
  tags: z.array(z.string().min(1).max(50)).optional(),
  inputSchema: JsonSchemaDocument,
  outputSchema: JsonSchemaDocument.optional(),
  timeout: DurationSchema.optional(),
  maxRetries: z.number().int().nonnegative().optional(),
  retryDelay: DurationSchema.optional(),
  cacheable: z.boolean().optional(),
  cacheTtl: DurationSchema.optional(),
});

export const ArgumentValueSchema: z.ZodType<ArgumentValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(ArgumentValueSchema),
    z.record(ArgumentValueSchema),
  ])
);

export const ToolArgumentsSchema = z.record(ArgumentValueSchema);
