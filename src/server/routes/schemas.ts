/**
 * Zod validation schemas for API routes
 */

import { z } from "zod";
import { TOOL_NAME_PATTERN, ToolArgumentsSchema } from "../../core/tool-engine/toolSchema";

export const ToolNameSchema = z.string().min(1).max(100).regex(TOOL_NAME_PATTERN, "invalid tool name");

// Tool invoke request - strict validation, no extra fields
export const ToolInvokeSchema = z
  .object({
    name: ToolNameSchema,
    arguments: ToolArgumentsSchema.default({}),
    requestId: z.string().min(1).max(100).optional(),
  })
  .strict();

// Cache invalidation for one tool; omit arguments to drop every entry
export const CacheInvalidateSchema = z
  .object({
    arguments: ToolArgumentsSchema.optional(),
  })
  .strict();

export const EventHistoryQuerySchema = z
  .object({
    since: z.coerce.number().int().nonnegative().optional(),
    limit: z.coerce.number().int().min(1).max(1000).optional(),
    type: z.string().min(1).optional(),
  })
  .strict();
