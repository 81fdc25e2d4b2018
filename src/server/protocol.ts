/**
 * JSON RPC envelope shared by POST /rpc and the WebSocket channel.
 *
 *   request:  { id, method, params? }
 *   response: { id, result } | { id, error }
 */

import { z } from "zod";
import { ErrorCode, ErrorPayload, ProtocolError, toErrorPayload } from "../core/errors";
import type { ExecutionEngine } from "../core/tool-engine";
import { ToolArgumentsSchema } from "../core/tool-engine";
import type { ArgumentValue, InvocationResult, ToolSummary } from "../core/types";

export type RpcId = string | number;

export const RpcRequestSchema = z.object({
  id: z.union([z.string().min(1).max(200), z.number().int()]),
  method: z.string().min(1).max(100),
  params: z.record(z.unknown()).optional(),
});

export type RpcRequest = z.infer<typeof RpcRequestSchema>;

export const ToolCallParamsSchema = z.object({
  name: z.string().min(1).max(100),
  arguments: ToolArgumentsSchema.default({}),
  requestId: z.string().min(1).max(100).optional(),
});

export interface ToolCallResult {
  requestId: string;
  value: ArgumentValue;
  fromCache: boolean;
  durationMs: number;
}

export type RpcResult = ToolCallResult | { tools: ToolSummary[] } | { subscribed: boolean };

export type RpcResponse = { id: RpcId; result: RpcResult } | { id: RpcId; error: ErrorPayload };

export const UNKNOWN_RPC_ID = "unknown";

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  NOT_FOUND: 404,
  METHOD_NOT_FOUND: 404,
  INVALID_ARGUMENTS: 400,
  INVALID_REQUEST: 400,
  EXECUTION_FAILED: 502,
  TIMEOUT: 504,
  CANCELLED: 499,
  RATE_LIMITED: 429,
};

/**
 * HTTP status for an error payload. Anything unmapped is a 500.
 */
export function statusForError(error: ErrorPayload): number {
  return STATUS_BY_CODE[error.code] ?? 500;
}

export function statusForInvocation(result: InvocationResult): number {
  return result.ok ? 200 : statusForError(result.error);
}

export function zodIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.errors.map(issue => ({ path: issue.path.join("."), message: issue.message }));
}

function idOf(raw: unknown): RpcId {
  if (typeof raw === "object" && raw !== null && "id" in raw) {
    const { id } = raw;
    if ((typeof id === "string" && id.length > 0) || typeof id === "number") return id;
  }
  return UNKNOWN_RPC_ID;
}

export function errorResponse(id: RpcId, error: unknown): RpcResponse {
  return { id, error: toErrorPayload(error) };
}

export type ParsedRpc = { ok: true; request: RpcRequest } | { ok: false; response: RpcResponse };

export function parseRpcRequest(raw: unknown): ParsedRpc {
  const parsed = RpcRequestSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      response: errorResponse(
        idOf(raw),
        new ProtocolError("Invalid request", "INVALID_REQUEST", { issues: zodIssues(parsed.error) })
      ),
    };
  }
  return { ok: true, request: parsed.data };
}

/**
 * Run `tools/list` or `tools/call`. Never rejects.
 */
export async function dispatchRpc(
  engine: ExecutionEngine,
  request: RpcRequest,
  signal?: AbortSignal
): Promise<RpcResponse> {
  const { id } = request;

  switch (request.method) {
    case "tools/list":
      return { id, result: { tools: engine.listTools() } };

    case "tools/call": {
      const params = ToolCallParamsSchema.safeParse(request.params ?? {});
      if (!params.success) {
        return errorResponse(
          id,
          new ProtocolError("Invalid params", "INVALID_REQUEST", { issues: zodIssues(params.error) })
        );
      }
      const { name, arguments: args, requestId } = params.data;
      const result = await engine.invoke(name, args, requestId, { signal });
      if (!result.ok) return { id, error: result.error };
      return {
        id,
        result: {
          requestId: result.requestId,
          value: result.value,
          fromCache: result.fromCache,
          durationMs: result.durationMs,
        },
      };
    }

    default:
      return errorResponse(
        id,
        new ProtocolError(`Method not found: ${request.method}`, "METHOD_NOT_FOUND", { method: request.method })
      );
  }
}

export function statusForResponse(response: RpcResponse): number {
  return "error" in response ? statusForError(response.error) : 200;
}
