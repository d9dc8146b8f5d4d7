// src/mcp/rpc.ts
// JSON-RPC 2.0 envelope for POST /mcp, kept apart from express so it can be called directly.

import { z } from "zod";
import { errorMessage } from "../errors.js";
import { describeInput, type Tool } from "./tools.js";

type RpcId = string | number | null;

export type RpcResponse =
  | { jsonrpc: "2.0"; id: RpcId; result: unknown }
  | { jsonrpc: "2.0"; id: RpcId; error: { code: number; message: string; data?: unknown } };

export const RPC_INVALID_REQUEST = -32600;
export const RPC_METHOD_NOT_FOUND = -32601;
export const RPC_INVALID_PARAMS = -32602;
export const RPC_INTERNAL_ERROR = -32603;
export const RPC_TOOL_ERROR = -32000;

export function ok(id: RpcId, result: unknown): RpcResponse { return { jsonrpc: "2.0", id, result }; }
export function err(id: RpcId, code: number, message: string, data?: unknown): RpcResponse {
  return { jsonrpc: "2.0", id, error: data === undefined ? { code, message } : { code, message, data } };
}

const RpcRequest = z.object({
  id: z.union([z.string().min(1), z.number()]),
  method: z.string().min(1),
  params: z.record(z.unknown()).optional(),
});

const CallParams = z.object({
  name: z.string(),
  arguments: z.unknown().optional(),
  params: z.unknown().optional(),
});

export function formatZodIssues(e: z.ZodError): string {
  return e.issues.map(i => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
}

/** Returns the HTTP status to send alongside the JSON-RPC payload. */
export async function dispatchRpc(tools: Tool[], body: unknown): Promise<{ status: number; payload: RpcResponse }> {
  const req = RpcRequest.safeParse(body);
  if (!req.success) return { status: 400, payload: err(null, RPC_INVALID_REQUEST, "Invalid Request") };
  const { id, method, params } = req.data;

  if (method === "tools/list") {
    return {
      status: 200,
      payload: ok(id, {
        tools: tools.map(t => ({ name: t.name, description: t.description, inputSchema: describeInput(t.inputSchema) })),
      }),
    };
  }

  if (method === "tools/call") {
    const call = CallParams.safeParse(params ?? {});
    if (!call.success) return { status: 200, payload: err(id, RPC_INVALID_PARAMS, formatZodIssues(call.error)) };
    const tool = tools.find(t => t.name === call.data.name);
    if (!tool) return { status: 200, payload: err(id, RPC_METHOD_NOT_FOUND, `Unknown tool: ${call.data.name}`) };
    try {
      const result = await tool.handler(call.data.arguments ?? call.data.params ?? {});
      return { status: 200, payload: ok(id, { content: result }) };
    } catch (e: unknown) {
      if (e instanceof z.ZodError) return { status: 200, payload: err(id, RPC_INVALID_PARAMS, formatZodIssues(e)) };
      return { status: 200, payload: err(id, RPC_TOOL_ERROR, errorMessage(e) || "Tool error") };
    }
  }

  return { status: 200, payload: err(id, RPC_METHOD_NOT_FOUND, `Method not found: ${method}`) };
}
