// src/server/rpc.ts
// JSON-RPC 2.0 dispatch for tools/list and tools/call, independent of Express.

import { z } from 'zod';
import type { Tool } from '../../registerGetWrapper.js';
import { zodMessage } from '../../registerGetWrapper.js';
import { createLogger } from '../log.js';

const log = createLogger('rpc');

type RpcId = string | number | null;

export type RpcResponse =
  | { jsonrpc: '2.0'; id: RpcId; result: unknown }
  | { jsonrpc: '2.0'; id: RpcId; error: { code: number; message: string; data?: unknown } };

// -------- JSON-RPC helpers --------
function ok(id: RpcId, result: unknown): RpcResponse { return { jsonrpc: '2.0', id, result }; }
function err(id: RpcId, code: number, message: string, data?: unknown): RpcResponse {
  return { jsonrpc: '2.0', id, error: { code, message, ...(data === undefined ? {} : { data }) } };
}

const RpcRequest = z.object({
  id: z.union([z.string().min(1), z.number()]),
  method: z.string().min(1),
  params: z.record(z.string(), z.unknown()).optional()
});

/** Minimal JSON Schema rendering of a zod object's top-level fields. */
export function describeSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  if (!(schema instanceof z.ZodObject)) return { type: 'object' };
  const shape: Record<string, z.ZodTypeAny> = schema.shape;
  const properties: Record<string, unknown> = {};
  const required: string[] = [];
  for (const [key, field] of Object.entries(shape)) {
    const inner = field instanceof z.ZodOptional ? field.unwrap() : field;
    properties[key] = {
      type: inner instanceof z.ZodArray ? 'array'
        : inner instanceof z.ZodNumber ? 'number'
        : inner instanceof z.ZodString ? 'string'
        : 'object'
    };
    if (!field.isOptional()) required.push(key);
  }
  return { type: 'object', properties, required };
}

export type RpcOutcome = { status: number; body: RpcResponse };

export async function handleRpc(tools: Tool[], body: unknown): Promise<RpcOutcome> {
  const req = RpcRequest.safeParse(body);
  if (!req.success) return { status: 400, body: err(null, -32600, 'Invalid Request') };
  const { id, method, params } = req.data;

  if (method === 'tools/list') {
    return {
      status: 200,
      body: ok(id, {
        tools: tools.map(t => ({ name: t.name, description: t.description, inputSchema: describeSchema(t.inputSchema) }))
      })
    };
  }

  if (method === 'tools/call') {
    const name = params?.name;
    const args = params?.arguments ?? params?.params ?? {};
    const tool = tools.find(t => t.name === name);
    if (!tool) return { status: 200, body: err(id, -32601, `Unknown tool: ${String(name)}`) };

    const parsed = tool.inputSchema.safeParse(args);
    if (!parsed.success) return { status: 200, body: err(id, -32602, zodMessage(parsed.error)) };
    try {
      const result = await tool.handler(parsed.data);
      return { status: 200, body: ok(id, { content: result }) };
    } catch (e: unknown) {
      log.error(`${tool.name} failed`, e);
      return { status: 200, body: err(id, -32000, e instanceof Error ? e.message : 'Tool error') };
    }
  }

  return { status: 200, body: err(id, -32601, `Method not found: ${method}`) };
}
