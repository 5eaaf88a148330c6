/**
 * MCP Protocol Types (JSON-RPC 2.0 over stdio)
 *
 * Each message is one line of JSON on stdin/stdout.
 *
 * @see https://modelcontextprotocol.io/specification/2025-06-18/basic
 * @see https://modelcontextprotocol.io/specification/2025-06-18/basic/transports#stdio
 */

import { z } from 'zod';

export const MCP_PROTOCOL_VERSION = '2025-06-18';

/**
 * Protocol versions this server can speak; the client's requested version is
 * echoed back when listed here.
 */
export const SUPPORTED_PROTOCOL_VERSIONS: readonly string[] = [
  '2024-11-05',
  '2025-03-26',
  MCP_PROTOCOL_VERSION,
];

export type JsonRpcId = string | number;

/**
 * JSON-RPC error codes.
 *
 * @see https://www.jsonrpc.org/specification#error_object
 */
export const JsonRpcErrorCode = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

/**
 * Incoming message: a request when `id` is present, a notification otherwise.
 */
export const jsonRpcMessageSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number()]).optional(),
  method: z.string().min(1),
  params: z.record(z.string(), z.unknown()).optional(),
});

export type JsonRpcMessage = z.infer<typeof jsonRpcMessageSchema>;

/**
 * MCP JSON-RPC error object
 */
export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

/**
 * MCP JSON-RPC response envelope
 */
export type JsonRpcResponse<T = unknown> =
  | { jsonrpc: '2.0'; id: JsonRpcId; result: T }
  | { jsonrpc: '2.0'; id: JsonRpcId | null; error: JsonRpcError };

export const toolsCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.string(), z.unknown()).optional(),
});

export const cancelledParamsSchema = z.object({
  requestId: z.union([z.string(), z.number()]),
  reason: z.string().optional(),
});

/**
 * MCP Tool definition from tools/list response
 */
export interface McpTool {
  name: string;
  description?: string;
  inputSchema: Record<string, unknown>;
}

/**
 * MCP tools/list response result
 */
export interface McpToolsListResult {
  tools: McpTool[];
}

/**
 * MCP content block in tools/call response
 */
export interface McpContentBlock {
  type: 'text';
  text: string;
}

/**
 * MCP tools/call response result
 */
export interface McpContent {
  content: McpContentBlock[];
  isError?: boolean;
}

export interface McpInitializeResult {
  protocolVersion: string;
  capabilities: { tools: { listChanged: boolean } };
  serverInfo: { name: string; version: string };
  instructions?: string;
}
