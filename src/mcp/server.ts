/**
 * MCP server: JSON-RPC dispatch for the tool surface.
 *
 * Methods: initialize, ping, tools/list, tools/call.
 * Notifications: notifications/initialized, notifications/cancelled.
 *
 * tools/call requests run concurrently; each one owns an AbortController
 * keyed by request id so notifications/cancelled can abort it. A cancelled
 * request gets no response.
 *
 * handleLine never throws.
 */

import { randomUUID } from 'node:crypto';
import { executeTool, type ExecuteToolOptions } from '../tools/executor.js';
import { formatToolError } from '../tools/errors.js';
import type { ToolRegistry } from '../tools/registry.js';
import { logger } from '../utils/logger.js';
import {
  cancelledParamsSchema,
  JsonRpcErrorCode,
  jsonRpcMessageSchema,
  MCP_PROTOCOL_VERSION,
  SUPPORTED_PROTOCOL_VERSIONS,
  toolsCallParamsSchema,
  type JsonRpcId,
  type JsonRpcMessage,
  type JsonRpcResponse,
  type McpContent,
  type McpInitializeResult,
} from './types.js';

export interface McpServerOptions {
  name: string;
  version: string;
  instructions?: string;
  /** Forwarded to every tool execution */
  execution?: Pick<ExecuteToolOptions, 'defaultTimeoutMs' | 'retryPolicy'>;
}

export class McpServer {
  private readonly inFlight = new Map<JsonRpcId, AbortController>();
  private initialized = false;

  constructor(
    private readonly registry: ToolRegistry,
    private readonly options: McpServerOptions
  ) {}

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Handle one line of input.
   *
   * @returns The response to write, or null for notifications and cancelled requests
   */
  async handleLine(line: string): Promise<JsonRpcResponse | null> {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      logger.warn({ event: 'mcp.message.parse_error', length: line.length });
      return errorResponse(null, JsonRpcErrorCode.PARSE_ERROR, 'Parse error');
    }

    const parsed = jsonRpcMessageSchema.safeParse(raw);
    if (!parsed.success) {
      return errorResponse(extractId(raw), JsonRpcErrorCode.INVALID_REQUEST, 'Invalid Request');
    }

    try {
      return await this.handleMessage(parsed.data);
    } catch (error) {
      logger.error({
        event: 'mcp.message.failed',
        method: parsed.data.method,
        error: error instanceof Error ? error.message : String(error),
      });
      return parsed.data.id === undefined
        ? null
        : errorResponse(parsed.data.id, JsonRpcErrorCode.INTERNAL_ERROR, 'Internal error');
    }
  }

  async handleMessage(message: JsonRpcMessage): Promise<JsonRpcResponse | null> {
    const { id, method, params } = message;

    if (id === undefined) {
      this.handleNotification(method, params);
      return null;
    }

    switch (method) {
      case 'initialize':
        return { jsonrpc: '2.0', id, result: this.initialize(params) };
      case 'ping':
        return { jsonrpc: '2.0', id, result: {} };
      case 'tools/list':
        return { jsonrpc: '2.0', id, result: { tools: this.registry.list() } };
      case 'tools/call':
        return this.callTool(id, params);
      default:
        logger.info({ event: 'mcp.method.not_found', method });
        return errorResponse(id, JsonRpcErrorCode.METHOD_NOT_FOUND, `Method not found: ${method}`);
    }
  }

  /**
   * Abort every in-flight call, e.g. when the input stream closes.
   */
  cancelAll(): void {
    for (const controller of this.inFlight.values()) controller.abort();
  }

  private initialize(params: Record<string, unknown> | undefined): McpInitializeResult {
    const requested = params?.protocolVersion;
    const protocolVersion =
      typeof requested === 'string' && SUPPORTED_PROTOCOL_VERSIONS.includes(requested)
        ? requested
        : MCP_PROTOCOL_VERSION;

    logger.info({ event: 'mcp.initialize', requested, protocolVersion });

    return {
      protocolVersion,
      capabilities: { tools: { listChanged: false } },
      serverInfo: { name: this.options.name, version: this.options.version },
      instructions: this.options.instructions,
    };
  }

  private handleNotification(method: string, params: Record<string, unknown> | undefined): void {
    if (method === 'notifications/initialized') {
      this.initialized = true;
      logger.debug({ event: 'mcp.initialized' });
      return;
    }

    if (method === 'notifications/cancelled') {
      const parsed = cancelledParamsSchema.safeParse(params);
      if (!parsed.success) return;
      const controller = this.inFlight.get(parsed.data.requestId);
      logger.info({
        event: 'mcp.request.cancelled',
        requestId: parsed.data.requestId,
        reason: parsed.data.reason,
        inFlight: controller !== undefined,
      });
      controller?.abort();
      return;
    }

    logger.debug({ event: 'mcp.notification.ignored', method, initialized: this.initialized });
  }

  private async callTool(
    id: JsonRpcId,
    params: Record<string, unknown> | undefined
  ): Promise<JsonRpcResponse | null> {
    const parsed = toolsCallParamsSchema.safeParse(params);
    if (!parsed.success) {
      return errorResponse(id, JsonRpcErrorCode.INVALID_PARAMS, 'Invalid tools/call params');
    }

    const { name, arguments: args } = parsed.data;
    if (!this.registry.get(name)) {
      return errorResponse(id, JsonRpcErrorCode.INVALID_PARAMS, `Unknown tool: ${name}`);
    }

    const controller = new AbortController();
    this.inFlight.set(id, controller);

    try {
      const result = await executeTool(this.registry, name, args ?? {}, {
        ...this.options.execution,
        traceId: randomUUID(),
        signal: controller.signal,
      });

      if (controller.signal.aborted) return null;

      const content: McpContent = result.success
        ? { content: [{ type: 'text', text: result.data }] }
        : { content: [{ type: 'text', text: formatToolError(result.error) }], isError: true };
      return { jsonrpc: '2.0', id, result: content };
    } finally {
      this.inFlight.delete(id);
    }
  }
}

function errorResponse(id: JsonRpcId | null, code: number, message: string): JsonRpcResponse {
  return { jsonrpc: '2.0', id, error: { code, message } };
}

function extractId(raw: unknown): JsonRpcId | null {
  if (raw === null || typeof raw !== 'object') return null;
  const id: unknown = Reflect.get(raw, 'id');
  return typeof id === 'string' || typeof id === 'number' ? id : null;
}
