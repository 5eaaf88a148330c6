import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { createRetryPolicy } from '../retry/policy.js';
import { ToolRegistry } from '../tools/registry.js';
import { defineTool, invocationShape, type InvocationContext } from '../tools/types.js';
import { createClassifiedError } from '../utils/errors.js';
import { McpServer } from './server.js';
import { MCP_PROTOCOL_VERSION } from './types.js';

function waitForAbort(context: InvocationContext): Promise<never> {
  return new Promise((_resolve, reject) => {
    context.signal.addEventListener('abort', () => reject(context.signal.reason), { once: true });
  });
}

function buildRegistry(): ToolRegistry {
  const registry = new ToolRegistry();
  registry.registerAll([
    defineTool({
      name: 'echo',
      description: 'Echo the value',
      inputSchema: z.object({ value: z.string(), ...invocationShape }),
      handler: async (input) => ({ success: true, data: { value: input.value } }),
    }),
    defineTool({
      name: 'reject',
      description: 'Always fails',
      inputSchema: z.object({ ...invocationShape }),
      handler: async () => ({
        success: false,
        error: createClassifiedError('PermissionError', 'HTTP 403 GET /api/2.1/jobs/get: no access', {
          httpStatus: 403,
        }),
      }),
    }),
    defineTool({
      name: 'hang',
      description: 'Finishes only when aborted',
      inputSchema: z.object({ ...invocationShape }),
      handler: (_input, context) => waitForAbort(context),
    }),
  ]);
  return registry;
}

function request(id: number | string, method: string, params?: Record<string, unknown>): string {
  return JSON.stringify({ jsonrpc: '2.0', id, method, params });
}

describe('McpServer', () => {
  let server: McpServer;

  beforeEach(() => {
    server = new McpServer(buildRegistry(), {
      name: 'test-server',
      version: '1.2.3',
      instructions: 'Use the tools',
      execution: { retryPolicy: createRetryPolicy({ initialDelayMs: 0, maxDelayMs: 0 }), defaultTimeoutMs: 5_000 },
    });
  });

  describe('framing', () => {
    it('answers unparseable input with a parse error', async () => {
      const response = await server.handleLine('{"jsonrpc": "2.0", ');

      expect(response).toEqual({ jsonrpc: '2.0', id: null, error: { code: -32700, message: 'Parse error' } });
    });

    it('answers a malformed message with invalid request, keeping its id', async () => {
      const response = await server.handleLine(JSON.stringify({ jsonrpc: '1.0', id: 3, method: 'ping' }));

      expect(response).toEqual({ jsonrpc: '2.0', id: 3, error: { code: -32600, message: 'Invalid Request' } });
    });

    it('does not accept batches', async () => {
      const response = await server.handleLine(`[${request(1, 'ping')}]`);

      expect(response).toEqual({ jsonrpc: '2.0', id: null, error: { code: -32600, message: 'Invalid Request' } });
    });

    it('answers an unknown method with method not found', async () => {
      const response = await server.handleLine(request(4, 'resources/list'));

      expect(response).toEqual({
        jsonrpc: '2.0',
        id: 4,
        error: { code: -32601, message: 'Method not found: resources/list' },
      });
    });

    it('does not answer notifications', async () => {
      const response = await server.handleLine(JSON.stringify({ jsonrpc: '2.0', method: 'notifications/initialized' }));

      expect(response).toBeNull();
    });
  });

  describe('initialize', () => {
    it('echoes a supported protocol version', async () => {
      const response = await server.handleLine(
        request(1, 'initialize', { protocolVersion: '2024-11-05', capabilities: {}, clientInfo: { name: 'c' } })
      );

      expect(response).toEqual({
        jsonrpc: '2.0',
        id: 1,
        result: {
          protocolVersion: '2024-11-05',
          capabilities: { tools: { listChanged: false } },
          serverInfo: { name: 'test-server', version: '1.2.3' },
          instructions: 'Use the tools',
        },
      });
    });

    it('falls back to the current version for an unknown one', async () => {
      const response = await server.handleLine(request(1, 'initialize', { protocolVersion: '1999-01-01' }));

      expect(response).toMatchObject({ result: { protocolVersion: MCP_PROTOCOL_VERSION } });
    });
  });

  it('answers ping with an empty result', async () => {
    expect(await server.handleLine(request('p', 'ping'))).toEqual({ jsonrpc: '2.0', id: 'p', result: {} });
  });

  it('lists tools sorted by name with their schemas', async () => {
    const response = await server.handleLine(request(2, 'tools/list'));

    expect(response).toMatchObject({
      id: 2,
      result: {
        tools: [
          { name: 'echo', description: 'Echo the value', inputSchema: { type: 'object', required: ['value'] } },
          { name: 'hang' },
          { name: 'reject' },
        ],
      },
    });
  });

  describe('tools/call', () => {
    it('returns the tool result as text content', async () => {
      const response = await server.handleLine(request(5, 'tools/call', { name: 'echo', arguments: { value: 'hi' } }));

      expect(response).toEqual({
        jsonrpc: '2.0',
        id: 5,
        result: { content: [{ type: 'text', text: '{\n  "value": "hi"\n}' }] },
      });
    });

    it('reports a tool failure as an error result with the outward error', async () => {
      const response = await server.handleLine(request(6, 'tools/call', { name: 'reject' }));

      expect(response).toMatchObject({ id: 6, result: { isError: true } });
      const text = response && 'result' in response ? Reflect.get(Object(response.result), 'content') : undefined;
      const [block] = Array.isArray(text) ? text : [];
      expect(JSON.parse(String(Reflect.get(Object(block), 'text')))).toEqual({
        error: {
          kind: 'PermissionError',
          message: 'HTTP 403 GET /api/2.1/jobs/get: no access',
          guidance: createClassifiedError('PermissionError', '').guidance,
          retryable: false,
          http_status: 403,
          error_code: null,
          attempts: [],
        },
      });
    });

    it('reports invalid arguments as an error result', async () => {
      const response = await server.handleLine(request(7, 'tools/call', { name: 'echo', arguments: { value: 1 } }));

      expect(response).toMatchObject({ id: 7, result: { isError: true } });
    });

    it('rejects an unknown tool with invalid params', async () => {
      const response = await server.handleLine(request(8, 'tools/call', { name: 'drop_everything' }));

      expect(response).toEqual({
        jsonrpc: '2.0',
        id: 8,
        error: { code: -32602, message: 'Unknown tool: drop_everything' },
      });
    });

    it('rejects params without a tool name', async () => {
      const response = await server.handleLine(request(9, 'tools/call', { arguments: {} }));

      expect(response).toMatchObject({ id: 9, error: { code: -32602 } });
    });

    it('drops the response of a cancelled call', async () => {
      const pending = server.handleLine(request(10, 'tools/call', { name: 'hang' }));
      expect(server.inFlightCount).toBe(1);

      const ack = await server.handleLine(
        JSON.stringify({ jsonrpc: '2.0', method: 'notifications/cancelled', params: { requestId: 10 } })
      );

      expect(ack).toBeNull();
      expect(await pending).toBeNull();
      expect(server.inFlightCount).toBe(0);
    });

    it('ignores a cancellation for an unknown request', async () => {
      const response = await server.handleLine(
        JSON.stringify({ jsonrpc: '2.0', method: 'notifications/cancelled', params: { requestId: 99 } })
      );

      expect(response).toBeNull();
    });

    it('cancelAll aborts every in-flight call', async () => {
      const first = server.handleLine(request(11, 'tools/call', { name: 'hang' }));
      const second = server.handleLine(request(12, 'tools/call', { name: 'hang' }));
      expect(server.inFlightCount).toBe(2);

      server.cancelAll();

      expect(await Promise.all([first, second])).toEqual([null, null]);
    });
  });
});
