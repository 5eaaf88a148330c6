import { PassThrough, Writable } from 'node:stream';
import { describe, it, expect, vi } from 'vitest';
import { McpServer } from '../../src/mcp/server.js';
import { serveStdio } from '../../src/mcp/stdio.js';
import { createToolRegistry } from '../../src/tools/index.js';
import { createFakeDependencies, instantRetryPolicy } from '../helpers/tool-fixtures.js';

function createServer(fake = createFakeDependencies()): McpServer {
  return new McpServer(createToolRegistry(fake.deps), {
    name: 'databricks-mcp-server',
    version: '0.0.0-test',
    execution: { retryPolicy: instantRetryPolicy, defaultTimeoutMs: 5_000 },
  });
}

async function runSession(lines: string[], fake = createFakeDependencies()): Promise<unknown[]> {
  const server = createServer(fake);
  const input = new PassThrough();
  const output = new PassThrough();
  const chunks: string[] = [];
  output.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf8')));
  const drained = new Promise<void>((resolve) => output.on('end', () => resolve()));

  const serving = serveStdio(server, { input, output });
  input.end(lines.join('\n') + '\n');
  await serving;
  output.end();
  await drained;

  return chunks
    .join('')
    .split('\n')
    .filter((line) => line !== '')
    .map((line): unknown => JSON.parse(line));
}

describe('stdio session', () => {
  it('runs a handshake, a listing and a tool call', async () => {
    const fake = createFakeDependencies();
    fake.listings.fetchFirstPage.mockResolvedValue({
      items: [{ cluster_id: 'c-1', cluster_name: 'etl', state: 'RUNNING' }],
      nextPageToken: null,
      totalKnown: null,
    });

    const responses = await runSession(
      [
        JSON.stringify({ jsonrpc: '2.0', id: 1, method: 'initialize', params: { protocolVersion: '2025-06-18' } }),
        JSON.stringify({ jsonrpc: '2.0', method: 'notifications/initialized' }),
        '',
        JSON.stringify({ jsonrpc: '2.0', id: 2, method: 'tools/call', params: { name: 'list_clusters' } }),
      ],
      fake
    );

    expect(responses).toHaveLength(2);
    const byId = new Map(responses.map((r) => [Reflect.get(Object(r), 'id'), r]));
    expect(byId.get(1)).toMatchObject({ result: { serverInfo: { name: 'databricks-mcp-server' } } });
    expect(byId.get(2)).toEqual({
      jsonrpc: '2.0',
      id: 2,
      result: {
        content: [
          {
            type: 'text',
            text: JSON.stringify(
              {
                clusters: [{ cluster_id: 'c-1', cluster_name: 'etl', state: 'RUNNING' }],
                count: 1,
                truncated: false,
                next_cursor: null,
                total_known: null,
              },
              null,
              2
            ),
          },
        ],
      },
    });
  });

  it('writes one response per request, including errors', async () => {
    const responses = await runSession(['not json', JSON.stringify({ jsonrpc: '2.0', id: 'x', method: 'ping' })]);

    expect(responses).toEqual(
      expect.arrayContaining([
        { jsonrpc: '2.0', id: null, error: { code: -32700, message: 'Parse error' } },
        { jsonrpc: '2.0', id: 'x', result: {} },
      ])
    );
    expect(responses).toHaveLength(2);
  });

  it('waits for in-flight calls after the input closes', async () => {
    const fake = createFakeDependencies();
    fake.statements.cancelStatement.mockImplementation(
      () => new Promise<void>((resolve) => setTimeout(resolve, 20))
    );

    const responses = await runSession(
      [
        JSON.stringify({
          jsonrpc: '2.0',
          id: 3,
          method: 'tools/call',
          params: { name: 'cancel_statement_execution', arguments: { statement_id: 's-1' } },
        }),
      ],
      fake
    );

    expect(fake.statements.cancelStatement).toHaveBeenCalledTimes(1);
    expect(responses).toEqual([
      {
        jsonrpc: '2.0',
        id: 3,
        result: {
          content: [{ type: 'text', text: '{\n  "statement_id": "s-1",\n  "status": "cancel_requested"\n}' }],
        },
      },
    ]);
  });

  it('ends the session when the output fails', async () => {
    const server = createServer();
    const cancelAll = vi.spyOn(server, 'cancelAll');
    const input = new PassThrough();
    const output = new Writable({
      write(_chunk, _encoding, callback) {
        callback(Object.assign(new Error('write EPIPE'), { code: 'EPIPE' }));
      },
    });

    const serving = serveStdio(server, { input, output });
    // input stays open: only the output failure can end the session
    input.write(`${JSON.stringify({ jsonrpc: '2.0', id: 1, method: 'ping' })}\n`);
    await serving;

    expect(cancelAll).toHaveBeenCalledTimes(1);
    expect(output.destroyed).toBe(true);
  });
});
