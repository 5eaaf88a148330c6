/**
 * stdio transport: newline-delimited JSON-RPC on stdin/stdout.
 *
 * Lines are dispatched as they arrive, without waiting for earlier calls to
 * finish. Responses are written one at a time, waiting for `drain` when the
 * output buffer is full. Resolves once the input ends and every in-flight
 * message has been answered.
 *
 * An output error (EPIPE when the client went away) ends the session: input
 * stops being read, in-flight calls are cancelled and their responses dropped.
 */

import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { logger } from '../utils/logger.js';
import type { McpServer } from './server.js';

export interface StdioTransportOptions {
  input?: Readable;
  output?: Writable;
}

export async function serveStdio(server: McpServer, options: StdioTransportOptions = {}): Promise<void> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const pending = new Map<number, Promise<void>>();
  let nextKey = 0;
  let outputClosed = false;
  let writes: Promise<void> = Promise.resolve();

  const rl = createInterface({ input, crlfDelay: Infinity });
  logger.info({ event: 'mcp.transport.started', transport: 'stdio' });

  output.on('error', (error: Error) => {
    if (outputClosed) return;
    outputClosed = true;
    logger.error({ event: 'mcp.transport.output_failed', error: error.message, inFlight: pending.size });
    server.cancelAll();
    rl.close();
  });

  const writeLine = (text: string): Promise<void> =>
    new Promise<void>((resolve) => {
      if (outputClosed || output.write(text)) {
        resolve();
        return;
      }
      const settle = (): void => {
        output.off('drain', settle);
        output.off('close', settle);
        resolve();
      };
      output.on('drain', settle);
      output.on('close', settle);
    });

  const send = (text: string): Promise<void> => {
    writes = writes.then(() => writeLine(text));
    return writes;
  };

  const dispatch = async (key: number, line: string): Promise<void> => {
    try {
      const response = await server.handleLine(line);
      if (response && !outputClosed) await send(`${JSON.stringify(response)}\n`);
    } finally {
      pending.delete(key);
    }
  };

  for await (const line of rl) {
    if (outputClosed) break;
    if (line.trim() === '') continue;
    const key = nextKey++;
    pending.set(key, dispatch(key, line));
  }

  logger.info({ event: 'mcp.transport.input_closed', inFlight: pending.size });
  await Promise.all(pending.values());
}
