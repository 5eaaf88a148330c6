#!/usr/bin/env node
/**
 * Databricks MCP Server - Entry Point
 *
 * Serves the Databricks tool registry over stdio. stdout carries only
 * JSON-RPC; every log line goes to stderr.
 */

import { realpathSync } from 'node:fs';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { config } from './config/environment.js';
import { McpServer } from './mcp/server.js';
import { serveStdio } from './mcp/stdio.js';
import { shutdown as shutdownLangfuse } from './observability/langfuse.js';
import { getProcessRetryPolicy } from './retry/policy.js';
import { createToolRegistry } from './tools/index.js';
import { logger } from './utils/logger.js';

export const SERVER_NAME = 'databricks-mcp-server';
export const SERVER_VERSION = '0.1.0';

/**
 * Starts the server.
 *
 * - Validates the retry policy (an invalid one fails startup)
 * - Registers every tool
 * - Serves stdio until the input closes
 */
export async function startApp(): Promise<void> {
  logger.info({
    event: 'server.starting',
    nodeEnv: config.nodeEnv,
    host: config.databricksHost || undefined,
  });

  const retryPolicy = getProcessRetryPolicy();
  const registry = createToolRegistry();
  const server = new McpServer(registry, {
    name: SERVER_NAME,
    version: SERVER_VERSION,
    execution: { retryPolicy, defaultTimeoutMs: config.toolDeadlineMs },
  });

  logger.info({
    event: 'server.started',
    tools: registry.size,
    retryPolicy,
    toolDeadlineMs: config.toolDeadlineMs,
  });

  let shuttingDown = false;
  const stop = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ event: 'server.shutdown.started', signal, inFlight: server.inFlightCount });
    server.cancelAll();
    // Flush pending traces before exit
    await shutdownLangfuse();
    logger.info({ event: 'server.shutdown.complete' });
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    void stop('SIGTERM');
  });
  process.on('SIGINT', () => {
    void stop('SIGINT');
  });

  await serveStdio(server);
  await stop('stdin.closed');
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  // The npm bin shim is a symlink to dist/index.js
  try {
    return import.meta.url === pathToFileURL(realpathSync(resolve(entry))).href;
  } catch {
    return false;
  }
}

// Auto-start ONLY when run directly (avoid side effects on import)
if (isMainModule()) {
  startApp().catch((error) => {
    logger.error({
      event: 'server.startup_failed',
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  });
}
