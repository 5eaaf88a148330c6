/**
 * Tool registry.
 *
 * Holds the registered tools by name and lists them, sorted, for tools/list.
 * Tool names are snake_case and unique.
 */

import type { McpTool } from '../mcp/types.js';
import { logger } from '../utils/logger.js';
import type { RegisteredTool } from './types.js';

export function isSnakeCase(value: string): boolean {
  return /^[a-z][a-z0-9_]*$/.test(value);
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  /**
   * @throws Error on a non snake_case or duplicate name
   */
  register(tool: RegisteredTool): void {
    if (!isSnakeCase(tool.name)) {
      throw new Error(`Tool name must be snake_case: ${tool.name}`);
    }
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
  }

  registerAll(tools: readonly RegisteredTool[]): void {
    for (const tool of tools) this.register(tool);
    logger.debug({ event: 'tools.registry.updated', toolCount: this.tools.size });
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  get size(): number {
    return this.tools.size;
  }

  list(): McpTool[] {
    return Array.from(this.tools.values())
      .map((t) => ({ name: t.name, description: t.description, inputSchema: t.inputSchema }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }
}
