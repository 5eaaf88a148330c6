import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ToolRegistry, isSnakeCase } from './registry.js';
import { defineTool, type RegisteredTool } from './types.js';

function tool(name: string): RegisteredTool {
  return defineTool({
    name,
    description: `The ${name} tool`,
    inputSchema: z.object({ id: z.string().describe('Identifier') }),
    handler: async (input) => ({ success: true, data: input.id }),
  });
}

describe('isSnakeCase', () => {
  it('accepts snake_case names only', () => {
    expect(isSnakeCase('list_clusters')).toBe(true);
    expect(isSnakeCase('get_v2_thing')).toBe(true);
    expect(isSnakeCase('listClusters')).toBe(false);
    expect(isSnakeCase('list-clusters')).toBe(false);
    expect(isSnakeCase('_private')).toBe(false);
  });
});

describe('ToolRegistry', () => {
  it('registers and looks up tools', () => {
    const registry = new ToolRegistry();
    registry.registerAll([tool('get_cluster'), tool('list_clusters')]);

    expect(registry.size).toBe(2);
    expect(registry.get('get_cluster')?.description).toBe('The get_cluster tool');
    expect(registry.get('missing')).toBeUndefined();
  });

  it('lists tools sorted by name with their JSON Schema', () => {
    const registry = new ToolRegistry();
    registry.registerAll([tool('start_cluster'), tool('get_cluster')]);

    const listed = registry.list();

    expect(listed.map((t) => t.name)).toEqual(['get_cluster', 'start_cluster']);
    expect(listed[0]?.inputSchema).toMatchObject({
      type: 'object',
      properties: { id: { type: 'string', description: 'Identifier' } },
      required: ['id'],
    });
  });

  it('rejects duplicate names', () => {
    const registry = new ToolRegistry();
    registry.register(tool('get_cluster'));

    expect(() => registry.register(tool('get_cluster'))).toThrow('Tool already registered: get_cluster');
  });

  it('rejects names that are not snake_case', () => {
    expect(() => new ToolRegistry().register(tool('getCluster'))).toThrow('snake_case');
  });
});

describe('defineTool', () => {
  it('validates arguments before calling the handler', async () => {
    const registered = tool('get_cluster');
    const context = {
      traceId: 't',
      signal: new AbortController().signal,
      deadline: Date.now() + 1000,
      retry: {},
    };

    expect(await registered.invoke({ id: 'c-1' }, context)).toEqual({ success: true, data: 'c-1' });

    const invalid = await registered.invoke({ id: 7 }, context);
    expect(invalid).toMatchObject({ success: false, error: { kind: 'BadRequestError' } });

    const missing = await registered.invoke(undefined, context);
    expect(missing).toMatchObject({ success: false, error: { kind: 'BadRequestError' } });
  });
});
