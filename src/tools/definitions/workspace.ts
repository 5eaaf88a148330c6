/**
 * Workspace file tree, pipeline and repo tools.
 *
 * @see https://docs.databricks.com/api/workspace/workspace/list
 * @see https://docs.databricks.com/api/workspace/pipelines/listpipelines
 * @see https://docs.databricks.com/api/workspace/repos/list
 */

import { z } from 'zod';
import { listInputShape, runListing } from '../helpers.js';
import { defineTool, invocationShape, type RegisteredTool, type ToolDependencies } from '../types.js';

export function workspaceTools(deps: ToolDependencies): RegisteredTool[] {
  return [
    defineTool({
      name: 'list_workspace_objects',
      description: 'List notebooks, files and directories under a workspace path',
      inputSchema: z.object({
        path: z.string().min(1).describe('Absolute workspace path, e.g. /Users/someone@example.com'),
        ...listInputShape,
        ...invocationShape,
      }),
      handler: (input, context) =>
        runListing(deps, context, {
          resourceKind: 'workspace_objects',
          itemsKey: 'objects',
          filter: { path: input.path },
          input,
          fields: ['path', 'object_type', 'object_id', 'language', 'modified_at'],
        }),
    }),

    defineTool({
      name: 'list_pipelines',
      description: 'List Delta Live Tables pipelines, in pages resumable with next_cursor',
      inputSchema: z.object({
        filter: z.string().optional().describe("Filter expression, e.g. name LIKE '%sales%'"),
        ...listInputShape,
        ...invocationShape,
      }),
      handler: (input, context) =>
        runListing(deps, context, {
          resourceKind: 'pipelines',
          itemsKey: 'pipelines',
          filter: { filter: input.filter },
          input,
          fields: ['pipeline_id', 'name', 'state', 'health', 'cluster_id', 'creator_user_name'],
        }),
    }),

    defineTool({
      name: 'list_repos',
      description: 'List Git folders (repos), in pages resumable with next_cursor',
      inputSchema: z.object({
        path_prefix: z.string().optional().describe('Only repos under this workspace path'),
        ...listInputShape,
        ...invocationShape,
      }),
      handler: (input, context) =>
        runListing(deps, context, {
          resourceKind: 'repos',
          itemsKey: 'repos',
          filter: { path_prefix: input.path_prefix },
          input,
          fields: ['id', 'path', 'url', 'provider', 'branch', 'head_commit_id'],
        }),
    }),
  ];
}
