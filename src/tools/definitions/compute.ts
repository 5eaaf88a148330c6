/**
 * Cluster tools.
 *
 * @see https://docs.databricks.com/api/workspace/clusters
 */

import { z } from 'zod';
import type { ApiObject } from '../../databricks/types.js';
import { callApi, listInputShape, runListing } from '../helpers.js';
import { defineTool, invocationShape, type RegisteredTool, type ToolDependencies } from '../types.js';

const CLUSTER_SUMMARY_FIELDS = [
  'cluster_id',
  'cluster_name',
  'state',
  'state_message',
  'spark_version',
  'node_type_id',
  'num_workers',
  'autoscale',
  'creator_user_name',
  'cluster_source',
] as const;

const clusterIdShape = {
  cluster_id: z.string().min(1).describe('The cluster ID'),
  ...invocationShape,
};

export function computeTools(deps: ToolDependencies): RegisteredTool[] {
  return [
    defineTool({
      name: 'list_clusters',
      description: 'List clusters in the workspace, in pages resumable with next_cursor',
      inputSchema: z.object({ ...listInputShape, ...invocationShape }),
      handler: (input, context) =>
        runListing(deps, context, {
          resourceKind: 'clusters',
          itemsKey: 'clusters',
          input,
          fields: CLUSTER_SUMMARY_FIELDS,
        }),
    }),

    defineTool({
      name: 'get_cluster',
      description: 'Get details of a specific cluster',
      inputSchema: z.object(clusterIdShape),
      handler: ({ cluster_id }, context) =>
        callApi(context, 'clusters.get', (signal) =>
          deps.workspace().get<ApiObject>('/api/2.1/clusters/get', { query: { cluster_id }, signal })
        ),
    }),

    defineTool({
      name: 'start_cluster',
      description: 'Start a terminated cluster',
      inputSchema: z.object(clusterIdShape),
      handler: async ({ cluster_id }, context) => {
        const started = await callApi(context, 'clusters.start', (signal) =>
          deps.workspace().post<ApiObject>('/api/2.1/clusters/start', { cluster_id }, { signal })
        );
        if (!started.success) return started;
        return { success: true, data: { cluster_id, status: 'starting' } };
      },
    }),

    defineTool({
      name: 'terminate_cluster',
      description: 'Terminate a running cluster; its configuration is kept',
      inputSchema: z.object(clusterIdShape),
      handler: async ({ cluster_id }, context) => {
        const terminated = await callApi(context, 'clusters.delete', (signal) =>
          deps.workspace().post<ApiObject>('/api/2.1/clusters/delete', { cluster_id }, { signal })
        );
        if (!terminated.success) return terminated;
        return { success: true, data: { cluster_id, status: 'terminating' } };
      },
    }),
  ];
}
