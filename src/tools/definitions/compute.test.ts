import { describe, it, expect, beforeEach } from 'vitest';
import { createFakeDependencies, createTestContext } from '../../../tests/helpers/tool-fixtures.js';
import { DatabricksApiError } from '../../databricks/errors.js';
import type { RegisteredTool } from '../types.js';
import { computeTools } from './compute.js';

describe('cluster tools', () => {
  let fake: ReturnType<typeof createFakeDependencies>;
  let tools: Map<string, RegisteredTool>;
  const context = createTestContext();

  const invoke = (name: string, args: Record<string, unknown>) => {
    const tool = tools.get(name);
    if (!tool) throw new Error(`missing tool ${name}`);
    return tool.invoke(args, context);
  };

  beforeEach(() => {
    fake = createFakeDependencies();
    tools = new Map(computeTools(fake.deps).map((t) => [t.name, t]));
  });

  it('list_clusters keeps only summary fields', async () => {
    fake.listings.fetchFirstPage.mockResolvedValue({
      items: [
        {
          cluster_id: '0101-abc',
          cluster_name: 'etl',
          state: 'RUNNING',
          spark_conf: { 'spark.x': '1' },
          default_tags: { Vendor: 'Databricks' },
        },
      ],
      nextPageToken: null,
      totalKnown: null,
    });

    const result = await invoke('list_clusters', { page_size: 25 });

    expect(fake.listings.fetchFirstPage).toHaveBeenCalledWith('clusters', {}, 25, context.signal);
    expect(result).toEqual({
      success: true,
      data: {
        clusters: [{ cluster_id: '0101-abc', cluster_name: 'etl', state: 'RUNNING' }],
        count: 1,
        truncated: false,
        next_cursor: null,
        total_known: null,
      },
    });
  });

  it('rejects max_items above the ceiling', async () => {
    const result = await invoke('list_clusters', { max_items: 5000 });

    expect(result).toMatchObject({ success: false, error: { kind: 'BadRequestError' } });
  });

  it('start_cluster retries while the cluster is still terminating', async () => {
    fake.workspacePost
      .mockRejectedValueOnce(
        new DatabricksApiError({
          status: 400,
          errorCode: 'INVALID_STATE',
          message: 'Cluster 0101-abc is in progress of terminating',
          method: 'POST',
          path: '/api/2.1/clusters/start',
        })
      )
      .mockResolvedValueOnce({});

    const result = await invoke('start_cluster', { cluster_id: '0101-abc' });

    expect(fake.workspacePost).toHaveBeenCalledTimes(2);
    expect(result).toEqual({ success: true, data: { cluster_id: '0101-abc', status: 'starting' } });
  });

  it('terminate_cluster calls the delete endpoint', async () => {
    const result = await invoke('terminate_cluster', { cluster_id: '0101-abc' });

    expect(fake.workspacePost).toHaveBeenCalledWith(
      '/api/2.1/clusters/delete',
      { cluster_id: '0101-abc' },
      { signal: context.signal }
    );
    expect(result).toEqual({ success: true, data: { cluster_id: '0101-abc', status: 'terminating' } });
  });

  it('get_cluster reports a missing cluster as NotFoundError', async () => {
    fake.workspaceGet.mockRejectedValue(
      new DatabricksApiError({
        status: 404,
        errorCode: 'RESOURCE_DOES_NOT_EXIST',
        message: 'Cluster nope does not exist',
        method: 'GET',
        path: '/api/2.1/clusters/get',
      })
    );

    const result = await invoke('get_cluster', { cluster_id: 'nope' });

    expect(result).toMatchObject({
      success: false,
      error: { kind: 'NotFoundError', httpStatus: 404, errorCode: 'RESOURCE_DOES_NOT_EXIST' },
    });
  });
});
