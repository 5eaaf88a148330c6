/**
 * Model serving tools.
 *
 * @see https://docs.databricks.com/api/workspace/servingendpoints
 */

import { z } from 'zod';
import type { ApiObject } from '../../databricks/types.js';
import { callApi, listInputShape, runListing } from '../helpers.js';
import { defineTool, invocationShape, type RegisteredTool, type ToolDependencies } from '../types.js';

const ENDPOINT_SUMMARY_FIELDS = ['name', 'id', 'state', 'creator', 'creation_timestamp', 'task'] as const;

const endpointNameSchema = z.string().min(1).describe('The serving endpoint name');

export function servingTools(deps: ToolDependencies): RegisteredTool[] {
  return [
    defineTool({
      name: 'list_serving_endpoints',
      description: 'List model serving endpoints',
      inputSchema: z.object({ ...listInputShape, ...invocationShape }),
      handler: (input, context) =>
        runListing(deps, context, {
          resourceKind: 'serving_endpoints',
          itemsKey: 'endpoints',
          input,
          fields: ENDPOINT_SUMMARY_FIELDS,
        }),
    }),

    defineTool({
      name: 'get_serving_endpoint',
      description: 'Get details of a serving endpoint',
      inputSchema: z.object({ name: endpointNameSchema, ...invocationShape }),
      handler: ({ name }, context) =>
        callApi(context, 'serving_endpoints.get', (signal) =>
          deps.workspace().get<ApiObject>(`/api/2.0/serving-endpoints/${encodeURIComponent(name)}`, { signal })
        ),
    }),

    defineTool({
      name: 'query_serving_endpoint',
      description: 'Send a scoring request to a serving endpoint and return its response',
      inputSchema: z.object({
        name: endpointNameSchema,
        payload: z
          .record(z.string(), z.unknown())
          .describe('Request body, e.g. { "dataframe_records": [...] } or { "messages": [...] }'),
        ...invocationShape,
      }),
      handler: ({ name, payload }, context) =>
        callApi(context, 'serving_endpoints.query', (signal) =>
          deps
            .workspace()
            .post<ApiObject>(`/serving-endpoints/${encodeURIComponent(name)}/invocations`, payload, { signal })
        ),
    }),
  ];
}
