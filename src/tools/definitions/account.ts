/**
 * Account-level tools. These need DATABRICKS_ACCOUNT_ID.
 *
 * @see https://docs.databricks.com/api/account/workspaces
 * @see https://docs.databricks.com/api/account/accountusers
 */

import { z } from 'zod';
import type { ApiObject } from '../../databricks/types.js';
import { callApi, listInputShape, runListing } from '../helpers.js';
import { defineTool, invocationShape, type RegisteredTool, type ToolDependencies } from '../types.js';

const WORKSPACE_SUMMARY_FIELDS = [
  'workspace_id',
  'workspace_name',
  'deployment_name',
  'workspace_status',
  'aws_region',
  'cloud',
  'pricing_tier',
] as const;

const USER_SUMMARY_FIELDS = ['id', 'userName', 'displayName', 'active'] as const;
const GROUP_SUMMARY_FIELDS = ['id', 'displayName'] as const;

const scimFilterSchema = z
  .string()
  .optional()
  .describe('SCIM filter expression, e.g. userName eq "someone@example.com"');

export function accountTools(deps: ToolDependencies): RegisteredTool[] {
  return [
    defineTool({
      name: 'list_account_workspaces',
      description: 'List the workspaces of the account',
      inputSchema: z.object({ ...listInputShape, ...invocationShape }),
      handler: (input, context) =>
        runListing(deps, context, {
          resourceKind: 'account_workspaces',
          itemsKey: 'workspaces',
          input,
          fields: WORKSPACE_SUMMARY_FIELDS,
        }),
    }),

    defineTool({
      name: 'get_account_workspace',
      description: 'Get details of an account workspace',
      inputSchema: z.object({
        workspace_id: z.number().int().positive().describe('The workspace ID'),
        ...invocationShape,
      }),
      handler: ({ workspace_id }, context) =>
        callApi(context, 'account.workspaces.get', (signal) => {
          const client = deps.account();
          return client.get<ApiObject>(client.accountPath(`/workspaces/${workspace_id}`), { signal });
        }),
    }),

    defineTool({
      name: 'list_account_users',
      description: 'List account users, in pages resumable with next_cursor',
      inputSchema: z.object({ filter: scimFilterSchema, ...listInputShape, ...invocationShape }),
      handler: (input, context) =>
        runListing(deps, context, {
          resourceKind: 'account_users',
          itemsKey: 'users',
          filter: { filter: input.filter },
          input,
          fields: USER_SUMMARY_FIELDS,
        }),
    }),

    defineTool({
      name: 'list_account_groups',
      description: 'List account groups, in pages resumable with next_cursor',
      inputSchema: z.object({ filter: scimFilterSchema, ...listInputShape, ...invocationShape }),
      handler: (input, context) =>
        runListing(deps, context, {
          resourceKind: 'account_groups',
          itemsKey: 'groups',
          filter: { filter: input.filter },
          input,
          fields: GROUP_SUMMARY_FIELDS,
        }),
    }),
  ];
}
