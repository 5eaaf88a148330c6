/**
 * Unity Catalog tools.
 *
 * @see https://docs.databricks.com/api/workspace/catalogs
 */

import { z } from 'zod';
import type { ApiObject } from '../../databricks/types.js';
import { callApi, listInputShape, runListing } from '../helpers.js';
import { defineTool, invocationShape, type RegisteredTool, type ToolDependencies } from '../types.js';

const CATALOG_SUMMARY_FIELDS = ['name', 'comment', 'owner', 'catalog_type', 'created_at'] as const;
const SCHEMA_SUMMARY_FIELDS = ['name', 'catalog_name', 'full_name', 'comment', 'owner'] as const;
const TABLE_SUMMARY_FIELDS = [
  'name',
  'catalog_name',
  'schema_name',
  'full_name',
  'table_type',
  'data_source_format',
  'comment',
  'owner',
] as const;

const catalogNameSchema = z.string().min(1).describe('Catalog name');
const schemaNameSchema = z.string().min(1).describe('Schema name');

export function catalogTools(deps: ToolDependencies): RegisteredTool[] {
  return [
    defineTool({
      name: 'list_catalogs',
      description: 'List Unity Catalog catalogs, in pages resumable with next_cursor',
      inputSchema: z.object({ ...listInputShape, ...invocationShape }),
      handler: (input, context) =>
        runListing(deps, context, {
          resourceKind: 'catalogs',
          itemsKey: 'catalogs',
          input,
          fields: CATALOG_SUMMARY_FIELDS,
        }),
    }),

    defineTool({
      name: 'get_catalog',
      description: 'Get details of a catalog',
      inputSchema: z.object({ name: catalogNameSchema, ...invocationShape }),
      handler: ({ name }, context) =>
        callApi(context, 'catalogs.get', (signal) =>
          deps
            .workspace()
            .get<ApiObject>(`/api/2.1/unity-catalog/catalogs/${encodeURIComponent(name)}`, { signal })
        ),
    }),

    defineTool({
      name: 'list_schemas',
      description: 'List the schemas of a catalog, in pages resumable with next_cursor',
      inputSchema: z.object({ catalog_name: catalogNameSchema, ...listInputShape, ...invocationShape }),
      handler: (input, context) =>
        runListing(deps, context, {
          resourceKind: 'schemas',
          itemsKey: 'schemas',
          filter: { catalog_name: input.catalog_name },
          input,
          fields: SCHEMA_SUMMARY_FIELDS,
        }),
    }),

    defineTool({
      name: 'list_tables',
      description: 'List the tables of a schema, in pages resumable with next_cursor',
      inputSchema: z.object({
        catalog_name: catalogNameSchema,
        schema_name: schemaNameSchema,
        ...listInputShape,
        ...invocationShape,
      }),
      handler: (input, context) =>
        runListing(deps, context, {
          resourceKind: 'tables',
          itemsKey: 'tables',
          filter: { catalog_name: input.catalog_name, schema_name: input.schema_name },
          input,
          fields: TABLE_SUMMARY_FIELDS,
        }),
    }),

    defineTool({
      name: 'get_table',
      description: 'Get a table, including its columns',
      inputSchema: z.object({
        full_name: z.string().min(1).describe('Three-level table name: catalog.schema.table'),
        ...invocationShape,
      }),
      handler: ({ full_name }, context) =>
        callApi(context, 'tables.get', (signal) =>
          deps
            .workspace()
            .get<ApiObject>(`/api/2.1/unity-catalog/tables/${encodeURIComponent(full_name)}`, { signal })
        ),
    }),
  ];
}
