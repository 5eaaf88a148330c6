/**
 * Tools Module
 *
 * Builds the registry of every Databricks tool over the process-wide
 * clients, or over injected dependencies in tests.
 */

import { config } from '../config/environment.js';
import { getAccountClient, getWorkspaceClient } from '../databricks/client.js';
import { DatabricksListingSource, DatabricksStatementSource } from '../databricks/sources.js';
import { accountTools } from './definitions/account.js';
import { catalogTools } from './definitions/catalog.js';
import { computeTools } from './definitions/compute.js';
import { jobTools } from './definitions/jobs.js';
import { servingTools } from './definitions/serving.js';
import { sqlTools } from './definitions/sql.js';
import { workspaceTools } from './definitions/workspace.js';
import { ToolRegistry } from './registry.js';
import type { ToolDependencies } from './types.js';

export function defaultToolDependencies(): ToolDependencies {
  return {
    workspace: getWorkspaceClient,
    account: getAccountClient,
    listings: new DatabricksListingSource(getWorkspaceClient, getAccountClient),
    statements: new DatabricksStatementSource(getWorkspaceClient),
    statementLimits: { maxItems: config.statementMaxItems, maxBytes: config.statementMaxBytes },
  };
}

export function createToolRegistry(deps: ToolDependencies = defaultToolDependencies()): ToolRegistry {
  const registry = new ToolRegistry();
  registry.registerAll([
    ...computeTools(deps),
    ...jobTools(deps),
    ...sqlTools(deps),
    ...catalogTools(deps),
    ...servingTools(deps),
    ...accountTools(deps),
    ...workspaceTools(deps),
  ]);
  return registry;
}

export { executeTool, type ExecuteToolOptions } from './executor.js';
export { ToolRegistry } from './registry.js';
export type { InvocationContext, RegisteredTool, ToolDependencies } from './types.js';
