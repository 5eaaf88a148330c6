/**
 * Job and job run tools.
 *
 * @see https://docs.databricks.com/api/workspace/jobs
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { ApiObject } from '../../databricks/types.js';
import { callApi, listInputShape, runListing } from '../helpers.js';
import { defineTool, invocationShape, type RegisteredTool, type ToolDependencies } from '../types.js';

const JOB_SUMMARY_FIELDS = ['job_id', 'settings', 'creator_user_name', 'created_time'] as const;

const RUN_SUMMARY_FIELDS = [
  'run_id',
  'job_id',
  'run_name',
  'state',
  'status',
  'start_time',
  'end_time',
  'run_page_url',
  'trigger',
] as const;

const jobIdSchema = z.number().int().positive().describe('The job ID');
const runIdSchema = z.number().int().positive().describe('The run ID');

export function jobTools(deps: ToolDependencies): RegisteredTool[] {
  return [
    defineTool({
      name: 'list_jobs',
      description: 'List jobs in the workspace, in pages resumable with next_cursor',
      inputSchema: z.object({
        name: z.string().optional().describe('Only jobs with exactly this name'),
        ...listInputShape,
        ...invocationShape,
      }),
      handler: (input, context) =>
        runListing(deps, context, {
          resourceKind: 'jobs',
          itemsKey: 'jobs',
          filter: { name: input.name },
          input,
          fields: JOB_SUMMARY_FIELDS,
        }),
    }),

    defineTool({
      name: 'get_job',
      description: 'Get the settings of a specific job',
      inputSchema: z.object({ job_id: jobIdSchema, ...invocationShape }),
      handler: ({ job_id }, context) =>
        callApi(context, 'jobs.get', (signal) =>
          deps.workspace().get<ApiObject>('/api/2.1/jobs/get', { query: { job_id }, signal })
        ),
    }),

    defineTool({
      name: 'run_job',
      description: 'Trigger a run of a job now',
      inputSchema: z.object({
        job_id: jobIdSchema,
        job_parameters: z
          .record(z.string(), z.string())
          .optional()
          .describe('Job-level parameter overrides'),
        ...invocationShape,
      }),
      handler: ({ job_id, job_parameters }, context) => {
        // Retries of this call must not start a second run.
        const idempotencyToken = randomUUID();
        return callApi(context, 'jobs.run_now', (signal) =>
          deps.workspace().post<ApiObject>(
            '/api/2.1/jobs/run-now',
            { job_id, job_parameters, idempotency_token: idempotencyToken },
            { signal }
          )
        );
      },
    }),

    defineTool({
      name: 'list_job_runs',
      description: 'List job runs, newest first, in pages resumable with next_cursor',
      inputSchema: z.object({
        job_id: jobIdSchema.optional().describe('Only runs of this job'),
        active_only: z.boolean().optional().describe('Only runs that are pending or running'),
        completed_only: z.boolean().optional().describe('Only completed runs'),
        ...listInputShape,
        ...invocationShape,
      }),
      handler: (input, context) =>
        runListing(deps, context, {
          resourceKind: 'job_runs',
          itemsKey: 'runs',
          filter: {
            job_id: input.job_id,
            active_only: input.active_only,
            completed_only: input.completed_only,
          },
          input,
          fields: RUN_SUMMARY_FIELDS,
        }),
    }),

    defineTool({
      name: 'get_run',
      description: 'Get the state and details of a job run',
      inputSchema: z.object({ run_id: runIdSchema, ...invocationShape }),
      handler: ({ run_id }, context) =>
        callApi(context, 'jobs.runs.get', (signal) =>
          deps.workspace().get<ApiObject>('/api/2.1/jobs/runs/get', { query: { run_id }, signal })
        ),
    }),

    defineTool({
      name: 'cancel_run',
      description: 'Cancel a job run',
      inputSchema: z.object({ run_id: runIdSchema, ...invocationShape }),
      handler: async ({ run_id }, context) => {
        const cancelled = await callApi(context, 'jobs.runs.cancel', (signal) =>
          deps.workspace().post<ApiObject>('/api/2.1/jobs/runs/cancel', { run_id }, { signal })
        );
        if (!cancelled.success) return cancelled;
        return { success: true, data: { run_id, status: 'cancelling' } };
      },
    }),
  ];
}
