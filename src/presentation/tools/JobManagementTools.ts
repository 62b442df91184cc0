import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { JOB_STATUSES, JobSnapshot, JobStatus, toJobSnapshot } from '../../core/entities/Job.js';
import { Principal } from '../../core/entities/Principal.js';
import { JobService } from '../../application/services/JobService.js';
import { OperationService } from '../../application/services/OperationService.js';
import { errorResult, exportResult, jsonBlock, textResult } from './toolResults.js';

export interface JobToolContext {
  jobService: JobService;
  operationService: OperationService;
  principal: Principal;
}

export interface ListJobsParams {
  status?: JobStatus;
  operation?: string;
  limit?: number;
}

const STATUS_ICONS: Record<JobStatus, string> = {
  pending: '⏳',
  running: '🔄',
  completed: '✅',
  failed: '❌',
  cancelled: '⛔',
};

export function listJobs(ctx: JobToolContext, params: ListJobsParams): CallToolResult {
  try {
    const jobs = ctx.jobService.list({
      ownerId: ctx.principal.id,
      status: params.status,
      operationSlug: params.operation,
      limit: params.limit,
    });
    const now = new Date();

    const rows = jobs.map((job) => ({
      id: job.id,
      operation: job.operationSlug,
      status: job.status,
      progress: `${job.progress}%`,
      items: `${job.processedItems}/${job.totalItems}`,
      createdAt: job.createdAt.toISOString(),
      elapsedTime: toJobSnapshot(job, now).elapsedTime,
    }));

    const operations = ctx.jobService.operationSlugs(ctx.principal.id);
    return textResult(
      `# Jobs for ${ctx.principal.id}\n\n` +
        `- **Operations with jobs**: ${operations.length > 0 ? operations.join(', ') : 'none'}\n\n` +
        (rows.length === 0 ? 'No jobs found' : jsonBlock(rows))
    );
  } catch (error) {
    return errorResult('Error listing jobs', error);
  }
}

function formatSnapshot(snapshot: JobSnapshot): string {
  const sections = [
    `# ${STATUS_ICONS[snapshot.status]} Job ${snapshot.id}: ${snapshot.operationSlug}`,
    '## Status\n' +
      `- **Status**: ${snapshot.status}\n` +
      `- **Progress**: ${snapshot.progress}% (${snapshot.processedItems}/${snapshot.totalItems})\n` +
      `- **Elapsed**: ${snapshot.elapsedTime}`,
    '## Time Information\n' +
      `- **Created**: ${snapshot.createdAt}\n` +
      `- **Started**: ${snapshot.startedAt ?? 'Not yet started'}\n` +
      `- **Completed**: ${snapshot.completedAt ?? 'In progress'}`,
  ];

  if (snapshot.error) {
    sections.push(`## ❌ Error\n\`\`\`\n${snapshot.error}\n\`\`\``);
  }
  if (snapshot.result) {
    sections.push(`## Result\n${jsonBlock(snapshot.result)}`);
  }
  if (snapshot.status === 'completed') {
    sections.push(`Use \`export-job-result\` with job_id ${snapshot.id} to download the results.`);
  }
  return sections.join('\n\n');
}

export function getJobStatus(ctx: JobToolContext, jobId: number): CallToolResult {
  try {
    ctx.jobService.getOwnedJob(jobId, ctx.principal.id);
    return textResult(formatSnapshot(ctx.jobService.getSnapshot(jobId)));
  } catch (error) {
    return errorResult('Error getting job status', error);
  }
}

export function cancelJob(ctx: JobToolContext, jobId: number): CallToolResult {
  try {
    ctx.jobService.getOwnedJob(jobId, ctx.principal.id);
    const job = ctx.jobService.cancel(jobId);
    return textResult(
      `# Job Cancelled\n\nJob ID: ${job.id}\nStatus: ${job.status}\n` +
        `Processed before cancellation: ${job.processedItems}/${job.totalItems}`
    );
  } catch (error) {
    return errorResult('Error cancelling job', error);
  }
}

export function deleteJob(ctx: JobToolContext, jobId: number): CallToolResult {
  try {
    ctx.jobService.getOwnedJob(jobId, ctx.principal.id);
    ctx.jobService.delete(jobId);
    return textResult(`Job ${jobId} deleted`);
  } catch (error) {
    return errorResult('Error deleting job', error);
  }
}

export function exportJobResult(ctx: JobToolContext, jobId: number, format: string): CallToolResult {
  try {
    return exportResult(ctx.operationService.exportJobResult(jobId, format, ctx.principal));
  } catch (error) {
    return errorResult('Error exporting job result', error);
  }
}

/**
 * Register all job management tools
 */
export function registerJobManagementTools(server: McpServer, ctx: JobToolContext) {
  const jobId = z.number().int().positive().describe('Numeric job ID');

  server.tool(
    'list-jobs',
    'List your background jobs, newest first',
    {
      status: z.enum(JOB_STATUSES).optional().describe('Filter jobs by status (optional)'),
      operation: z.string().optional().describe('Filter jobs by operation slug (optional)'),
      limit: z.number().int().positive().max(500).optional().describe('Maximum number of jobs to return'),
    },
    async (params) => listJobs(ctx, params)
  );

  server.tool(
    'get-job-status',
    'Get status, progress and elapsed time of a job',
    { job_id: jobId },
    async ({ job_id }) => getJobStatus(ctx, job_id)
  );

  server.tool(
    'cancel-job',
    'Cancel a pending or running job. An item already in flight may still finish',
    { job_id: jobId },
    async ({ job_id }) => cancelJob(ctx, job_id)
  );

  server.tool(
    'delete-job',
    'Delete a finished, failed or cancelled job',
    { job_id: jobId },
    async ({ job_id }) => deleteJob(ctx, job_id)
  );

  server.tool(
    'export-job-result',
    'Export the result of a completed job',
    {
      job_id: jobId,
      format: z.enum(['csv', 'json']).default('csv').describe('Export format'),
    },
    async ({ job_id, format }) => exportJobResult(ctx, job_id, format)
  );
}
