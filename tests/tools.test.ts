import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { OperationRegistry } from '../src/application/operations/OperationRegistry.js';
import { registerBuiltinOperations } from '../src/application/operations/builtinOperations.js';
import { JobService } from '../src/application/services/JobService.js';
import { OperationService } from '../src/application/services/OperationService.js';
import { Principal } from '../src/core/entities/Principal.js';
import { DatabaseConnection, IN_MEMORY_DATABASE } from '../src/infrastructure/database/DatabaseConnection.js';
import { JobRepository } from '../src/infrastructure/database/repositories/JobRepository.js';
import {
  describeOperation,
  exportOperationResult,
  listOperations,
  runOperation,
} from '../src/presentation/tools/OperationTools.js';
import {
  JobToolContext,
  cancelJob,
  deleteJob,
  exportJobResult,
  getJobStatus,
  listJobs,
} from '../src/presentation/tools/JobManagementTools.js';
import { FakeClientProvider, FakeTicketClient, makeTickets } from './helpers/FakeTicketClient.js';
import { RecordingTaskQueue } from './helpers/RecordingTaskQueue.js';

function textOf(result: CallToolResult): string {
  const [first] = result.content;
  if (first?.type !== 'text') throw new Error('expected a text result');
  return first.text;
}

describe('MCP tool handlers', () => {
  const alice: Principal = { id: 'alice', role: 'user' };
  const bob: Principal = { id: 'bob', role: 'user' };

  let connection: DatabaseConnection;
  let jobService: JobService;
  let operationService: OperationService;
  let ctx: JobToolContext;

  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    connection = new DatabaseConnection(IN_MEMORY_DATABASE);
    const client = new FakeTicketClient().addView({ id: 100, title: 'Escalations', active: true }, makeTickets(3));
    jobService = new JobService(new JobRepository(connection.getDatabase()), new RecordingTaskQueue());
    const registry = new OperationRegistry();
    registerBuiltinOperations(registry, {
      clientProvider: new FakeClientProvider(client),
      jobService,
      settings: { syncItemCeiling: 500, asyncItemCeiling: 50_000, batch: { delayMs: 0 } },
    });
    let nextId = 0;
    operationService = new OperationService(registry, jobService, () => `task-${++nextId}`);
    ctx = { jobService, operationService, principal: alice };
  });

  afterEach(() => {
    connection.close();
    jest.restoreAllMocks();
  });

  async function queueJob() {
    const result = await runOperation(ctx, 'tag-add', { view_id: '100', tags: 'urgent', ticket_limit: '1000' });
    expect(result.isError).toBeUndefined();
    return result;
  }

  describe('operation tools', () => {
    test('should list operations with their capabilities', () => {
      const lines = textOf(listOperations(ctx)).split('\n');

      expect(lines[0]).toBe('# Available Operations');
      expect(lines.slice(2)).toEqual([
        '- **tag-add** (Tags): Add one or more tags to every ticket in a view | background: yes | export: csv, json',
        '- **tag-remove** (Tags): Remove one or more tags from every ticket in a view | background: yes | export: csv, json',
        '- **apply-macro-to-view** (Macros) [admin]: Apply a macro to all tickets in a specified view with safety controls | background: yes | export: csv, json',
        '- **macro-search** (Macros): Find macros that contain a substring in any of their actions | background: no | export: csv, json',
      ]);
    });

    test('should describe an operation', async () => {
      const text = textOf(await describeOperation(ctx, 'macro-search'));

      expect(text).toBe(
        '# Search Macros\n\nFind macros that contain a substring in any of their actions\n\n' +
          '- **Slug**: macro-search\n' +
          '- **Category**: Macros\n' +
          '- **Admin only**: no\n' +
          '- **Limits**: Runs inline only\n\n' +
          '## Fields\n' +
          '- **search_term** [text] (required): Search Term\n' +
          '  This will search within all macro actions. Case-insensitive.'
      );
    });

    test('should report unknown operations as errors', async () => {
      const result = await describeOperation(ctx, 'nope');
      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe('Error describing operation: Operation "nope" not found');
    });

    test('should return inline results', async () => {
      const result = await runOperation(ctx, 'tag-add', { view_id: '100', tags: 'urgent', ticket_limit: '10' });

      expect(result.isError).toBe(false);
      expect(textOf(result).split('\n')[0]).toBe('# ✅ Successfully added tags to 3 ticket(s) in view "Escalations".');
    });

    test('should explain rejected requests', async () => {
      const result = await runOperation(ctx, 'apply-macro-to-view', { view_id: '100', macro_id: '5', ticket_limit: '1' });

      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe('Cannot run apply-macro-to-view: This operation requires admin privileges');
    });

    test('should point queued jobs at the status tool', async () => {
      expect(textOf(await queueJob())).toBe(
        '# ⏳ Job Queued\n\nJob started. Processing 3 tickets in the background...\n\n' +
          '- **Job ID**: 1\n' +
          '- **Task ID**: task-1\n' +
          '- **Items**: 3\n\n' +
          'Use `get-job-status` with job_id 1 to follow progress.'
      );
    });

    test('should export the latest inline result', async () => {
      expect(textOf(exportOperationResult(ctx, 'tag-add', 'csv'))).toBe(
        'Error exporting results: No results to export. Run the operation first.'
      );

      await runOperation(ctx, 'tag-add', { view_id: '100', tags: 'urgent', ticket_limit: '10' });
      const lines = textOf(exportOperationResult(ctx, 'tag-add', 'csv')).split('\n');

      expect(lines[0]).toBe('# Export: tag_add_100.csv');
      expect(lines[2]).toBe('- **Type**: text/csv');
      expect(lines[5]).toBe('```csv');
      expect(lines[6]).toBe('Add Tags to View Results\r');
    });
  });

  describe('job tools', () => {
    test('should show job status to its owner only', async () => {
      await queueJob();

      expect(textOf(getJobStatus(ctx, 1)).split('\n')[0]).toBe('# ⏳ Job 1: tag-add');

      const denied = getJobStatus({ ...ctx, principal: bob }, 1);
      expect(denied.isError).toBe(true);
      expect(textOf(denied)).toBe('Error getting job status: Permission denied');
    });

    test('should list the caller’s jobs', async () => {
      await queueJob();

      expect(textOf(listJobs(ctx, {})).split('\n').slice(0, 3)).toEqual([
        '# Jobs for alice',
        '',
        '- **Operations with jobs**: tag-add',
      ]);
      expect(textOf(listJobs({ ...ctx, principal: bob }, {}))).toBe(
        '# Jobs for bob\n\n- **Operations with jobs**: none\n\nNo jobs found'
      );
      expect(textOf(listJobs(ctx, { status: 'completed' })).endsWith('No jobs found')).toBe(true);
    });

    test('should cancel and then delete a job', async () => {
      await queueJob();

      expect(textOf(deleteJob(ctx, 1))).toBe('Error deleting job: Job 1 is pending; cancel it before deleting');
      expect(textOf(cancelJob(ctx, 1))).toBe(
        '# Job Cancelled\n\nJob ID: 1\nStatus: cancelled\nProcessed before cancellation: 0/3'
      );
      expect(textOf(cancelJob(ctx, 1))).toBe(
        'Error cancelling job: Job 1 is already cancelled and cannot be cancelled'
      );
      expect(textOf(deleteJob(ctx, 1))).toBe('Job 1 deleted');
      expect(textOf(getJobStatus(ctx, 1))).toBe('Error getting job status: Job not found: 1');
    });

    test('should export a completed job', async () => {
      await queueJob();
      expect(textOf(exportJobResult(ctx, 1, 'csv'))).toBe(
        'Error exporting job result: Job 1 has no result to export (status: pending)'
      );

      jobService.complete(1, { viewId: 100, viewName: 'Escalations', dryRun: false, totalTickets: 3 });

      expect(textOf(exportJobResult(ctx, 1, 'json')).split('\n')[0]).toBe('# Export: tag_add_100.json');
      expect(textOf(getJobStatus(ctx, 1))).toContain('Use `export-job-result` with job_id 1 to download the results.');
    });
  });
});
