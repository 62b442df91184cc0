import { OperationRegistry } from '../src/application/operations/OperationRegistry.js';
import { registerBuiltinOperations } from '../src/application/operations/builtinOperations.js';
import { JobService } from '../src/application/services/JobService.js';
import { OperationService } from '../src/application/services/OperationService.js';
import { BulkTaskWorker } from '../src/application/workers/BulkTaskWorker.js';
import { Principal } from '../src/core/entities/Principal.js';
import { RemoteApiError } from '../src/core/errors.js';
import { DatabaseConnection, IN_MEMORY_DATABASE } from '../src/infrastructure/database/DatabaseConnection.js';
import { JobRepository } from '../src/infrastructure/database/repositories/JobRepository.js';
import { TaskQueue } from '../src/infrastructure/queue/TaskQueue.js';
import { FakeClientProvider, FakeTicketClient, makeTickets, recordingSleep } from './helpers/FakeTicketClient.js';

describe('background jobs end to end', () => {
  const alice: Principal = { id: 'alice', role: 'user' };

  let connection: DatabaseConnection;
  let client: FakeTicketClient;
  let queue: TaskQueue;
  let jobService: JobService;
  let service: OperationService;
  let sleeper: ReturnType<typeof recordingSleep>;
  let nextId: number;

  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    connection = new DatabaseConnection(IN_MEMORY_DATABASE);
    client = new FakeTicketClient().addView({ id: 100, title: 'Escalations', active: true }, makeTickets(3));
    queue = new TaskQueue(1);
    jobService = new JobService(new JobRepository(connection.getDatabase()), queue);
    sleeper = recordingSleep();

    const registry = new OperationRegistry();
    registerBuiltinOperations(registry, {
      clientProvider: new FakeClientProvider(client),
      jobService,
      settings: { syncItemCeiling: 2, asyncItemCeiling: 50_000, batch: { delayMs: 0 } },
    });
    nextId = 0;
    service = new OperationService(registry, jobService, () => `task-${++nextId}`);
  });

  afterEach(() => {
    connection.close();
    jest.restoreAllMocks();
  });

  function attach(provider = new FakeClientProvider(client)) {
    const worker = new BulkTaskWorker(jobService, provider, {
      delayMs: 0,
      rateLimitCooldownMs: 30_000,
      sleep: sleeper.sleep,
    });
    queue.attachWorker((task) => worker.handle(task));
  }

  async function queueTagAdd(tags: string) {
    const outcome = await service.run('tag-add', { view_id: '100', tags, ticket_limit: '10' }, alice);
    if (outcome.status !== 'queued') throw new Error(`expected a queued job, got ${outcome.status}`);
    return outcome.job;
  }

  test('should run a job from pending to completed', async () => {
    const job = await queueTagAdd('urgent');
    expect(job.status).toBe('pending');

    const progress = jest.spyOn(jobService, 'advance');
    attach();
    await queue.whenIdle();

    expect(progress.mock.calls).toEqual([
      [job.id, 0],
      [job.id, 1],
      [job.id, 2],
      [job.id, 3],
    ]);

    const finished = jobService.getJob(job.id);
    expect(finished.status).toBe('completed');
    expect(finished.progress).toBe(100);
    expect(finished.processedItems).toBe(3);
    expect(finished.startedAt).toBeInstanceOf(Date);
    expect(finished.completedAt).toBeInstanceOf(Date);
    expect(finished.result).toEqual({
      viewId: 100,
      viewName: 'Escalations',
      operation: 'tag-add',
      tags: ['urgent'],
      dryRun: false,
      totalTickets: 3,
      successful: 3,
      failed: 0,
      successfulTickets: [1, 2, 3],
      failedTickets: [],
      errors: [],
    });
    expect([1, 2, 3].map((id) => client.tickets.get(id)?.tags)).toEqual([['urgent'], ['urgent'], ['urgent']]);
  });

  test('should retry a throttled ticket once after the cooldown', async () => {
    client.failUpdates(2, new RemoteApiError('HTTP 429 Too Many Requests', 429));
    const job = await queueTagAdd('urgent');

    attach();
    await queue.whenIdle();

    expect(sleeper.calls).toEqual([30_000]);
    expect(jobService.getJob(job.id).result?.successfulTickets).toEqual([1, 2, 3]);
  });

  test('should complete with per-ticket failures recorded', async () => {
    client.failUpdates(3, new Error('Ticket is closed'));
    const job = await queueTagAdd('urgent');

    attach();
    await queue.whenIdle();

    const finished = jobService.getJob(job.id);
    expect(finished.status).toBe('completed');
    expect(finished.processedItems).toBe(2);
    expect(finished.result?.failedTickets).toEqual([3]);
    expect(finished.result?.errors).toEqual(['Ticket 3: Ticket is closed']);
  });

  test('should fail the job when the worker cannot reach the ticket system', async () => {
    const job = await queueTagAdd('urgent');

    attach(new FakeClientProvider(null));
    await queue.whenIdle();

    const finished = jobService.getJob(job.id);
    expect(finished.status).toBe('failed');
    expect(finished.error).toBe('Zendesk client not configured');
    expect(finished.result).toBeUndefined();
  });

  test('should never run a job cancelled while pending', async () => {
    const first = await queueTagAdd('urgent');
    const second = await queueTagAdd('vip');

    jobService.cancel(second.id);
    attach();
    await queue.whenIdle();

    expect(jobService.getJob(first.id).status).toBe('completed');
    const cancelled = jobService.getJob(second.id);
    expect(cancelled.status).toBe('cancelled');
    expect(cancelled.processedItems).toBe(0);
    expect(client.tickets.get(1)?.tags).toEqual(['urgent']);
    expect(queue.getStatistics()).toMatchObject({ processed: 1, revoked: 1 });
  });

  test('should stop a running job at the next ticket once it is cancelled', async () => {
    client.addView({ id: 200, title: 'Backlog', active: true }, makeTickets(20, 11));
    const outcome = await service.run('tag-add', { view_id: '200', tags: 'urgent', ticket_limit: '20' }, alice);
    if (outcome.status !== 'queued') throw new Error(`expected a queued job, got ${outcome.status}`);
    const job = outcome.job;

    let pauses = 0;
    const worker = new BulkTaskWorker(jobService, new FakeClientProvider(client), {
      delayMs: 1,
      sleep: async () => {
        pauses++;
        if (pauses === 2) jobService.cancel(job.id);
      },
    });
    queue.attachWorker((task) => worker.handle(task));
    await queue.whenIdle();

    expect(client.updates.map((update) => update.ticketId)).toEqual([11, 12]);
    const cancelled = jobService.getJob(job.id);
    expect(cancelled.status).toBe('cancelled');
    expect(cancelled.processedItems).toBe(2);
    expect(cancelled.result).toBeUndefined();
    expect(cancelled.error).toBeUndefined();
    expect(queue.isRevoked(job.externalId)).toBe(false);
    expect(queue.getStatistics()).toMatchObject({ running: 0, processed: 1, revoked: 1 });
  });
});
