import { OperationRegistry } from '../src/application/operations/OperationRegistry.js';
import { MacroSearchOperation } from '../src/application/operations/MacroSearchOperation.js';
import { JobService } from '../src/application/services/JobService.js';
import { DatabaseConnection, IN_MEMORY_DATABASE } from '../src/infrastructure/database/DatabaseConnection.js';
import { JobRepository } from '../src/infrastructure/database/repositories/JobRepository.js';
import { ZendeskClientProvider } from '../src/infrastructure/http/ZendeskClientProvider.js';
import { TaskQueueStatistics } from '../src/infrastructure/queue/TaskQueue.js';
import { HealthCheckDeps, buildHealthReport } from '../src/presentation/tools/HealthCheckTool.js';
import { FakeClientProvider, FakeTicketClient } from './helpers/FakeTicketClient.js';
import { RecordingTaskQueue } from './helpers/RecordingTaskQueue.js';

describe('buildHealthReport', () => {
  const now = new Date('2024-05-01T12:00:00.000Z');
  const queueStats: TaskQueueStatistics = { pending: 0, running: 1, processed: 4, revoked: 0, maxConcurrent: 2 };
  const credentials = { subdomain: 'example', email: 'agent@example.com', apiToken: 'test-token' };

  let connection: DatabaseConnection;
  let deps: HealthCheckDeps;

  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    connection = new DatabaseConnection(IN_MEMORY_DATABASE);
    const jobService = new JobService(new JobRepository(connection.getDatabase()), new RecordingTaskQueue());
    jobService.enqueue({
      externalId: 'task-1',
      operationSlug: 'tag-add',
      totalItems: 2,
      ownerId: 'alice',
      payload: { operationSlug: 'tag-add', ticketIds: [1, 2], mutation: { kind: 'add-tags', tags: ['x'] }, context: {} },
    });

    const registry = new OperationRegistry();
    registry.register(new MacroSearchOperation(new FakeClientProvider(null)));

    deps = {
      jobService,
      registry,
      database: { getDatabaseSize: () => 8192 },
      zendesk: new ZendeskClientProvider(credentials, { factory: () => new FakeTicketClient() }),
      queue: { getStatistics: () => queueStats },
    };
  });

  afterEach(() => {
    connection.close();
    jest.restoreAllMocks();
  });

  test('should report healthy components', async () => {
    expect(await buildHealthReport(deps, now)).toEqual({
      timestamp: '2024-05-01T12:00:00.000Z',
      status: 'healthy',
      components: {
        database: {
          status: 'healthy',
          message: 'Database connected',
          sizeBytes: 8192,
          jobs: { pending: 1, running: 0, completed: 0, failed: 0, cancelled: 0 },
        },
        zendesk: { status: 'healthy', message: 'Connected as Test Agent (agent@example.com)' },
        taskQueue: queueStats,
        operations: { registered: 1, categories: ['Macros'] },
      },
    });
  });

  test('should be degraded without Zendesk credentials', async () => {
    const report = await buildHealthReport({ ...deps, zendesk: new ZendeskClientProvider({}) }, now);

    expect(report.status).toBe('degraded');
    expect(report.components.zendesk).toEqual({
      status: 'not_configured',
      message: 'Zendesk credentials are not set',
    });
  });

  test('should be degraded when the database is unreadable', async () => {
    const report = await buildHealthReport(
      {
        ...deps,
        database: {
          getDatabaseSize: () => {
            throw new Error('disk I/O error');
          },
        },
      },
      now
    );

    expect(report.status).toBe('degraded');
    expect(report.components.database).toEqual({ status: 'error', message: 'disk I/O error' });
  });
});
