import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { JobStatus } from '../../core/entities/Job.js';
import { errorMessage } from '../../core/errors.js';
import { JobService } from '../../application/services/JobService.js';
import { OperationRegistry } from '../../application/operations/OperationRegistry.js';
import { ConnectionTestResult } from '../../infrastructure/http/ZendeskClientProvider.js';
import { TaskQueueStatistics } from '../../infrastructure/queue/TaskQueue.js';
import { errorResult, jsonBlock, textResult } from './toolResults.js';

type ComponentStatus = 'healthy' | 'degraded' | 'error' | 'not_configured';

interface ComponentHealth {
  status: ComponentStatus;
  message: string;
}

export interface HealthReport {
  timestamp: string;
  status: 'healthy' | 'degraded';
  components: {
    database: ComponentHealth & { sizeBytes?: number; jobs?: Record<JobStatus, number> };
    zendesk: ComponentHealth;
    taskQueue: TaskQueueStatistics;
    operations: { registered: number; categories: string[] };
  };
}

export interface HealthCheckDeps {
  jobService: JobService;
  registry: OperationRegistry;
  database: { getDatabaseSize(): number };
  zendesk: { isConfigured(): boolean; testConnection(): Promise<ConnectionTestResult> };
  queue: { getStatistics(): TaskQueueStatistics };
}

export async function buildHealthReport(deps: HealthCheckDeps, now: Date = new Date()): Promise<HealthReport> {
  let degraded = false;

  let database: HealthReport['components']['database'];
  try {
    database = {
      status: 'healthy',
      message: 'Database connected',
      sizeBytes: deps.database.getDatabaseSize(),
      jobs: deps.jobService.countByStatus(),
    };
  } catch (error) {
    database = { status: 'error', message: errorMessage(error) };
    degraded = true;
  }

  let zendesk: ComponentHealth;
  if (!deps.zendesk.isConfigured()) {
    zendesk = { status: 'not_configured', message: 'Zendesk credentials are not set' };
    degraded = true;
  } else {
    const connection = await deps.zendesk.testConnection();
    zendesk = { status: connection.ok ? 'healthy' : 'error', message: connection.message };
    degraded = degraded || !connection.ok;
  }

  return {
    timestamp: now.toISOString(),
    status: degraded ? 'degraded' : 'healthy',
    components: {
      database,
      zendesk,
      taskQueue: deps.queue.getStatistics(),
      operations: { registered: deps.registry.size, categories: deps.registry.categories() },
    },
  };
}

export async function healthCheck(deps: HealthCheckDeps): Promise<CallToolResult> {
  try {
    const report = await buildHealthReport(deps);
    return textResult(`# System Health Check\n\n${jsonBlock(report)}`);
  } catch (error) {
    return errorResult('Health check error', error);
  }
}

/**
 * Register the health-check tool
 */
export function registerHealthCheckTool(server: McpServer, deps: HealthCheckDeps) {
  server.tool(
    'health-check',
    'Check the health of the server and its components (Zendesk connectivity, database, task queue)',
    {},
    async () => healthCheck(deps)
  );
}
