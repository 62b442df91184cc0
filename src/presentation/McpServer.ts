import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Config } from '../config.js';
import { Principal } from '../core/entities/Principal.js';
import { DatabaseConnection } from '../infrastructure/database/DatabaseConnection.js';
import { JobRepository } from '../infrastructure/database/repositories/JobRepository.js';
import { ZendeskClientProvider } from '../infrastructure/http/ZendeskClientProvider.js';
import { TaskQueue } from '../infrastructure/queue/TaskQueue.js';
import { JobService } from '../application/services/JobService.js';
import { OperationService } from '../application/services/OperationService.js';
import { OperationRegistry } from '../application/operations/OperationRegistry.js';
import { registerBuiltinOperations } from '../application/operations/builtinOperations.js';
import { BulkTaskWorker } from '../application/workers/BulkTaskWorker.js';
import { createLogger, setDebugLogging } from '../utils/logger.js';
import { registerOperationTools } from './tools/OperationTools.js';
import { registerJobManagementTools } from './tools/JobManagementTools.js';
import { registerHealthCheckTool } from './tools/HealthCheckTool.js';

const log = createLogger('McpServer');

/**
 * Main MCP Server class that orchestrates all components
 */
export class McpServer {
  private server: BaseMcpServer;
  private dbConnection: DatabaseConnection;
  private taskQueue: TaskQueue;
  private clientProvider: ZendeskClientProvider;
  private registry: OperationRegistry;
  private jobService: JobService;
  private operationService: OperationService;
  private principal: Principal;

  constructor(private config: Config) {
    setDebugLogging(config.server.debug);

    // Persistence
    this.dbConnection = new DatabaseConnection(config.database.file);
    const jobRepo = new JobRepository(this.dbConnection.getDatabase());

    // Infrastructure
    this.clientProvider = new ZendeskClientProvider(config.zendesk);
    this.taskQueue = new TaskQueue(config.jobQueue.maxConcurrentJobs);

    // Services
    this.jobService = new JobService(jobRepo, this.taskQueue);
    const batch = {
      delayMs: config.batch.itemDelayMs,
      rateLimitCooldownMs: config.batch.rateLimitCooldownMs,
    };
    const worker = new BulkTaskWorker(this.jobService, this.clientProvider, batch);
    this.taskQueue.attachWorker((task) => worker.handle(task));

    // Operations are registered before any tool is served
    this.registry = new OperationRegistry();
    registerBuiltinOperations(this.registry, {
      clientProvider: this.clientProvider,
      jobService: this.jobService,
      settings: {
        syncItemCeiling: config.batch.syncItemCeiling,
        asyncItemCeiling: config.batch.asyncItemCeiling,
        batch,
      },
    });
    this.operationService = new OperationService(this.registry, this.jobService);
    this.principal = { id: config.operator.id, role: config.operator.role };

    this.server = new BaseMcpServer({
      name: config.server.name,
      version: config.server.version,
    });
    this.registerTools();
  }

  private registerTools() {
    const context = {
      operationService: this.operationService,
      jobService: this.jobService,
      principal: this.principal,
    };

    registerOperationTools(this.server, context);
    registerJobManagementTools(this.server, context);
    registerHealthCheckTool(this.server, {
      jobService: this.jobService,
      registry: this.registry,
      database: this.dbConnection,
      zendesk: this.clientProvider,
      queue: this.taskQueue,
    });
  }

  /**
   * Jobs left pending or running by a previous process can never finish:
   * their tasks lived in memory. Mark them failed.
   */
  private failOrphanedJobs() {
    const orphaned = [
      ...this.jobService.list({ status: 'pending' }),
      ...this.jobService.list({ status: 'running' }),
    ];
    for (const job of orphaned) {
      this.jobService.fail(job.id, 'Server restarted before the job finished');
    }
    if (orphaned.length > 0) {
      log.warn(`Marked ${orphaned.length} interrupted job(s) as failed`);
    }
  }

  /**
   * Print database statistics
   */
  printStats() {
    const counts = this.jobService.countByStatus();
    const sizeKb = (this.dbConnection.getDatabaseSize() / 1024).toFixed(2);
    log.info(
      `📋 Jobs: ${counts.pending} pending, ${counts.running} running, ${counts.completed} completed, ` +
        `${counts.failed} failed, ${counts.cancelled} cancelled (${sizeKb} KB)`
    );
    log.info(`🧰 Operations: ${this.registry.slugs().join(', ')}`);
  }

  /**
   * Start the MCP server on stdio
   */
  async start() {
    log.debug(`Database initialized at: ${this.dbConnection.getDatabasePath()}`);
    this.failOrphanedJobs();

    const transport = new StdioServerTransport();

    process.stdin.on('error', (error) => {
      log.warn(`stdin error (non-fatal): ${error.message}`);
    });
    process.stdout.on('error', (error) => {
      log.warn(`stdout error (non-fatal): ${error.message}`);
    });
    process.stdin.on('end', () => {
      log.warn('stdin ended - client may have disconnected');
    });

    await this.server.connect(transport);
    log.info('✅ Ticket Bulk Operations MCP Server running on stdio');
  }

  /**
   * Graceful shutdown
   */
  async shutdown() {
    log.info('👋 Shutting down gracefully...');
    const stats = this.taskQueue.getStatistics();
    if (stats.running > 0 || stats.pending > 0) {
      log.warn(`${stats.running} running and ${stats.pending} pending task(s) will be interrupted`);
    }
    await this.server.close();
    this.dbConnection.close();
  }
}
