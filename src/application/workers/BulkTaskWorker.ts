import { QueuedTask } from '../../core/interfaces/ITaskQueue.js';
import { ITicketClientProvider } from '../../core/interfaces/ITicketClient.js';
import { TaskRevokedError, errorMessage } from '../../core/errors.js';
import { createLogger } from '../../utils/logger.js';
import { BatchOptions, runBatch } from '../batch/BatchExecutor.js';
import { createTicketMutation, describeMutation } from '../batch/ticketMutations.js';
import { summarizeBatch } from '../operations/results.js';
import { JobService } from '../services/JobService.js';

const log = createLogger('BulkTaskWorker');

export type WorkerBatchOptions = Pick<BatchOptions, 'delayMs' | 'rateLimitCooldownMs' | 'sleep'>;

/**
 * Executes queued bulk tasks and drives their jobs through the lifecycle
 */
export class BulkTaskWorker {
  constructor(
    private jobService: JobService,
    private clientProvider: ITicketClientProvider,
    private batchOptions: WorkerBatchOptions = {}
  ) {}

  /**
   * Queue entry point. Any error other than a revocation is recorded on the
   * job as a failure, so a job never stays running after its task settles.
   */
  async handle(task: QueuedTask): Promise<void> {
    const job = this.jobService.findByExternalId(task.id);
    if (!job) {
      log.error(`No job found for task ${task.id}; skipping`);
      return;
    }

    try {
      const { payload } = task;
      this.jobService.advance(job.id, 0);
      log.info(`Job ${job.id}: ${describeMutation(payload.mutation)} on ${payload.ticketIds.length} tickets`);

      const client = this.clientProvider.getClient();
      const result = await runBatch(payload.ticketIds, createTicketMutation(client, payload.mutation), {
        ...this.batchOptions,
        signal: task.signal,
        onProgress: (processed) => {
          this.jobService.advance(job.id, processed);
        },
      });

      this.jobService.complete(job.id, {
        ...payload.context,
        ...summarizeBatch(payload.ticketIds.length, result),
      });
    } catch (error) {
      if (error instanceof TaskRevokedError) {
        log.info(`Job ${job.id} stopped after cancellation`);
        return;
      }
      this.jobService.fail(job.id, errorMessage(error));
    }
  }
}
