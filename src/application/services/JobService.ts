import {
  Job,
  JobFilter,
  JobResultPayload,
  JobSnapshot,
  JobStatus,
  computeProgress,
  isTerminalStatus,
  toJobSnapshot,
} from '../../core/entities/Job.js';
import { IJobRepository } from '../../core/interfaces/IJobRepository.js';
import { BulkTaskPayload, ITaskQueue } from '../../core/interfaces/ITaskQueue.js';
import {
  JobNotCancellableError,
  JobNotDeletableError,
  JobNotFoundError,
  PermissionDeniedError,
} from '../../core/errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('JobService');

export interface EnqueueJobParams {
  externalId: string;
  operationSlug: string;
  totalItems: number;
  ownerId: string;
  payload: BulkTaskPayload;
}

export type Clock = () => Date;

/**
 * Job lifecycle: the only component that writes job rows.
 *
 * pending → running → completed | failed | cancelled. Terminal jobs never
 * change again; worker-side transitions on a terminal job are ignored, while
 * caller-side requests (cancel, delete) that the status forbids are rejected
 * with a JobStateError.
 */
export class JobService {
  constructor(
    private jobRepository: IJobRepository,
    private taskQueue: ITaskQueue,
    private clock: Clock = () => new Date()
  ) {}

  /**
   * Create the pending job and hand its payload to the queue. If the queue
   * refuses the task the row is removed again.
   */
  enqueue(params: EnqueueJobParams): Job {
    const job = this.jobRepository.create({
      externalId: params.externalId,
      operationSlug: params.operationSlug,
      totalItems: params.totalItems,
      ownerId: params.ownerId,
      createdAt: this.clock(),
    });

    try {
      this.taskQueue.submit(params.externalId, params.payload);
    } catch (error) {
      this.jobRepository.delete(job.id);
      throw error;
    }

    log.info(`✓ Job ${job.id} queued (${params.operationSlug}, ${params.totalItems} items)`);
    return job;
  }

  getJob(jobId: number): Job {
    const job = this.jobRepository.findById(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  /**
   * Job lookup for a caller; jobs are visible to their owner only
   */
  getOwnedJob(jobId: number, ownerId: string): Job {
    const job = this.getJob(jobId);
    if (job.ownerId !== ownerId) {
      throw new PermissionDeniedError('Permission denied');
    }
    return job;
  }

  findByExternalId(externalId: string): Job | null {
    return this.jobRepository.findByExternalId(externalId);
  }

  getSnapshot(jobId: number): JobSnapshot {
    return toJobSnapshot(this.getJob(jobId), this.clock());
  }

  /**
   * Record progress. Marks the job running (and its start time, once).
   * Processed counts never decrease and never exceed the total.
   */
  advance(jobId: number, processedItems: number): Job {
    const job = this.getJob(jobId);
    if (isTerminalStatus(job.status)) {
      log.debug(`Ignoring progress for ${job.status} job ${jobId}`);
      return job;
    }

    const bounded = Math.max(job.processedItems, Math.min(Math.max(0, processedItems), job.totalItems));
    return this.jobRepository.update(jobId, {
      status: 'running',
      processedItems: bounded,
      progress: computeProgress(bounded, job.totalItems),
      startedAt: job.startedAt ?? this.clock(),
    });
  }

  complete(jobId: number, result: JobResultPayload): Job {
    const job = this.getJob(jobId);
    if (isTerminalStatus(job.status)) {
      log.warn(`Job ${jobId} is already ${job.status}; result discarded`);
      return job;
    }

    const updated = this.jobRepository.update(jobId, {
      status: 'completed',
      progress: 100,
      result,
      completedAt: this.clock(),
    });
    log.info(`✓ Job ${jobId} completed`);
    return updated;
  }

  fail(jobId: number, errorMessage: string): Job {
    const job = this.getJob(jobId);
    if (isTerminalStatus(job.status)) {
      log.warn(`Job ${jobId} is already ${job.status}; failure not recorded: ${errorMessage}`);
      return job;
    }

    const updated = this.jobRepository.update(jobId, {
      status: 'failed',
      error: errorMessage,
      completedAt: this.clock(),
    });
    log.error(`✗ Job ${jobId} failed: ${errorMessage}`);
    return updated;
  }

  /**
   * Revoke the queued task and mark the job cancelled. A worker already
   * inside an item finishes it and stops before the next one.
   */
  cancel(jobId: number): Job {
    const job = this.getJob(jobId);
    if (isTerminalStatus(job.status)) {
      throw new JobNotCancellableError(jobId, job.status);
    }

    this.taskQueue.revoke(job.externalId);
    const updated = this.jobRepository.update(jobId, {
      status: 'cancelled',
      completedAt: this.clock(),
    });
    log.info(`Job ${jobId} cancelled`);
    return updated;
  }

  delete(jobId: number): void {
    const job = this.getJob(jobId);
    if (!isTerminalStatus(job.status)) {
      throw new JobNotDeletableError(jobId, job.status);
    }
    this.jobRepository.delete(jobId);
    log.info(`Job ${jobId} deleted`);
  }

  list(filter: JobFilter = {}): Job[] {
    return this.jobRepository.list(filter);
  }

  operationSlugs(ownerId?: string): string[] {
    return this.jobRepository.operationSlugs(ownerId);
  }

  countByStatus(): Record<JobStatus, number> {
    return this.jobRepository.countByStatus();
  }
}
