import { BulkTaskPayload, ITaskQueue, QueuedTask } from '../../core/interfaces/ITaskQueue.js';
import { TaskRevokedError } from '../../core/errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('TaskQueue');

export type TaskHandler = (task: QueuedTask) => Promise<void>;

export interface TaskQueueStatistics {
  pending: number;
  running: number;
  processed: number;
  revoked: number;
  maxConcurrent: number;
}

/**
 * In-process task queue.
 *
 * Runs at most `maxConcurrent` tasks at once, in submission order. Each
 * task is identified by the external id of the job it belongs to, so a job
 * never has more than one task in flight.
 */
export class TaskQueue implements ITaskQueue {
  private pending: QueuedTask[] = [];
  private running: Map<string, QueuedTask> = new Map();
  private controllers: Map<string, AbortController> = new Map();
  private processed = 0;
  private revoked = 0;
  private handler?: TaskHandler;
  private idleWaiters: Array<() => void> = [];

  constructor(private maxConcurrent: number = 2) {}

  /**
   * Attach the worker that executes tasks. Tasks submitted before a worker
   * is attached wait in the queue.
   */
  attachWorker(handler: TaskHandler): void {
    this.handler = handler;
    this.processQueue();
  }

  submit(externalId: string, payload: BulkTaskPayload): void {
    if (this.running.has(externalId) || this.pending.some((task) => task.id === externalId)) {
      throw new Error(`Task ${externalId} is already queued`);
    }

    const controller = new AbortController();
    this.controllers.set(externalId, controller);
    this.pending.push({ id: externalId, payload, submittedAt: new Date(), signal: controller.signal });
    log.debug(`Task ${externalId} queued (${payload.ticketIds.length} tickets)`);

    this.processQueue();
  }

  revoke(externalId: string): boolean {
    const pendingIndex = this.pending.findIndex((task) => task.id === externalId);
    if (pendingIndex !== -1) {
      this.pending.splice(pendingIndex, 1);
      this.controllers.delete(externalId);
      this.revoked++;
      log.info(`Task ${externalId} revoked before start`);
      this.notifyIfIdle();
      return true;
    }

    // Running: the handler stops at its next check of the signal
    const controller = this.controllers.get(externalId);
    if (controller && this.running.has(externalId)) {
      if (!controller.signal.aborted) {
        controller.abort(new TaskRevokedError(externalId));
        this.revoked++;
        log.info(`Task ${externalId} revoked while running`);
      }
      return true;
    }

    return false;
  }

  /**
   * Whether a task still in flight has been revoked. Settled and dropped
   * tasks are forgotten.
   */
  isRevoked(externalId: string): boolean {
    return this.controllers.get(externalId)?.signal.aborted ?? false;
  }

  getStatistics(): TaskQueueStatistics {
    return {
      pending: this.pending.length,
      running: this.running.size,
      processed: this.processed,
      revoked: this.revoked,
      maxConcurrent: this.maxConcurrent,
    };
  }

  /**
   * Resolves once nothing is pending or running
   */
  whenIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private isIdle(): boolean {
    return this.running.size === 0 && (this.pending.length === 0 || !this.handler);
  }

  private processQueue(): void {
    const handler = this.handler;
    if (!handler) return;

    while (this.pending.length > 0 && this.running.size < this.maxConcurrent) {
      const task = this.pending.shift();
      if (!task) break;

      this.running.set(task.id, task);
      log.debug(`Task ${task.id} started`);

      this.execute(handler, task).catch((error) => {
        log.error(`Task ${task.id} settled with an error`, { error: String(error) });
      });
    }
  }

  private async execute(handler: TaskHandler, task: QueuedTask): Promise<void> {
    try {
      await handler(task);
    } catch (error) {
      if (error instanceof TaskRevokedError) {
        log.info(`Task ${task.id} stopped after revocation`);
        return;
      }
      log.error(`Task ${task.id} failed`, { error: error instanceof Error ? error.message : String(error) });
    } finally {
      this.running.delete(task.id);
      this.controllers.delete(task.id);
      this.processed++;
      this.processQueue();
      this.notifyIfIdle();
    }
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
