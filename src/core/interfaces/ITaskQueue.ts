import { OperationKind } from '../entities/Operation.js';

/**
 * Remote mutation applied to every ticket in a bulk task
 */
export type TicketMutation =
  | { kind: 'add-tags'; tags: string[] }
  | { kind: 'remove-tags'; tags: string[] }
  | { kind: 'apply-macro'; macroId: number };

/**
 * Everything a worker needs to run one job, independent of the request
 */
export interface BulkTaskPayload {
  operationSlug: OperationKind;
  ticketIds: number[];
  mutation: TicketMutation;
  /** Merged into the job result so exports match inline results */
  context: Record<string, unknown>;
}

export interface QueuedTask {
  id: string;
  payload: BulkTaskPayload;
  submittedAt: Date;
  /** Aborted with a TaskRevokedError when the task is revoked while running */
  signal: AbortSignal;
}

/**
 * Interface for the background task queue
 */
export interface ITaskQueue {
  submit(externalId: string, payload: BulkTaskPayload): void;

  /**
   * Drop a pending task, or abort the signal of a running one. A running
   * task finishes the item it is working on and stops before the next.
   */
  revoke(externalId: string): boolean;
}
