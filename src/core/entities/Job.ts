/**
 * Job domain entity
 */
export const JOB_STATUSES = ['pending', 'running', 'completed', 'failed', 'cancelled'] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = ['completed', 'failed', 'cancelled'];

export type JobResultPayload = Record<string, unknown>;

export interface Job {
  id: number;
  externalId: string;
  operationSlug: string;
  status: JobStatus;
  progress: number; // 0-100
  totalItems: number;
  processedItems: number;
  result?: JobResultPayload;
  error?: string;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  ownerId: string;
}

/**
 * Polling view of a job
 */
export interface JobSnapshot {
  id: number;
  externalId: string;
  operationSlug: string;
  status: JobStatus;
  progress: number;
  totalItems: number;
  processedItems: number;
  error: string | null;
  elapsedTime: string;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  ownerId: string;
  result: JobResultPayload | null;
}

export interface JobFilter {
  ownerId?: string;
  status?: JobStatus;
  operationSlug?: string;
  limit?: number;
  offset?: number;
}

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.includes(status);
}

export function computeProgress(processedItems: number, totalItems: number): number {
  if (totalItems <= 0) return 0;
  return Math.floor((100 * processedItems) / totalItems);
}

/**
 * Human-readable run time: total time for finished jobs, time since start
 * for running ones.
 */
export function formatElapsedTime(job: Job, now: Date = new Date()): string {
  let deltaMs: number;
  if (job.completedAt) {
    deltaMs = job.completedAt.getTime() - job.createdAt.getTime();
  } else if (job.startedAt) {
    deltaMs = now.getTime() - job.startedAt.getTime();
  } else {
    return 'Not started';
  }

  const totalSeconds = Math.max(0, Math.floor(deltaMs / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if (hours > 0) return `${hours}h ${minutes}m ${seconds}s`;
  if (minutes > 0) return `${minutes}m ${seconds}s`;
  return `${seconds}s`;
}

export function toJobSnapshot(job: Job, now: Date = new Date()): JobSnapshot {
  return {
    id: job.id,
    externalId: job.externalId,
    operationSlug: job.operationSlug,
    status: job.status,
    progress: job.progress,
    totalItems: job.totalItems,
    processedItems: job.processedItems,
    error: job.error ?? null,
    elapsedTime: formatElapsedTime(job, now),
    createdAt: job.createdAt.toISOString(),
    startedAt: job.startedAt ? job.startedAt.toISOString() : null,
    completedAt: job.completedAt ? job.completedAt.toISOString() : null,
    ownerId: job.ownerId,
    result: job.result ?? null,
  };
}
