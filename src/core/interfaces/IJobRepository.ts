import { Job, JobFilter, JobResultPayload, JobStatus } from '../entities/Job.js';

export interface NewJobRecord {
  externalId: string;
  operationSlug: string;
  totalItems: number;
  ownerId: string;
  createdAt: Date;
}

/**
 * Field updates applied by lifecycle transitions. `null` clears a column.
 */
export interface JobChanges {
  status?: JobStatus;
  progress?: number;
  processedItems?: number;
  result?: JobResultPayload | null;
  error?: string | null;
  startedAt?: Date | null;
  completedAt?: Date | null;
}

/**
 * Interface for job persistence
 */
export interface IJobRepository {
  create(record: NewJobRecord): Job;

  findById(id: number): Job | null;

  findByExternalId(externalId: string): Job | null;

  update(id: number, changes: JobChanges): Job;

  delete(id: number): boolean;

  /** Newest first */
  list(filter?: JobFilter): Job[];

  /** Distinct slugs, optionally limited to one owner's jobs */
  operationSlugs(ownerId?: string): string[];

  countByStatus(): Record<JobStatus, number>;
}
