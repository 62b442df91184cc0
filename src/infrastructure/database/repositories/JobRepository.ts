import Database from 'better-sqlite3';
import { z } from 'zod';
import { IJobRepository, JobChanges, NewJobRecord } from '../../../core/interfaces/IJobRepository.js';
import { JOB_STATUSES, Job, JobFilter, JobResultPayload, JobStatus } from '../../../core/entities/Job.js';
import { JobNotFoundError } from '../../../core/errors.js';
import { createLogger } from '../../../utils/logger.js';

const log = createLogger('JobRepository');

const JobStatusSchema = z.enum(JOB_STATUSES);

const JobRowSchema = z.object({
  id: z.number().int(),
  external_id: z.string(),
  operation_slug: z.string(),
  status: JobStatusSchema,
  progress: z.number().int(),
  total_items: z.number().int(),
  processed_items: z.number().int(),
  result: z.string().nullable(),
  error: z.string().nullable(),
  created_at: z.string(),
  started_at: z.string().nullable(),
  completed_at: z.string().nullable(),
  owner_id: z.string(),
});

type JobRow = z.infer<typeof JobRowSchema>;

const StatusCountRowSchema = z.object({ status: JobStatusSchema, count: z.number().int() });

const ResultPayloadSchema = z.record(z.unknown());

/**
 * Column each updatable field is stored in
 */
const CHANGE_COLUMNS: ReadonlyArray<[keyof JobChanges, string]> = [
  ['status', 'status'],
  ['progress', 'progress'],
  ['processedItems', 'processed_items'],
  ['result', 'result'],
  ['error', 'error'],
  ['startedAt', 'started_at'],
  ['completedAt', 'completed_at'],
];

type SqlValue = string | number | null;

function toSqlValue(value: JobChanges[keyof JobChanges]): SqlValue {
  if (value === undefined || value === null) return null;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string' || typeof value === 'number') return value;
  return JSON.stringify(value);
}

/**
 * SQLite implementation of job repository
 */
export class JobRepository implements IJobRepository {
  constructor(private db: Database.Database) {}

  create(record: NewJobRecord): Job {
    const stmt = this.db.prepare(`
      INSERT INTO jobs (external_id, operation_slug, status, progress, total_items, processed_items, created_at, owner_id)
      VALUES (?, ?, 'pending', 0, ?, 0, ?, ?)
    `);

    const info = stmt.run(
      record.externalId,
      record.operationSlug,
      record.totalItems,
      record.createdAt.toISOString(),
      record.ownerId
    );

    const job = this.findById(Number(info.lastInsertRowid));
    if (!job) {
      throw new JobNotFoundError(record.externalId);
    }
    return job;
  }

  findById(id: number): Job | null {
    const row = this.db.prepare('SELECT * FROM jobs WHERE id = ?').get(id);
    return row === undefined ? null : this.mapRow(JobRowSchema.parse(row));
  }

  findByExternalId(externalId: string): Job | null {
    const row = this.db.prepare('SELECT * FROM jobs WHERE external_id = ?').get(externalId);
    return row === undefined ? null : this.mapRow(JobRowSchema.parse(row));
  }

  update(id: number, changes: JobChanges): Job {
    const assignments: string[] = [];
    const values: SqlValue[] = [];

    for (const [key, column] of CHANGE_COLUMNS) {
      const value = changes[key];
      if (value === undefined) continue;
      assignments.push(`${column} = ?`);
      values.push(toSqlValue(value));
    }

    if (assignments.length > 0) {
      this.db.prepare(`UPDATE jobs SET ${assignments.join(', ')} WHERE id = ?`).run(...values, id);
    }

    const job = this.findById(id);
    if (!job) {
      throw new JobNotFoundError(id);
    }
    return job;
  }

  delete(id: number): boolean {
    const result = this.db.prepare('DELETE FROM jobs WHERE id = ?').run(id);
    return result.changes > 0;
  }

  list(filter: JobFilter = {}): Job[] {
    const where: string[] = [];
    const params: SqlValue[] = [];

    if (filter.ownerId !== undefined) {
      where.push('owner_id = ?');
      params.push(filter.ownerId);
    }
    if (filter.status !== undefined) {
      where.push('status = ?');
      params.push(filter.status);
    }
    if (filter.operationSlug !== undefined) {
      where.push('operation_slug = ?');
      params.push(filter.operationSlug);
    }

    const whereClause = where.length > 0 ? `WHERE ${where.join(' AND ')}` : '';
    const rows = this.db
      .prepare(`SELECT * FROM jobs ${whereClause} ORDER BY created_at DESC, id DESC LIMIT ? OFFSET ?`)
      .all(...params, filter.limit ?? -1, filter.offset ?? 0);

    return z.array(JobRowSchema).parse(rows).map((row) => this.mapRow(row));
  }

  operationSlugs(ownerId?: string): string[] {
    const rows =
      ownerId === undefined
        ? this.db.prepare('SELECT DISTINCT operation_slug FROM jobs ORDER BY operation_slug').all()
        : this.db
            .prepare('SELECT DISTINCT operation_slug FROM jobs WHERE owner_id = ? ORDER BY operation_slug')
            .all(ownerId);
    return z
      .array(z.object({ operation_slug: z.string() }))
      .parse(rows)
      .map((row) => row.operation_slug);
  }

  countByStatus(): Record<JobStatus, number> {
    const counts: Record<JobStatus, number> = { pending: 0, running: 0, completed: 0, failed: 0, cancelled: 0 };
    const rows = this.db.prepare('SELECT status, COUNT(*) AS count FROM jobs GROUP BY status').all();

    for (const row of z.array(StatusCountRowSchema).parse(rows)) {
      counts[row.status] = row.count;
    }
    return counts;
  }

  private mapRow(row: JobRow): Job {
    return {
      id: row.id,
      externalId: row.external_id,
      operationSlug: row.operation_slug,
      status: row.status,
      progress: row.progress,
      totalItems: row.total_items,
      processedItems: row.processed_items,
      result: row.result !== null ? this.parseResult(row.id, row.result) : undefined,
      error: row.error ?? undefined,
      createdAt: new Date(row.created_at),
      startedAt: row.started_at ? new Date(row.started_at) : undefined,
      completedAt: row.completed_at ? new Date(row.completed_at) : undefined,
      ownerId: row.owner_id,
    };
  }

  private parseResult(jobId: number, raw: string): JobResultPayload | undefined {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      log.warn(`Job ${jobId} has an unreadable result payload`, { error: String(error) });
      return undefined;
    }
    const payload = ResultPayloadSchema.safeParse(parsed);
    return payload.success ? payload.data : undefined;
  }
}
