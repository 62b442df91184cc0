import { randomUUID } from 'crypto';
import { Job } from '../../core/entities/Job.js';
import {
  ExportPayload,
  FormField,
  OperationDescriptor,
  OperationInput,
  OperationResult,
} from '../../core/entities/Operation.js';
import { Principal, isAdmin } from '../../core/entities/Principal.js';
import { IOperation } from '../../core/interfaces/IOperation.js';
import {
  JobResultUnavailableError,
  OperationNotFoundError,
  UnsupportedExportFormatError,
  ValidationError,
} from '../../core/errors.js';
import { createLogger } from '../../utils/logger.js';
import { OperationRegistry } from '../operations/OperationRegistry.js';
import { JobService } from './JobService.js';

const log = createLogger('OperationService');

export type DispatchOutcome =
  | { status: 'rejected'; error: string }
  | { status: 'queued'; jobId: string; job: Job; message: string }
  | { status: 'completed' | 'failed'; result: OperationResult };

export type IdGenerator = () => string;

export interface OperationDetails {
  descriptor: Readonly<OperationDescriptor>;
  fields: FormField[];
  syncItemCeiling: number;
  asyncItemCeiling: number | null;
}

/**
 * Entry point for running operations: decides between inline execution and
 * a background job, and keeps the latest inline result for export.
 */
export class OperationService {
  private lastResults = new Map<string, OperationResult>();

  constructor(
    private registry: OperationRegistry,
    private jobService: JobService,
    private generateId: IdGenerator = randomUUID
  ) {}

  listOperations(): Readonly<OperationDescriptor>[] {
    return [...this.registry.all().values()];
  }

  async describeOperation(slug: string): Promise<OperationDetails> {
    const operation = this.requireOperation(slug);
    const descriptor = this.registry.describe(slug);
    if (!descriptor) {
      throw new OperationNotFoundError(slug);
    }

    return {
      descriptor,
      fields: await operation.formSchema(),
      syncItemCeiling: operation.itemCeiling(false),
      asyncItemCeiling: operation.supportsAsync() ? operation.itemCeiling(true) : null,
    };
  }

  /**
   * Route one request. Dry runs are always inline; large runs of
   * async-capable operations become jobs; everything else runs inline.
   */
  async run(slug: string, input: OperationInput, principal: Principal): Promise<DispatchOutcome> {
    const operation = this.registry.get(slug);
    if (!operation) {
      return { status: 'rejected', error: `Operation "${slug}" not found` };
    }

    if (operation.metadata.requiresAdmin && !isAdmin(principal)) {
      log.warn(`${principal.id} denied access to admin operation ${slug}`);
      return { status: 'rejected', error: 'This operation requires admin privileges' };
    }

    const validation = operation.validate(input);
    if (!validation.ok) {
      return { status: 'rejected', error: validation.error };
    }

    const { itemCount, dryRun } = operation.requestShape(input);

    if (!dryRun && operation.supportsAsync() && itemCount > operation.itemCeiling(false)) {
      const externalId = this.generateId();
      log.info(`${slug}: ${itemCount} items exceeds inline ceiling, dispatching job ${externalId}`);

      const dispatched = await operation.executeAsync(input, { externalId, ownerId: principal.id });
      if (!dispatched.success) {
        return { status: 'failed', result: { success: false, message: dispatched.message, data: null } };
      }
      return { status: 'queued', jobId: dispatched.jobId, job: dispatched.job, message: dispatched.message };
    }

    const result = await operation.execute(input);
    if (result.success) {
      this.lastResults.set(this.resultKey(principal, slug), result);
    }
    return { status: result.success ? 'completed' : 'failed', result };
  }

  /**
   * Export the caller's most recent successful inline result for an operation
   */
  exportLastResult(slug: string, format: string, principal: Principal): ExportPayload {
    const operation = this.requireExportable(slug, format);
    const result = this.lastResults.get(this.resultKey(principal, slug));
    if (!result) {
      throw new ValidationError('No results to export. Run the operation first.');
    }
    return operation.export(result, format);
  }

  exportJobResult(jobId: number, format: string, principal: Principal): ExportPayload {
    const job = this.jobService.getOwnedJob(jobId, principal.id);
    const operation = this.requireExportable(job.operationSlug, format);
    if (job.status !== 'completed' || !job.result) {
      throw new JobResultUnavailableError(job.id, job.status);
    }
    return operation.export({ success: true, message: '', data: job.result }, format);
  }

  private requireOperation(slug: string): IOperation {
    const operation = this.registry.get(slug);
    if (!operation) {
      throw new OperationNotFoundError(slug);
    }
    return operation;
  }

  private requireExportable(slug: string, format: string): IOperation {
    const operation = this.requireOperation(slug);
    if (!operation.exportFormats().some((supported) => supported === format)) {
      throw new UnsupportedExportFormatError(slug, format);
    }
    return operation;
  }

  private resultKey(principal: Principal, slug: string): string {
    return `${principal.id}:${slug}`;
  }
}
