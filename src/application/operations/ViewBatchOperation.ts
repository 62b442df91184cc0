import {
  AsyncDispatchContext,
  AsyncDispatchResult,
  EXPORT_FORMATS,
  ExportFormat,
  ExportPayload,
  FormField,
  OperationInput,
  OperationMetadata,
  OperationResult,
  RequestShape,
  ValidationOutcome,
} from '../../core/entities/Operation.js';
import { IOperation } from '../../core/interfaces/IOperation.js';
import { ITicketClient, ITicketClientProvider } from '../../core/interfaces/ITicketClient.js';
import { TicketMutation } from '../../core/interfaces/ITaskQueue.js';
import { UnsupportedExportFormatError, ValidationError, errorMessage } from '../../core/errors.js';
import { CsvCell, toCsv } from '../../utils/csv.js';
import { BatchOptions, runBatch } from '../batch/BatchExecutor.js';
import { createTicketMutation } from '../batch/ticketMutations.js';
import { JobService } from '../services/JobService.js';
import {
  ERROR_OPTION_VALUE,
  loadOptions,
  parseDryRun,
  parseId,
  readString,
  readTicketLimit,
  validateDryRun,
  validateTicketLimit,
} from './formInput.js';
import { readCount, readPreviewTickets, readStringList, readText, summarizeBatch, toPreviewTicket } from './results.js';

export const SYNC_ITEM_CEILING = 500;
export const ASYNC_ITEM_CEILING = 50_000;

export interface ViewBatchSettings {
  syncItemCeiling: number;
  asyncItemCeiling: number;
  batch: Pick<BatchOptions, 'delayMs' | 'rateLimitCooldownMs' | 'sleep'>;
}

export const DEFAULT_VIEW_BATCH_SETTINGS: ViewBatchSettings = {
  syncItemCeiling: SYNC_ITEM_CEILING,
  asyncItemCeiling: ASYNC_ITEM_CEILING,
  batch: {},
};

export interface ViewBatchDeps {
  clientProvider: ITicketClientProvider;
  jobService: JobService;
  settings?: ViewBatchSettings;
}

export interface PreparedMutation {
  mutation: TicketMutation;
  /** Descriptive fields copied into results and exports */
  context: Record<string, unknown>;
}

/**
 * What distinguishes one view-wide ticket mutation from another
 */
export interface ViewBatchVariant {
  metadata: OperationMetadata;
  /** Past-tense phrase for result messages, e.g. "added tags to" */
  actionLabel: string;
  /** Fields shown between the view selector and the ticket limit */
  fields(client: ITicketClient | null): Promise<FormField[]>;
  validate(input: OperationInput): string | null;
  prepare(input: OperationInput, client: ITicketClient): Promise<PreparedMutation>;
  exportRows(data: Record<string, unknown>): CsvCell[][];
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Operation that applies one mutation to every ticket of a view, inline for
 * small runs and through a tracked background job for large ones.
 */
export class ViewBatchOperation implements IOperation {
  readonly metadata: OperationMetadata;
  private settings: ViewBatchSettings;

  constructor(
    private variant: ViewBatchVariant,
    private deps: ViewBatchDeps
  ) {
    this.metadata = variant.metadata;
    this.settings = deps.settings ?? DEFAULT_VIEW_BATCH_SETTINGS;
  }

  async formSchema(): Promise<FormField[]> {
    const client = this.deps.clientProvider.isConfigured() ? this.deps.clientProvider.getClient() : null;

    const viewOptions = await loadOptions('views', async () => {
      if (!client) throw new Error('Zendesk client not configured');
      const views = await client.getViews();
      return views.map((view) => ({ value: String(view.id), label: `${view.title} (ID: ${view.id})` }));
    });

    const ceiling = this.itemCeiling(true);
    return [
      {
        name: 'view_id',
        label: 'Select View',
        type: 'select',
        required: true,
        options: viewOptions,
        helpText: 'Choose the view containing the tickets you want to update',
      },
      ...(await this.variant.fields(client)),
      {
        name: 'ticket_limit',
        label: 'Ticket Limit',
        type: 'number',
        required: true,
        placeholder: String(this.settings.syncItemCeiling),
        helpText:
          `Maximum number of tickets to process. Up to ${this.settings.syncItemCeiling.toLocaleString('en-US')} ` +
          `for immediate results, up to ${ceiling.toLocaleString('en-US')} for background processing.`,
      },
      {
        name: 'dry_run',
        label: 'Dry Run (Preview Only)',
        type: 'checkbox',
        required: false,
        helpText: 'Preview which tickets would be affected without making changes',
      },
    ];
  }

  validate(input: OperationInput): ValidationOutcome {
    const viewId = readString(input, 'view_id');
    if (!viewId) {
      return { ok: false, error: 'Please select a view' };
    }
    if (viewId === ERROR_OPTION_VALUE) {
      return { ok: false, error: 'Unable to load views. Please check your Zendesk configuration.' };
    }
    if (parseId(viewId) === null) {
      return { ok: false, error: 'View ID must be a valid number' };
    }

    const error =
      this.variant.validate(input) ??
      validateTicketLimit(input, this.itemCeiling(this.supportsAsync())) ??
      validateDryRun(input);
    return error ? { ok: false, error } : { ok: true };
  }

  requestShape(input: OperationInput): RequestShape {
    return { itemCount: readTicketLimit(input), dryRun: parseDryRun(input) };
  }

  supportsAsync(): boolean {
    return true;
  }

  itemCeiling(asyncMode: boolean): number {
    return asyncMode ? this.settings.asyncItemCeiling : this.settings.syncItemCeiling;
  }

  async execute(input: OperationInput): Promise<OperationResult> {
    const validation = this.validate(input);
    if (!validation.ok) {
      return { success: false, message: validation.error, data: null };
    }

    const { itemCount: ticketLimit, dryRun } = this.requestShape(input);
    if (!dryRun && ticketLimit > this.itemCeiling(false)) {
      return {
        success: false,
        message: `Ticket limit ${ticketLimit} exceeds ${this.itemCeiling(false)} for immediate processing. Use background processing instead.`,
        data: null,
      };
    }

    const viewId = Number(readString(input, 'view_id'));

    try {
      const client = this.deps.clientProvider.getClient();
      const tickets = await client.getViewTickets(viewId, ticketLimit);
      const { mutation, context } = await this.variant.prepare(input, client);
      const base = { viewId, operation: this.metadata.slug, ...context };

      if (tickets.length === 0) {
        return {
          success: true,
          message: 'No tickets found in the selected view.',
          data: { ...base, totalTickets: 0, processed: 0, dryRun },
        };
      }

      const viewName = await this.lookupViewName(client, viewId);

      if (dryRun) {
        return {
          success: true,
          message: `DRY RUN: Found ${tickets.length} ticket(s) in view "${viewName}". No changes were made.`,
          data: {
            ...base,
            viewName,
            totalTickets: tickets.length,
            dryRun: true,
            tickets: tickets.map(toPreviewTicket),
          },
        };
      }

      const ticketIds = tickets.map((ticket) => ticket.id);
      const result = await runBatch(ticketIds, createTicketMutation(client, mutation), this.settings.batch);

      const successCount = result.successful.length;
      const failCount = result.failed.length;
      const message =
        failCount === 0
          ? `Successfully ${this.variant.actionLabel} ${successCount} ticket(s) in view "${viewName}".`
          : `${capitalize(this.variant.actionLabel)} ${successCount} ticket(s). ${failCount} ticket(s) failed.`;

      return {
        success: true,
        message,
        data: { ...base, viewName, dryRun: false, ...summarizeBatch(tickets.length, result) },
      };
    } catch (error) {
      return { success: false, message: `Error: ${errorMessage(error)}`, data: null };
    }
  }

  async executeAsync(input: OperationInput, context: AsyncDispatchContext): Promise<AsyncDispatchResult> {
    const validation = this.validate(input);
    if (!validation.ok) {
      return { success: false, message: validation.error };
    }

    const viewId = Number(readString(input, 'view_id'));
    const { itemCount: ticketLimit } = this.requestShape(input);

    try {
      const client = this.deps.clientProvider.getClient();
      const tickets = await client.getViewTickets(viewId, ticketLimit);
      if (tickets.length === 0) {
        return { success: false, message: 'No tickets found in the selected view.' };
      }

      const prepared = await this.variant.prepare(input, client);
      const viewName = await this.lookupViewName(client, viewId);
      const ticketIds = tickets.map((ticket) => ticket.id);

      const job = this.deps.jobService.enqueue({
        externalId: context.externalId,
        operationSlug: this.metadata.slug,
        totalItems: ticketIds.length,
        ownerId: context.ownerId,
        payload: {
          operationSlug: this.metadata.slug,
          ticketIds,
          mutation: prepared.mutation,
          context: { viewId, viewName, operation: this.metadata.slug, ...prepared.context, dryRun: false },
        },
      });

      return {
        success: true,
        jobId: context.externalId,
        job,
        message: `Job started. Processing ${ticketIds.length} tickets in the background...`,
      };
    } catch (error) {
      return { success: false, message: `Error starting background job: ${errorMessage(error)}` };
    }
  }

  exportFormats(): readonly ExportFormat[] {
    return EXPORT_FORMATS;
  }

  export(result: OperationResult, format: string): ExportPayload {
    const data = result.data;
    if (!data) {
      throw new ValidationError('No valid results to export');
    }

    const baseName = `${this.metadata.slug.replace(/-/g, '_')}_${readText(data, 'viewId') ?? 'unknown'}`;

    if (format === 'json') {
      return {
        content: Buffer.from(JSON.stringify(data, null, 2), 'utf-8'),
        mimeType: 'application/json',
        filename: `${baseName}.json`,
      };
    }

    if (format === 'csv') {
      const dryRun = data.dryRun === true;
      const rows: CsvCell[][] = [
        [`${this.metadata.name} Results`],
        ['View', readText(data, 'viewName') ?? 'N/A'],
        ['Operation', this.metadata.slug],
        ...this.variant.exportRows(data),
        ['Total Tickets', readCount(data, 'totalTickets')],
        ['Dry Run', dryRun ? 'Yes' : 'No'],
      ];

      if (!dryRun) {
        rows.push(['Successful', readCount(data, 'successful')], ['Failed', readCount(data, 'failed')]);
      }
      rows.push([]);

      if (dryRun) {
        rows.push(['Ticket ID', 'Subject', 'Status', 'Priority', 'Current Tags']);
        for (const ticket of readPreviewTickets(data)) {
          rows.push([ticket.id, ticket.subject, ticket.status, ticket.priority ?? 'N/A', ticket.currentTags.join(', ')]);
        }
      } else {
        const errors = readStringList(data, 'errors');
        if (errors.length > 0) {
          rows.push(['Errors'], ...errors.map((error) => [error]));
        }
      }

      return {
        content: Buffer.from(toCsv(rows), 'utf-8'),
        mimeType: 'text/csv',
        filename: `${baseName}.csv`,
      };
    }

    throw new UnsupportedExportFormatError(this.metadata.slug, format);
  }

  private async lookupViewName(client: ITicketClient, viewId: number): Promise<string> {
    const views = await client.getViews();
    return views.find((view) => view.id === viewId)?.title ?? `View ${viewId}`;
  }
}
