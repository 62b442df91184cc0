import { z } from 'zod';
import {
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
import { Macro, MacroAction } from '../../core/entities/Ticket.js';
import { IOperation } from '../../core/interfaces/IOperation.js';
import { ITicketClientProvider } from '../../core/interfaces/ITicketClient.js';
import { UnsupportedExportFormatError, ValidationError, errorMessage } from '../../core/errors.js';
import { CsvCell, toCsv } from '../../utils/csv.js';
import { readString } from './formInput.js';
import { readText } from './results.js';
import { ASYNC_ITEM_CEILING, SYNC_ITEM_CEILING } from './ViewBatchOperation.js';

export const MIN_SEARCH_TERM_LENGTH = 2;

const MacroMatchSchema = z.object({
  id: z.number(),
  title: z.string(),
  active: z.boolean(),
  matchingActions: z.array(z.object({ field: z.string(), value: z.unknown() })),
  url: z.string(),
});

export type MacroMatch = z.infer<typeof MacroMatchSchema>;

export function formatActionValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) return '';
  return JSON.stringify(value);
}

/**
 * Actions whose field or value contains the term, case-insensitively
 */
export function findMatchingActions(macro: Macro, term: string): MacroAction[] {
  const needle = term.toLowerCase();
  return macro.actions.filter((action) =>
    `${action.field} ${formatActionValue(action.value)}`.toLowerCase().includes(needle)
  );
}

/**
 * Read-only search over macro actions. Runs inline only.
 */
export class MacroSearchOperation implements IOperation {
  readonly metadata: OperationMetadata = {
    name: 'Search Macros',
    slug: 'macro-search',
    description: 'Find macros that contain a substring in any of their actions',
    category: 'Macros',
    requiresAdmin: false,
  };

  constructor(private clientProvider: ITicketClientProvider) {}

  async formSchema(): Promise<FormField[]> {
    return [
      {
        name: 'search_term',
        label: 'Search Term',
        type: 'text',
        required: true,
        placeholder: 'Enter text to search for...',
        helpText: 'This will search within all macro actions. Case-insensitive.',
      },
    ];
  }

  validate(input: OperationInput): ValidationOutcome {
    const term = readString(input, 'search_term');
    if (!term) {
      return { ok: false, error: 'Search term is required' };
    }
    if (term.length < MIN_SEARCH_TERM_LENGTH) {
      return { ok: false, error: `Search term must be at least ${MIN_SEARCH_TERM_LENGTH} characters` };
    }
    return { ok: true };
  }

  requestShape(): RequestShape {
    return { itemCount: 0, dryRun: false };
  }

  supportsAsync(): boolean {
    return false;
  }

  itemCeiling(asyncMode: boolean): number {
    return asyncMode ? ASYNC_ITEM_CEILING : SYNC_ITEM_CEILING;
  }

  async execute(input: OperationInput): Promise<OperationResult> {
    const validation = this.validate(input);
    if (!validation.ok) {
      return { success: false, message: validation.error, data: null };
    }

    const term = readString(input, 'search_term');
    try {
      const client = this.clientProvider.getClient();
      const macros = await client.getMacros();
      const matches: MacroMatch[] = [];

      for (const macro of macros) {
        const matchingActions = findMatchingActions(macro, term);
        if (matchingActions.length > 0) {
          matches.push({
            id: macro.id,
            title: macro.title,
            active: macro.active,
            matchingActions,
            url: `https://${client.subdomain}.zendesk.com/admin/macros/${macro.id}`,
          });
        }
      }

      return {
        success: true,
        message: `Found ${matches.length} macro(s) matching "${term}"`,
        data: { searchTerm: term, count: matches.length, macros: matches },
      };
    } catch (error) {
      return { success: false, message: `Search failed: ${errorMessage(error)}`, data: null };
    }
  }

  async executeAsync(): Promise<AsyncDispatchResult> {
    return { success: false, message: `${this.metadata.name} does not support background processing` };
  }

  exportFormats(): readonly ExportFormat[] {
    return EXPORT_FORMATS;
  }

  export(result: OperationResult, format: string): ExportPayload {
    if (!result.success || !result.data) {
      throw new ValidationError('No valid results to export');
    }

    const parsed = z.array(MacroMatchSchema).safeParse(result.data.macros);
    const macros = parsed.success ? parsed.data : [];
    const searchTerm = readText(result.data, 'searchTerm') ?? 'macros';
    const baseName = `macro_search_${searchTerm.replace(/[^A-Za-z0-9_-]+/g, '_')}`;

    if (format === 'csv') {
      const rows: CsvCell[][] = [['Macro ID', 'Title', 'Active', 'Matching Actions', 'URL']];
      for (const macro of macros) {
        rows.push([
          macro.id,
          macro.title,
          macro.active ? 'Yes' : 'No',
          macro.matchingActions.map((action) => `${action.field}: ${formatActionValue(action.value)}`).join('; '),
          macro.url,
        ]);
      }
      return {
        content: Buffer.from(toCsv(rows), 'utf-8'),
        mimeType: 'text/csv',
        filename: `${baseName}.csv`,
      };
    }

    if (format === 'json') {
      const body = { searchTerm, count: macros.length, macros };
      return {
        content: Buffer.from(JSON.stringify(body, null, 2), 'utf-8'),
        mimeType: 'application/json',
        filename: `${baseName}.json`,
      };
    }

    throw new UnsupportedExportFormatError(this.metadata.slug, format);
  }
}
