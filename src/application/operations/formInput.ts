import { FormFieldOption, OperationInput } from '../../core/entities/Operation.js';
import { errorMessage } from '../../core/errors.js';

/** Option value used when a lookup for select options failed */
export const ERROR_OPTION_VALUE = 'error';

const DRY_RUN_ON = new Set(['on', 'true', '1', 'yes']);
const DRY_RUN_OFF = new Set(['', 'off', 'false', '0', 'no']);

/**
 * Form value as a trimmed string; numbers are accepted, anything else is ''
 */
export function readString(input: OperationInput, key: string): string {
  const value = input[key];
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}

function dryRunToken(input: OperationInput): string {
  const value = input.dry_run;
  if (typeof value === 'boolean') return value ? 'on' : 'off';
  return readString(input, 'dry_run').toLowerCase();
}

export function parseDryRun(input: OperationInput): boolean {
  return DRY_RUN_ON.has(dryRunToken(input));
}

export function validateDryRun(input: OperationInput): string | null {
  const token = dryRunToken(input);
  if (input.dry_run === undefined || input.dry_run === null) return null;
  return DRY_RUN_ON.has(token) || DRY_RUN_OFF.has(token) ? null : 'Dry run must be either on or off';
}

/**
 * "urgent, needs-review ,," → ['urgent', 'needs-review'], duplicates dropped
 */
export function parseTags(input: OperationInput): string[] {
  const value = input.tags;
  const parts = Array.isArray(value)
    ? value.filter((tag): tag is string => typeof tag === 'string')
    : readString(input, 'tags').split(',');

  const tags = parts.map((tag) => tag.trim()).filter((tag) => tag.length > 0);
  return [...new Set(tags)];
}

/**
 * Positive integer id, or null when the value is not one
 */
export function parseId(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

export function readTicketLimit(input: OperationInput): number {
  const raw = readString(input, 'ticket_limit');
  const limit = Number(raw);
  return raw !== '' && Number.isInteger(limit) ? limit : 0;
}

export function validateTicketLimit(input: OperationInput, ceiling: number): string | null {
  const raw = readString(input, 'ticket_limit');
  if (raw === '') {
    return 'Please specify a ticket limit';
  }

  const limit = Number(raw);
  if (!Number.isInteger(limit)) {
    return 'Ticket limit must be a valid number';
  }
  if (limit < 1) {
    return 'Ticket limit must be at least 1';
  }
  if (limit > ceiling) {
    return `Ticket limit cannot exceed ${ceiling.toLocaleString('en-US')}. Please process in smaller batches.`;
  }
  return null;
}

/**
 * Run an option lookup; on failure return a single 'error' option carrying
 * the reason instead of throwing.
 */
export async function loadOptions(
  what: string,
  lookup: () => Promise<FormFieldOption[]>
): Promise<FormFieldOption[]> {
  try {
    return await lookup();
  } catch (error) {
    return [{ value: ERROR_OPTION_VALUE, label: `Error loading ${what}: ${errorMessage(error)}` }];
  }
}
