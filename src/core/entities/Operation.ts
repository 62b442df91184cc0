import type { Job } from './Job.js';

/**
 * Fixed set of built-in operation kinds
 */
export type OperationKind = 'tag-add' | 'tag-remove' | 'apply-macro-to-view' | 'macro-search';

export type ExportFormat = 'csv' | 'json';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['csv', 'json'];

export interface OperationMetadata {
  name: string;
  slug: OperationKind;
  description: string;
  category: string;
  requiresAdmin: boolean;
}

/**
 * Registry view of an operation; frozen once registered
 */
export interface OperationDescriptor extends OperationMetadata {
  supportsAsync: boolean;
  exportFormats: readonly ExportFormat[];
}

export type FormFieldType = 'text' | 'textarea' | 'select' | 'checkbox' | 'number';

export interface FormFieldOption {
  value: string;
  label: string;
}

export interface FormField {
  name: string;
  label: string;
  type: FormFieldType;
  required: boolean;
  placeholder?: string;
  helpText?: string;
  options?: FormFieldOption[];
}

/**
 * Raw form values as submitted by the caller
 */
export type OperationInput = Record<string, unknown>;

export type ValidationOutcome = { ok: true } | { ok: false; error: string };

export interface RequestShape {
  itemCount: number;
  dryRun: boolean;
}

export interface OperationResult {
  success: boolean;
  message: string;
  data: Record<string, unknown> | null;
}

export interface AsyncDispatchContext {
  externalId: string;
  ownerId: string;
}

export type AsyncDispatchResult =
  | { success: true; jobId: string; job: Job; message: string }
  | { success: false; message: string };

export interface ExportPayload {
  content: Buffer;
  mimeType: string;
  filename: string;
}
