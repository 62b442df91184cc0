import {
  AsyncDispatchContext,
  AsyncDispatchResult,
  ExportFormat,
  ExportPayload,
  FormField,
  OperationInput,
  OperationMetadata,
  OperationResult,
  RequestShape,
  ValidationOutcome,
} from '../entities/Operation.js';

/**
 * Contract every bulk operation implements
 */
export interface IOperation {
  readonly metadata: OperationMetadata;

  /**
   * Ordered form fields. Lookups that populate select options must not throw;
   * on failure they yield a single 'error' option instead.
   */
  formSchema(): Promise<FormField[]>;

  validate(input: OperationInput): ValidationOutcome;

  /**
   * Item count and dry-run flag the dispatch policy routes on
   */
  requestShape(input: OperationInput): RequestShape;

  /**
   * Run inline. Never rejects: failures are reported in the result.
   */
  execute(input: OperationInput): Promise<OperationResult>;

  supportsAsync(): boolean;

  itemCeiling(asyncMode: boolean): number;

  /**
   * Create the job and hand the work to the task queue without waiting for it.
   * Only called when supportsAsync() is true.
   */
  executeAsync(input: OperationInput, context: AsyncDispatchContext): Promise<AsyncDispatchResult>;

  exportFormats(): readonly ExportFormat[];

  export(result: OperationResult, format: string): ExportPayload;
}
