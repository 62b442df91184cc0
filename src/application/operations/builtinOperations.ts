import { ITicketClientProvider } from '../../core/interfaces/ITicketClient.js';
import { JobService } from '../services/JobService.js';
import { MacroSearchOperation } from './MacroSearchOperation.js';
import { OperationRegistry } from './OperationRegistry.js';
import { ViewBatchOperation, ViewBatchSettings } from './ViewBatchOperation.js';
import { applyMacroVariant, tagAddVariant, tagRemoveVariant } from './viewBatchVariants.js';

export interface BuiltinOperationDeps {
  clientProvider: ITicketClientProvider;
  jobService: JobService;
  settings?: ViewBatchSettings;
}

/**
 * Register every built-in operation. Throws DuplicateSlugError if called
 * twice on the same registry.
 */
export function registerBuiltinOperations(registry: OperationRegistry, deps: BuiltinOperationDeps): void {
  registry.register(new ViewBatchOperation(tagAddVariant, deps));
  registry.register(new ViewBatchOperation(tagRemoveVariant, deps));
  registry.register(new ViewBatchOperation(applyMacroVariant, deps));
  registry.register(new MacroSearchOperation(deps.clientProvider));
}
