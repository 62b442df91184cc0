import { OperationRegistry } from '../src/application/operations/OperationRegistry.js';
import { registerBuiltinOperations } from '../src/application/operations/builtinOperations.js';
import { MacroSearchOperation } from '../src/application/operations/MacroSearchOperation.js';
import { JobService } from '../src/application/services/JobService.js';
import { DatabaseConnection, IN_MEMORY_DATABASE } from '../src/infrastructure/database/DatabaseConnection.js';
import { JobRepository } from '../src/infrastructure/database/repositories/JobRepository.js';
import { DuplicateSlugError } from '../src/core/errors.js';
import { FakeClientProvider, FakeTicketClient } from './helpers/FakeTicketClient.js';
import { RecordingTaskQueue } from './helpers/RecordingTaskQueue.js';

describe('OperationRegistry', () => {
  let connection: DatabaseConnection;
  let registry: OperationRegistry;
  let provider: FakeClientProvider;

  beforeEach(() => {
    connection = new DatabaseConnection(IN_MEMORY_DATABASE);
    provider = new FakeClientProvider(new FakeTicketClient());
    const jobService = new JobService(new JobRepository(connection.getDatabase()), new RecordingTaskQueue());
    registry = new OperationRegistry();
    registerBuiltinOperations(registry, { clientProvider: provider, jobService });
  });

  afterEach(() => {
    connection.close();
  });

  test('should register every built-in operation', () => {
    expect(registry.slugs()).toEqual(['tag-add', 'tag-remove', 'apply-macro-to-view', 'macro-search']);
    expect(registry.size).toBe(4);
  });

  test('should build descriptors from the operations', () => {
    const all = registry.all();

    expect(all.get('apply-macro-to-view')).toEqual({
      name: 'Apply Macro to View',
      slug: 'apply-macro-to-view',
      description: 'Apply a macro to all tickets in a specified view with safety controls',
      category: 'Macros',
      requiresAdmin: true,
      supportsAsync: true,
      exportFormats: ['csv', 'json'],
    });
    expect(all.get('macro-search')?.supportsAsync).toBe(false);
    expect(all.get('tag-add')?.requiresAdmin).toBe(false);
  });

  test('should freeze descriptors', () => {
    const descriptor = registry.describe('tag-add');
    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(Object.isFrozen(descriptor?.exportFormats)).toBe(true);
  });

  test('should reject a duplicate slug', () => {
    expect(() => registry.register(new MacroSearchOperation(provider))).toThrow(DuplicateSlugError);
    expect(() => registry.register(new MacroSearchOperation(provider))).toThrow(
      "Operation with slug 'macro-search' is already registered"
    );
  });

  test('should return undefined for an unknown slug', () => {
    expect(registry.get('does-not-exist')).toBeUndefined();
    expect(registry.has('does-not-exist')).toBe(false);
    expect(registry.has('tag-remove')).toBe(true);
  });

  test('should group by category', () => {
    expect(registry.categories()).toEqual(['Macros', 'Tags']);
    const tags = registry.byCategory('Tags');
    expect([...tags.keys()]).toEqual(['tag-add', 'tag-remove']);
    expect(tags.get('tag-add')).toBe(registry.describe('tag-add'));
    expect(registry.byCategory('Reports').size).toBe(0);
  });

  test('should empty the registry on clear', () => {
    registry.clear();
    expect(registry.size).toBe(0);
    registry.register(new MacroSearchOperation(provider));
    expect(registry.slugs()).toEqual(['macro-search']);
  });
});
