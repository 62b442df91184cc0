import { OperationDescriptor, OperationKind } from '../../core/entities/Operation.js';
import { IOperation } from '../../core/interfaces/IOperation.js';
import { DuplicateSlugError } from '../../core/errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('OperationRegistry');

interface RegistryEntry {
  operation: IOperation;
  descriptor: Readonly<OperationDescriptor>;
}

/**
 * Slug-keyed catalogue of operations. Built once at startup and injected
 * wherever operations are looked up.
 */
export class OperationRegistry {
  private entries = new Map<string, RegistryEntry>();

  register(operation: IOperation): Readonly<OperationDescriptor> {
    const { slug } = operation.metadata;
    if (this.entries.has(slug)) {
      throw new DuplicateSlugError(slug);
    }

    const descriptor = Object.freeze({
      ...operation.metadata,
      supportsAsync: operation.supportsAsync(),
      exportFormats: Object.freeze([...operation.exportFormats()]),
    });
    this.entries.set(slug, { operation, descriptor });
    log.debug(`Registered ${slug} (${descriptor.category})`);
    return descriptor;
  }

  get(slug: string): IOperation | undefined {
    return this.entries.get(slug)?.operation;
  }

  has(slug: string): boolean {
    return this.entries.has(slug);
  }

  describe(slug: string): Readonly<OperationDescriptor> | undefined {
    return this.entries.get(slug)?.descriptor;
  }

  /**
   * Descriptors keyed by slug, in registration order
   */
  all(): Map<string, Readonly<OperationDescriptor>> {
    return new Map([...this.entries].map(([slug, entry]) => [slug, entry.descriptor]));
  }

  /**
   * Descriptors of one category keyed by slug, in registration order
   */
  byCategory(category: string): Map<string, Readonly<OperationDescriptor>> {
    return new Map(
      [...this.entries]
        .filter(([, entry]) => entry.descriptor.category === category)
        .map(([slug, entry]) => [slug, entry.descriptor])
    );
  }

  categories(): string[] {
    const names = new Set([...this.entries.values()].map((entry) => entry.descriptor.category));
    return [...names].sort();
  }

  slugs(): OperationKind[] {
    return [...this.entries.values()].map((entry) => entry.descriptor.slug);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
