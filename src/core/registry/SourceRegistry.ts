// src/core/registry/SourceRegistry.ts

import type { SourceAdapter, SourceSummary } from '../../sources/types';
import { ConfigurationError, DuplicateSourceError, UnknownSourceError } from '../../utils/errors';

const SOURCE_KEY = /^[a-z0-9_]+$/;

/**
 * Fixed set of adapters, keyed by `key`, in registration order.
 */
export class SourceRegistry {
  private adapters: Map<string, SourceAdapter> = new Map();

  constructor(adapters: Iterable<SourceAdapter>) {
    for (const adapter of adapters) {
      if (!SOURCE_KEY.test(adapter.key)) {
        throw new ConfigurationError(`Invalid source key: ${adapter.key}`, { key: adapter.key });
      }
      if (this.adapters.has(adapter.key)) {
        throw new DuplicateSourceError(adapter.key);
      }
      this.adapters.set(adapter.key, adapter);
    }
  }

  get(key: string): SourceAdapter | undefined {
    return this.adapters.get(key);
  }

  /**
   * @throws {UnknownSourceError} If no adapter is registered under `key`
   */
  require(key: string): SourceAdapter {
    const adapter = this.adapters.get(key);
    if (!adapter) {
      throw new UnknownSourceError(key);
    }
    return adapter;
  }

  /**
   * Public sources as shown by --list-sites. Internal adapters are left out.
   */
  list(): SourceSummary[] {
    return this.runnable().map(({ key, displayName }) => ({ key, displayName }));
  }

  /**
   * Adapters an --all run visits, in registration order.
   */
  runnable(): SourceAdapter[] {
    return Array.from(this.adapters.values()).filter((adapter) => !adapter.internal);
  }
}

export function createRegistry(adapters: Iterable<SourceAdapter>): SourceRegistry {
  return new SourceRegistry(adapters);
}
