import { ConfigurationError } from '../errors.js';
import {
  type AsyncHookSet,
  HOOK_KINDS,
  type HookEntry,
  type HookKind,
  type HookSet,
  type SyncHookSet,
} from './types.js';

type HookStores<H extends HookSet> = {
  [K in HookKind]: Map<string, HookEntry<K, H[K]>[]>;
};

/**
 * Ordered hook lists per database name and hook kind. Registration order is
 * execution order; registering the same callable twice runs it twice.
 */
export class HookRegistry<H extends HookSet = AsyncHookSet> {
  private stores: HookStores<H> = {
    'precreate-auto': new Map(),
    'precreate-manual': new Map(),
    'postcreate-auto': new Map(),
    'postcreate-manual': new Map(),
  };

  register<K extends HookKind, F extends H[K]>(
    kind: K,
    databases: string | readonly string[],
    hook: F
  ): F {
    const names = typeof databases === 'string' ? [databases] : databases;
    if (names.length === 0) {
      throw new ConfigurationError(`Cannot register ${kind} hook without a database name`);
    }

    for (const database of names) {
      if (typeof database !== 'string' || database.trim() === '') {
        throw new ConfigurationError(`Cannot register ${kind} hook for an empty database name`);
      }
    }

    const store: Map<string, HookEntry<K, H[K]>[]> = this.stores[kind];
    for (const database of names) {
      const entries = store.get(database) ?? [];
      entries.push({ kind, database, hook });
      store.set(database, entries);
    }

    return hook;
  }

  get<K extends HookKind>(kind: K, database: string): readonly HookEntry<K, H[K]>[] {
    const store: Map<string, HookEntry<K, H[K]>[]> = this.stores[kind];
    return store.get(database) ?? [];
  }

  precreate(databases: string | readonly string[]) {
    return <F extends H['precreate-auto']>(hook: F): F =>
      this.register('precreate-auto', databases, hook);
  }

  precreateManual(databases: string | readonly string[]) {
    return <F extends H['precreate-manual']>(hook: F): F =>
      this.register('precreate-manual', databases, hook);
  }

  postcreate(databases: string | readonly string[]) {
    return <F extends H['postcreate-auto']>(hook: F): F =>
      this.register('postcreate-auto', databases, hook);
  }

  postcreateManual(databases: string | readonly string[]) {
    return <F extends H['postcreate-manual']>(hook: F): F =>
      this.register('postcreate-manual', databases, hook);
  }

  databases(): string[] {
    const names = new Set<string>();
    for (const kind of HOOK_KINDS) {
      for (const database of this.stores[kind].keys()) {
        if (this.get(kind, database).length > 0) {
          names.add(database);
        }
      }
    }
    return [...names].sort();
  }

  count(database?: string): number {
    const names = database === undefined ? this.databases() : [database];
    let total = 0;
    for (const name of names) {
      for (const kind of HOOK_KINDS) {
        total += this.get(kind, name).length;
      }
    }
    return total;
  }
}

export type SyncHookRegistry = HookRegistry<SyncHookSet>;

export function createHookRegistry(): HookRegistry<AsyncHookSet> {
  return new HookRegistry<AsyncHookSet>();
}

export function createSyncHookRegistry(): SyncHookRegistry {
  return new HookRegistry<SyncHookSet>();
}
