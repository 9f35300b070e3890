import { OperationCancelledError } from '../errors.js';
import type { HookRegistry } from '../hooks/registry.js';
import type { HookEntry, HookKind, HookSet } from '../hooks/types.js';
import type { LifecycleListener, LifecycleState } from './types.js';

export interface RequestContext {
  database: string;
  tenantId: string | undefined;
  resolvedName: string;
  signal: AbortSignal | undefined;
}

export const HOOK_PHASES = {
  precreate: {
    name: 'Precreate',
    state: 'Precreated',
    auto: 'precreate-auto',
    manual: 'precreate-manual',
  },
  postcreate: {
    name: 'Postcreate',
    state: 'Postcreated',
    auto: 'postcreate-auto',
    manual: 'postcreate-manual',
  },
} as const;

export type HookPhase = (typeof HOOK_PHASES)[keyof typeof HOOK_PHASES];

export const BOOTSTRAP_STATES = ['Precreated', 'SchemaReady', 'Postcreated'] as const;

export class LifecycleReporter {
  constructor(
    private listener: LifecycleListener | undefined,
    private request: RequestContext
  ) {}

  emit(state: LifecycleState, reused = false): void {
    this.listener?.({
      state,
      database: this.request.database,
      tenantId: this.request.tenantId,
      resolvedName: this.request.resolvedName,
      reused,
    });
  }
}

export function throwIfCancelled(signal: AbortSignal | undefined, state: LifecycleState): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(state, signal.reason);
  }
}

/**
 * Hooks registered under the logical name, followed by those registered under
 * the tenant-resolved name when it differs.
 */
export function collectHooks<H extends HookSet, K extends HookKind>(
  registry: HookRegistry<H>,
  kind: K,
  request: RequestContext
): readonly HookEntry<K, H[K]>[] {
  const entries = registry.get(kind, request.database);
  if (request.resolvedName === request.database) {
    return entries;
  }
  return [...entries, ...registry.get(kind, request.resolvedName)];
}
