import type { SessionCapability, SyncSessionCapability } from '../driver/types.js';
import type { MaybePromise } from '../types/index.js';

export type HookKind = 'precreate-auto' | 'precreate-manual' | 'postcreate-auto' | 'postcreate-manual';

export const HOOK_KINDS: readonly HookKind[] = [
  'precreate-auto',
  'precreate-manual',
  'postcreate-auto',
  'postcreate-manual',
];

/** One statement, or an ordered batch. An empty batch is valid. */
export type HookStatements = string | readonly string[];

export type AutoHook = (tenantId: string | undefined) => MaybePromise<HookStatements>;

export type ManualHook = (session: SessionCapability, tenantId: string | undefined) => MaybePromise<void>;

export type SyncAutoHook = (tenantId: string | undefined) => HookStatements;

export type SyncManualHook = (session: SyncSessionCapability, tenantId: string | undefined) => void;

/** Maps each hook kind to the callable type accepted for it. */
export interface HookSet {
  'precreate-auto': unknown;
  'precreate-manual': unknown;
  'postcreate-auto': unknown;
  'postcreate-manual': unknown;
}

export interface AsyncHookSet extends HookSet {
  'precreate-auto': AutoHook;
  'precreate-manual': ManualHook;
  'postcreate-auto': AutoHook;
  'postcreate-manual': ManualHook;
}

export interface SyncHookSet extends HookSet {
  'precreate-auto': SyncAutoHook;
  'precreate-manual': SyncManualHook;
  'postcreate-auto': SyncAutoHook;
  'postcreate-manual': SyncManualHook;
}

export interface HookEntry<K extends HookKind = HookKind, F = unknown> {
  kind: K;
  database: string;
  hook: F;
}

export function normalizeStatements(result: HookStatements | undefined | null): readonly string[] {
  if (result === undefined || result === null) {
    return [];
  }
  return typeof result === 'string' ? [result] : result;
}
