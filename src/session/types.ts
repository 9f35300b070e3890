export type LifecycleState =
  | 'Idle'
  | 'EngineReady'
  | 'Precreated'
  | 'SchemaReady'
  | 'Postcreated'
  | 'SessionActive'
  | 'Closed';

export const LIFECYCLE_STATES: readonly LifecycleState[] = [
  'Idle',
  'EngineReady',
  'Precreated',
  'SchemaReady',
  'Postcreated',
  'SessionActive',
  'Closed',
];

export interface LifecycleEvent {
  state: LifecycleState;
  database: string;
  tenantId: string | undefined;
  resolvedName: string;
  /** The phase was completed by an earlier request for the same engine. */
  reused: boolean;
}

export type LifecycleListener = (event: LifecycleEvent) => void;

export interface SessionRequestOptions {
  tenantId?: string;
  signal?: AbortSignal;
}
