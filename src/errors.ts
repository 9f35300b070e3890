import type { HookKind } from './hooks/types.js';
import type { LifecycleState } from './session/types.js';

/**
 * Base class for every error raised by the engine. `state` names the
 * lifecycle state a session request was in when the error occurred, so callers
 * can tell whether manual cleanup is needed.
 */
export class DbSessionError extends Error {
  state?: LifecycleState;

  constructor(message: string, options: { cause?: unknown; state?: LifecycleState } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'DbSessionError';
    this.state = options.state;
  }
}

export class ConfigurationError extends DbSessionError {
  constructor(
    message: string,
    public issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ConnectionError extends DbSessionError {
  readonly attempts: number;
  readonly transient: boolean;

  constructor(
    message: string,
    options: { attempts: number; transient: boolean; cause?: unknown }
  ) {
    super(message, { cause: options.cause, state: 'EngineReady' });
    this.name = 'ConnectionError';
    this.attempts = options.attempts;
    this.transient = options.transient;
  }
}

export class HookExecutionError extends DbSessionError {
  readonly kind: HookKind;
  readonly database: string;
  readonly ordinal: number;

  constructor(options: {
    kind: HookKind;
    database: string;
    ordinal: number;
    state: LifecycleState;
    cause: unknown;
  }) {
    super(
      `${options.kind} hook #${options.ordinal} for database "${options.database}" failed: ${describeCause(options.cause)}`,
      { cause: options.cause, state: options.state }
    );
    this.name = 'HookExecutionError';
    this.kind = options.kind;
    this.database = options.database;
    this.ordinal = options.ordinal;
  }
}

export class SchemaError extends DbSessionError {
  constructor(
    message: string,
    public database: string,
    cause?: unknown
  ) {
    super(message, { cause, state: 'SchemaReady' });
    this.name = 'SchemaError';
  }
}

export class SessionError extends DbSessionError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'SessionError';
  }
}

export class OperationCancelledError extends DbSessionError {
  constructor(state: LifecycleState, cause?: unknown) {
    super(`Session request cancelled in state ${state}`, { cause, state });
    this.name = 'OperationCancelledError';
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
