import type { ConnectionDescriptor } from '../config/descriptor.js';
import type { DialectName, QueryResult } from '../types/index.js';

export interface TransactionClient {
  query<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;
  execute(sql: string, params?: unknown[]): Promise<{ rowCount: number }>;
}

/**
 * The minimal session surface handed to manual hooks. Alternate backends only
 * need to provide these three operations.
 */
export interface SessionCapability {
  execute(sql: string, params?: unknown[]): Promise<{ rowCount: number }>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export interface SessionOptions {
  /** Runs after the session has released its connection. */
  onClose?: () => Promise<void>;
}

export interface Session extends SessionCapability {
  readonly closed: boolean;
  readonly inTransaction: boolean;
  query<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;
  close(): Promise<void>;
}

/**
 * A connection checked out for the lifetime of one session transaction.
 */
export interface SessionConnection {
  begin(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  query<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;
  execute(sql: string, params?: unknown[]): Promise<{ rowCount: number }>;
  release(): Promise<void>;
}

export interface Engine {
  readonly dialect: DialectName;
  readonly database: string;

  ping(): Promise<void>;

  query<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;

  execute(sql: string, params?: unknown[]): Promise<{ rowCount: number }>;

  transaction<T>(fn: (trx: TransactionClient) => Promise<T>): Promise<T>;

  openSession(options?: SessionOptions): Session;

  dispose(): Promise<void>;
}

/**
 * Dialect plumbing used by the engine factory. `createEngine` must not perform
 * I/O; connectivity is established by `Engine.ping()`.
 */
export interface EngineDriver {
  readonly dialect: DialectName;

  createEngine(descriptor: ConnectionDescriptor, database: string): Engine;

  databaseExists(descriptor: ConnectionDescriptor, database: string): Promise<boolean>;

  createDatabase(descriptor: ConnectionDescriptor, database: string): Promise<void>;

  isDuplicateDatabaseError(error: unknown): boolean;
}

export interface SyncTransactionClient {
  query<T = Record<string, unknown>>(sql: string, params?: unknown[]): QueryResult<T>;
  execute(sql: string, params?: unknown[]): { rowCount: number };
}

export interface SyncSessionCapability {
  execute(sql: string, params?: unknown[]): { rowCount: number };
  commit(): void;
  rollback(): void;
}

export interface SyncSessionOptions {
  onClose?: () => void;
}

export interface SyncSession extends SyncSessionCapability {
  readonly closed: boolean;
  readonly inTransaction: boolean;
  query<T = Record<string, unknown>>(sql: string, params?: unknown[]): QueryResult<T>;
  close(): void;
}

export interface SyncSessionConnection {
  begin(): void;
  commit(): void;
  rollback(): void;
  query<T = Record<string, unknown>>(sql: string, params?: unknown[]): QueryResult<T>;
  execute(sql: string, params?: unknown[]): { rowCount: number };
  release(): void;
}

export interface SyncEngine {
  readonly dialect: DialectName;
  readonly database: string;

  ping(): void;

  query<T = Record<string, unknown>>(sql: string, params?: unknown[]): QueryResult<T>;

  execute(sql: string, params?: unknown[]): { rowCount: number };

  transaction<T>(fn: (trx: SyncTransactionClient) => T): T;

  openSession(options?: SyncSessionOptions): SyncSession;

  dispose(): void;
}

export interface SyncEngineDriver {
  readonly dialect: DialectName;

  createEngine(descriptor: ConnectionDescriptor, database: string): SyncEngine;

  databaseExists(descriptor: ConnectionDescriptor, database: string): boolean;

  createDatabase(descriptor: ConnectionDescriptor, database: string): void;

  isDuplicateDatabaseError(error: unknown): boolean;
}
