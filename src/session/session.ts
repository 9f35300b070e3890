import type {
  Session,
  SessionConnection,
  SessionOptions,
  SyncSession,
  SyncSessionConnection,
  SyncSessionOptions,
} from '../driver/types.js';
import { SessionError } from '../errors.js';
import type { QueryResult } from '../types/index.js';

/**
 * Session over a connection checked out on first use. The first statement
 * begins a transaction; `commit()` and `rollback()` end it and hand the
 * connection back, so the next statement starts a new one.
 */
export class ConnectionSession implements Session {
  private connection: SessionConnection | null = null;
  private connecting: Promise<SessionConnection> | null = null;
  private isClosed = false;

  constructor(
    private acquire: () => Promise<SessionConnection>,
    private options: SessionOptions = {}
  ) {}

  get closed(): boolean {
    return this.isClosed;
  }

  get inTransaction(): boolean {
    return this.connection !== null;
  }

  async query<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<QueryResult<T>> {
    const connection = await this.begin('query');
    return connection.query<T>(sql, params);
  }

  async execute(sql: string, params?: unknown[]): Promise<{ rowCount: number }> {
    const connection = await this.begin('execute');
    return connection.execute(sql, params);
  }

  async commit(): Promise<void> {
    this.assertOpen('commit');
    const connection = await this.settle();
    if (!connection) return;

    try {
      await connection.commit();
    } catch (error) {
      throw new SessionError('Session commit failed', error);
    } finally {
      await connection.release();
    }
  }

  async rollback(): Promise<void> {
    this.assertOpen('rollback');
    const connection = await this.settle();
    if (!connection) return;

    try {
      await connection.rollback();
    } catch (error) {
      throw new SessionError('Session rollback failed', error);
    } finally {
      await connection.release();
    }
  }

  async close(): Promise<void> {
    if (this.isClosed) return;
    const connection = await this.settle();
    this.isClosed = true;

    try {
      if (connection) {
        await connection.rollback();
      }
    } catch (error) {
      throw new SessionError('Rollback while closing session failed', error);
    } finally {
      if (connection) {
        await connection.release();
      }
      await this.options.onClose?.();
    }
  }

  private assertOpen(operation: string): void {
    if (this.isClosed) {
      throw new SessionError(`Cannot ${operation} on a closed session`);
    }
  }

  private async settle(): Promise<SessionConnection | null> {
    if (this.connecting) {
      // a failed checkout is reported to the statement that started it
      await Promise.allSettled([this.connecting]);
    }
    const connection = this.connection;
    this.connection = null;
    return connection;
  }

  private async begin(operation: string): Promise<SessionConnection> {
    this.assertOpen(operation);
    if (this.connection) return this.connection;
    if (this.connecting) return this.connecting;

    this.connecting = (async () => {
      const connection = await this.acquire();
      try {
        await connection.begin();
      } catch (error) {
        await connection.release();
        throw error;
      }
      this.connection = connection;
      return connection;
    })();

    try {
      return await this.connecting;
    } finally {
      this.connecting = null;
    }
  }
}

export class SyncConnectionSession implements SyncSession {
  private connection: SyncSessionConnection | null = null;
  private isClosed = false;

  constructor(
    private acquire: () => SyncSessionConnection,
    private options: SyncSessionOptions = {}
  ) {}

  get closed(): boolean {
    return this.isClosed;
  }

  get inTransaction(): boolean {
    return this.connection !== null;
  }

  query<T = Record<string, unknown>>(sql: string, params?: unknown[]): QueryResult<T> {
    return this.begin('query').query<T>(sql, params);
  }

  execute(sql: string, params?: unknown[]): { rowCount: number } {
    return this.begin('execute').execute(sql, params);
  }

  commit(): void {
    this.assertOpen('commit');
    const connection = this.connection;
    if (!connection) return;
    this.connection = null;

    try {
      connection.commit();
    } catch (error) {
      throw new SessionError('Session commit failed', error);
    } finally {
      connection.release();
    }
  }

  rollback(): void {
    this.assertOpen('rollback');
    const connection = this.connection;
    if (!connection) return;
    this.connection = null;

    try {
      connection.rollback();
    } catch (error) {
      throw new SessionError('Session rollback failed', error);
    } finally {
      connection.release();
    }
  }

  close(): void {
    if (this.isClosed) return;
    const connection = this.connection;
    this.connection = null;
    this.isClosed = true;

    try {
      connection?.rollback();
    } catch (error) {
      throw new SessionError('Rollback while closing session failed', error);
    } finally {
      connection?.release();
      this.options.onClose?.();
    }
  }

  private assertOpen(operation: string): void {
    if (this.isClosed) {
      throw new SessionError(`Cannot ${operation} on a closed session`);
    }
  }

  private begin(operation: string): SyncSessionConnection {
    this.assertOpen(operation);
    if (this.connection) return this.connection;

    const connection = this.acquire();
    try {
      connection.begin();
    } catch (error) {
      connection.release();
      throw error;
    }
    this.connection = connection;
    return connection;
  }
}
