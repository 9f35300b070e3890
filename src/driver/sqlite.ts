import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import type { ConnectionDescriptor } from '../config/descriptor.js';
import { ConnectionSession, SyncConnectionSession } from '../session/session.js';
import type { QueryResult } from '../types/index.js';
import type {
  Engine,
  EngineDriver,
  SessionConnection,
  SyncEngine,
  SyncEngineDriver,
  SyncSessionConnection,
  SyncTransactionClient,
  TransactionClient,
} from './types.js';

export function sqliteDatabasePath(descriptor: ConnectionDescriptor, database: string): string {
  return join(descriptor.directory ?? '.', `${database}.db`);
}

function openConnection(path: string, descriptor: ConnectionDescriptor): Database.Database {
  const db = new Database(path, { fileMustExist: true, timeout: descriptor.connectTimeoutMs });
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  return db;
}

function statementClient(db: Database.Database): SyncTransactionClient {
  return {
    query<T = Record<string, unknown>>(queryText: string, params: unknown[] = []): QueryResult<T> {
      const rows = db.prepare(queryText).all(...params) as T[];
      return {
        rows,
        rowCount: rows.length,
      };
    },

    execute(queryText: string, params: unknown[] = []): { rowCount: number } {
      const result = db.prepare(queryText).run(...params);
      return { rowCount: result.changes };
    },
  };
}

function sessionConnection(db: Database.Database): SyncSessionConnection {
  const client = statementClient(db);
  return {
    begin: () => {
      db.prepare('BEGIN').run();
    },
    commit: () => {
      db.prepare('COMMIT').run();
    },
    rollback: () => {
      db.prepare('ROLLBACK').run();
    },
    query: client.query,
    execute: client.execute,
    release: () => db.close(),
  };
}

function toAsyncSessionConnection(connection: SyncSessionConnection): SessionConnection {
  return {
    begin: async () => connection.begin(),
    commit: async () => connection.commit(),
    rollback: async () => connection.rollback(),
    query: async <T = Record<string, unknown>>(queryText: string, params?: unknown[]) =>
      connection.query<T>(queryText, params),
    execute: async (queryText: string, params?: unknown[]) => connection.execute(queryText, params),
    release: async () => connection.release(),
  };
}

/**
 * Each engine keeps one connection for its own statements; every session
 * opens a separate connection to the same file, so database files must be on
 * disk rather than in memory.
 */
class SQLiteConnectionHolder {
  private db: Database.Database | null = null;

  constructor(
    readonly path: string,
    private descriptor: ConnectionDescriptor
  ) {}

  get(): Database.Database {
    if (!this.db) {
      this.db = openConnection(this.path, this.descriptor);
    }
    return this.db;
  }

  openSessionConnection(): SyncSessionConnection {
    return sessionConnection(openConnection(this.path, this.descriptor));
  }

  close(): void {
    this.db?.close();
    this.db = null;
  }
}

export function createSQLiteSyncEngine(
  descriptor: ConnectionDescriptor,
  database: string
): SyncEngine {
  const holder = new SQLiteConnectionHolder(sqliteDatabasePath(descriptor, database), descriptor);

  return {
    dialect: 'sqlite',
    database,

    ping(): void {
      holder.get().prepare('SELECT 1').get();
    },

    query<T = Record<string, unknown>>(queryText: string, params?: unknown[]): QueryResult<T> {
      return statementClient(holder.get()).query<T>(queryText, params);
    },

    execute(queryText: string, params?: unknown[]): { rowCount: number } {
      return statementClient(holder.get()).execute(queryText, params);
    },

    transaction<T>(fn: (trx: SyncTransactionClient) => T): T {
      const db = holder.get();
      db.prepare('BEGIN IMMEDIATE').run();
      try {
        const result = fn(statementClient(db));
        db.prepare('COMMIT').run();
        return result;
      } catch (error) {
        db.prepare('ROLLBACK').run();
        throw error;
      }
    },

    openSession(options) {
      return new SyncConnectionSession(() => holder.openSessionConnection(), options);
    },

    dispose(): void {
      holder.close();
    },
  };
}

export function createSQLiteEngine(descriptor: ConnectionDescriptor, database: string): Engine {
  const holder = new SQLiteConnectionHolder(sqliteDatabasePath(descriptor, database), descriptor);

  return {
    dialect: 'sqlite',
    database,

    async ping(): Promise<void> {
      holder.get().prepare('SELECT 1').get();
    },

    async query<T = Record<string, unknown>>(
      queryText: string,
      params?: unknown[]
    ): Promise<QueryResult<T>> {
      return statementClient(holder.get()).query<T>(queryText, params);
    },

    async execute(queryText: string, params?: unknown[]): Promise<{ rowCount: number }> {
      return statementClient(holder.get()).execute(queryText, params);
    },

    async transaction<T>(fn: (trx: TransactionClient) => Promise<T>): Promise<T> {
      const db = holder.get();
      const client = statementClient(db);
      const trx: TransactionClient = {
        query: async <R = Record<string, unknown>>(queryText: string, params?: unknown[]) =>
          client.query<R>(queryText, params),
        execute: async (queryText: string, params?: unknown[]) => client.execute(queryText, params),
      };

      let committed = false;
      db.prepare('BEGIN IMMEDIATE').run();
      try {
        const result = await fn(trx);
        db.prepare('COMMIT').run();
        committed = true;
        return result;
      } catch (error) {
        if (!committed) {
          db.prepare('ROLLBACK').run();
        }
        throw error;
      }
    },

    openSession(options) {
      return new ConnectionSession(
        async () => toAsyncSessionConnection(holder.openSessionConnection()),
        options
      );
    },

    async dispose(): Promise<void> {
      holder.close();
    },
  };
}

function databaseExists(descriptor: ConnectionDescriptor, database: string): boolean {
  return existsSync(sqliteDatabasePath(descriptor, database));
}

function createDatabase(descriptor: ConnectionDescriptor, database: string): void {
  mkdirSync(descriptor.directory ?? '.', { recursive: true });
  new Database(sqliteDatabasePath(descriptor, database)).close();
}

export function createSyncSQLiteEngineDriver(): SyncEngineDriver {
  return {
    dialect: 'sqlite',
    createEngine: createSQLiteSyncEngine,
    databaseExists,
    createDatabase,
    // creating a file that already exists does not fail
    isDuplicateDatabaseError: () => false,
  };
}

export function createSQLiteEngineDriver(): EngineDriver {
  return {
    dialect: 'sqlite',
    createEngine: createSQLiteEngine,
    databaseExists: async (descriptor, database) => databaseExists(descriptor, database),
    createDatabase: async (descriptor, database) => createDatabase(descriptor, database),
    isDuplicateDatabaseError: () => false,
  };
}
