import type { ConnectionOptions, SslOptions } from 'mysql2';
import type { Connection } from 'mysql2/promise';
import type { ConnectionDescriptor } from '../config/descriptor.js';
import { ConnectionSession } from '../session/session.js';
import type { QueryResult } from '../types/index.js';
import { quoteIdentifier } from './dialect.js';
import { poolSettings } from './pool.js';
import type {
  Engine,
  EngineDriver,
  SessionConnection,
  TransactionClient,
} from './types.js';

type MySQLModule = typeof import('mysql2/promise');

const DUPLICATE_DATABASE = 'ER_DB_CREATE_EXISTS';

export function mysqlSslOption(security: ConnectionDescriptor['security']): SslOptions | undefined {
  if (security.mode === 'disable') {
    return undefined;
  }

  const { ca, cert, key, rejectUnauthorized } = security.options;
  return {
    ca,
    cert,
    key,
    rejectUnauthorized: rejectUnauthorized ?? security.mode === 'verify-full',
  };
}

function connectionOptions(descriptor: ConnectionDescriptor): ConnectionOptions {
  return {
    host: descriptor.host,
    port: descriptor.port,
    user: descriptor.username,
    password: descriptor.password,
    ssl: mysqlSslOption(descriptor.security),
    connectTimeout: descriptor.connectTimeoutMs,
  };
}

function affectedRows(result: unknown): number {
  return (result as { affectedRows?: number }).affectedRows ?? 0;
}

type Executor = (sql: string, params: unknown[]) => Promise<[unknown, unknown]>;

function statementClient(execute: Executor): TransactionClient {
  return {
    async query<R = Record<string, unknown>>(
      queryText: string,
      params: unknown[] = []
    ): Promise<QueryResult<R>> {
      const [rows] = await execute(queryText, params);
      const resultRows = Array.isArray(rows) ? rows : [];
      return {
        rows: resultRows as R[],
        rowCount: resultRows.length,
      };
    },

    async execute(queryText: string, params: unknown[] = []): Promise<{ rowCount: number }> {
      const [result] = await execute(queryText, params);
      return { rowCount: affectedRows(result) };
    },
  };
}

export function createMySQLEngine(
  mysql: MySQLModule,
  descriptor: ConnectionDescriptor,
  database: string
): Engine {
  const settings = poolSettings(descriptor);
  const pool = mysql.createPool({
    ...connectionOptions(descriptor),
    database,
    waitForConnections: true,
    connectionLimit: settings.max,
    maxIdle: settings.keepIdle,
    idleTimeout: settings.idleTimeoutMs,
  });
  const client = statementClient((sql, params) => pool.execute(sql, params));

  async function acquire(): Promise<SessionConnection> {
    const connection = await pool.getConnection();
    const trx = statementClient((sql, params) => connection.execute(sql, params));

    return {
      begin: () => connection.beginTransaction(),
      commit: () => connection.commit(),
      rollback: () => connection.rollback(),
      query: trx.query,
      execute: trx.execute,
      async release() {
        connection.release();
      },
    };
  }

  return {
    dialect: 'mysql',
    database,

    async ping(): Promise<void> {
      const connection = await pool.getConnection();
      try {
        await connection.ping();
      } finally {
        connection.release();
      }
    },

    query: client.query,

    execute: client.execute,

    async transaction<T>(fn: (trx: TransactionClient) => Promise<T>): Promise<T> {
      const connection = await pool.getConnection();
      await connection.beginTransaction();

      try {
        const result = await fn(statementClient((sql, params) => connection.execute(sql, params)));
        await connection.commit();
        return result;
      } catch (error) {
        await connection.rollback();
        throw error;
      } finally {
        connection.release();
      }
    },

    openSession(options) {
      return new ConnectionSession(acquire, options);
    },

    async dispose(): Promise<void> {
      await pool.end();
    },
  };
}

export async function createMySQLEngineDriver(): Promise<EngineDriver> {
  const mysql = await import('mysql2/promise');

  async function withServerConnection<T>(
    descriptor: ConnectionDescriptor,
    fn: (connection: Connection) => Promise<T>
  ): Promise<T> {
    const connection = await mysql.createConnection(connectionOptions(descriptor));
    try {
      return await fn(connection);
    } finally {
      await connection.end();
    }
  }

  return {
    dialect: 'mysql',

    createEngine(descriptor, database) {
      return createMySQLEngine(mysql, descriptor, database);
    },

    async databaseExists(descriptor, database) {
      return withServerConnection(descriptor, async (connection) => {
        const [rows] = await connection.execute(
          'SELECT SCHEMA_NAME FROM INFORMATION_SCHEMA.SCHEMATA WHERE SCHEMA_NAME = ?',
          [database]
        );
        return Array.isArray(rows) && rows.length > 0;
      });
    },

    async createDatabase(descriptor, database) {
      await withServerConnection(descriptor, async (connection) => {
        await connection.query(`CREATE DATABASE ${quoteIdentifier('mysql', database)}`);
      });
    },

    isDuplicateDatabaseError(error) {
      return error instanceof Error && (error as Error & { code?: unknown }).code === DUPLICATE_DATABASE;
    },
  };
}
