import postgres, { type ParameterOrJSON } from 'postgres';
import type { ConnectionDescriptor } from '../config/descriptor.js';
import { type Logger, consoleLogger } from '../logger.js';
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

export interface PostgresDriverOptions {
  logger?: Logger;
}

const DUPLICATE_DATABASE = '42P04';
const UNIQUE_VIOLATION = '23505';

export function postgresSslOption(security: ConnectionDescriptor['security']) {
  if (security.mode === 'disable') {
    return false;
  }

  const { options } = security;
  if (Object.values(options).some((value) => value !== undefined)) {
    return {
      ...options,
      rejectUnauthorized: options.rejectUnauthorized ?? security.mode === 'verify-full',
    };
  }
  return security.mode;
}

function connectionOptions(descriptor: ConnectionDescriptor, database: string, logger: Logger) {
  return {
    host: descriptor.host,
    port: descriptor.port,
    database,
    username: descriptor.username,
    password: descriptor.password,
    ssl: postgresSslOption(descriptor.security),
    connect_timeout: Math.max(1, Math.ceil(descriptor.connectTimeoutMs / 1000)),
    connection: {
      application_name: descriptor.applicationName,
      search_path: descriptor.defaultSchema,
    },
    onnotice: (notice: postgres.Notice) => logger.debug(`NOTICE: ${String(notice.message)}`),
  };
}

function toParams(params: unknown[]): ParameterOrJSON<never>[] {
  return params as ParameterOrJSON<never>[];
}

export function createPostgresEngine(
  descriptor: ConnectionDescriptor,
  database: string,
  logger: Logger = consoleLogger
): Engine {
  const pool = poolSettings(descriptor);
  const sql = postgres({
    ...connectionOptions(descriptor, database, logger),
    max: pool.max,
    idle_timeout: pool.idleTimeoutMs / 1000,
    max_lifetime: pool.maxLifetimeMs === null ? null : pool.maxLifetimeMs / 1000,
    prepare: pool.reuse,
  });

  async function acquire(): Promise<SessionConnection> {
    const reserved = await sql.reserve();

    return {
      async begin() {
        await reserved.unsafe('BEGIN');
      },
      async commit() {
        await reserved.unsafe('COMMIT');
      },
      async rollback() {
        await reserved.unsafe('ROLLBACK');
      },
      async query<T = Record<string, unknown>>(
        queryText: string,
        params: unknown[] = []
      ): Promise<QueryResult<T>> {
        const rows = await reserved.unsafe<T[]>(queryText, toParams(params));
        return { rows: rows as T[], rowCount: rows.length };
      },
      async execute(queryText: string, params: unknown[] = []): Promise<{ rowCount: number }> {
        const result = await reserved.unsafe(queryText, toParams(params));
        return { rowCount: result.count ?? 0 };
      },
      async release() {
        reserved.release();
      },
    };
  }

  return {
    dialect: 'postgresql',
    database,

    async ping(): Promise<void> {
      await sql`SELECT 1`;
    },

    async query<T = Record<string, unknown>>(
      queryText: string,
      params: unknown[] = []
    ): Promise<QueryResult<T>> {
      const result = await sql.unsafe<T[]>(queryText, toParams(params));
      return {
        rows: result as T[],
        rowCount: result.length,
      };
    },

    async execute(queryText: string, params: unknown[] = []): Promise<{ rowCount: number }> {
      const result = await sql.unsafe(queryText, toParams(params));
      return { rowCount: result.count ?? 0 };
    },

    async transaction<T>(fn: (trx: TransactionClient) => Promise<T>): Promise<T> {
      const result = await sql.begin(async (tx) => {
        const client: TransactionClient = {
          async query<R = Record<string, unknown>>(
            queryText: string,
            params: unknown[] = []
          ): Promise<QueryResult<R>> {
            const txResult = await tx.unsafe<R[]>(queryText, toParams(params));
            return {
              rows: txResult as R[],
              rowCount: txResult.length,
            };
          },

          async execute(queryText: string, params: unknown[] = []): Promise<{ rowCount: number }> {
            const txResult = await tx.unsafe(queryText, toParams(params));
            return { rowCount: txResult.count ?? 0 };
          },
        };

        return fn(client);
      });
      return result as T;
    },

    openSession(options) {
      return new ConnectionSession(acquire, options);
    },

    async dispose(): Promise<void> {
      await sql.end({ timeout: 5 });
    },
  };
}

async function withMaintenanceConnection<T>(
  descriptor: ConnectionDescriptor,
  logger: Logger,
  fn: (sql: postgres.Sql) => Promise<T>
): Promise<T> {
  const admin = postgres({
    ...connectionOptions(descriptor, descriptor.maintenanceDatabase ?? 'postgres', logger),
    max: 1,
  });

  try {
    return await fn(admin);
  } finally {
    await admin.end({ timeout: 5 });
  }
}

export function createPostgresEngineDriver(options: PostgresDriverOptions = {}): EngineDriver {
  const logger = options.logger ?? consoleLogger;

  return {
    dialect: 'postgresql',

    createEngine(descriptor, database) {
      return createPostgresEngine(descriptor, database, logger);
    },

    async databaseExists(descriptor, database) {
      return withMaintenanceConnection(descriptor, logger, async (admin) => {
        const rows = await admin`SELECT 1 FROM pg_database WHERE datname = ${database}`;
        return rows.length > 0;
      });
    },

    async createDatabase(descriptor, database) {
      await withMaintenanceConnection(descriptor, logger, async (admin) => {
        await admin.unsafe(`CREATE DATABASE ${quoteIdentifier('postgresql', database)}`);
      });
    },

    isDuplicateDatabaseError(error) {
      if (!(error instanceof Error)) return false;
      const code = (error as Error & { code?: unknown }).code;
      return (
        code === DUPLICATE_DATABASE ||
        (code === UNIQUE_VIOLATION && error.message.includes('pg_database'))
      );
    },
  };
}
