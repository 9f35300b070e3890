import { ConfigurationError } from '../errors.js';
import { type Logger, consoleLogger } from '../logger.js';
import type { DialectName } from '../types/index.js';
import { createPostgresEngineDriver } from './postgresql.js';
import type { EngineDriver } from './types.js';

export type {
  Engine,
  EngineDriver,
  Session,
  SessionCapability,
  SessionConnection,
  SessionOptions,
  SyncEngine,
  SyncEngineDriver,
  SyncSession,
  SyncSessionCapability,
  SyncSessionConnection,
  SyncSessionOptions,
  SyncTransactionClient,
  TransactionClient,
} from './types.js';

export type { BackoffPolicy, RetryConfig } from './retry.js';
export {
  createBackoffPolicy,
  exponentialBackoff,
  fixedBackoff,
  isRetryableError,
  withRetry,
  withRetrySync,
  withTimeout,
} from './retry.js';

export { detectDialect, quoteIdentifier } from './dialect.js';

export interface CreateEngineDriverOptions {
  logger?: Logger;
}

export async function createEngineDriver(
  dialect: DialectName,
  options: CreateEngineDriverOptions = {}
): Promise<EngineDriver> {
  switch (dialect) {
    case 'postgresql':
      return createPostgresEngineDriver({ logger: options.logger ?? consoleLogger });

    case 'mysql': {
      const { createMySQLEngineDriver } = await import('./mysql.js');
      return createMySQLEngineDriver();
    }

    case 'sqlite': {
      const { createSQLiteEngineDriver } = await import('./sqlite.js');
      return createSQLiteEngineDriver();
    }

    default:
      throw new ConfigurationError(`Unsupported dialect: ${String(dialect)}`);
  }
}
