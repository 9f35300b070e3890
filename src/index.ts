import { loadDescriptorFromEnv } from './config/env.js';
import { AsyncSessionManager, type AsyncSessionManagerOptions } from './session/manager.js';

export * from './types/index.js';

export {
  connectionDescriptorSchema,
  createConnectionDescriptor,
  describeTarget,
  engineCacheKey,
  formatIssues,
  resolveDatabaseName,
} from './config/descriptor.js';
export type {
  BackoffSettings,
  ConnectionDescriptor,
  ConnectionDescriptorInput,
  SecurityMode,
} from './config/descriptor.js';
export { loadDescriptorFromEnv, parseConnectionUri } from './config/env.js';

export {
  createBackoffPolicy,
  createEngineDriver,
  detectDialect,
  exponentialBackoff,
  fixedBackoff,
  isRetryableError,
  quoteIdentifier,
  withRetry,
  withRetrySync,
  withTimeout,
} from './driver/index.js';
export type {
  BackoffPolicy,
  CreateEngineDriverOptions,
  Engine,
  EngineDriver,
  RetryConfig,
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
} from './driver/index.js';
export { createPostgresEngineDriver } from './driver/postgresql.js';
export type { PostgresDriverOptions } from './driver/postgresql.js';
export { createMySQLEngineDriver } from './driver/mysql.js';
export { createSQLiteEngineDriver, createSyncSQLiteEngineDriver } from './driver/sqlite.js';

export { EngineFactory } from './engine/factory.js';
export type { EngineFactoryOptions, GetEngineOptions } from './engine/factory.js';
export { SyncEngineFactory } from './engine/sync-factory.js';
export { registerSignalHandlers } from './engine/signal-handler.js';
export type { EngineOwner, ShutdownResult, SignalHandlerOptions } from './engine/signal-handler.js';

export {
  ConfigurationError,
  ConnectionError,
  DbSessionError,
  HookExecutionError,
  OperationCancelledError,
  SchemaError,
  SessionError,
} from './errors.js';
export { TenantContextError, validateDatabaseName, validateTenantId } from './utils/tenant-validation.js';

export { consoleLogger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';

export { HookRegistry, createHookRegistry, createSyncHookRegistry } from './hooks/registry.js';
export type { SyncHookRegistry } from './hooks/registry.js';
export { HOOK_KINDS } from './hooks/types.js';
export type {
  AutoHook,
  HookKind,
  HookStatements,
  ManualHook,
  SyncAutoHook,
  SyncManualHook,
} from './hooks/types.js';

export * from './schema/index.js';

export { ConnectionSession, SyncConnectionSession } from './session/session.js';
export { AsyncSessionManager } from './session/manager.js';
export type { AsyncSessionManagerOptions, SessionProvider } from './session/manager.js';
export { SessionManager } from './session/sync-manager.js';
export type { SessionManagerOptions, SyncSessionProvider } from './session/sync-manager.js';
export { LIFECYCLE_STATES } from './session/types.js';
export type {
  LifecycleEvent,
  LifecycleListener,
  LifecycleState,
  SessionRequestOptions,
} from './session/types.js';

export { runCli } from './cli/index.js';
export type { CliContext, CliOutput, SetupFunction } from './cli/index.js';

/**
 * Builds a non-blocking session manager from the `DB_*` environment variables.
 */
export function createSessionManager(
  options: AsyncSessionManagerOptions = {},
  env: NodeJS.ProcessEnv = process.env
): AsyncSessionManager {
  return new AsyncSessionManager(loadDescriptorFromEnv(env), options);
}
