import {
  type ConnectionDescriptor,
  describeTarget,
  resolveDatabaseName,
} from '../config/descriptor.js';
import type { BackoffPolicy } from '../driver/retry.js';
import { createSyncSQLiteEngineDriver } from '../driver/sqlite.js';
import type { SyncEngine, SyncEngineDriver, SyncSession } from '../driver/types.js';
import { SyncEngineFactory } from '../engine/sync-factory.js';
import {
  ConfigurationError,
  DbSessionError,
  HookExecutionError,
  SchemaError,
  describeCause,
} from '../errors.js';
import { type SyncHookRegistry, createSyncHookRegistry } from '../hooks/registry.js';
import { normalizeStatements } from '../hooks/types.js';
import { type Logger, consoleLogger } from '../logger.js';
import {
  type SchemaSource,
  SyncDeclarativeSchemaMaterializer,
  type SyncSchemaMaterializer,
} from '../schema/materializer.js';
import {
  BOOTSTRAP_STATES,
  HOOK_PHASES,
  type HookPhase,
  LifecycleReporter,
  type RequestContext,
  collectHooks,
  throwIfCancelled,
} from './lifecycle.js';
import type { LifecycleListener, SessionRequestOptions } from './types.js';

export interface SessionManagerOptions {
  /** Required for every dialect except sqlite. */
  driver?: SyncEngineDriver;
  hooks?: SyncHookRegistry;
  materializer?: SyncSchemaMaterializer;
  schemas?: SchemaSource;
  logger?: Logger;
  backoff?: BackoffPolicy;
  onStateChange?: LifecycleListener;
}

export type SyncSessionProvider = (tenantId?: string) => SyncSession;

function defaultDriver(descriptor: ConnectionDescriptor): SyncEngineDriver {
  if (descriptor.dialect === 'sqlite') {
    return createSyncSQLiteEngineDriver();
  }
  throw new ConfigurationError(
    `No blocking driver is built in for ${descriptor.dialect}; pass a SyncEngineDriver`
  );
}

/**
 * Blocking session manager. Every step, including backoff waits between
 * connection attempts, runs on the calling thread.
 */
export class SessionManager {
  readonly hooks: SyncHookRegistry;
  private logger: Logger;
  private materializer: SyncSchemaMaterializer | null;
  private onStateChange?: LifecycleListener;
  private factory: SyncEngineFactory;
  private bootstrapped = new WeakSet<SyncEngine>();
  private bootstrapping = new WeakSet<SyncEngine>();

  constructor(
    readonly descriptor: ConnectionDescriptor,
    options: SessionManagerOptions = {}
  ) {
    const driver = options.driver ?? defaultDriver(descriptor);
    if (driver.dialect !== descriptor.dialect) {
      throw new ConfigurationError(
        `Driver dialect "${driver.dialect}" does not match descriptor dialect "${descriptor.dialect}"`
      );
    }

    this.logger = options.logger ?? consoleLogger;
    this.hooks = options.hooks ?? createSyncHookRegistry();
    this.onStateChange = options.onStateChange;
    this.factory = new SyncEngineFactory(driver, { logger: this.logger, backoff: options.backoff });
    this.materializer =
      options.materializer ??
      (options.schemas ? this.createMaterializer(options.schemas) : null);
  }

  precreate(databases: string | readonly string[]) {
    return this.hooks.precreate(databases);
  }

  precreateManual(databases: string | readonly string[]) {
    return this.hooks.precreateManual(databases);
  }

  postcreate(databases: string | readonly string[]) {
    return this.hooks.postcreate(databases);
  }

  postcreateManual(databases: string | readonly string[]) {
    return this.hooks.postcreateManual(databases);
  }

  private createMaterializer(source: SchemaSource): SyncSchemaMaterializer {
    return new SyncDeclarativeSchemaMaterializer(source, {
      logger: this.logger,
      schemaName: this.descriptor.defaultSchema,
    });
  }

  useSchemas(source: SchemaSource): void {
    this.materializer = this.createMaterializer(source);
  }

  useMaterializer(materializer: SyncSchemaMaterializer): void {
    this.materializer = materializer;
  }

  resolveDatabaseName(database: string, tenantId?: string): string {
    return resolveDatabaseName(this.descriptor, database, tenantId);
  }

  /** Bootstrapped like {@link getSession}; with caching off, hand it back through {@link releaseEngine}. */
  getEngine(database: string, options: SessionRequestOptions = {}): SyncEngine {
    return this.prepare(database, options).engine;
  }

  /** Connects with retry but runs no hooks or schema creation. Returns the resolved name. */
  verifyConnection(database: string, options: SessionRequestOptions = {}): string {
    const resolvedName = this.resolveDatabaseName(database, options.tenantId);
    throwIfCancelled(options.signal, 'EngineReady');

    const engine = this.factory.getOrCreateEngine(this.descriptor, resolvedName, { signal: options.signal });
    this.releaseEngine(engine);
    return resolvedName;
  }

  releaseEngine(engine: SyncEngine): void {
    if (!this.descriptor.cacheEngines) {
      engine.dispose();
    }
  }

  getSession(database: string, options: SessionRequestOptions = {}): SyncSession {
    const { engine, reporter } = this.prepare(database, options);

    const session = engine.openSession({
      onClose: () => {
        reporter.emit('Closed');
        this.releaseEngine(engine);
      },
    });
    reporter.emit('SessionActive');
    return session;
  }

  withSession<T>(
    database: string,
    fn: (session: SyncSession) => T,
    options: SessionRequestOptions = {}
  ): T {
    const session = this.getSession(database, options);
    try {
      return fn(session);
    } finally {
      session.close();
    }
  }

  sessionProvider(database: string): SyncSessionProvider {
    return (tenantId) => this.getSession(database, { tenantId });
  }

  dispose(): void {
    this.factory.disposeAll();
  }

  private prepare(
    database: string,
    options: SessionRequestOptions
  ): { engine: SyncEngine; reporter: LifecycleReporter } {
    const request: RequestContext = {
      database,
      tenantId: options.tenantId,
      resolvedName: this.resolveDatabaseName(database, options.tenantId),
      signal: options.signal,
    };
    const reporter = new LifecycleReporter(this.onStateChange, request);
    reporter.emit('Idle');
    throwIfCancelled(request.signal, 'EngineReady');

    const reused = this.factory.get(this.descriptor, request.resolvedName) !== undefined;
    const engine = this.factory.getOrCreateEngine(this.descriptor, request.resolvedName, {
      signal: request.signal,
    });
    reporter.emit('EngineReady', reused);

    try {
      this.bootstrap(engine, request, reporter);
      throwIfCancelled(request.signal, 'SessionActive');
    } catch (error) {
      try {
        this.releaseEngine(engine);
      } catch (disposeError) {
        this.logger.warn(`Failed to dispose engine for "${request.resolvedName}": ${describeCause(disposeError)}`);
      }
      throw error;
    }

    return { engine, reporter };
  }

  private bootstrap(engine: SyncEngine, request: RequestContext, reporter: LifecycleReporter): void {
    if (this.bootstrapped.has(engine)) {
      for (const state of BOOTSTRAP_STATES) {
        reporter.emit(state, true);
      }
      return;
    }

    if (this.bootstrapping.has(engine)) {
      throw new DbSessionError(
        `Database "${request.resolvedName}" was requested by one of its own bootstrap hooks`,
        { state: 'Precreated' }
      );
    }

    this.bootstrapping.add(engine);
    try {
      this.runHookPhase(HOOK_PHASES.precreate, engine, request);
      reporter.emit('Precreated');

      throwIfCancelled(request.signal, 'SchemaReady');
      this.materialize(engine, request);
      reporter.emit('SchemaReady');

      this.runHookPhase(HOOK_PHASES.postcreate, engine, request);
      reporter.emit('Postcreated');
    } finally {
      this.bootstrapping.delete(engine);
    }

    this.bootstrapped.add(engine);
    this.logger.info(`Bootstrap for ${describeTarget(this.descriptor, request.resolvedName)} completed`);
  }

  private runHookPhase(phase: HookPhase, engine: SyncEngine, request: RequestContext): void {
    const autoHooks = collectHooks(this.hooks, phase.auto, request);
    for (const [index, entry] of autoHooks.entries()) {
      throwIfCancelled(request.signal, phase.state);
      try {
        const statements = normalizeStatements(entry.hook(request.tenantId));
        if (statements.length > 0) {
          engine.transaction((trx) => {
            for (const statement of statements) {
              trx.execute(statement);
            }
          });
        }
      } catch (error) {
        throw new HookExecutionError({
          kind: phase.auto,
          database: request.database,
          ordinal: index + 1,
          state: phase.state,
          cause: error,
        });
      }
    }

    const manualHooks = collectHooks(this.hooks, phase.manual, request);
    for (const [index, entry] of manualHooks.entries()) {
      throwIfCancelled(request.signal, phase.state);
      const session = engine.openSession();
      try {
        entry.hook(session, request.tenantId);
        session.commit();
      } catch (error) {
        try {
          session.close();
        } catch (closeError) {
          this.logger.warn(`Failed to close hook session: ${describeCause(closeError)}`);
        }
        throw new HookExecutionError({
          kind: phase.manual,
          database: request.database,
          ordinal: index + 1,
          state: phase.state,
          cause: error,
        });
      }
      session.close();
    }

    if (autoHooks.length + manualHooks.length > 0) {
      this.logger.info(`${phase.name} for "${request.resolvedName}" completed`);
    }
  }

  private materialize(engine: SyncEngine, request: RequestContext): void {
    if (!this.materializer) return;

    try {
      this.materializer.materialize(engine, request.database);
    } catch (error) {
      if (error instanceof SchemaError) {
        throw error;
      }
      throw new SchemaError(
        `Failed to materialize schema for "${request.resolvedName}": ${describeCause(error)}`,
        request.database,
        error
      );
    }
  }
}
