import {
  type ConnectionDescriptor,
  describeTarget,
  resolveDatabaseName,
} from '../config/descriptor.js';
import { createEngineDriver } from '../driver/index.js';
import type { BackoffPolicy } from '../driver/retry.js';
import type { Engine, EngineDriver, Session } from '../driver/types.js';
import { EngineFactory } from '../engine/factory.js';
import { ConfigurationError, HookExecutionError, SchemaError, describeCause } from '../errors.js';
import { type HookRegistry, createHookRegistry } from '../hooks/registry.js';
import { type AsyncHookSet, normalizeStatements } from '../hooks/types.js';
import { type Logger, consoleLogger } from '../logger.js';
import {
  DeclarativeSchemaMaterializer,
  type SchemaMaterializer,
  type SchemaSource,
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

export interface AsyncSessionManagerOptions {
  /** Defaults to the built-in driver for `descriptor.dialect`. */
  driver?: EngineDriver;
  hooks?: HookRegistry<AsyncHookSet>;
  materializer?: SchemaMaterializer;
  /** Shorthand for a {@link DeclarativeSchemaMaterializer} over these definitions. */
  schemas?: SchemaSource;
  logger?: Logger;
  backoff?: BackoffPolicy;
  onStateChange?: LifecycleListener;
}

export type SessionProvider = (tenantId?: string) => Promise<Session>;

/**
 * Hands out sessions for logical databases, creating and bootstrapping the
 * underlying engine on first use. Bootstrap (precreate hooks, schema,
 * postcreate hooks) runs once per engine; concurrent first requests share it.
 *
 * Hooks must be registered before the first request for their database.
 */
export class AsyncSessionManager {
  readonly hooks: HookRegistry<AsyncHookSet>;
  private logger: Logger;
  private materializer: SchemaMaterializer | null;
  private backoff?: BackoffPolicy;
  private onStateChange?: LifecycleListener;
  private driver?: EngineDriver;
  private factory: Promise<EngineFactory> | null = null;
  private bootstraps = new WeakMap<Engine, Promise<void>>();

  constructor(
    readonly descriptor: ConnectionDescriptor,
    options: AsyncSessionManagerOptions = {}
  ) {
    if (options.driver && options.driver.dialect !== descriptor.dialect) {
      throw new ConfigurationError(
        `Driver dialect "${options.driver.dialect}" does not match descriptor dialect "${descriptor.dialect}"`
      );
    }

    this.logger = options.logger ?? consoleLogger;
    this.hooks = options.hooks ?? createHookRegistry();
    this.driver = options.driver;
    this.backoff = options.backoff;
    this.onStateChange = options.onStateChange;
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

  private createMaterializer(source: SchemaSource): SchemaMaterializer {
    return new DeclarativeSchemaMaterializer(source, {
      logger: this.logger,
      schemaName: this.descriptor.defaultSchema,
    });
  }

  useSchemas(source: SchemaSource): void {
    this.materializer = this.createMaterializer(source);
  }

  useMaterializer(materializer: SchemaMaterializer): void {
    this.materializer = materializer;
  }

  resolveDatabaseName(database: string, tenantId?: string): string {
    return resolveDatabaseName(this.descriptor, database, tenantId);
  }

  /**
   * Raw engine access. The engine is bootstrapped exactly as for
   * {@link getSession}. When engine caching is off the caller owns the returned
   * engine and hands it back through {@link releaseEngine}.
   */
  async getEngine(database: string, options: SessionRequestOptions = {}): Promise<Engine> {
    const { engine } = await this.prepare(database, options);
    return engine;
  }

  /**
   * Connects to the resolved target with the factory's retry policy, without
   * running hooks or schema creation. Resolves to the resolved database name.
   */
  async verifyConnection(database: string, options: SessionRequestOptions = {}): Promise<string> {
    const resolvedName = this.resolveDatabaseName(database, options.tenantId);
    throwIfCancelled(options.signal, 'EngineReady');

    const factory = await this.getFactory();
    const engine = await factory.getOrCreateEngine(this.descriptor, resolvedName, {
      signal: options.signal,
    });
    await this.releaseEngine(engine);
    return resolvedName;
  }

  /** Disposes an engine obtained with caching off; cached engines live until {@link dispose}. */
  async releaseEngine(engine: Engine): Promise<void> {
    if (!this.descriptor.cacheEngines) {
      await engine.dispose();
    }
  }

  async getSession(database: string, options: SessionRequestOptions = {}): Promise<Session> {
    const { engine, reporter } = await this.prepare(database, options);

    const session = engine.openSession({
      onClose: async () => {
        reporter.emit('Closed');
        await this.releaseEngine(engine);
      },
    });
    reporter.emit('SessionActive');
    return session;
  }

  /**
   * Runs `fn` with a session that is closed afterwards on every path. Work the
   * callback did not commit is rolled back by the close.
   */
  async withSession<T>(
    database: string,
    fn: (session: Session) => Promise<T>,
    options: SessionRequestOptions = {}
  ): Promise<T> {
    const session = await this.getSession(database, options);
    try {
      return await fn(session);
    } finally {
      await session.close();
    }
  }

  sessionProvider(database: string): SessionProvider {
    return (tenantId) => this.getSession(database, { tenantId });
  }

  async dispose(): Promise<void> {
    if (!this.factory) return;
    const factory = await this.factory;
    this.factory = null;
    await factory.disposeAll();
  }

  private async prepare(
    database: string,
    options: SessionRequestOptions
  ): Promise<{ engine: Engine; reporter: LifecycleReporter }> {
    const request: RequestContext = {
      database,
      tenantId: options.tenantId,
      resolvedName: this.resolveDatabaseName(database, options.tenantId),
      signal: options.signal,
    };
    const reporter = new LifecycleReporter(this.onStateChange, request);
    reporter.emit('Idle');
    throwIfCancelled(request.signal, 'EngineReady');

    const factory = await this.getFactory();
    const reused = factory.get(this.descriptor, request.resolvedName) !== undefined;
    const engine = await factory.getOrCreateEngine(this.descriptor, request.resolvedName, {
      signal: request.signal,
    });
    reporter.emit('EngineReady', reused);

    try {
      await this.bootstrap(engine, request, reporter);
      throwIfCancelled(request.signal, 'SessionActive');
    } catch (error) {
      await this.releaseEngine(engine).catch((disposeError: unknown) => {
        this.logger.warn(`Failed to dispose engine for "${request.resolvedName}": ${describeCause(disposeError)}`);
      });
      throw error;
    }

    return { engine, reporter };
  }

  private async getFactory(): Promise<EngineFactory> {
    if (!this.factory) {
      this.factory = this.createFactory();
    }
    try {
      return await this.factory;
    } catch (error) {
      this.factory = null;
      throw error;
    }
  }

  private async createFactory(): Promise<EngineFactory> {
    const driver =
      this.driver ?? (await createEngineDriver(this.descriptor.dialect, { logger: this.logger }));
    return new EngineFactory(driver, { logger: this.logger, backoff: this.backoff });
  }

  private async bootstrap(
    engine: Engine,
    request: RequestContext,
    reporter: LifecycleReporter
  ): Promise<void> {
    const existing = this.bootstraps.get(engine);
    if (existing) {
      await existing;
      for (const state of BOOTSTRAP_STATES) {
        reporter.emit(state, true);
      }
      return;
    }

    const run = this.runBootstrap(engine, request, reporter);
    this.bootstraps.set(engine, run);
    try {
      await run;
    } catch (error) {
      this.bootstraps.delete(engine);
      throw error;
    }
  }

  private async runBootstrap(
    engine: Engine,
    request: RequestContext,
    reporter: LifecycleReporter
  ): Promise<void> {
    await this.runHookPhase(HOOK_PHASES.precreate, engine, request);
    reporter.emit('Precreated');

    throwIfCancelled(request.signal, 'SchemaReady');
    await this.materialize(engine, request);
    reporter.emit('SchemaReady');

    await this.runHookPhase(HOOK_PHASES.postcreate, engine, request);
    reporter.emit('Postcreated');

    this.logger.info(`Bootstrap for ${describeTarget(this.descriptor, request.resolvedName)} completed`);
  }

  private async runHookPhase(phase: HookPhase, engine: Engine, request: RequestContext): Promise<void> {
    const autoHooks = collectHooks(this.hooks, phase.auto, request);
    for (const [index, entry] of autoHooks.entries()) {
      throwIfCancelled(request.signal, phase.state);
      try {
        const statements = normalizeStatements(await entry.hook(request.tenantId));
        if (statements.length > 0) {
          await engine.transaction(async (trx) => {
            for (const statement of statements) {
              await trx.execute(statement);
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
        await entry.hook(session, request.tenantId);
        await session.commit();
      } catch (error) {
        await session.close().catch((closeError: unknown) => {
          this.logger.warn(`Failed to close hook session: ${describeCause(closeError)}`);
        });
        throw new HookExecutionError({
          kind: phase.manual,
          database: request.database,
          ordinal: index + 1,
          state: phase.state,
          cause: error,
        });
      }
      await session.close();
    }

    if (autoHooks.length + manualHooks.length > 0) {
      this.logger.info(`${phase.name} for "${request.resolvedName}" completed`);
    }
  }

  private async materialize(engine: Engine, request: RequestContext): Promise<void> {
    if (!this.materializer) return;

    try {
      await this.materializer.materialize(engine, request.database);
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
