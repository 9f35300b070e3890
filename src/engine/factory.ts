import {
  type ConnectionDescriptor,
  describeTarget,
  engineCacheKey,
} from '../config/descriptor.js';
import { type BackoffPolicy, createBackoffPolicy, withRetry, withTimeout } from '../driver/retry.js';
import type { Engine, EngineDriver } from '../driver/types.js';
import { type Logger, consoleLogger } from '../logger.js';
import { SingleFlight } from './single-flight.js';

export interface EngineFactoryOptions {
  logger?: Logger;
  /** Overrides the backoff described by `descriptor.retry.backoff`. */
  backoff?: BackoffPolicy;
}

export interface GetEngineOptions {
  signal?: AbortSignal;
}

/**
 * Creates engines through an {@link EngineDriver} and caches them per resolved
 * target. Concurrent first requests for one target share a single connection
 * sequence; the first caller's signal governs it.
 *
 * With `cacheEngines` off every request owns its engine, so each one runs its
 * own connection sequence and nothing is shared between callers.
 */
export class EngineFactory {
  private engines = new Map<string, Engine>();
  private connecting = new SingleFlight<Engine>();
  private logger: Logger;
  private backoff?: BackoffPolicy;

  constructor(
    private driver: EngineDriver,
    options: EngineFactoryOptions = {}
  ) {
    this.logger = options.logger ?? consoleLogger;
    this.backoff = options.backoff;
  }

  async getOrCreateEngine(
    descriptor: ConnectionDescriptor,
    database: string,
    options: GetEngineOptions = {}
  ): Promise<Engine> {
    const key = engineCacheKey(descriptor, database);
    const cached = this.engines.get(key);
    if (cached) {
      return cached;
    }
    if (!descriptor.cacheEngines) {
      return this.connect(descriptor, database, key, options.signal);
    }

    return this.connecting.run(key, () => this.connect(descriptor, database, key, options.signal));
  }

  get(descriptor: ConnectionDescriptor, database: string): Engine | undefined {
    return this.engines.get(engineCacheKey(descriptor, database));
  }

  get size(): number {
    return this.engines.size;
  }

  async dispose(descriptor: ConnectionDescriptor, database: string): Promise<void> {
    const key = engineCacheKey(descriptor, database);
    const engine = this.engines.get(key);
    if (!engine) return;

    this.engines.delete(key);
    await engine.dispose();
    this.logger.debug(`Disposed engine for ${describeTarget(descriptor, database)}`);
  }

  async disposeAll(): Promise<void> {
    const engines = [...this.engines.values()];
    this.engines.clear();

    const results = await Promise.allSettled(engines.map((engine) => engine.dispose()));
    const failures = results.filter((result) => result.status === 'rejected');
    if (failures.length > 0) {
      throw new AggregateError(
        failures.map((failure) => failure.reason),
        `Failed to dispose ${failures.length} of ${engines.length} engines`
      );
    }
  }

  private async connect(
    descriptor: ConnectionDescriptor,
    database: string,
    key: string,
    signal?: AbortSignal
  ): Promise<Engine> {
    const target = describeTarget(descriptor, database);
    this.logger.debug(`Creating engine for ${target}`);

    const engine = this.driver.createEngine(descriptor, database);

    try {
      await withRetry(
        () =>
          withTimeout(
            this.establish(engine, descriptor, database),
            descriptor.connectTimeoutMs,
            `Connection to ${target} timed out after ${descriptor.connectTimeoutMs}ms`
          ),
        {
          maxRetries: descriptor.retry.maxRetries,
          backoff: this.backoff ?? createBackoffPolicy(descriptor.retry.backoff),
          retryableErrors: descriptor.retry.retryableErrors,
          signal,
          logger: this.logger,
          label: `Connecting to ${target}`,
        }
      );
    } catch (error) {
      await engine.dispose().catch((disposeError: unknown) => {
        this.logger.warn(`Failed to dispose engine for ${target}: ${String(disposeError)}`);
      });
      throw error;
    }

    if (descriptor.cacheEngines) {
      this.engines.set(key, engine);
    }
    this.logger.info(`Engine ready for ${target}`);
    return engine;
  }

  private async establish(
    engine: Engine,
    descriptor: ConnectionDescriptor,
    database: string
  ): Promise<void> {
    if (descriptor.autoCreateDatabase) {
      await this.ensureDatabase(descriptor, database);
    }
    await engine.ping();
  }

  private async ensureDatabase(descriptor: ConnectionDescriptor, database: string): Promise<void> {
    if (await this.driver.databaseExists(descriptor, database)) {
      return;
    }

    this.logger.info(`Database "${database}" does not exist, creating it`);
    try {
      await this.driver.createDatabase(descriptor, database);
    } catch (error) {
      if (!this.driver.isDuplicateDatabaseError(error)) {
        throw error;
      }
      this.logger.debug(`Database "${database}" was created concurrently`);
    }
  }
}
