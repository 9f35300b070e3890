import {
  type ConnectionDescriptor,
  describeTarget,
  engineCacheKey,
} from '../config/descriptor.js';
import { type BackoffPolicy, createBackoffPolicy, withRetrySync } from '../driver/retry.js';
import type { SyncEngine, SyncEngineDriver } from '../driver/types.js';
import { ConnectionError } from '../errors.js';
import { type Logger, consoleLogger } from '../logger.js';
import type { EngineFactoryOptions, GetEngineOptions } from './factory.js';

/**
 * Blocking counterpart of {@link EngineFactory}. Connection attempts run on the
 * calling thread, so the only way to reach a key under construction is
 * re-entrantly (from a hook), which is rejected.
 */
export class SyncEngineFactory {
  private engines = new Map<string, SyncEngine>();
  private connecting = new Set<string>();
  private logger: Logger;
  private backoff?: BackoffPolicy;

  constructor(
    private driver: SyncEngineDriver,
    options: EngineFactoryOptions = {}
  ) {
    this.logger = options.logger ?? consoleLogger;
    this.backoff = options.backoff;
  }

  getOrCreateEngine(
    descriptor: ConnectionDescriptor,
    database: string,
    options: GetEngineOptions = {}
  ): SyncEngine {
    const key = engineCacheKey(descriptor, database);
    const cached = this.engines.get(key);
    if (cached) {
      return cached;
    }

    if (this.connecting.has(key)) {
      throw new ConnectionError(
        `Engine for ${describeTarget(descriptor, database)} requested while it is being created`,
        { attempts: 0, transient: false }
      );
    }

    this.connecting.add(key);
    try {
      return this.connect(descriptor, database, key, options.signal);
    } finally {
      this.connecting.delete(key);
    }
  }

  get(descriptor: ConnectionDescriptor, database: string): SyncEngine | undefined {
    return this.engines.get(engineCacheKey(descriptor, database));
  }

  get size(): number {
    return this.engines.size;
  }

  dispose(descriptor: ConnectionDescriptor, database: string): void {
    const key = engineCacheKey(descriptor, database);
    const engine = this.engines.get(key);
    if (!engine) return;

    this.engines.delete(key);
    engine.dispose();
    this.logger.debug(`Disposed engine for ${describeTarget(descriptor, database)}`);
  }

  disposeAll(): void {
    const engines = [...this.engines.values()];
    this.engines.clear();

    const failures: unknown[] = [];
    for (const engine of engines) {
      try {
        engine.dispose();
      } catch (error) {
        failures.push(error);
      }
    }
    if (failures.length > 0) {
      throw new AggregateError(failures, `Failed to dispose ${failures.length} of ${engines.length} engines`);
    }
  }

  private connect(
    descriptor: ConnectionDescriptor,
    database: string,
    key: string,
    signal?: AbortSignal
  ): SyncEngine {
    const target = describeTarget(descriptor, database);
    this.logger.debug(`Creating engine for ${target}`);

    const engine = this.driver.createEngine(descriptor, database);

    try {
      withRetrySync(
        () => {
          if (descriptor.autoCreateDatabase) {
            this.ensureDatabase(descriptor, database);
          }
          engine.ping();
        },
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
      try {
        engine.dispose();
      } catch (disposeError) {
        this.logger.warn(`Failed to dispose engine for ${target}: ${String(disposeError)}`);
      }
      throw error;
    }

    if (descriptor.cacheEngines) {
      this.engines.set(key, engine);
    }
    this.logger.info(`Engine ready for ${target}`);
    return engine;
  }

  private ensureDatabase(descriptor: ConnectionDescriptor, database: string): void {
    if (this.driver.databaseExists(descriptor, database)) {
      return;
    }

    this.logger.info(`Database "${database}" does not exist, creating it`);
    try {
      this.driver.createDatabase(descriptor, database);
    } catch (error) {
      if (!this.driver.isDuplicateDatabaseError(error)) {
        throw error;
      }
      this.logger.debug(`Database "${database}" was created concurrently`);
    }
  }
}
