import {
  type ConnectionDescriptor,
  createConnectionDescriptor,
} from '../../src/config/descriptor.js';
import { fixedBackoff } from '../../src/driver/retry.js';
import type { Session, SyncSession } from '../../src/driver/types.js';
import type { HookStatements } from '../../src/hooks/types.js';
import { silentLogger } from '../../src/logger.js';
import { AsyncSessionManager } from '../../src/session/manager.js';
import { SessionManager } from '../../src/session/sync-manager.js';
import type { LifecycleEvent, SessionRequestOptions } from '../../src/session/types.js';
import {
  type MaterializeCall,
  MemoryServer,
  RecordingMaterializer,
  SyncRecordingMaterializer,
  createMemoryEngineDriver,
  createSyncMemoryEngineDriver,
} from './memory-driver.js';

export type Model = 'async' | 'sync';
export type Phase = 'precreate' | 'postcreate';

/** Both session flavours behind promises, so one suite drives either model. */
export interface HarnessSession {
  readonly closed: boolean;
  execute(sql: string): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  close(): Promise<void>;
}

export interface HarnessOptions {
  cacheEngines?: boolean;
  maxRetries?: number;
  autoCreateDatabase?: boolean;
  tables?: readonly string[];
}

export interface Harness {
  model: Model;
  server: MemoryServer;
  events: LifecycleEvent[];
  materializerCalls: MaterializeCall[];
  registerAuto(phase: Phase, databases: string | string[], hook: (tenantId?: string) => HookStatements): void;
  /** Registers a manual hook running `script`'s statements, then throwing `failure` if given. */
  registerManual(
    phase: Phase,
    databases: string | string[],
    script: (tenantId?: string) => readonly string[],
    failure?: Error
  ): void;
  failSchema(error: Error): void;
  getSession(database: string, options?: SessionRequestOptions): Promise<HarnessSession>;
  getEngineDatabase(database: string, options?: SessionRequestOptions): Promise<string>;
  provideSession(database: string, tenantId?: string): Promise<HarnessSession>;
  /** Runs one statement in a scoped session, then throws `error` from the callback. */
  withFailingSession(database: string, statement: string, error: Error): Promise<void>;
  dispose(): Promise<void>;
}

export function memoryDescriptor(options: HarnessOptions = {}): ConnectionDescriptor {
  return createConnectionDescriptor({
    dialect: 'postgresql',
    host: 'localhost',
    username: 'app',
    password: 'test-secret',
    cacheEngines: options.cacheEngines ?? true,
    autoCreateDatabase: options.autoCreateDatabase ?? true,
    retry: { maxRetries: options.maxRetries ?? 3 },
  });
}

function wrapSession(session: Session): HarnessSession {
  return {
    get closed() {
      return session.closed;
    },
    execute: async (sql) => {
      await session.execute(sql);
    },
    commit: () => session.commit(),
    rollback: () => session.rollback(),
    close: () => session.close(),
  };
}

function wrapSyncSession(session: SyncSession): HarnessSession {
  return {
    get closed() {
      return session.closed;
    },
    execute: async (sql) => {
      session.execute(sql);
    },
    commit: async () => session.commit(),
    rollback: async () => session.rollback(),
    close: async () => session.close(),
  };
}

export function createAsyncHarness(options: HarnessOptions = {}): Harness & { manager: AsyncSessionManager } {
  const server = new MemoryServer();
  const events: LifecycleEvent[] = [];
  const materializer = new RecordingMaterializer(options.tables);
  const manager = new AsyncSessionManager(memoryDescriptor(options), {
    driver: createMemoryEngineDriver(server),
    materializer,
    logger: silentLogger,
    backoff: fixedBackoff(0),
    onStateChange: (event) => events.push(event),
  });

  return {
    model: 'async',
    manager,
    server,
    events,
    materializerCalls: materializer.calls,

    registerAuto(phase, databases, hook) {
      if (phase === 'precreate') {
        manager.precreate(databases)(hook);
      } else {
        manager.postcreate(databases)(hook);
      }
    },

    registerManual(phase, databases, script, failure) {
      const hook = async (session: { execute(sql: string): Promise<unknown> }, tenantId?: string) => {
        for (const statement of script(tenantId)) {
          await session.execute(statement);
        }
        if (failure) {
          throw failure;
        }
      };
      if (phase === 'precreate') {
        manager.precreateManual(databases)(hook);
      } else {
        manager.postcreateManual(databases)(hook);
      }
    },

    failSchema(error) {
      manager.useMaterializer({
        materialize: async () => {
          throw error;
        },
      });
    },

    getSession: async (database, requestOptions) =>
      wrapSession(await manager.getSession(database, requestOptions)),

    getEngineDatabase: async (database, requestOptions) =>
      (await manager.getEngine(database, requestOptions)).database,

    provideSession: async (database, tenantId) =>
      wrapSession(await manager.sessionProvider(database)(tenantId)),

    withFailingSession: (database, statement, error) =>
      manager.withSession(database, async (session) => {
        await session.execute(statement);
        throw error;
      }),

    dispose: () => manager.dispose(),
  };
}

export function createSyncHarness(options: HarnessOptions = {}): Harness & { manager: SessionManager } {
  const server = new MemoryServer();
  const events: LifecycleEvent[] = [];
  const materializer = new SyncRecordingMaterializer(options.tables);
  const manager = new SessionManager(memoryDescriptor(options), {
    driver: createSyncMemoryEngineDriver(server),
    materializer,
    logger: silentLogger,
    backoff: fixedBackoff(0),
    onStateChange: (event) => events.push(event),
  });

  return {
    model: 'sync',
    manager,
    server,
    events,
    materializerCalls: materializer.calls,

    registerAuto(phase, databases, hook) {
      if (phase === 'precreate') {
        manager.precreate(databases)(hook);
      } else {
        manager.postcreate(databases)(hook);
      }
    },

    registerManual(phase, databases, script, failure) {
      const hook = (session: { execute(sql: string): unknown }, tenantId?: string) => {
        for (const statement of script(tenantId)) {
          session.execute(statement);
        }
        if (failure) {
          throw failure;
        }
      };
      if (phase === 'precreate') {
        manager.precreateManual(databases)(hook);
      } else {
        manager.postcreateManual(databases)(hook);
      }
    },

    failSchema(error) {
      manager.useMaterializer({
        materialize: () => {
          throw error;
        },
      });
    },

    getSession: async (database, requestOptions) =>
      wrapSyncSession(manager.getSession(database, requestOptions)),

    getEngineDatabase: async (database, requestOptions) =>
      manager.getEngine(database, requestOptions).database,

    provideSession: async (database, tenantId) =>
      wrapSyncSession(manager.sessionProvider(database)(tenantId)),

    withFailingSession: async (database, statement, error) => {
      manager.withSession(database, (session) => {
        session.execute(statement);
        throw error;
      });
    },

    dispose: async () => manager.dispose(),
  };
}

export function createHarness(model: Model, options: HarnessOptions = {}): Harness {
  return model === 'async' ? createAsyncHarness(options) : createSyncHarness(options);
}
