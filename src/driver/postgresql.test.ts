import { afterEach, describe, expect, it, vi } from 'vitest';
import { type ConnectionDescriptorInput, createConnectionDescriptor } from '../config/descriptor.js';
import { silentLogger } from '../logger.js';
import { UNPOOLED_MAX_CONNECTIONS } from './pool.js';
import { createPostgresEngine } from './postgresql.js';

const { postgresMock } = vi.hoisted(() => ({
  postgresMock: vi.fn((_options: Record<string, unknown>) => ({ end: vi.fn() })),
}));

vi.mock('postgres', () => ({ default: postgresMock }));

function descriptorWith(overrides: Partial<ConnectionDescriptorInput> = {}) {
  return createConnectionDescriptor({
    host: 'db.internal',
    username: 'app',
    password: 'test-secret',
    ...overrides,
  });
}

function lastOptions(): Record<string, unknown> | undefined {
  return postgresMock.mock.calls.at(-1)?.[0];
}

describe('createPostgresEngine', () => {
  afterEach(() => {
    postgresMock.mockClear();
  });

  it('should size the client from the pool settings when pooling is on', () => {
    createPostgresEngine(
      descriptorWith({ pool: { enabled: true, max: 12, idleTimeoutMs: 20000, recycleMs: 120000 } }),
      'orders',
      silentLogger
    );

    expect(lastOptions()).toMatchObject({
      database: 'orders',
      max: 12,
      idle_timeout: 20,
      max_lifetime: 120,
      prepare: true,
    });
  });

  it('should not cap an unpooled engine at one connection', () => {
    createPostgresEngine(descriptorWith({ pool: { enabled: false } }), 'orders', silentLogger);

    expect(lastOptions()).toMatchObject({
      max: UNPOOLED_MAX_CONNECTIONS,
      idle_timeout: 1,
      max_lifetime: null,
      prepare: false,
    });
  });

  it('should set the search path to the default schema', () => {
    createPostgresEngine(descriptorWith({ defaultSchema: 'billing' }), 'orders', silentLogger);

    expect(lastOptions()).toMatchObject({
      connection: { application_name: 'db-session', search_path: 'billing' },
    });
  });

  it('should fall back to the public schema', () => {
    createPostgresEngine(descriptorWith(), 'orders', silentLogger);

    expect(lastOptions()).toMatchObject({ connection: { search_path: 'public' } });
  });
});
