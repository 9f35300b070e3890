import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors.js';
import { TenantContextError } from '../utils/tenant-validation.js';
import {
  createConnectionDescriptor,
  describeTarget,
  engineCacheKey,
  resolveDatabaseName,
} from './descriptor.js';

function captureIssues(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

describe('createConnectionDescriptor', () => {
  it('should fill in defaults for a postgres target', () => {
    const descriptor = createConnectionDescriptor({ host: 'db', username: 'app' });

    expect(descriptor).toMatchObject({
      dialect: 'postgresql',
      port: 5432,
      maintenanceDatabase: 'postgres',
      tenantDatabaseTemplate: '{tenant}__{database}',
      applicationName: 'db-session',
      connectTimeoutMs: 30000,
      autoCreateDatabase: true,
      cacheEngines: true,
      pool: { enabled: false, min: 1, max: 10, idleTimeoutMs: 30000, recycleMs: 300000 },
      retry: {
        maxRetries: 5,
        backoff: { kind: 'exponential', baseDelayMs: 100, maxDelayMs: 5000, jitter: 0.1 },
        retryableErrors: [],
      },
      security: { mode: 'disable', options: {} },
    });
  });

  it('should default the mysql port without a maintenance database', () => {
    const descriptor = createConnectionDescriptor({ dialect: 'mysql', host: 'db', username: 'app' });

    expect(descriptor.port).toBe(3306);
    expect(descriptor.maintenanceDatabase).toBeUndefined();
  });

  it('should freeze the descriptor deeply', () => {
    const descriptor = createConnectionDescriptor({ host: 'db', username: 'app' });

    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(Object.isFrozen(descriptor.pool)).toBe(true);
    expect(Object.isFrozen(descriptor.retry.backoff)).toBe(true);
  });

  it('should list every missing network setting', () => {
    expect(captureIssues(() => createConnectionDescriptor({}))).toEqual([
      'host: host is required for postgresql',
      'username: username is required for postgresql',
    ]);
  });

  it('should report issues in the error message', () => {
    expect(() => createConnectionDescriptor({ host: 'db' })).toThrow(
      'Invalid connection descriptor: username: username is required for postgresql'
    );
  });

  it('should require a directory for sqlite', () => {
    expect(captureIssues(() => createConnectionDescriptor({ dialect: 'sqlite' }))).toEqual([
      'directory: directory is required for sqlite',
    ]);
  });

  it('should reject a pool minimum above the maximum', () => {
    const issues = captureIssues(() =>
      createConnectionDescriptor({ host: 'db', username: 'app', pool: { min: 5, max: 2 } })
    );

    expect(issues).toEqual(['pool.min: pool.min (5) must not exceed pool.max (2)']);
  });

  it('should reject a negative retry count', () => {
    const issues = captureIssues(() =>
      createConnectionDescriptor({ host: 'db', username: 'app', retry: { maxRetries: -1 } })
    );

    expect(issues).toContain('retry.maxRetries: maxRetries must not be negative');
  });

  it('should require both placeholders in the tenant template', () => {
    const issues = captureIssues(() =>
      createConnectionDescriptor({ host: 'db', username: 'app', tenantDatabaseTemplate: '{database}_x' })
    );

    expect(issues).toEqual(['tenantDatabaseTemplate: tenantDatabaseTemplate must contain {tenant}']);
  });

  it('should reject fields of the wrong type', () => {
    expect(() =>
      createConnectionDescriptor({ host: 'db', username: 'app', port: 70000 })
    ).toThrow(ConfigurationError);
  });
});

describe('resolveDatabaseName', () => {
  const descriptor = createConnectionDescriptor({ host: 'db', username: 'app' });

  it('should keep the logical name without a tenant', () => {
    expect(resolveDatabaseName(descriptor, 'orders')).toBe('orders');
  });

  it('should apply the tenant template', () => {
    expect(resolveDatabaseName(descriptor, 'orders', 'acme')).toBe('acme__orders');
  });

  it('should honour a custom template', () => {
    const custom = createConnectionDescriptor({
      host: 'db',
      username: 'app',
      tenantDatabaseTemplate: 'tenant_{tenant}_{database}',
    });

    expect(resolveDatabaseName(custom, 'orders', 'acme')).toBe('tenant_acme_orders');
  });

  it('should reject tenant ids that are not identifier-safe', () => {
    expect(() => resolveDatabaseName(descriptor, 'orders', 'acme;drop')).toThrow(TenantContextError);
  });
});

describe('connection targets', () => {
  const descriptor = createConnectionDescriptor({
    host: 'db',
    username: 'app',
    password: 'test-secret',
  });

  it('should key engines by target and resolved name', () => {
    expect(engineCacheKey(descriptor, 'acme__orders')).toBe('postgresql://db:5432/acme__orders');
  });

  it('should key sqlite engines by directory', () => {
    const sqlite = createConnectionDescriptor({ dialect: 'sqlite', directory: '/data' });

    expect(engineCacheKey(sqlite, 'orders')).toBe('sqlite:///data/orders');
  });

  it('should describe targets without the password', () => {
    expect(describeTarget(descriptor, 'orders')).toBe('postgresql://app@db:5432/orders');
  });
});
