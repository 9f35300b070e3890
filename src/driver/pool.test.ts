import { describe, expect, it } from 'vitest';
import { createConnectionDescriptor } from '../config/descriptor.js';
import { UNPOOLED_IDLE_TIMEOUT_MS, UNPOOLED_MAX_CONNECTIONS, poolSettings } from './pool.js';

const base = { host: 'localhost', username: 'app', password: 'test-secret' };

describe('poolSettings', () => {
  it('should keep connections for reuse when pooling is on', () => {
    const descriptor = createConnectionDescriptor({
      ...base,
      pool: { enabled: true, min: 2, max: 8, idleTimeoutMs: 15000, recycleMs: 60000 },
    });

    expect(poolSettings(descriptor)).toEqual({
      max: 8,
      keepIdle: 2,
      idleTimeoutMs: 15000,
      maxLifetimeMs: 60000,
      reuse: true,
    });
  });

  it('should keep at least one idle connection and drop recycling at zero', () => {
    const descriptor = createConnectionDescriptor({
      ...base,
      pool: { enabled: true, min: 0, recycleMs: 0 },
    });

    expect(poolSettings(descriptor)).toMatchObject({ keepIdle: 1, maxLifetimeMs: null });
  });

  it('should allow concurrent connections but keep none idle when pooling is off', () => {
    const descriptor = createConnectionDescriptor({ ...base, pool: { enabled: false, max: 3 } });

    expect(poolSettings(descriptor)).toEqual({
      max: UNPOOLED_MAX_CONNECTIONS,
      keepIdle: 0,
      idleTimeoutMs: UNPOOLED_IDLE_TIMEOUT_MS,
      maxLifetimeMs: null,
      reuse: false,
    });
  });
});
