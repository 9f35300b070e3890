import type { ConnectionDescriptor } from '../config/descriptor.js';

/** Connection ceiling for engines created with pooling switched off. */
export const UNPOOLED_MAX_CONNECTIONS = 100;

/** How long an unpooled connection may sit idle before it is closed. */
export const UNPOOLED_IDLE_TIMEOUT_MS = 1000;

export interface PoolSettings {
  /** Upper bound on open connections; concurrent sessions beyond it wait. */
  max: number;
  /** Idle connections kept open once the idle timeout has passed. */
  keepIdle: number;
  idleTimeoutMs: number;
  /** `null` lets a connection live until it goes idle. */
  maxLifetimeMs: number | null;
  /** Whether connections (and their prepared statements) outlive one checkout. */
  reuse: boolean;
}

/**
 * Maps the descriptor's pooling switch onto client settings. Switched off,
 * the engine still opens one connection per concurrent session, but closes
 * each shortly after it is returned instead of keeping it for reuse.
 */
export function poolSettings(descriptor: ConnectionDescriptor): PoolSettings {
  const { pool } = descriptor;

  if (!pool.enabled) {
    return {
      max: UNPOOLED_MAX_CONNECTIONS,
      keepIdle: 0,
      idleTimeoutMs: UNPOOLED_IDLE_TIMEOUT_MS,
      maxLifetimeMs: null,
      reuse: false,
    };
  }

  return {
    max: pool.max,
    keepIdle: Math.max(pool.min, 1),
    idleTimeoutMs: pool.idleTimeoutMs,
    maxLifetimeMs: pool.recycleMs > 0 ? pool.recycleMs : null,
    reuse: true,
  };
}
