import { setTimeout as sleep } from 'node:timers/promises';
import type { BackoffSettings } from '../config/descriptor.js';
import { ConnectionError, OperationCancelledError, describeCause } from '../errors.js';
import { type Logger, consoleLogger } from '../logger.js';

/**
 * Delay in milliseconds before retry number `retry` (1 for the wait after the
 * first failed attempt).
 */
export type BackoffPolicy = (retry: number) => number;

export interface RetryConfig {
  maxRetries?: number;
  backoff?: BackoffPolicy;
  retryableErrors?: readonly string[];
  signal?: AbortSignal;
  logger?: Logger;
  label?: string;
}

const DEFAULT_RETRYABLE_ERRORS = [
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ECONNRESET',
  'EPIPE',
  'ENOTCONN',
  'EAI_AGAIN',
  'CONNECT_TIMEOUT',
  '57P01',
  '57P02',
  '57P03',
  'PROTOCOL_CONNECTION_LOST',
  'ER_CON_COUNT_ERROR',
  'SQLITE_BUSY',
];

export function isRetryableError(error: unknown, customErrors: readonly string[] = []): boolean {
  const allErrors = [...DEFAULT_RETRYABLE_ERRORS, ...customErrors];

  if (error instanceof Error) {
    const errorCode = (error as Error & { code?: unknown }).code;
    const errorMessage = error.message;

    return allErrors.some((code) => errorCode === code || errorMessage.includes(code));
  }
  return false;
}

export function exponentialBackoff(
  options: { baseDelayMs?: number; maxDelayMs?: number; jitter?: number } = {}
): BackoffPolicy {
  const baseDelayMs = options.baseDelayMs ?? 100;
  const maxDelayMs = options.maxDelayMs ?? 5000;
  const jitter = options.jitter ?? 0.1;

  return (retry) => {
    const delay = Math.min(baseDelayMs * 2 ** (retry - 1), maxDelayMs);
    return delay + Math.random() * delay * jitter;
  };
}

export function fixedBackoff(delayMs: number): BackoffPolicy {
  return () => delayMs;
}

export function createBackoffPolicy(settings: BackoffSettings): BackoffPolicy {
  switch (settings.kind) {
    case 'exponential':
      return exponentialBackoff(settings);
    case 'fixed':
      return fixedBackoff(settings.delayMs);
  }
}

class TimeoutError extends Error {
  readonly code = 'ETIMEDOUT';

  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, message: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(message)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

interface AttemptFailure {
  attempt: number;
  maxRetries: number;
  error: unknown;
  config: RetryConfig;
}

/**
 * Returns the delay before the next attempt, or throws the final
 * `ConnectionError` when the failure is permanent or attempts are used up.
 */
function nextDelay({ attempt, maxRetries, error, config }: AttemptFailure): number {
  const label = config.label ?? 'Operation';

  if (!isRetryableError(error, config.retryableErrors)) {
    throw new ConnectionError(`${label} failed with a non-transient error: ${describeCause(error)}`, {
      attempts: attempt,
      transient: false,
      cause: error,
    });
  }

  if (attempt > maxRetries) {
    throw new ConnectionError(`${label} failed after ${attempt} attempts: ${describeCause(error)}`, {
      attempts: attempt,
      transient: true,
      cause: error,
    });
  }

  const delay = (config.backoff ?? exponentialBackoff())(attempt);
  (config.logger ?? consoleLogger).warn(
    `Connection error (attempt ${attempt}/${maxRetries + 1}), retrying in ${Math.round(delay)}ms: ${describeCause(error)}`
  );
  return delay;
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  config: RetryConfig = {}
): Promise<T> {
  const maxRetries = config.maxRetries ?? 3;

  for (let attempt = 1; ; attempt++) {
    if (config.signal?.aborted) {
      throw new OperationCancelledError('EngineReady', config.signal.reason);
    }

    try {
      return await operation(attempt);
    } catch (error) {
      const delay = nextDelay({ attempt, maxRetries, error, config });
      try {
        await sleep(delay, undefined, { signal: config.signal });
      } catch (abortError) {
        throw new OperationCancelledError('EngineReady', abortError);
      }
    }
  }
}

const sleepCell = new Int32Array(new SharedArrayBuffer(4));

export function sleepSync(ms: number): void {
  if (ms > 0) {
    Atomics.wait(sleepCell, 0, 0, ms);
  }
}

/**
 * Blocking variant of {@link withRetry}; waits between attempts block the
 * calling thread.
 */
export function withRetrySync<T>(operation: (attempt: number) => T, config: RetryConfig = {}): T {
  const maxRetries = config.maxRetries ?? 3;

  for (let attempt = 1; ; attempt++) {
    if (config.signal?.aborted) {
      throw new OperationCancelledError('EngineReady', config.signal.reason);
    }

    try {
      return operation(attempt);
    } catch (error) {
      sleepSync(nextDelay({ attempt, maxRetries, error, config }));
    }
  }
}
