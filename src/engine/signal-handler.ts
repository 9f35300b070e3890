import { withTimeout } from '../driver/retry.js';
import { type Logger, consoleLogger } from '../logger.js';
import type { MaybePromise } from '../types/index.js';

/** Anything owning engines, such as either session manager. */
export interface EngineOwner {
  dispose(): MaybePromise<void>;
}

export interface SignalHandlerOptions {
  timeout?: number;
  exitCodeSuccess?: number;
  exitCodeForced?: number;
  autoExit?: boolean;
  logger?: Logger;
  exit?: (code: number) => void;
  onShutdownStart?: () => void;
  onShutdownComplete?: (result: ShutdownResult) => void;
}

export interface ShutdownResult {
  success: boolean;
  elapsedMs: number;
  error?: unknown;
}

/**
 * Disposes every engine owned by `owner` on SIGTERM or SIGINT. Returns a
 * function that removes the handlers again.
 */
export function registerSignalHandlers(
  owner: EngineOwner,
  options: SignalHandlerOptions = {}
): () => void {
  const {
    timeout = 30000,
    exitCodeSuccess = 0,
    exitCodeForced = 1,
    autoExit = true,
    logger = consoleLogger,
    exit = (code: number) => process.exit(code),
    onShutdownStart,
    onShutdownComplete,
  } = options;

  let shuttingDown = false;

  const handleSignal = async (signal: string) => {
    if (shuttingDown) {
      logger.info(`Already shutting down, ignoring ${signal}`);
      return;
    }

    shuttingDown = true;
    logger.info(`Received ${signal}, disposing engines`);
    onShutdownStart?.();

    const startTime = Date.now();
    let result: ShutdownResult;
    try {
      await withTimeout(
        Promise.resolve(owner.dispose()),
        timeout,
        `Engine disposal did not finish within ${timeout}ms`
      );
      result = { success: true, elapsedMs: Date.now() - startTime };
    } catch (error) {
      logger.error('Error during shutdown:', error);
      result = { success: false, elapsedMs: Date.now() - startTime, error };
    }

    onShutdownComplete?.(result);

    if (autoExit) {
      exit(result.success ? exitCodeSuccess : exitCodeForced);
    }
  };

  const sigterm = () => {
    void handleSignal('SIGTERM');
  };
  const sigint = () => {
    void handleSignal('SIGINT');
  };

  process.on('SIGTERM', sigterm);
  process.on('SIGINT', sigint);

  return () => {
    process.off('SIGTERM', sigterm);
    process.off('SIGINT', sigint);
  };
}
