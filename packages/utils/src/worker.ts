/**
 * Common worker pattern utilities
 *
 * Provides reusable interval-based worker execution with graceful shutdown.
 */

import { logger } from "./logger";

/**
 * Options for creating an interval-based worker
 */
export interface WorkerOptions {
  /**
   * Name of the worker (for logging)
   */
  name: string;

  /**
   * Interval in milliseconds between runs
   */
  intervalMs: number;

  /**
   * Function to run on each iteration
   */
  runOnce: () => Promise<void>;

  /**
   * Optional cleanup function to run on shutdown
   */
  cleanup?: () => Promise<void> | void;

  /**
   * Optional metadata to log on startup
   */
  startupMetadata?: Record<string, unknown>;

  /**
   * Stop on SIGINT/SIGTERM and exit the process afterwards (default: true)
   */
  handleSignals?: boolean;

  /**
   * Upper bound on waiting for an in-flight iteration during shutdown
   */
  shutdownTimeoutMs?: number;
}

/**
 * Handle returned by createIntervalWorker
 */
export interface IntervalWorker {
  /**
   * Stop scheduling, wait for the in-flight iteration, run cleanup
   */
  stop(): Promise<void>;
  /**
   * Iterations skipped because the previous one was still running
   */
  skippedCount(): number;
}

/**
 * Create and start an interval-based worker
 *
 * This function handles:
 * - Initial run
 * - Periodic execution via setInterval, never overlapping
 * - Graceful shutdown on SIGINT/SIGTERM
 * - Error handling
 *
 * @param options - Worker configuration
 */
export function createIntervalWorker(options: WorkerOptions): IntervalWorker {
  const { name, intervalMs, runOnce, cleanup, startupMetadata } = options;
  const handleSignals = options.handleSignals ?? true;
  const shutdownTimeoutMs = options.shutdownTimeoutMs ?? 5000;

  logger.info(`Starting ${name}`, startupMetadata ?? {});

  // Track running promise to wait for completion during shutdown
  let runningPromise: Promise<void> | null = null;
  let skipped = 0;

  const runOnceSafely = async (): Promise<void> => {
    if (runningPromise) {
      skipped++;
      logger.debug(`${name} iteration skipped (previous still running)`);
      return;
    }
    runningPromise = runOnce().catch((error: unknown) => {
      logger.error(`${name} iteration failed`, { error });
    });
    await runningPromise;
    runningPromise = null;
  };

  // Run immediately
  void runOnceSafely();

  // Run periodically
  const interval = setInterval(() => {
    void runOnceSafely();
  }, intervalMs);

  // Graceful shutdown
  let stopPromise: Promise<void> | null = null;
  const stop = (): Promise<void> => {
    // Prevent multiple shutdown calls
    if (stopPromise) {
      return stopPromise;
    }

    stopPromise = (async () => {
      logger.info(`Shutting down ${name}...`);
      clearInterval(interval);

      // Wait for any running iteration to complete (with timeout)
      if (runningPromise) {
        let timer: ReturnType<typeof setTimeout> | undefined;
        await Promise.race([
          runningPromise,
          new Promise<void>(resolve => {
            timer = setTimeout(resolve, shutdownTimeoutMs);
          }),
        ]);
        clearTimeout(timer);
      }

      if (cleanup) {
        await cleanup();
      }

      logger.info(`${name} shutdown complete`);
    })();

    return stopPromise;
  };

  if (handleSignals) {
    const onSignal = (): void => {
      stop()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error(`${name} shutdown failed`, { error });
          process.exit(1);
        });
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
  }

  logger.info(`${name} running`);

  return {
    stop,
    skippedCount: () => skipped,
  };
}
