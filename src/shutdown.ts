import logger from './logger';

export type ShutdownSignal = 'SIGTERM' | 'SIGINT';

/**
 * Cleanup to run when SIGTERM or SIGINT arrives. Receives the signal name.
 */
export type OnShutdownCallback = (signal: ShutdownSignal) => Promise<void>;

export interface ShutdownOptions {
  /** Exit the process once the callback settles. Defaults to true. */
  exit?: boolean;
  exitCode?: number;
}

/**
 * Register SIGTERM and SIGINT handlers.
 *
 * On signal:
 * 1. Logs the signal received
 * 2. Calls the optional onShutdown callback
 * 3. Exits the process, unless `exit: false`
 *
 * Errors during shutdown are logged but don't prevent exit. Returns a
 * function that removes both handlers.
 */
export const setupShutdownHandlers = (
  onShutdown?: OnShutdownCallback,
  { exit = true, exitCode = 0 }: ShutdownOptions = {}
): (() => void) => {
  const handleSignal = (signal: ShutdownSignal) => {
    return async () => {
      logger.info({ signal }, 'Signal received, shutting down');

      try {
        if (onShutdown) await onShutdown(signal);
      } catch (error) {
        logger.error({ err: error, signal }, 'Error during shutdown');
      }

      if (exit) process.exit(exitCode);
    };
  };

  const onTerm = handleSignal('SIGTERM');
  const onInt = handleSignal('SIGINT');
  process.on('SIGTERM', onTerm);
  process.on('SIGINT', onInt);

  return () => {
    process.off('SIGTERM', onTerm);
    process.off('SIGINT', onInt);
  };
};

/**
 * An AbortSignal that fires on the first SIGINT/SIGTERM, so a running
 * pipeline finishes its current step and stops. A second signal exits
 * immediately.
 */
export const abortOnSignal = (): { signal: AbortSignal; dispose: () => void } => {
  const controller = new AbortController();

  const dispose = setupShutdownHandlers(
    async signal => {
      if (controller.signal.aborted) {
        logger.warn({ signal }, 'Second signal, exiting without waiting for the current step');
        process.exit(130);
      }
      logger.warn({ signal }, 'Stopping after the current step');
      controller.abort();
    },
    { exit: false }
  );

  return { signal: controller.signal, dispose };
};
