import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import type { Runtime } from '@/runtime/bootstrap';

const FORCE_EXIT_MS = 8000;

export function registerShutdownHandlers(
  runtime: Runtime,
  log = createLogger('Runtime'),
): void {
  let shuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info('shutdown requested', { signal });

    // Force exit if stopping hangs.
    const forceExit = setTimeout(() => {
      log.warn('shutdown timed out; forcing exit');
      process.exit(1);
    }, FORCE_EXIT_MS);

    let exitCode = 0;
    try {
      await runtime.stop();
    } catch (error) {
      log.error('shutdown failed', { message: errorMessage(error) });
      exitCode = 1;
    }

    clearTimeout(forceExit);
    process.exit(exitCode);
  };

  process.on('SIGINT', (signal) => {
    void shutdown(signal);
  });
  process.on('SIGTERM', (signal) => {
    void shutdown(signal);
  });
}
