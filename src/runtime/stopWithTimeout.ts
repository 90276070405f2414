import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';

export type StopResult =
  | { kind: 'stopped' }
  | { kind: 'timeout' }
  | { kind: 'error'; error: unknown };

type StopLogger = Pick<ReturnType<typeof createLogger>, 'info' | 'warn' | 'error'>;

/**
 * Races a service stop against a deadline. A late failure after the
 * deadline is still logged once it settles.
 */
export async function stopWithTimeout(
  name: string,
  stopFn: () => Promise<void>,
  timeoutMs: number,
  log: StopLogger = createLogger('Runtime'),
): Promise<StopResult> {
  let timeoutHandle: NodeJS.Timeout | null = null;
  const stopPromise = (async (): Promise<StopResult> => {
    try {
      await stopFn();
      return { kind: 'stopped' };
    } catch (error) {
      return { kind: 'error', error };
    }
  })();
  const timeoutPromise = new Promise<StopResult>((resolve) => {
    timeoutHandle = setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs);
  });

  const result = await Promise.race([stopPromise, timeoutPromise]).finally(() => {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  });

  if (result.kind === 'stopped') {
    log.info(`service ${name} stopped`);
    return result;
  }

  if (result.kind === 'timeout') {
    log.warn(`service ${name} stop timed out`, { timeoutMs });
    void stopPromise.then((finalResult) => {
      if (finalResult.kind === 'error') {
        log.error(`failed to stop ${name}`, { message: errorMessage(finalResult.error) });
      }
    });
    return result;
  }

  log.error(`failed to stop ${name}`, { message: errorMessage(result.error) });
  return result;
}
