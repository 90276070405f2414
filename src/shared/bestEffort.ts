import type { ComponentLogger } from '@/shared/logging/logger';

export type BestEffortOptions<T> = {
  fallback: T;
  onError?: 'ignore' | 'debug';
  label?: string;
  context?: Record<string, unknown>;
  log?: ComponentLogger;
};

/**
 * Normalises a thrown value into a loggable message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function logBestEffortFailure(
  error: unknown,
  options: BestEffortOptions<unknown>,
): void {
  if (options.onError !== 'debug' || !options.log) {
    return;
  }
  options.log.debug(options.label ?? 'best-effort fallback used', {
    ...options.context,
    message: errorMessage(error),
  });
}

/**
 * Runs an optional async step; failures resolve to the fallback.
 */
export async function bestEffort<T>(
  fn: () => Promise<T>,
  options: BestEffortOptions<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    logBestEffortFailure(error, options);
    return options.fallback;
  }
}

export function bestEffortSync<T>(fn: () => T, options: BestEffortOptions<T>): T {
  try {
    return fn();
  } catch (error) {
    logBestEffortFailure(error, options);
    return options.fallback;
  }
}

export function safeJsonParse(
  raw: string,
  options: Omit<BestEffortOptions<unknown>, 'fallback'> = {},
): unknown {
  return bestEffortSync<unknown>(() => JSON.parse(raw), { ...options, fallback: undefined });
}

export async function safeReadText(
  response: { text: () => Promise<string> },
  fallback = '',
  options: Omit<BestEffortOptions<string>, 'fallback'> = {},
): Promise<string> {
  return bestEffort(() => response.text(), { ...options, fallback });
}
