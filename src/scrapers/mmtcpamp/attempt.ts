import type { Logger } from '../../logger.js';

export type AttemptResult<T> =
  | { ok: true; value: T }
  | { ok: false; value: T; diagnostic: string };

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message.split('\n')[0] || error.name;
  }
  return String(error);
}

/**
 * Runs `task`, turning any rejection into `fallback` plus a one-line
 * diagnostic naming the step that failed.
 */
export async function attempt<T>(label: string, task: () => Promise<T>, fallback: T): Promise<AttemptResult<T>> {
  try {
    return { ok: true, value: await task() };
  } catch (error) {
    return { ok: false, value: fallback, diagnostic: `${label} failed: ${describeError(error)}` };
  }
}

export async function bestEffort<T>(
  label: string,
  task: () => Promise<T>,
  fallback: T,
  logger: Logger,
  level: 'debug' | 'warn' = 'debug'
): Promise<T> {
  const result = await attempt(label, task, fallback);
  if (!result.ok) {
    logger[level](result.diagnostic);
  }
  return result.value;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
