import { CancellationRequestedError } from './errors';

/**
 * Timer-based sleep that rejects with CancellationRequestedError as soon as
 * the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancellationRequestedError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancellationRequestedError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancellationRequestedError();
  }
}

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)\s*(ms|s|m)?$/;
const UNIT_MS: Record<string, number> = { ms: 1, s: 1000, m: 60_000 };

/**
 * Parses `250`, `250ms`, `2s` or `1.5m` into milliseconds. Returns null for
 * anything else.
 */
export function parseDuration(value: string | number): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }

  const match = DURATION_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  return Math.round(parseFloat(match[1]) * UNIT_MS[match[2] ?? 'ms']);
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}
