import {
  describeTarget,
  HealthCheck,
  HealthCheckers,
  ProbeFailure,
  ProbeResult,
} from '../../types/Health';
import { CancellationRequestedError, ProbeError, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/Logger';
import { sleep, throwIfCancelled } from '../../utils/timing';
import { createDefaultCheckers } from './checkers';

type AttemptOutcome = { ok: true } | { ok: false; completed: boolean; failure: ProbeFailure };

const log = logger.child('probe');

/**
 * Bounded-retry readiness polling.
 *
 * At most `maxAttempts` attempts, `intervalMs` apart, each cut off after
 * `timeoutMs`. Holds no state between calls.
 */
export class HealthProber {
  private readonly checkers: HealthCheckers;

  constructor(checkers: HealthCheckers = createDefaultCheckers()) {
    this.checkers = checkers;
  }

  async probe(check: HealthCheck, signal?: AbortSignal): Promise<ProbeResult> {
    const startedAt = Date.now();
    const maxAttempts = Math.max(1, Math.floor(check.maxAttempts));
    const target = describeTarget(check);

    if (check.initialDelayMs) {
      await sleep(check.initialDelayMs, signal);
    }

    let attempts = 0;
    let completedAny = false;
    let lastError: ProbeFailure = { kind: 'unknown', message: 'No probe attempted' };

    while (attempts < maxAttempts) {
      throwIfCancelled(signal);
      attempts++;

      const outcome = await this.attempt(check, signal);
      if (outcome.ok) {
        log.debug(`${target} healthy after ${attempts} attempt(s)`);
        return { verdict: 'healthy', attempts, elapsedMs: Date.now() - startedAt };
      }

      completedAny = completedAny || outcome.completed;
      lastError = outcome.failure;
      log.debug(`${target} attempt ${attempts}/${maxAttempts} failed`, lastError.message);

      if (attempts < maxAttempts) {
        await sleep(check.intervalMs, signal);
      }
    }

    const elapsedMs = Date.now() - startedAt;

    if (!completedAny) {
      return {
        verdict: 'timedOut',
        attempts,
        elapsedMs,
        lastError: {
          kind: 'probe-timeout',
          message: `${target} never answered within ${check.timeoutMs}ms in ${attempts} attempt(s)`,
        },
      };
    }

    return { verdict: 'unhealthy', attempts, elapsedMs, lastError };
  }

  private async attempt(check: HealthCheck, signal?: AbortSignal): Promise<AttemptOutcome> {
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'timeout'>(resolve => {
      timer = setTimeout(() => resolve('timeout'), check.timeoutMs);
    });

    try {
      const result = await Promise.race([
        this.runChecker(check, controller.signal).then(() => 'ok' as const),
        deadline,
      ]);

      if (result === 'timeout') {
        controller.abort();
        return {
          ok: false,
          completed: false,
          failure: {
            kind: 'attempt-timeout',
            message: `${describeTarget(check)} did not answer within ${check.timeoutMs}ms`,
          },
        };
      }

      return { ok: true };
    } catch (error) {
      if (signal?.aborted) {
        throw new CancellationRequestedError();
      }
      const kind = error instanceof ProbeError ? error.kind : 'unknown';
      return { ok: false, completed: true, failure: { kind, message: errorMessage(error) } };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  private runChecker(check: HealthCheck, signal: AbortSignal): Promise<void> {
    switch (check.kind) {
      case 'port-listening':
        return this.checkers['port-listening'](check, signal);
      case 'http-get':
        return this.checkers['http-get'](check, signal);
      case 'process-alive':
        return this.checkers['process-alive'](check, signal);
    }
  }
}
