import { HealthProber } from '../../src/core/health/HealthProber';
import { HealthCheckers, PortHealthCheck } from '../../src/types/Health';
import { CancellationRequestedError, ProbeError } from '../../src/utils/errors';
import { portCheck } from '../setup';

const refused = (): Promise<void> =>
  Promise.reject(new ProbeError('connection-refused', '127.0.0.1:4000: connect ECONNREFUSED'));

const hang = (): Promise<void> => new Promise<void>(() => undefined);

function createProber(portChecker: jest.Mock<Promise<void>, [PortHealthCheck, AbortSignal]>) {
  const checkers: HealthCheckers = {
    'port-listening': portChecker,
    'http-get': jest.fn<Promise<void>, []>().mockResolvedValue(undefined),
    'process-alive': jest.fn<Promise<void>, []>().mockResolvedValue(undefined),
  };
  return new HealthProber(checkers);
}

describe('HealthProber', () => {
  it('should stop after the first healthy attempt', async () => {
    const checker = jest.fn<Promise<void>, [PortHealthCheck, AbortSignal]>().mockResolvedValue(undefined);
    const prober = createProber(checker);

    const result = await prober.probe(portCheck(4000, { maxAttempts: 5 }));

    expect(result.verdict).toBe('healthy');
    expect(result.attempts).toBe(1);
    expect(checker).toHaveBeenCalledTimes(1);
  });

  it('should report healthy after earlier failures', async () => {
    const checker = jest
      .fn<Promise<void>, [PortHealthCheck, AbortSignal]>()
      .mockImplementationOnce(refused)
      .mockImplementationOnce(refused)
      .mockResolvedValue(undefined);
    const prober = createProber(checker);

    const result = await prober.probe(portCheck(4000, { maxAttempts: 5 }));

    expect(result).toEqual({ verdict: 'healthy', attempts: 3, elapsedMs: expect.any(Number) });
    expect(checker).toHaveBeenCalledTimes(3);
  });

  it('should make exactly maxAttempts attempts against a target that never comes up', async () => {
    const checker = jest.fn<Promise<void>, [PortHealthCheck, AbortSignal]>().mockImplementation(refused);
    const prober = createProber(checker);

    const result = await prober.probe(portCheck(4000, { maxAttempts: 3 }));

    expect(checker).toHaveBeenCalledTimes(3);
    expect(result.verdict).toBe('unhealthy');
    expect(result.attempts).toBe(3);
    if (result.verdict !== 'healthy') {
      expect(result.lastError).toEqual({
        kind: 'connection-refused',
        message: '127.0.0.1:4000: connect ECONNREFUSED',
      });
    }
  });

  it('should wait the interval between attempts but not after the last', async () => {
    const checker = jest.fn<Promise<void>, [PortHealthCheck, AbortSignal]>().mockImplementation(refused);
    const prober = createProber(checker);

    const startedAt = Date.now();
    const result = await prober.probe(portCheck(4000, { maxAttempts: 3, intervalMs: 1000 }));
    const elapsed = Date.now() - startedAt;

    expect(result.attempts).toBe(3);
    expect(elapsed).toBeGreaterThanOrEqual(1950);
    expect(elapsed).toBeLessThan(4000);
  });

  it('should honour the initial delay before the first attempt', async () => {
    const checker = jest.fn<Promise<void>, [PortHealthCheck, AbortSignal]>().mockResolvedValue(undefined);
    const prober = createProber(checker);

    const startedAt = Date.now();
    await prober.probe(portCheck(4000, { initialDelayMs: 200 }));

    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(190);
  });

  it('should report timedOut when no attempt ever answered', async () => {
    const checker = jest.fn<Promise<void>, [PortHealthCheck, AbortSignal]>().mockImplementation(hang);
    const prober = createProber(checker);

    const result = await prober.probe(portCheck(4000, { maxAttempts: 2, timeoutMs: 20 }));

    expect(result.verdict).toBe('timedOut');
    expect(result.attempts).toBe(2);
    if (result.verdict === 'timedOut') {
      expect(result.lastError).toEqual({
        kind: 'probe-timeout',
        message: '127.0.0.1:4000 never answered within 20ms in 2 attempt(s)',
      });
    }
  });

  it('should report unhealthy when some attempts answered and the last timed out', async () => {
    const checker = jest
      .fn<Promise<void>, [PortHealthCheck, AbortSignal]>()
      .mockImplementationOnce(refused)
      .mockImplementation(hang);
    const prober = createProber(checker);

    const result = await prober.probe(portCheck(4000, { maxAttempts: 2, timeoutMs: 20 }));

    expect(result.verdict).toBe('unhealthy');
    if (result.verdict === 'unhealthy') {
      expect(result.lastError.kind).toBe('attempt-timeout');
      expect(result.lastError.message).toBe('127.0.0.1:4000 did not answer within 20ms');
    }
  });

  it('should abort the checker signal when an attempt times out', async () => {
    let seen: AbortSignal | undefined;
    const checker = jest
      .fn<Promise<void>, [PortHealthCheck, AbortSignal]>()
      .mockImplementation((_check, signal) => {
        seen = signal;
        return hang();
      });
    const prober = createProber(checker);

    await prober.probe(portCheck(4000, { maxAttempts: 1, timeoutMs: 20 }));

    expect(seen?.aborted).toBe(true);
  });

  it('should treat a non-positive maxAttempts as a single attempt', async () => {
    const checker = jest.fn<Promise<void>, [PortHealthCheck, AbortSignal]>().mockImplementation(refused);
    const prober = createProber(checker);

    const result = await prober.probe(portCheck(4000, { maxAttempts: 0 }));

    expect(result.attempts).toBe(1);
    expect(checker).toHaveBeenCalledTimes(1);
  });

  it('should map unexpected checker errors to unknown', async () => {
    const checker = jest
      .fn<Promise<void>, [PortHealthCheck, AbortSignal]>()
      .mockRejectedValue(new Error('socket hang up'));
    const prober = createProber(checker);

    const result = await prober.probe(portCheck(4000, { maxAttempts: 1 }));

    expect(result.verdict).toBe('unhealthy');
    if (result.verdict === 'unhealthy') {
      expect(result.lastError).toEqual({ kind: 'unknown', message: 'socket hang up' });
    }
  });

  describe('cancellation', () => {
    it('should reject when the signal is already aborted', async () => {
      const checker = jest.fn<Promise<void>, [PortHealthCheck, AbortSignal]>().mockResolvedValue(undefined);
      const prober = createProber(checker);
      const controller = new AbortController();
      controller.abort();

      await expect(prober.probe(portCheck(4000), controller.signal)).rejects.toBeInstanceOf(
        CancellationRequestedError
      );
      expect(checker).not.toHaveBeenCalled();
    });

    it('should stop waiting between attempts once cancelled', async () => {
      const checker = jest.fn<Promise<void>, [PortHealthCheck, AbortSignal]>().mockImplementation(refused);
      const prober = createProber(checker);
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 50);

      const startedAt = Date.now();
      await expect(
        prober.probe(portCheck(4000, { maxAttempts: 10, intervalMs: 5000 }), controller.signal)
      ).rejects.toBeInstanceOf(CancellationRequestedError);

      expect(Date.now() - startedAt).toBeLessThan(2000);
      expect(checker).toHaveBeenCalledTimes(1);
    });
  });
});
