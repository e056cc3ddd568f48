import { FailureKind } from './Service';

export type HealthCheckKind = 'port-listening' | 'http-get' | 'process-alive';

interface ProbePolicy {
  intervalMs: number;
  maxAttempts: number;
  timeoutMs: number;
  initialDelayMs?: number;
}

export interface PortHealthCheck extends ProbePolicy {
  kind: 'port-listening';
  port: number;
  host?: string;
  // Fail when the port only accepts connections on the loopback interface
  requireExternalBinding?: boolean;
}

export interface HttpHealthCheck extends ProbePolicy {
  kind: 'http-get';
  url: string;
}

export interface ProcessHealthCheck extends ProbePolicy {
  kind: 'process-alive';
  pattern: string;
}

export type HealthCheck = PortHealthCheck | HttpHealthCheck | ProcessHealthCheck;

export interface ProbeFailure {
  kind: FailureKind;
  message: string;
}

export type ProbeResult =
  | { verdict: 'healthy'; attempts: number; elapsedMs: number }
  | { verdict: 'unhealthy'; attempts: number; elapsedMs: number; lastError: ProbeFailure }
  | { verdict: 'timedOut'; attempts: number; elapsedMs: number; lastError: ProbeFailure };

/**
 * Performs a single probe attempt. Resolves when the target is healthy,
 * rejects with a ProbeError describing why it is not.
 */
export type HealthChecker<T extends HealthCheck = HealthCheck> = (
  check: T,
  signal: AbortSignal
) => Promise<void>;

export type HealthCheckers = {
  [K in HealthCheckKind]: HealthChecker<Extract<HealthCheck, { kind: K }>>;
};

export function describeTarget(check: HealthCheck): string {
  switch (check.kind) {
    case 'port-listening':
      return `${check.host ?? '127.0.0.1'}:${check.port}`;
    case 'http-get':
      return check.url;
    case 'process-alive':
      return `process /${check.pattern}/`;
  }
}
