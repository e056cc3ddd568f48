import { HealthCheck } from './Health';

export interface CommandSpec {
  command: string;
  args: string[];
  shell?: boolean;
}

export interface FallbackStart extends CommandSpec {
  workingDirectory?: string;
  environment?: Record<string, string>;
}

export interface ServiceSpec {
  name: string;
  start: CommandSpec;
  workingDirectory: string;
  environment: Record<string, string>;
  dependsOn: string[];
  healthCheck: HealthCheck;
  fallback?: FallbackStart;
  optional: boolean;
  requires: string[];
  stop?: CommandSpec;
}

export type FailureKind =
  | 'dependency-failed'
  | 'start-failed'
  | 'command-not-found'
  | 'connection-refused'
  | 'loopback-only'
  | 'http-status'
  | 'attempt-timeout'
  | 'process-not-found'
  | 'probe-timeout'
  | 'cancelled'
  | 'unknown';

export type ServiceState =
  | { status: 'pending' }
  | { status: 'installing' }
  | { status: 'starting'; attempt: number }
  | { status: 'probing'; attempt: number }
  | { status: 'healthy' }
  | { status: 'degraded'; reason: string; kind: FailureKind }
  | { status: 'failed'; reason: string; kind: FailureKind }
  | { status: 'skipped'; reason: string; kind: FailureKind };

export type ServiceStatus = ServiceState['status'];

export type TerminalState = Extract<
  ServiceState,
  { status: 'healthy' | 'degraded' | 'failed' | 'skipped' }
>;

export const TERMINAL_STATUSES: readonly ServiceStatus[] = [
  'healthy',
  'degraded',
  'failed',
  'skipped',
];

export function isTerminal(state: ServiceState): state is TerminalState {
  return TERMINAL_STATUSES.includes(state.status);
}
