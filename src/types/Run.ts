import { InstallResult } from './Installer';
import { FailureKind, ServiceSpec, ServiceState, ServiceStatus } from './Service';

export interface StateChange {
  status: ServiceStatus;
  at: string;
  reason?: string;
}

export interface ServiceOutcome {
  name: string;
  state: ServiceState;
  history: StateChange[];
  probeAttempts: number;
  startAttempts: number;
  elapsedMs: number;
  lastError?: string;
  installs: InstallResult[];
  pid?: number;
}

export interface DeploymentRun {
  id: string;
  startedAt: string;
  finishedAt?: string;
  cancelled: boolean;
  registry: ServiceSpec[];
  services: Record<string, ServiceOutcome>;
}

export interface ServiceReport {
  name: string;
  state: ServiceStatus;
  optional: boolean;
  reason?: string;
  kind?: FailureKind;
  attempts: number;
  startAttempts: number;
  elapsedMs: number;
  hint?: string;
  previousState?: ServiceStatus;
}

export interface MachineServiceReport {
  state: ServiceStatus;
  attempts: number;
  elapsedMs: number;
  hint: string | null;
}
