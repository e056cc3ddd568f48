import * as path from 'path';
import { randomUUID } from 'crypto';
import { ProbeFailure } from '../types/Health';
import { InstallResult } from '../types/Installer';
import { DeploymentRun, ServiceOutcome } from '../types/Run';
import { FailureKind, ServiceSpec, ServiceState, ServiceStatus, isTerminal } from '../types/Service';
import {
  CancellationRequestedError,
  IllegalTransitionError,
  StartFailureError,
  errorMessage,
} from '../utils/errors';
import { logger } from '../utils/Logger';
import { HealthProber } from './health/HealthProber';
import { DependencyInstaller } from './installer/DependencyInstaller';
import { LaunchHandle, LaunchRequest, ServiceLauncher } from './launcher/ServiceLauncher';
import { ServiceRegistry } from './ServiceRegistry';

export type Prober = Pick<HealthProber, 'probe'>;
export type ToolInstaller = Pick<DependencyInstaller, 'knows' | 'ensure' | 'recheck'>;

export interface SequencerDependencies {
  launcher: ServiceLauncher;
  prober: Prober;
  installer: ToolInstaller;
}

export type SequencerEvent =
  | { type: 'transition'; service: string; state: ServiceState }
  | { type: 'install'; service: string; result: InstallResult }
  | { type: 'launch'; service: string; pid: number; command: string };

export interface RunOptions {
  id?: string;
  signal?: AbortSignal;
  onEvent?: (event: SequencerEvent) => void;
}

// The primary command plus at most one fallback
export const MAX_START_ATTEMPTS = 2;

const TRANSITIONS: Record<ServiceStatus, readonly ServiceStatus[]> = {
  pending: ['installing', 'skipped'],
  installing: ['starting', 'skipped', 'failed', 'degraded'],
  starting: ['probing', 'starting', 'failed', 'degraded'],
  probing: ['healthy', 'starting', 'failed', 'degraded'],
  healthy: [],
  degraded: [],
  failed: [],
  skipped: [],
};

const CANCELLED_REASON = 'deployment cancelled';

const log = logger.child('sequencer');

/**
 * Walks the registry in dependency order, one service at a time: install
 * required tools, launch, probe, fall back once, record the outcome.
 *
 * A failing service never stops the walk; its dependents are skipped and
 * independent services still start. Only an IllegalTransitionError, which
 * means a bug in this class, escapes `run`.
 */
export class Sequencer {
  private readonly registry: ServiceRegistry;
  private readonly deps: SequencerDependencies;
  private current: DeploymentRun | null = null;

  constructor(registry: ServiceRegistry, deps: SequencerDependencies) {
    this.registry = registry;
    this.deps = deps;
  }

  /**
   * Deep copy of the run in progress (or the last finished one).
   */
  snapshot(): DeploymentRun | null {
    return this.current ? structuredClone(this.current) : null;
  }

  async run(options: RunOptions = {}): Promise<DeploymentRun> {
    const ordered = this.registry.orderedServices();
    const run: DeploymentRun = {
      id: options.id ?? randomUUID(),
      startedAt: new Date().toISOString(),
      cancelled: false,
      registry: structuredClone([...ordered]),
      services: {},
    };

    for (const spec of ordered) {
      run.services[spec.name] = {
        name: spec.name,
        state: { status: 'pending' },
        history: [{ status: 'pending', at: run.startedAt }],
        probeAttempts: 0,
        startAttempts: 0,
        elapsedMs: 0,
        installs: [],
      };
    }
    this.current = run;

    log.info(`Deployment ${run.id}: ${ordered.map(s => s.name).join(' → ')}`);

    for (const spec of ordered) {
      const outcome = run.services[spec.name];
      const startedAt = Date.now();

      try {
        await this.deployService(spec, outcome, run, options);
      } catch (error) {
        if (error instanceof IllegalTransitionError) {
          throw error;
        }
        log.error(`Unexpected error while deploying ${spec.name}`, error);
        if (!isTerminal(outcome.state)) {
          this.settleFailure(spec, outcome, { kind: 'unknown', message: errorMessage(error) }, options);
        }
      } finally {
        outcome.elapsedMs = Date.now() - startedAt;
      }
    }

    run.cancelled = options.signal?.aborted ?? false;
    run.finishedAt = new Date().toISOString();
    return structuredClone(run);
  }

  private async deployService(
    spec: ServiceSpec,
    outcome: ServiceOutcome,
    run: DeploymentRun,
    options: RunOptions
  ): Promise<void> {
    const { signal } = options;

    if (signal?.aborted) {
      this.skip(outcome, CANCELLED_REASON, 'cancelled', options);
      return;
    }

    const blocker = this.failedDependency(spec, run);
    if (blocker) {
      this.skip(outcome, `dependency failed: ${blocker}`, 'dependency-failed', options);
      return;
    }

    this.transition(outcome, { status: 'installing' }, options);
    for (const tool of this.toolsFor(spec)) {
      await this.install(spec.name, tool, outcome, options, false);
    }

    if (signal?.aborted) {
      this.skip(outcome, CANCELLED_REASON, 'cancelled', options);
      return;
    }

    try {
      await this.deps.launcher.stopExisting(spec);
    } catch (error) {
      log.warn(`Could not clean up previous ${spec.name} instance`, errorMessage(error));
    }

    const requests = this.launchRequests(spec);
    let failure: ProbeFailure = { kind: 'unknown', message: 'not started' };
    let handle: LaunchHandle | undefined;

    for (const [index, request] of requests.entries()) {
      if (signal?.aborted) {
        if (outcome.startAttempts === 0) {
          this.skip(outcome, CANCELLED_REASON, 'cancelled', options);
        } else {
          this.settleFailure(spec, outcome, { kind: 'cancelled', message: CANCELLED_REASON }, options);
        }
        return;
      }

      if (index > 0) {
        log.warn(`${spec.name}: ${failure.message}; trying fallback start`);
        if (handle) {
          await this.deps.launcher.stop(handle);
          handle = undefined;
        }
      }

      outcome.startAttempts++;
      this.transition(outcome, { status: 'starting', attempt: outcome.startAttempts }, options);

      try {
        handle = await this.deps.launcher.launch(request);
        outcome.pid = handle.pid;
        options.onEvent?.({ type: 'launch', service: spec.name, pid: handle.pid, command: handle.command });
      } catch (error) {
        failure = {
          kind: error instanceof StartFailureError ? error.kind : 'start-failed',
          message: errorMessage(error),
        };
        outcome.lastError = failure.message;
        if (failure.kind === 'command-not-found') {
          await this.reinstallExecutable(spec.name, request, outcome, options);
        }
        continue;
      }

      this.transition(outcome, { status: 'probing', attempt: outcome.startAttempts }, options);

      try {
        const result = await this.deps.prober.probe(spec.healthCheck, signal);
        outcome.probeAttempts += result.attempts;

        if (result.verdict === 'healthy') {
          this.transition(outcome, { status: 'healthy' }, options);
          log.success(`${spec.name} is healthy`);
          return;
        }
        failure = result.lastError;
      } catch (error) {
        if (error instanceof CancellationRequestedError) {
          failure = { kind: 'cancelled', message: CANCELLED_REASON };
          break;
        }
        failure = { kind: 'unknown', message: errorMessage(error) };
      }
      outcome.lastError = failure.message;
    }

    this.settleFailure(spec, outcome, failure, options);
  }

  private launchRequests(spec: ServiceSpec): LaunchRequest[] {
    const requests: LaunchRequest[] = [
      {
        service: spec.name,
        command: spec.start,
        workingDirectory: spec.workingDirectory,
        environment: spec.environment,
      },
    ];

    if (spec.fallback) {
      const { workingDirectory, environment, ...command } = spec.fallback;
      requests.push({
        service: spec.name,
        command,
        workingDirectory: workingDirectory ?? spec.workingDirectory,
        environment: { ...spec.environment, ...environment },
      });
    }

    return requests.slice(0, MAX_START_ATTEMPTS);
  }

  private failedDependency(spec: ServiceSpec, run: DeploymentRun): string | undefined {
    return spec.dependsOn.find(name => {
      const dependency = this.registry.get(name);
      const status = run.services[name]?.state.status;
      return !dependency?.optional && (status === 'failed' || status === 'skipped');
    });
  }

  private toolsFor(spec: ServiceSpec): string[] {
    const tools = [...spec.requires];
    const executable = path.basename(spec.start.command);
    if (!tools.includes(executable) && this.deps.installer.knows(executable)) {
      tools.push(executable);
    }
    return tools;
  }

  private async install(
    service: string,
    tool: string,
    outcome: ServiceOutcome,
    options: RunOptions,
    recheck: boolean
  ): Promise<void> {
    const result = recheck
      ? await this.deps.installer.recheck(tool)
      : await this.deps.installer.ensure(tool);
    outcome.installs.push(result);
    options.onEvent?.({ type: 'install', service, result });

    if (result.status === 'failed') {
      log.warn(`${service}: ${tool} unavailable, starting anyway`, result.reason);
    }
  }

  private async reinstallExecutable(
    service: string,
    request: LaunchRequest,
    outcome: ServiceOutcome,
    options: RunOptions
  ): Promise<void> {
    const executable = path.basename(request.command.command);
    if (this.deps.installer.knows(executable)) {
      await this.install(service, executable, outcome, options, true);
    }
  }

  private skip(
    outcome: ServiceOutcome,
    reason: string,
    kind: FailureKind,
    options: RunOptions
  ): void {
    log.warn(`Skipping ${outcome.name}: ${reason}`);
    this.transition(outcome, { status: 'skipped', reason, kind }, options);
  }

  private settleFailure(
    spec: ServiceSpec,
    outcome: ServiceOutcome,
    failure: ProbeFailure,
    options: RunOptions
  ): void {
    outcome.lastError = failure.message;
    const status = spec.optional ? 'degraded' : 'failed';
    this.transition(outcome, { status, reason: failure.message, kind: failure.kind }, options);

    if (spec.optional) {
      log.warn(`${spec.name} is degraded (optional)`, failure.message);
    } else {
      log.error(`${spec.name} failed`, failure.message);
    }
  }

  private transition(outcome: ServiceOutcome, next: ServiceState, options: RunOptions): void {
    const from = outcome.state.status;
    const allowed = TRANSITIONS[from].includes(next.status);
    const withinRetryBound = next.status !== 'starting' || next.attempt <= MAX_START_ATTEMPTS;

    if (!allowed || !withinRetryBound) {
      throw new IllegalTransitionError(outcome.name, from, next.status);
    }

    outcome.state = next;
    outcome.history.push({
      status: next.status,
      at: new Date().toISOString(),
      ...('reason' in next && { reason: next.reason }),
    });
    options.onEvent?.({ type: 'transition', service: outcome.name, state: next });
  }
}
