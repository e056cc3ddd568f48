import chalk from 'chalk';
import * as path from 'path';
import { DeploymentRun, MachineServiceReport, ServiceReport } from '../types/Run';
import { FailureKind, ServiceState, ServiceStatus } from '../types/Service';
import { formatDuration } from '../utils/timing';

export const REMEDIATION_HINTS: Record<FailureKind, string> = {
  'dependency-failed': 'Fix the failed dependency first; this service was never started.',
  'start-failed': 'Check the start command and working directory, then the service log.',
  'command-not-found':
    'The start executable is not on PATH. Install it or add it to the service `requires` list.',
  'connection-refused':
    'Nothing is listening yet. Check the service log for a crash or a different port.',
  'loopback-only':
    'The port is bound to 127.0.0.1 only. Restart the service with HOST=0.0.0.0 (or its bind-address flag) for external access.',
  'http-status':
    'The endpoint answers with an error status. Check the service log and its configuration.',
  'attempt-timeout':
    'The target accepts connections too slowly. Raise the health check `timeout` or check host load.',
  'process-not-found':
    'No matching process is running. It probably exited right after start; see the service log.',
  'probe-timeout':
    'The service never answered. Raise `maxAttempts`/`interval` for slow starters or check the service log.',
  cancelled: 'The deployment was interrupted. Run `stackup deploy` again.',
  unknown: 'Check the service log for details.',
};

const STATE_STYLE: Record<ServiceStatus, (text: string) => string> = {
  pending: chalk.gray,
  installing: chalk.cyan,
  starting: chalk.cyan,
  probing: chalk.cyan,
  healthy: chalk.green,
  degraded: chalk.yellow,
  failed: chalk.red,
  skipped: chalk.gray,
};

const STATE_ICON: Record<ServiceStatus, string> = {
  pending: '…',
  installing: '…',
  starting: '…',
  probing: '…',
  healthy: '✓',
  degraded: '⚠',
  failed: '✗',
  skipped: '⊘',
};

export class DeploymentSummary {
  readonly runId: string;
  readonly finishedAt: string | undefined;
  readonly cancelled: boolean;
  readonly services: readonly ServiceReport[];

  constructor(
    runId: string,
    finishedAt: string | undefined,
    cancelled: boolean,
    services: ServiceReport[]
  ) {
    this.runId = runId;
    this.finishedAt = finishedAt;
    this.cancelled = cancelled;
    this.services = Object.freeze(services);
  }

  /**
   * True iff every non-optional service ended healthy.
   */
  overallHealthy(): boolean {
    return this.services.every(service => service.optional || service.state === 'healthy');
  }

  countByState(): Partial<Record<ServiceStatus, number>> {
    const counts: Partial<Record<ServiceStatus, number>> = {};
    for (const service of this.services) {
      counts[service.state] = (counts[service.state] ?? 0) + 1;
    }
    return counts;
  }

  toJSON(): Record<string, MachineServiceReport> {
    const result: Record<string, MachineServiceReport> = {};
    for (const service of this.services) {
      result[service.name] = {
        state: service.state,
        attempts: service.attempts,
        elapsedMs: service.elapsedMs,
        hint: service.hint ?? null,
      };
    }
    return result;
  }
}

/**
 * Builds the summary of a finished (or snapshotted, or deserialized) run.
 * `previous` adds each service's state from an earlier run for comparison.
 */
export function report(run: DeploymentRun, previous?: DeploymentRun | null): DeploymentSummary {
  const services = run.registry.map((spec): ServiceReport => {
    const outcome = run.services[spec.name];
    const state: ServiceState = outcome?.state ?? { status: 'pending' };
    const previousState = previous?.services[spec.name]?.state.status;

    return {
      name: spec.name,
      state: state.status,
      optional: spec.optional,
      ...('kind' in state && { reason: state.reason, kind: state.kind, hint: REMEDIATION_HINTS[state.kind] }),
      attempts: outcome?.probeAttempts ?? 0,
      startAttempts: outcome?.startAttempts ?? 0,
      elapsedMs: outcome?.elapsedMs ?? 0,
      ...(previousState && { previousState }),
    };
  });

  return new DeploymentSummary(run.id, run.finishedAt, run.cancelled, services);
}

export interface FormatOptions {
  logDir?: string;
}

export function formatSummary(summary: DeploymentSummary, options: FormatOptions = {}): string {
  const lines: string[] = [];
  const nameWidth = Math.max(7, ...summary.services.map(s => s.name.length));

  lines.push(chalk.bold(`Deployment ${summary.runId}`));
  if (summary.cancelled) {
    lines.push(chalk.yellow('⚠ Deployment was cancelled before every service was evaluated'));
  }
  lines.push('');

  for (const service of summary.services) {
    const style = STATE_STYLE[service.state];
    const optional = service.optional ? chalk.gray(' (optional)') : '';
    const previous =
      service.previousState && service.previousState !== service.state
        ? chalk.gray(` (was ${service.previousState})`)
        : '';
    const stats = chalk.gray(
      `${service.attempts} probe(s), ${service.startAttempts} start(s), ${formatDuration(service.elapsedMs)}`
    );

    lines.push(
      `  ${style(`${STATE_ICON[service.state]} ${service.name.padEnd(nameWidth)}`)} ${style(service.state.padEnd(9))} ${stats}${optional}${previous}`
    );

    if (service.reason) {
      lines.push(chalk.gray(`      reason: ${service.reason}`));
    }
    if (service.hint) {
      lines.push(chalk.blue(`      hint:   ${service.hint}`));
    }
    if (options.logDir && service.state !== 'healthy' && service.state !== 'skipped') {
      lines.push(chalk.gray(`      logs:   ${path.join(options.logDir, `${service.name}.log`)}`));
    }
  }

  lines.push('');
  const counts = summary.countByState();
  const tally = Object.entries(counts)
    .map(([state, count]) => `${count} ${state}`)
    .join(', ');

  lines.push(
    summary.overallHealthy()
      ? chalk.green(`✅ Stack is healthy (${tally})`)
      : chalk.red(`❌ Stack is not healthy (${tally})`)
  );

  return lines.join('\n');
}
