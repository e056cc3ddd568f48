import * as path from 'path';
import { Manifest } from '../types/Config';
import { InstallResult } from '../types/Installer';
import { DeploymentRun, ServiceOutcome } from '../types/Run';
import { ServiceState } from '../types/Service';
import { logger } from '../utils/Logger';
import { DeploymentSummary, report } from './DiagnosticReporter';
import { HealthProber } from './health/HealthProber';
import { DependencyInstaller } from './installer/DependencyInstaller';
import { ProcessLauncher } from './launcher/ServiceLauncher';
import { RunStore } from './RunStore';
import { Prober, Sequencer, SequencerDependencies, SequencerEvent } from './Sequencer';
import { ServiceRegistry } from './ServiceRegistry';

export interface DeployOptions {
  signal?: AbortSignal;
  onEvent?: (event: SequencerEvent) => void;
  dependencies?: Partial<SequencerDependencies>;
  store?: RunStore;
}

export interface DeployOutcome {
  run: DeploymentRun;
  previous: DeploymentRun | null;
  setup: InstallResult[];
  summary: DeploymentSummary;
}

export function createDependencies(manifest: Manifest): SequencerDependencies {
  return {
    installer: new DependencyInstaller(manifest.tools),
    prober: new HealthProber(),
    launcher: new ProcessLauncher({
      logDir: manifest.settings.logDir,
      pidDir: path.join(manifest.settings.stateDir, 'pids'),
    }),
  };
}

/**
 * One full deployment: setup tools, the sequenced walk, persistence of the
 * run, and the summary against the previous run.
 *
 * Registry errors (cycles, unknown dependencies) throw before anything is
 * installed or started.
 */
export async function deployStack(
  manifest: Manifest,
  options: DeployOptions = {}
): Promise<DeployOutcome> {
  const registry = new ServiceRegistry(manifest.services);
  const dependencies = { ...createDependencies(manifest), ...options.dependencies };
  const store = options.store ?? new RunStore(manifest.settings.stateDir);
  const previous = await store.loadLast();

  const setup: InstallResult[] = [];
  for (const tool of manifest.setupTools) {
    if (options.signal?.aborted) break;
    setup.push(await dependencies.installer.ensure(tool));
  }

  const sequencer = new Sequencer(registry, dependencies);
  const run = await sequencer.run({
    ...(options.signal && { signal: options.signal }),
    ...(options.onEvent && { onEvent: options.onEvent }),
  });

  await store.save(run);

  return { run, previous, setup, summary: report(run, previous) };
}

/**
 * Probes every declared service once, starting nothing, and reports the
 * result in the shape of a deployment run.
 */
export async function checkLiveStatus(
  manifest: Manifest,
  prober: Prober = new HealthProber(),
  signal?: AbortSignal
): Promise<DeploymentRun> {
  const registry = new ServiceRegistry(manifest.services);
  const startedAt = new Date().toISOString();
  const services: Record<string, ServiceOutcome> = {};

  for (const spec of registry.orderedServices()) {
    const result = await prober.probe({ ...spec.healthCheck, maxAttempts: 1, initialDelayMs: 0 }, signal);

    let state: ServiceState;
    if (result.verdict === 'healthy') {
      state = { status: 'healthy' };
    } else {
      const status = spec.optional ? 'degraded' : 'failed';
      state = { status, reason: result.lastError.message, kind: result.lastError.kind };
    }
    logger.debug(`${spec.name}: ${state.status}`);

    services[spec.name] = {
      name: spec.name,
      state,
      history: [{ status: state.status, at: new Date().toISOString() }],
      probeAttempts: result.attempts,
      startAttempts: 0,
      elapsedMs: result.elapsedMs,
      installs: [],
    };
  }

  return {
    id: `live-${Date.now()}`,
    startedAt,
    finishedAt: new Date().toISOString(),
    cancelled: false,
    registry: [...registry.orderedServices()],
    services,
  };
}
