import { Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import ora from 'ora';
import { formatSummary, report } from '../core/DiagnosticReporter';
import { RunStore } from '../core/RunStore';
import { checkLiveStatus } from '../core/StackDeployer';
import { DeploymentRun } from '../types/Run';
import { configureLogging, hint, loadManifestOrFail, sharedFlags } from '../utils/CommandSupport';
import { StackupError } from '../utils/errors';

export default class Status extends Command {
  static override description = 'Report the health of the stack from the last deployment or a live probe';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --live',
    '<%= config.bin %> <%= command.id %> --json',
  ];

  static override flags = {
    ...sharedFlags,
    live: Flags.boolean({
      char: 'l',
      description: 'Probe every service once now instead of reading the last run',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Status);
    const manifest = await loadManifestOrFail(this, flags.manifest);
    configureLogging(manifest, flags['log-level'], flags.json);

    const store = new RunStore(manifest.settings.stateDir);
    const previous = await store.loadLast();

    let run: DeploymentRun;
    if (flags.live) {
      const spinner = flags.json ? null : ora('Probing services...').start();
      try {
        run = await checkLiveStatus(manifest);
        spinner?.stop();
      } catch (error) {
        spinner?.fail('Probe failed');
        if (error instanceof StackupError) {
          this.error(error.message, { exit: 2 });
        }
        throw error;
      }
    } else if (previous) {
      run = previous;
    } else {
      return this.error(
        `No deployment recorded in ${manifest.settings.stateDir}. Run ${chalk.white('stackup deploy')} first.`,
        { exit: 1 }
      );
    }

    const summary = report(run, flags.live ? previous : null);

    if (flags.json) {
      this.outputJson({
        runId: summary.runId,
        finishedAt: summary.finishedAt ?? null,
        overallHealthy: summary.overallHealthy(),
        services: summary.toJSON(),
      });
    } else {
      this.log(formatSummary(summary, { logDir: manifest.settings.logDir }));
      if (!flags.live) {
        this.log(`\n${hint(`Recorded ${summary.finishedAt ?? 'in an unfinished run'}. Use --live to probe now`)}`);
      }
    }

    if (!summary.overallHealthy()) {
      this.exit(1);
    }
  }

  private outputJson(document: object): void {
    this.log(JSON.stringify(document, null, 2));
  }
}
