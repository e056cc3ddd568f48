import { Command } from '@oclif/core';
import chalk from 'chalk';
import ora, { Ora } from 'ora';
import { formatSummary } from '../core/DiagnosticReporter';
import { SequencerEvent } from '../core/Sequencer';
import { DeployOutcome, deployStack } from '../core/StackDeployer';
import { configureLogging, hint, loadManifestOrFail, sharedFlags } from '../utils/CommandSupport';
import { StackupError } from '../utils/errors';
import { logger } from '../utils/Logger';

export default class Deploy extends Command {
  static override description =
    'Install missing tools, start every service in dependency order and verify that each one is healthy';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --manifest ./deploy/stackup.yml',
    '<%= config.bin %> <%= command.id %> --json',
    '<%= config.bin %> <%= command.id %> --log-level debug',
  ];

  static override flags = {
    ...sharedFlags,
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Deploy);
    const manifest = await loadManifestOrFail(this, flags.manifest);
    configureLogging(manifest, flags['log-level'], flags.json);

    const controller = new AbortController();
    const onSignal = (): void => {
      if (!controller.signal.aborted) {
        logger.warn('Cancellation requested, finishing the current step...');
        controller.abort();
      }
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);

    // Live spinner only when the logger is quiet enough not to interleave with it
    const spinner =
      flags.json || logger.getLevel() === 'debug' || logger.getLevel() === 'info'
        ? null
        : ora(`Deploying ${manifest.name}...`).start();

    if (!flags.json) {
      this.log(chalk.blue(`🚀 Deploying ${manifest.services.length} service(s) for '${manifest.name}'\n`));
    }

    let outcome: DeployOutcome;
    try {
      outcome = await deployStack(manifest, {
        signal: controller.signal,
        onEvent: event => this.updateSpinner(spinner, event),
      });
    } catch (error) {
      spinner?.fail('Deployment aborted');
      if (error instanceof StackupError) {
        this.error(error.message, { exit: 2 });
      }
      throw error;
    } finally {
      process.removeListener('SIGINT', onSignal);
      process.removeListener('SIGTERM', onSignal);
    }

    const { summary, setup } = outcome;
    if (summary.overallHealthy()) {
      spinner?.succeed('Deployment finished');
    } else {
      spinner?.fail('Deployment finished with failures');
    }

    if (flags.json) {
      this.log(
        JSON.stringify(
          {
            runId: summary.runId,
            overallHealthy: summary.overallHealthy(),
            cancelled: summary.cancelled,
            services: summary.toJSON(),
          },
          null,
          2
        )
      );
    } else {
      const missingTools = setup.filter(result => result.status === 'failed');
      for (const result of missingTools) {
        this.log(chalk.yellow(`⚠ Setup tool ${result.tool} is unavailable`));
      }
      this.log(`\n${formatSummary(summary, { logDir: manifest.settings.logDir })}`);
      if (!summary.overallHealthy()) {
        this.log(`\n${hint(`Re-run ${chalk.white('stackup status --live')} once the causes above are fixed`)}`);
      }
    }

    if (!summary.overallHealthy()) {
      this.exit(1);
    }
  }

  private updateSpinner(spinner: Ora | null, event: SequencerEvent): void {
    if (!spinner) {
      return;
    }

    switch (event.type) {
      case 'transition':
        spinner.text = `${event.service}: ${event.state.status}`;
        break;
      case 'install':
        spinner.text = `${event.service}: ${event.result.tool} ${event.result.status}`;
        break;
      case 'launch':
        spinner.text = `${event.service}: started pid ${event.pid}`;
        break;
    }
  }
}
