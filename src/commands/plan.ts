import { Command } from '@oclif/core';
import chalk from 'chalk';
import { formatCommand } from '../core/installer/DependencyInstaller';
import { ServiceRegistry } from '../core/ServiceRegistry';
import { describeTarget } from '../types/Health';
import { configureLogging, loadManifestOrFail, sharedFlags } from '../utils/CommandSupport';
import { StackupError } from '../utils/errors';

export default class Plan extends Command {
  static override description = 'Validate the manifest and show the startup order without starting anything';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --json',
  ];

  static override flags = {
    ...sharedFlags,
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Plan);
    const manifest = await loadManifestOrFail(this, flags.manifest);
    configureLogging(manifest, flags['log-level'], flags.json);

    let registry: ServiceRegistry;
    try {
      registry = new ServiceRegistry(manifest.services);
    } catch (error) {
      if (error instanceof StackupError) {
        this.error(error.message, { exit: 2 });
      }
      throw error;
    }

    const ordered = registry.orderedServices();

    if (flags.json) {
      this.log(
        JSON.stringify(
          {
            order: ordered.map(spec => spec.name),
            phases: registry.phases().map(phase => phase.map(spec => spec.name)),
          },
          null,
          2
        )
      );
      return;
    }

    this.log(registry.describe());
    this.log('');

    for (const [index, spec] of ordered.entries()) {
      const optional = spec.optional ? chalk.gray(' (optional)') : '';
      this.log(chalk.bold(`${index + 1}. ${spec.name}`) + optional);
      this.log(chalk.gray(`   start:    ${formatCommand(spec.start)}`));
      if (spec.fallback) {
        this.log(chalk.gray(`   fallback: ${formatCommand(spec.fallback)}`));
      }
      this.log(chalk.gray(`   health:   ${describeTarget(spec.healthCheck)}`));
      if (spec.requires.length > 0) {
        this.log(chalk.gray(`   requires: ${spec.requires.join(', ')}`));
      }
    }

    if (manifest.setupTools.length > 0) {
      this.log('');
      this.log(chalk.gray(`Setup tools: ${manifest.setupTools.join(', ')}`));
    }
  }
}
