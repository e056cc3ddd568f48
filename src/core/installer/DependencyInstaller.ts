import { CommandRunner, InstallResult, ToolRecipe } from '../../types/Installer';
import { CommandSpec } from '../../types/Service';
import { errorMessage } from '../../utils/errors';
import { logger } from '../../utils/Logger';
import { ProcessUtils } from '../../utils/ProcessUtils';
import { BUILTIN_RECIPES } from './recipes';

const log = logger.child('installer');

export const shellRunner: CommandRunner = {
  run: (spec: CommandSpec) =>
    ProcessUtils.execute(spec.command, spec.args, { shell: spec.shell ?? false }),
};

export function formatCommand(spec: CommandSpec): string {
  return [spec.command, ...spec.args].join(' ');
}

/**
 * Makes sure host tools exist. `ensure` never throws: a missing recipe, a
 * failing install command or a runner error all come back as `failed`.
 */
export class DependencyInstaller {
  private readonly recipes = new Map<string, ToolRecipe>();
  private readonly results = new Map<string, InstallResult>();
  private readonly runner: CommandRunner;

  constructor(extraRecipes: ToolRecipe[] = [], runner: CommandRunner = shellRunner) {
    for (const recipe of [...BUILTIN_RECIPES, ...extraRecipes]) {
      this.recipes.set(recipe.name, recipe);
    }
    this.runner = runner;
  }

  knows(tool: string): boolean {
    return this.recipes.has(tool);
  }

  /**
   * Checks for the tool and installs it when absent. A result is remembered
   * for the lifetime of this installer; `failed` results are retried only
   * through `recheck`.
   */
  async ensure(tool: string): Promise<InstallResult> {
    const cached = this.results.get(tool);
    if (cached) {
      return cached;
    }

    const result = await this.resolve(tool);
    this.results.set(tool, result);
    return result;
  }

  async ensureAll(tools: string[]): Promise<InstallResult[]> {
    const results: InstallResult[] = [];
    for (const tool of new Set(tools)) {
      results.push(await this.ensure(tool));
    }
    return results;
  }

  /**
   * Forgets the cached result and runs `ensure` again. Used when a later stage
   * reports the tool missing although an earlier check passed.
   */
  async recheck(tool: string): Promise<InstallResult> {
    this.results.delete(tool);
    return this.ensure(tool);
  }

  private async resolve(tool: string): Promise<InstallResult> {
    const recipe = this.recipes.get(tool);
    if (!recipe) {
      log.warn(`No install recipe for '${tool}'`);
      return { tool, status: 'failed', reason: `No install recipe for '${tool}'` };
    }

    if (await this.isPresent(recipe)) {
      log.debug(`${tool} already present`);
      return { tool, status: 'alreadyPresent' };
    }

    log.info(`Installing ${recipe.description ?? tool}...`);
    let lastFailure = 'no install commands configured';

    for (const command of recipe.install) {
      const display = formatCommand(command);
      try {
        const outcome = await this.runner.run(command);
        if (outcome.exitCode !== 0) {
          lastFailure = `'${display}' exited with ${outcome.exitCode}${outcome.stderr ? `: ${outcome.stderr.split('\n').pop()}` : ''}`;
          log.warn(`Install command failed for ${tool}, trying next option`, lastFailure);
          continue;
        }
      } catch (error) {
        lastFailure = `'${display}' could not run: ${errorMessage(error)}`;
        log.warn(`Install command failed for ${tool}, trying next option`, lastFailure);
        continue;
      }

      if (await this.isPresent(recipe)) {
        log.success(`Installed ${tool}`);
        return { tool, status: 'installed', via: display };
      }
      lastFailure = `'${display}' succeeded but ${tool} is still missing`;
    }

    log.error(`Could not install ${tool}`, lastFailure);
    return { tool, status: 'failed', reason: lastFailure };
  }

  private async isPresent(recipe: ToolRecipe): Promise<boolean> {
    try {
      const outcome = await this.runner.run(recipe.check);
      return outcome.exitCode === 0;
    } catch (error) {
      log.debug(`Presence check for ${recipe.name} could not run`, errorMessage(error));
      return false;
    }
  }
}
