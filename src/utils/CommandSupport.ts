import { Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import { DEFAULT_MANIFEST, ManifestLoader } from '../core/ManifestLoader';
import { Manifest } from '../types/Config';
import { StackupError } from './errors';
import { isLogLevel, LOG_LEVELS, logger } from './Logger';

export const sharedFlags = {
  manifest: Flags.string({
    char: 'm',
    description: 'Path to the stack manifest',
    default: DEFAULT_MANIFEST,
  }),
  'log-level': Flags.string({
    description: 'Log verbosity (overrides STACKUP_LOG_LEVEL and the manifest)',
    options: [...LOG_LEVELS],
  }),
  json: Flags.boolean({
    char: 'j',
    description: 'Print the machine-readable summary only',
    default: false,
  }),
};

/**
 * Level precedence: --log-level, STACKUP_LOG_LEVEL, manifest settings. JSON
 * mode drops to warnings so stdout carries only the document.
 */
export function configureLogging(
  manifest: Manifest,
  flagLevel: string | undefined,
  json: boolean
): void {
  if (isLogLevel(flagLevel)) {
    logger.setLevel(flagLevel);
  } else if (!isLogLevel(process.env.STACKUP_LOG_LEVEL)) {
    logger.setLevel(json ? 'warn' : manifest.settings.logLevel);
  }
}

export async function loadManifestOrFail(command: Command, manifestPath: string): Promise<Manifest> {
  try {
    return await ManifestLoader.load(manifestPath);
  } catch (error) {
    if (error instanceof StackupError) {
      command.error(error.message, { exit: 2 });
    }
    throw error;
  }
}

export function hint(text: string): string {
  return chalk.gray(`💡 ${text}`);
}
