import { CommandSpec } from './Service';

export type InstallResult =
  | { tool: string; status: 'alreadyPresent' }
  | { tool: string; status: 'installed'; via: string }
  | { tool: string; status: 'failed'; reason: string };

export interface ToolRecipe {
  name: string;
  description?: string;
  check: CommandSpec;
  // Tried in order until one succeeds
  install: CommandSpec[];
}

export interface CommandOutcome {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandRunner {
  run(spec: CommandSpec): Promise<CommandOutcome>;
}
