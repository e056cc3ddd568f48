import * as fs from 'fs-extra';
import * as path from 'path';
import * as yaml from 'yaml';
import { Manifest, StackupSettings } from '../types/Config';
import { HealthCheck, HealthCheckKind } from '../types/Health';
import { ToolRecipe } from '../types/Installer';
import { CommandSpec, FallbackStart, ServiceSpec } from '../types/Service';
import { ManifestError } from '../utils/errors';
import { FileSystem } from '../utils/FileSystem';
import { isLogLevel, LOG_LEVELS } from '../utils/Logger';
import { parseDuration } from '../utils/timing';

export const DEFAULT_MANIFEST = 'stackup.yml';

const HEALTH_DEFAULTS = {
  intervalMs: 2000,
  maxAttempts: 30,
  timeoutMs: 2000,
};

const HEALTH_KINDS: readonly HealthCheckKind[] = ['port-listening', 'http-get', 'process-alive'];
const SHELL_SYNTAX = /["'`$|&;<>(){}*?~\\]/;

type Fields = Record<string, unknown>;

function isFields(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turns a command written as a string into a CommandSpec. Plain words are
 * split on whitespace; anything using quotes, pipes, redirects or variables
 * is handed to `sh -c` unchanged.
 */
export function parseCommandString(line: string): CommandSpec {
  const trimmed = line.trim();
  if (SHELL_SYNTAX.test(trimmed)) {
    return { command: 'sh', args: ['-c', trimmed] };
  }
  const [command, ...args] = trimmed.split(/\s+/);
  return { command, args };
}

/**
 * Collects every problem in the document instead of stopping at the first.
 */
class ManifestReader {
  readonly problems: string[] = [];

  constructor(private readonly baseDir: string) {}

  fields(value: unknown, where: string): Fields {
    if (value === undefined || value === null) return {};
    if (!isFields(value)) {
      this.problems.push(`${where} must be a mapping`);
      return {};
    }
    return value;
  }

  string(fields: Fields, key: string, where: string): string | undefined {
    const value = fields[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string' || value.trim() === '') {
      this.problems.push(`${where}.${key} must be a non-empty string`);
      return undefined;
    }
    return value;
  }

  requiredString(fields: Fields, key: string, where: string): string {
    const value = this.string(fields, key, where);
    if (value === undefined && fields[key] === undefined) {
      this.problems.push(`${where}.${key} is required`);
    }
    return value ?? '';
  }

  boolean(fields: Fields, key: string, where: string, fallback: boolean): boolean {
    const value = fields[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== 'boolean') {
      this.problems.push(`${where}.${key} must be true or false`);
      return fallback;
    }
    return value;
  }

  positiveInteger(fields: Fields, key: string, where: string, fallback: number): number {
    const value = fields[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
      this.problems.push(`${where}.${key} must be a positive integer`);
      return fallback;
    }
    return value;
  }

  duration(fields: Fields, key: string, where: string, fallback: number): number {
    const value = fields[key];
    if (value === undefined || value === null) return fallback;
    const parsed = typeof value === 'string' || typeof value === 'number' ? parseDuration(value) : null;
    if (parsed === null) {
      this.problems.push(`${where}.${key} must be a duration such as 500ms, 2s or 1m`);
      return fallback;
    }
    return parsed;
  }

  stringList(fields: Fields, key: string, where: string): string[] {
    const value = fields[key];
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
      this.problems.push(`${where}.${key} must be a list of strings`);
      return [];
    }
    return value.filter((item): item is string => typeof item === 'string');
  }

  environment(fields: Fields, key: string, where: string): Record<string, string> {
    const env: Record<string, string> = {};
    for (const [name, value] of Object.entries(this.fields(fields[key], `${where}.${key}`))) {
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        env[name] = String(value);
      } else {
        this.problems.push(`${where}.${key}.${name} must be a string, number or boolean`);
      }
    }
    return env;
  }

  command(value: unknown, where: string): CommandSpec | undefined {
    if (typeof value === 'string' && value.trim() !== '') {
      return parseCommandString(value);
    }
    if (isFields(value)) {
      const command = this.requiredString(value, 'command', where);
      return {
        command,
        args: this.stringList(value, 'args', where),
        ...(value.shell !== undefined && { shell: this.boolean(value, 'shell', where, false) }),
      };
    }
    this.problems.push(`${where} must be a command string or { command, args }`);
    return undefined;
  }

  directory(value: string | undefined): string {
    return value === undefined ? this.baseDir : FileSystem.resolveFrom(this.baseDir, value);
  }

  healthCheck(value: unknown, where: string): HealthCheck | undefined {
    const fields = this.fields(value, where);
    const kind = fields.kind;
    if (typeof kind !== 'string' || !HEALTH_KINDS.some(k => k === kind)) {
      this.problems.push(`${where}.kind must be one of ${HEALTH_KINDS.join(', ')}`);
      return undefined;
    }

    const policy = {
      intervalMs: this.duration(fields, 'interval', where, HEALTH_DEFAULTS.intervalMs),
      maxAttempts: this.positiveInteger(fields, 'maxAttempts', where, HEALTH_DEFAULTS.maxAttempts),
      timeoutMs: this.duration(fields, 'timeout', where, HEALTH_DEFAULTS.timeoutMs),
      initialDelayMs: this.duration(fields, 'initialDelay', where, 0),
    };

    switch (kind) {
      case 'port-listening': {
        const port = fields.port;
        if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535) {
          this.problems.push(`${where}.port must be a port number between 1 and 65535`);
          return undefined;
        }
        const host = this.string(fields, 'host', where);
        return {
          kind,
          port,
          ...(host && { host }),
          requireExternalBinding: this.boolean(fields, 'requireExternalBinding', where, false),
          ...policy,
        };
      }
      case 'http-get': {
        const url = this.requiredString(fields, 'url', where);
        if (url && !/^https?:\/\//.test(url)) {
          this.problems.push(`${where}.url must start with http:// or https://`);
        }
        return { kind, url, ...policy };
      }
      default:
        return { kind: 'process-alive', pattern: this.requiredString(fields, 'pattern', where), ...policy };
    }
  }

  fallback(value: unknown, where: string): FallbackStart | undefined {
    if (value === undefined || value === null) return undefined;
    const fields = isFields(value) && value.command === undefined ? value : undefined;
    const command = this.command(fields ? fields.start : value, fields ? `${where}.start` : where);
    if (!command) return undefined;

    const source = isFields(value) ? value : {};
    const workingDirectory = this.string(source, 'workingDirectory', where);
    return {
      ...command,
      ...(workingDirectory && { workingDirectory: this.directory(workingDirectory) }),
      ...(source.environment !== undefined && {
        environment: this.environment(source, 'environment', where),
      }),
    };
  }

  service(value: unknown, index: number): ServiceSpec | undefined {
    const where = `services[${index}]`;
    const fields = this.fields(value, where);
    const name = this.requiredString(fields, 'name', where);
    const label = name ? `services.${name}` : where;

    const start = this.command(fields.start, `${label}.start`);
    const healthCheck = this.healthCheck(fields.healthCheck, `${label}.healthCheck`);
    const fallback = this.fallback(fields.fallback, `${label}.fallback`);
    const stop = fields.stop === undefined ? undefined : this.command(fields.stop, `${label}.stop`);

    if (!start || !healthCheck) {
      return undefined;
    }

    return {
      name,
      start,
      workingDirectory: this.directory(this.string(fields, 'workingDirectory', label)),
      environment: this.environment(fields, 'environment', label),
      dependsOn: this.stringList(fields, 'dependsOn', label),
      healthCheck,
      ...(fallback && { fallback }),
      optional: this.boolean(fields, 'optional', label, false),
      requires: this.stringList(fields, 'requires', label),
      ...(stop && { stop }),
    };
  }

  tool(name: string, value: unknown): ToolRecipe | undefined {
    const where = `tools.${name}`;
    const fields = this.fields(value, where);
    const check = this.command(fields.check, `${where}.check`);
    const rawInstall = fields.install;
    const installList = Array.isArray(rawInstall) ? rawInstall : rawInstall === undefined ? [] : [rawInstall];
    const install = installList
      .map((entry, i) => this.command(entry, `${where}.install[${i}]`))
      .filter((entry): entry is CommandSpec => entry !== undefined);
    const description = this.string(fields, 'description', where);

    if (!check) return undefined;
    return { name, ...(description && { description }), check, install };
  }

  settings(value: unknown): StackupSettings {
    const fields = this.fields(value, 'settings');
    const level = fields.logLevel ?? 'info';
    if (!isLogLevel(level)) {
      this.problems.push(`settings.logLevel must be one of ${LOG_LEVELS.join(', ')}`);
    }
    const stateDir = this.directory(this.string(fields, 'stateDir', 'settings') ?? '.stackup');
    const logDir = this.string(fields, 'logDir', 'settings');

    return {
      logLevel: isLogLevel(level) ? level : 'info',
      stateDir,
      logDir: logDir ? this.directory(logDir) : path.join(stateDir, 'logs'),
    };
  }
}

/**
 * Parses manifest text. Paths in the document are resolved against the
 * manifest's directory. Throws ManifestError listing every problem found.
 */
export function parseManifest(content: string, manifestPath: string): Manifest {
  const reader = new ManifestReader(path.dirname(path.resolve(manifestPath)));

  let document: unknown;
  try {
    document = yaml.parse(content);
  } catch (error) {
    throw new ManifestError(manifestPath, [
      `not valid YAML: ${error instanceof Error ? error.message : 'Unknown error'}`,
    ]);
  }

  const root = reader.fields(document, 'manifest');
  const settings = reader.settings(root.settings);
  const setupTools = reader.stringList(reader.fields(root.setup, 'setup'), 'tools', 'setup');
  const tools = Object.entries(reader.fields(root.tools, 'tools'))
    .map(([name, value]) => reader.tool(name, value))
    .filter((tool): tool is ToolRecipe => tool !== undefined);

  const rawServices = root.services;
  if (!Array.isArray(rawServices) || rawServices.length === 0) {
    reader.problems.push('services must be a non-empty list');
  }
  const services = (Array.isArray(rawServices) ? rawServices : [])
    .map((service, index) => reader.service(service, index))
    .filter((service): service is ServiceSpec => service !== undefined);

  if (reader.problems.length > 0) {
    throw new ManifestError(manifestPath, reader.problems);
  }

  return {
    path: path.resolve(manifestPath),
    name: reader.string(root, 'name', 'manifest') ?? path.basename(path.dirname(path.resolve(manifestPath))),
    settings,
    setupTools,
    tools,
    services,
  };
}

export class ManifestLoader {
  static async load(manifestPath: string = DEFAULT_MANIFEST): Promise<Manifest> {
    if (!(await fs.pathExists(manifestPath))) {
      throw new ManifestError(manifestPath, ['file not found']);
    }

    const content = await fs.readFile(manifestPath, 'utf8');
    return parseManifest(content, manifestPath);
  }
}
