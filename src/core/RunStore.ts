import * as path from 'path';
import { DeploymentRun } from '../types/Run';
import { errorMessage } from '../utils/errors';
import { FileSystem } from '../utils/FileSystem';
import { logger } from '../utils/Logger';

const LAST_RUN_FILE = 'last-run.json';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Shallow structural check of a run read back from disk.
 */
export function isDeploymentRun(value: unknown): value is DeploymentRun {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.startedAt === 'string' &&
    typeof value.cancelled === 'boolean' &&
    Array.isArray(value.registry) &&
    value.registry.every(spec => isRecord(spec) && typeof spec.name === 'string') &&
    isRecord(value.services) &&
    Object.values(value.services).every(
      outcome => isRecord(outcome) && isRecord(outcome.state) && typeof outcome.state.status === 'string'
    )
  );
}

/**
 * Keeps the most recent finished run on disk so that `stackup status` can
 * report without deploying. Only one run is kept.
 */
export class RunStore {
  private readonly filePath: string;

  constructor(stateDir: string) {
    this.filePath = path.join(stateDir, LAST_RUN_FILE);
  }

  getPath(): string {
    return this.filePath;
  }

  async save(run: DeploymentRun): Promise<void> {
    await FileSystem.writeJsonFile(this.filePath, run);
    logger.debug(`Saved run ${run.id} to ${this.filePath}`);
  }

  async loadLast(): Promise<DeploymentRun | null> {
    let data: unknown;
    try {
      data = await FileSystem.readJsonFile(this.filePath);
    } catch (error) {
      logger.warn(`Ignoring unreadable run record at ${this.filePath}`, errorMessage(error));
      return null;
    }

    if (data === null) {
      return null;
    }

    if (!isDeploymentRun(data)) {
      logger.warn(`Ignoring run record with unexpected shape at ${this.filePath}`);
      return null;
    }
    return data;
  }
}
