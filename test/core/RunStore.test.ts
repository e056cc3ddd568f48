import * as fs from 'fs-extra';
import * as path from 'path';
import { RunStore, isDeploymentRun } from '../../src/core/RunStore';
import { DeploymentRun } from '../../src/types/Run';
import { cleanupTempDir, createService, createTempDir } from '../setup';

const createRun = (): DeploymentRun => ({
  id: 'run-7',
  startedAt: '2024-05-01T10:00:00.000Z',
  finishedAt: '2024-05-01T10:00:30.000Z',
  cancelled: false,
  registry: [createService('database')],
  services: {
    database: {
      name: 'database',
      state: { status: 'failed', reason: 'connect ECONNREFUSED', kind: 'connection-refused' },
      history: [{ status: 'pending', at: '2024-05-01T10:00:00.000Z' }],
      probeAttempts: 3,
      startAttempts: 1,
      elapsedMs: 30000,
      lastError: 'connect ECONNREFUSED',
      installs: [{ tool: 'docker', status: 'alreadyPresent' }],
      pid: 4242,
    },
  },
});

describe('RunStore', () => {
  let tempDir: string;
  let store: RunStore;

  beforeEach(async () => {
    tempDir = await createTempDir();
    store = new RunStore(path.join(tempDir, '.stackup'));
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('should return null before any run was saved', async () => {
    expect(await store.loadLast()).toBeNull();
  });

  it('should save the run as last-run.json and read it back', async () => {
    const run = createRun();

    await store.save(run);

    expect(store.getPath()).toBe(path.join(tempDir, '.stackup', 'last-run.json'));
    expect(await fs.pathExists(store.getPath())).toBe(true);
    expect(await store.loadLast()).toEqual(run);
  });

  it('should keep only the latest run', async () => {
    await store.save(createRun());
    await store.save({ ...createRun(), id: 'run-8' });

    expect((await store.loadLast())?.id).toBe('run-8');
  });

  it('should ignore a corrupt record', async () => {
    await fs.outputFile(store.getPath(), '{ not json');

    expect(await store.loadLast()).toBeNull();
  });

  it('should ignore a record of another shape', async () => {
    await fs.outputJson(store.getPath(), { id: 'run-1', services: [] });

    expect(await store.loadLast()).toBeNull();
  });

  describe('isDeploymentRun', () => {
    it('should accept a run that went through JSON', () => {
      expect(isDeploymentRun(JSON.parse(JSON.stringify(createRun())))).toBe(true);
    });

    it('should reject outcomes without a state', () => {
      const run = { ...createRun(), services: { database: { name: 'database' } } };

      expect(isDeploymentRun(run)).toBe(false);
    });
  });
});
