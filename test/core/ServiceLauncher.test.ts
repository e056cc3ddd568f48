import * as fs from 'fs-extra';
import * as path from 'path';
import { LaunchHandle, ProcessLauncher, targetPort } from '../../src/core/launcher/ServiceLauncher';
import { HttpHealthCheck } from '../../src/types/Health';
import { StartFailureError } from '../../src/utils/errors';
import { FileSystem } from '../../src/utils/FileSystem';
import { ProcessUtils } from '../../src/utils/ProcessUtils';
import { cleanupTempDir, createService, createTempDir, portCheck } from '../setup';

const waitFor = async (condition: () => Promise<boolean>, timeoutMs = 3000): Promise<boolean> => {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (await condition()) {
      return true;
    }
    await new Promise(resolve => setTimeout(resolve, 25));
  }
  return false;
};

const IDLE_SCRIPT = 'setTimeout(() => {}, 30000)';

const spawnIdle = async (): Promise<number> => {
  const child = await ProcessUtils.spawnDetached(process.execPath, ['-e', IDLE_SCRIPT]);
  if (child.pid === undefined) {
    throw new Error('idle process has no PID');
  }
  return child.pid;
};

const killIfRunning = (pid: number | undefined): void => {
  if (pid !== undefined && ProcessUtils.isProcessRunning(pid)) {
    process.kill(pid);
  }
};

const httpCheck = (url: string): HttpHealthCheck => ({
  kind: 'http-get',
  url,
  intervalMs: 10,
  maxAttempts: 3,
  timeoutMs: 100,
});

describe('ProcessLauncher', () => {
  let tempDir: string;
  let launcher: ProcessLauncher;

  beforeEach(async () => {
    tempDir = await createTempDir();
    launcher = new ProcessLauncher({
      logDir: path.join(tempDir, 'logs'),
      pidDir: path.join(tempDir, 'pids'),
      settleMs: 0,
    });
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await cleanupTempDir(tempDir);
  });

  it('should place log and pid files per service', () => {
    expect(launcher.logFileFor('backend')).toBe(path.join(tempDir, 'logs', 'backend.log'));
    expect(launcher.pidFileFor('backend')).toBe(path.join(tempDir, 'pids', 'backend.pid'));
  });

  it('should start a detached process with its output in the service log', async () => {
    let handle: LaunchHandle | undefined;
    try {
      handle = await launcher.launch({
        service: 'echo',
        command: {
          command: process.execPath,
          args: ['-e', 'console.log(process.env.GREETING); setTimeout(() => {}, 5000)'],
        },
        workingDirectory: tempDir,
        environment: { GREETING: 'hello from echo' },
      });

      expect(handle.service).toBe('echo');
      expect(await fs.readFile(launcher.pidFileFor('echo'), 'utf8')).toBe(`${handle.pid}\n${handle.command}\n`);

      const logged = await waitFor(async () => {
        const content = await fs.readFile(launcher.logFileFor('echo'), 'utf8');
        return content.includes('hello from echo');
      });
      expect(logged).toBe(true);

      await launcher.stop(handle);
    } finally {
      if (handle && ProcessUtils.isProcessRunning(handle.pid)) {
        process.kill(handle.pid);
      }
    }
  });

  it('should fail with start-failed when the working directory is missing', async () => {
    const missing = path.join(tempDir, 'nope');

    await expect(
      launcher.launch({
        service: 'api',
        command: { command: 'true', args: [] },
        workingDirectory: missing,
        environment: {},
      })
    ).rejects.toMatchObject({
      kind: 'start-failed',
      message: `Failed to start api: working directory ${missing} does not exist`,
    });
  });

  it('should fail with command-not-found for an unknown executable', async () => {
    const attempt = launcher.launch({
      service: 'api',
      command: { command: 'stackup-no-such-binary', args: ['--serve'] },
      workingDirectory: tempDir,
      environment: {},
    });

    await expect(attempt).rejects.toBeInstanceOf(StartFailureError);
    await expect(attempt).rejects.toMatchObject({ kind: 'command-not-found' });
    expect(await fs.pathExists(launcher.pidFileFor('api'))).toBe(false);
  });

  it('should run the stop command and tolerate a stale pid file', async () => {
    const marker = path.join(tempDir, 'stopped');
    await fs.outputFile(launcher.pidFileFor('api'), 'not-a-pid\n');

    await launcher.stopExisting(
      createService('api', {
        workingDirectory: tempDir,
        healthCheck: portCheck(1),
        stop: {
          command: process.execPath,
          args: ['-e', `require('fs').writeFileSync(${JSON.stringify(marker)}, 'done')`],
        },
      })
    );

    expect(await fs.readFile(marker, 'utf8')).toBe('done');
  });

  it('should keep the running process when the PID file cannot be written', async () => {
    jest.spyOn(FileSystem, 'writeTextFile').mockRejectedValueOnce(new Error('disk full'));
    let handle: LaunchHandle | undefined;
    try {
      handle = await launcher.launch({
        service: 'worker',
        command: { command: process.execPath, args: ['-e', IDLE_SCRIPT] },
        workingDirectory: tempDir,
        environment: {},
      });

      expect(handle.command).toBe(`${process.execPath} -e ${IDLE_SCRIPT}`);
      expect(ProcessUtils.isProcessRunning(handle.pid)).toBe(true);
      expect(await fs.pathExists(launcher.pidFileFor('worker'))).toBe(false);
    } finally {
      killIfRunning(handle?.pid);
    }
  });

  describe('stopExisting', () => {
    it('should stop the process holding the port of an http check', async () => {
      const pid = await spawnIdle();
      const lookup = jest.spyOn(ProcessUtils, 'findProcessByPort').mockResolvedValue(pid);
      try {
        await launcher.stopExisting(
          createService('backend', {
            workingDirectory: tempDir,
            healthCheck: httpCheck('http://127.0.0.1:47123/health'),
          })
        );

        expect(lookup).toHaveBeenCalledWith(47123);
        expect(await waitFor(async () => !ProcessUtils.isProcessRunning(pid))).toBe(true);
      } finally {
        killIfRunning(pid);
      }
    });

    it('should stop the instance recorded by the previous run', async () => {
      jest.spyOn(ProcessUtils, 'findProcessByPort').mockResolvedValue(null);
      let handle: LaunchHandle | undefined;
      try {
        handle = await launcher.launch({
          service: 'worker',
          command: { command: process.execPath, args: ['-e', IDLE_SCRIPT] },
          workingDirectory: tempDir,
          environment: {},
        });
        const { pid } = handle;

        await launcher.stopExisting(createService('worker', { workingDirectory: tempDir, healthCheck: portCheck(1) }));

        expect(await waitFor(async () => !ProcessUtils.isProcessRunning(pid))).toBe(true);
      } finally {
        killIfRunning(handle?.pid);
      }
    });

    it('should leave alone a recorded PID that now runs another command', async () => {
      jest.spyOn(ProcessUtils, 'findProcessByPort').mockResolvedValue(null);
      const pid = await spawnIdle();
      try {
        await fs.outputFile(launcher.pidFileFor('api'), `${pid}\npython3 app.py\n`);

        await launcher.stopExisting(createService('api', { workingDirectory: tempDir, healthCheck: portCheck(1) }));

        expect(ProcessUtils.isProcessRunning(pid)).toBe(true);
      } finally {
        killIfRunning(pid);
      }
    });

    it('should leave alone a PID file without a recorded command', async () => {
      jest.spyOn(ProcessUtils, 'findProcessByPort').mockResolvedValue(null);
      const pid = await spawnIdle();
      try {
        await fs.outputFile(launcher.pidFileFor('api'), `${pid}\n`);

        await launcher.stopExisting(createService('api', { workingDirectory: tempDir, healthCheck: portCheck(1) }));

        expect(ProcessUtils.isProcessRunning(pid)).toBe(true);
      } finally {
        killIfRunning(pid);
      }
    });
  });
});

describe('targetPort', () => {
  it('should use the explicit port of an http check', () => {
    expect(targetPort(httpCheck('http://127.0.0.1:5000/health'))).toBe(5000);
  });

  it('should fall back to the scheme default port', () => {
    expect(targetPort(httpCheck('http://backend.internal/health'))).toBe(80);
    expect(targetPort(httpCheck('https://backend.internal/health'))).toBe(443);
  });

  it('should read port checks and ignore process checks', () => {
    expect(targetPort(portCheck(19530))).toBe(19530);
    expect(
      targetPort({ kind: 'process-alive', pattern: 'worker.py', intervalMs: 10, maxAttempts: 1, timeoutMs: 100 })
    ).toBeNull();
  });
});
