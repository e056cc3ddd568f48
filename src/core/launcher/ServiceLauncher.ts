import * as path from 'path';
import { HealthCheck } from '../../types/Health';
import { CommandSpec, ServiceSpec } from '../../types/Service';
import { errorMessage, isErrnoException, StartFailureError } from '../../utils/errors';
import { FileSystem } from '../../utils/FileSystem';
import { logger } from '../../utils/Logger';
import { ProcessUtils } from '../../utils/ProcessUtils';
import { sleep } from '../../utils/timing';

export interface LaunchRequest {
  service: string;
  command: CommandSpec;
  workingDirectory: string;
  environment: Record<string, string>;
}

export interface LaunchHandle {
  service: string;
  pid: number;
  command: string;
}

/**
 * Starts service processes without waiting for them to exit. The launcher
 * does not supervise: once started, a process outlives the deployment run.
 */
export interface ServiceLauncher {
  /** Rejects with StartFailureError when the OS could not create the process. */
  launch(request: LaunchRequest): Promise<LaunchHandle>;
  stop(handle: LaunchHandle): Promise<void>;
  /** Best-effort removal of instances left over from an earlier run. */
  stopExisting(spec: ServiceSpec): Promise<void>;
}

export interface ProcessLauncherOptions {
  logDir: string;
  pidDir: string;
  // Pause after killing a leftover instance so its port is released
  settleMs?: number;
}

interface RecordedProcess {
  pid: number;
  command: string;
}

const log = logger.child('launcher');

/** The TCP port a health check targets, if it names one. */
export function targetPort(check: HealthCheck): number | null {
  switch (check.kind) {
    case 'port-listening':
      return check.port;
    case 'http-get': {
      const url = new URL(check.url);
      if (url.port !== '') {
        return parseInt(url.port, 10);
      }
      return url.protocol === 'https:' ? 443 : 80;
    }
    case 'process-alive':
      return null;
  }
}

export class ProcessLauncher implements ServiceLauncher {
  private readonly options: Required<ProcessLauncherOptions>;

  constructor(options: ProcessLauncherOptions) {
    this.options = { settleMs: 1000, ...options };
  }

  logFileFor(service: string): string {
    return path.join(this.options.logDir, `${service}.log`);
  }

  pidFileFor(service: string): string {
    return path.join(this.options.pidDir, `${service}.pid`);
  }

  async launch(request: LaunchRequest): Promise<LaunchHandle> {
    const display = [request.command.command, ...request.command.args].join(' ');

    if (!(await FileSystem.exists(request.workingDirectory))) {
      throw new StartFailureError(
        request.service,
        'start-failed',
        `working directory ${request.workingDirectory} does not exist`
      );
    }

    const fd = await FileSystem.openAppendFd(this.logFileFor(request.service));
    let pid: number;

    try {
      const child = await ProcessUtils.spawnDetached(request.command.command, request.command.args, {
        cwd: request.workingDirectory,
        env: request.environment,
        shell: request.command.shell ?? false,
        stdio: ['ignore', fd, fd],
      });

      if (child.pid === undefined) {
        throw new StartFailureError(request.service, 'start-failed', 'no PID returned');
      }
      pid = child.pid;
    } catch (error) {
      if (error instanceof StartFailureError) {
        throw error;
      }
      const kind = isErrnoException(error) && error.code === 'ENOENT' ? 'command-not-found' : 'start-failed';
      throw new StartFailureError(request.service, kind, `${display}: ${errorMessage(error)}`);
    } finally {
      await FileSystem.closeFd(fd);
    }

    log.info(`Started ${request.service} (PID ${pid}): ${display}`);

    // Without the PID file the next run still finds the process through its port
    try {
      await FileSystem.writeTextFile(this.pidFileFor(request.service), `${pid}\n${display}\n`);
    } catch (error) {
      log.warn(`Could not record PID ${pid} for ${request.service}`, errorMessage(error));
    }

    return { service: request.service, pid, command: display };
  }

  async stop(handle: LaunchHandle): Promise<void> {
    if (!ProcessUtils.isProcessRunning(handle.pid)) {
      return;
    }

    try {
      await ProcessUtils.killProcess(handle.pid);
      log.debug(`Stopped ${handle.service} (PID ${handle.pid})`);
    } catch (error) {
      log.warn(`Could not stop ${handle.service} (PID ${handle.pid})`, errorMessage(error));
    }
  }

  async stopExisting(spec: ServiceSpec): Promise<void> {
    let killed = false;

    if (spec.stop) {
      await this.runStopCommand(spec, spec.stop);
    }

    const recorded = await this.readPidFile(spec.name);
    if (recorded !== null && (await this.isRecordedInstance(recorded))) {
      killed = (await this.kill(spec.name, recorded.pid, 'recorded PID')) || killed;
    }

    const check = spec.healthCheck;
    const port = targetPort(check);
    if (port !== null) {
      const holder = await ProcessUtils.findProcessByPort(port);
      if (holder !== null) {
        killed = (await this.kill(spec.name, holder, `holder of port ${port}`)) || killed;
      }
    } else if (check.kind === 'process-alive') {
      try {
        if (await ProcessUtils.isProcessMatching(check.pattern)) {
          await ProcessUtils.killMatching(check.pattern);
          killed = true;
        }
      } catch (error) {
        log.warn(`Could not stop processes matching /${check.pattern}/`, errorMessage(error));
      }
    }

    if (killed && this.options.settleMs > 0) {
      await sleep(this.options.settleMs);
    }
  }

  private async runStopCommand(spec: ServiceSpec, command: CommandSpec): Promise<void> {
    const display = [command.command, ...command.args].join(' ');
    try {
      const result = await ProcessUtils.execute(command.command, command.args, {
        cwd: spec.workingDirectory,
        env: spec.environment,
        shell: command.shell ?? false,
      });
      if (result.exitCode !== 0) {
        log.debug(`'${display}' exited with ${result.exitCode}`, result.stderr);
      }
    } catch (error) {
      log.warn(`Stop command for ${spec.name} failed`, errorMessage(error));
    }
  }

  private async readPidFile(service: string): Promise<RecordedProcess | null> {
    const content = await FileSystem.readTextFile(this.pidFileFor(service));
    if (content === null) {
      return null;
    }
    const [pidLine = '', command = ''] = content.split('\n');
    const pid = parseInt(pidLine.trim(), 10);
    return isNaN(pid) ? null : { pid, command: command.trim() };
  }

  /**
   * A PID file outlives reboots, so its PID may since have been reused. Only a
   * live process still running the recorded command counts.
   */
  private async isRecordedInstance(recorded: RecordedProcess): Promise<boolean> {
    if (recorded.command === '' || !ProcessUtils.isProcessRunning(recorded.pid)) {
      return false;
    }
    const commandLine = await ProcessUtils.getCommandLine(recorded.pid);
    if (commandLine === null || !commandLine.includes(recorded.command)) {
      log.debug(`PID ${recorded.pid} no longer runs '${recorded.command}'; leaving it alone`);
      return false;
    }
    return true;
  }

  private async kill(service: string, pid: number, label: string): Promise<boolean> {
    if (pid === process.pid) {
      return false;
    }
    try {
      await ProcessUtils.killProcess(pid);
      log.info(`Stopped previous ${service} instance (${label}, PID ${pid})`);
      return true;
    } catch (error) {
      log.warn(`Could not stop previous ${service} instance (PID ${pid})`, errorMessage(error));
      return false;
    }
  }
}
