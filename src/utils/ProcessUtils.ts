import { ChildProcess, StdioOptions } from 'child_process';
import kill from 'tree-kill';
import crossSpawn from 'cross-spawn';

export interface ProcessOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  shell?: boolean;
  detached?: boolean;
  stdio?: StdioOptions;
}

export interface ProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

const LOOPBACK_HOSTS = new Set(['127.0.0.1', '::1', 'localhost', '::ffff:127.0.0.1']);

export class ProcessUtils {
  static async execute(
    command: string,
    args: string[] = [],
    options: ProcessOptions = {}
  ): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const child = crossSpawn(command, args, {
        cwd: options.cwd || process.cwd(),
        env: { ...process.env, ...options.env },
        shell: options.shell || false,
        stdio: options.stdio || 'pipe',
      });

      let stdout = '';
      let stderr = '';

      if (child.stdout) {
        child.stdout.on('data', (data: Buffer) => {
          stdout += data.toString();
        });
      }

      if (child.stderr) {
        child.stderr.on('data', (data: Buffer) => {
          stderr += data.toString();
        });
      }

      child.on('close', (code: number | null) => {
        resolve({
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          // Killed by a signal
          exitCode: code ?? 1,
        });
      });

      child.on('error', (error: Error) => {
        reject(new Error(`Process execution failed: ${error.message}`));
      });
    });
  }

  /**
   * Launches a long-running process detached from this one. Resolves once the
   * OS has created the process, rejects with the spawn error (ENOENT, EACCES)
   * otherwise. The returned child is already unref'd.
   */
  static async spawnDetached(
    command: string,
    args: string[] = [],
    options: ProcessOptions = {}
  ): Promise<ChildProcess> {
    const child = crossSpawn(command, args, {
      cwd: options.cwd || process.cwd(),
      env: { ...process.env, ...options.env },
      shell: options.shell || false,
      stdio: options.stdio || 'ignore',
      detached: true,
    });

    await new Promise<void>((resolve, reject) => {
      child.once('spawn', () => resolve());
      child.once('error', reject);
    });

    child.unref();
    return child;
  }

  static async killProcess(pid: number, signal: string = 'SIGTERM'): Promise<void> {
    return new Promise((resolve, reject) => {
      kill(pid, signal, (error?: Error) => {
        if (error) {
          reject(new Error(`Failed to kill process ${pid}: ${error.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  static isProcessRunning(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch {
      return false;
    }
  }

  static async findProcessByPort(port: number): Promise<number | null> {
    try {
      const result = await this.execute('lsof', ['-ti', `tcp:${port}`, '-sTCP:LISTEN']);
      const pid = parseInt(result.stdout.split('\n')[0]?.trim() ?? '', 10);
      return isNaN(pid) ? null : pid;
    } catch {
      // lsof missing on minimal hosts
      return null;
    }
  }

  /**
   * Local addresses with a listening TCP socket on the given port, read from
   * `ss -tln` and falling back to `netstat -tln`.
   */
  static async getListeningAddresses(port: number): Promise<string[]> {
    for (const command of ['ss', 'netstat']) {
      try {
        const result = await this.execute(command, ['-tln']);
        if (result.exitCode === 0) {
          return this.parseListeningAddresses(result.stdout, port);
        }
      } catch {
        continue;
      }
    }
    return [];
  }

  static parseListeningAddresses(output: string, port: number): string[] {
    const addresses: string[] = [];

    for (const line of output.split('\n')) {
      const columns = line.trim().split(/\s+/);
      // The first column ending in :<port> is the local address; peers end in :*
      const local = columns.find(column => column.endsWith(`:${port}`));
      if (!local) continue;

      const host = local.slice(0, local.length - `:${port}`.length).replace(/^\[|\]$/g, '');
      if (!addresses.includes(host)) {
        addresses.push(host);
      }
    }

    return addresses;
  }

  static isLoopbackAddress(host: string): boolean {
    return LOOPBACK_HOSTS.has(host) || host.startsWith('127.');
  }

  /** The full command line of a running process, or null when it is gone. */
  static async getCommandLine(pid: number): Promise<string | null> {
    try {
      const result = await this.execute('ps', ['-p', String(pid), '-o', 'args=']);
      return result.exitCode === 0 && result.stdout !== '' ? result.stdout : null;
    } catch {
      return null;
    }
  }

  /**
   * Whether any process command line matches the pattern, an extended regex
   * as `pgrep -f` reads it. Rejects when pgrep cannot evaluate the pattern.
   */
  static async isProcessMatching(pattern: string): Promise<boolean> {
    const result = await this.execute('pgrep', ['-f', pattern]);
    // 1 means no match, 2 and above a bad pattern or a pgrep failure
    if (result.exitCode > 1) {
      throw new Error(`pgrep -f '${pattern}' failed: ${result.stderr || `exit code ${result.exitCode}`}`);
    }
    return result.exitCode === 0;
  }

  static async killMatching(pattern: string): Promise<void> {
    await this.execute('pkill', ['-f', pattern]);
  }
}
