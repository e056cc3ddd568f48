import * as http from 'http';
import * as https from 'https';
import * as net from 'net';
import {
  HealthCheckers,
  HttpHealthCheck,
  PortHealthCheck,
  ProcessHealthCheck,
} from '../../types/Health';
import { ProbeError } from '../../utils/errors';
import { ProcessUtils } from '../../utils/ProcessUtils';

export interface HostInspector {
  listeningAddresses(port: number): Promise<string[]>;
  processMatches(pattern: string): Promise<boolean>;
}

const systemInspector: HostInspector = {
  listeningAddresses: port => ProcessUtils.getListeningAddresses(port),
  processMatches: pattern => ProcessUtils.isProcessMatching(pattern),
};

function connectionFailure(target: string, error: NodeJS.ErrnoException): ProbeError {
  const kind = error.code === 'ECONNREFUSED' ? 'connection-refused' : 'unknown';
  return new ProbeError(kind, `${target}: ${error.message}`);
}

function tcpConnect(host: string, port: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host, port });

    const cleanup = (): void => {
      socket.destroy();
      signal.removeEventListener('abort', onAbort);
    };
    const onAbort = (): void => {
      cleanup();
      reject(new ProbeError('attempt-timeout', `${host}:${port}: connection attempt aborted`));
    };

    socket.once('connect', () => {
      cleanup();
      resolve();
    });
    socket.once('error', (error: NodeJS.ErrnoException) => {
      cleanup();
      reject(connectionFailure(`${host}:${port}`, error));
    });
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

function httpGet(url: string, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const target = new URL(url);
    const client = target.protocol === 'https:' ? https : http;

    const request = client.get(target, { signal }, response => {
      response.resume();
      const status = response.statusCode ?? 0;
      if (status >= 200 && status < 400) {
        resolve();
      } else {
        reject(new ProbeError('http-status', `GET ${url} returned HTTP ${status}`));
      }
    });

    request.on('error', (error: NodeJS.ErrnoException) => {
      reject(connectionFailure(`GET ${url}`, error));
    });
  });
}

export function createDefaultCheckers(inspector: HostInspector = systemInspector): HealthCheckers {
  return {
    'port-listening': async (check: PortHealthCheck, signal) => {
      const host = check.host ?? '127.0.0.1';
      await tcpConnect(host, check.port, signal);

      if (check.requireExternalBinding) {
        const addresses = await inspector.listeningAddresses(check.port);
        if (addresses.length > 0 && addresses.every(a => ProcessUtils.isLoopbackAddress(a))) {
          throw new ProbeError(
            'loopback-only',
            `Port ${check.port} is only bound to ${addresses.join(', ')}`
          );
        }
      }
    },

    'http-get': (check: HttpHealthCheck, signal) => httpGet(check.url, signal),

    'process-alive': async (check: ProcessHealthCheck) => {
      if (!(await inspector.processMatches(check.pattern))) {
        throw new ProbeError('process-not-found', `No process matches /${check.pattern}/`);
      }
    },
  };
}
