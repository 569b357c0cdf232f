import { Socket } from 'node:net';
import {
  CONNECTIVITY_PROBE_HOST,
  CONNECTIVITY_PROBE_PORT,
  CONNECTIVITY_PROBE_TIMEOUT_MS,
} from '../../config/constants';
import { logger } from '../../utils/logger';

/** Loopback and private-LAN endpoints need no internet */
export function isLocalEndpoint(endpoint: string | undefined): boolean {
  if (!endpoint) return false;

  let host: string;
  try {
    host = new URL(endpoint).hostname;
  } catch {
    host = endpoint.replace(/^[a-z]+:\/\//i, '').split(/[/:]/)[0] ?? '';
  }

  return (
    host === 'localhost' ||
    host === '127.0.0.1' ||
    host.startsWith('192.168.') ||
    host.startsWith('10.')
  );
}

/**
 * TCP probe against a public DNS resolver.
 * Resolves false on refusal, error or timeout; never rejects.
 */
export function hasInternetConnection(
  host: string = CONNECTIVITY_PROBE_HOST,
  port: number = CONNECTIVITY_PROBE_PORT,
  timeoutMs: number = CONNECTIVITY_PROBE_TIMEOUT_MS,
): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = new Socket();

    const finish = (reachable: boolean) => {
      socket.destroy();
      if (!reachable) {
        logger.warn({ host, port }, 'Connectivity probe failed');
      }
      resolve(reachable);
    };

    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish(true));
    socket.once('timeout', () => finish(false));
    socket.once('error', () => finish(false));
    socket.connect(port, host);
  });
}
