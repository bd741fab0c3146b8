/**
 * Port utility functions for finding free ports and checking listeners
 */

import { createConnection, createServer } from 'node:net';
import { DEFAULT_NETWORK, DEFAULT_TIMEOUTS } from '@/config/constants';

/**
 * Ask the OS for a free TCP port on the loopback interface.
 */
export async function getFreePort(host: string = DEFAULT_NETWORK.loopback): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = createServer();
    server.unref();
    server.once('error', reject);
    server.listen(0, host, () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        server.close();
        reject(new Error('Could not determine the assigned port'));
        return;
      }
      const { port } = address;
      server.close((error) => (error ? reject(error) : resolve(port)));
    });
  });
}

/**
 * Check if a port is available on the host
 */
export async function isPortAvailable(
  port: number,
  host: string = DEFAULT_NETWORK.loopback,
): Promise<boolean> {
  return new Promise((resolve) => {
    const server = createServer();
    server.unref();
    server.once('error', () => resolve(false));
    server.listen(port, host, () => {
      server.close(() => resolve(true));
    });
  });
}

/**
 * Resolve true when something accepts a TCP connection on host:port within the timeout.
 */
export async function canConnect(
  port: number,
  host: string = DEFAULT_NETWORK.loopback,
  timeoutMs: number = DEFAULT_TIMEOUTS.portForwardDial,
): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = createConnection({ port, host });
    const finish = (connected: boolean): void => {
      socket.destroy();
      resolve(connected);
    };
    socket.setTimeout(timeoutMs, () => finish(false));
    socket.once('connect', () => finish(true));
    socket.once('error', () => finish(false));
  });
}
