/**
 * Docker socket detection
 */

import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { posix } from 'node:path';
import { DOCKER } from '@/config/constants';

/**
 * Candidate Unix sockets, in lookup order: the system socket, then Docker Desktop,
 * Colima and rootless installs.
 */
export function socketCandidates(home: string = homedir()): string[] {
  const candidates = [
    DOCKER.DEFAULT_SOCKET,
    posix.join(home, '.docker', 'run', 'docker.sock'),
    posix.join(home, '.colima', 'default', 'docker.sock'),
    posix.join(home, '.colima', 'docker.sock'),
  ];
  if (process.getuid) {
    candidates.push(`/run/user/${process.getuid()}/docker.sock`);
  }
  return candidates;
}

/**
 * Resolve the engine endpoint: DOCKER_HOST first, then the first socket that exists.
 * Falls back to the default socket so the connection error names a real path.
 */
export function autoDetectDockerSocket(
  env: NodeJS.ProcessEnv = process.env,
  exists: (path: string) => boolean = existsSync,
  platform: NodeJS.Platform = process.platform,
): string {
  const dockerHost = env.DOCKER_HOST;
  if (dockerHost) {
    return dockerHost.startsWith('unix://') ? dockerHost.slice('unix://'.length) : dockerHost;
  }

  if (platform === 'win32') {
    return DOCKER.WINDOWS_PIPE;
  }

  return socketCandidates().find((candidate) => exists(candidate)) ?? DOCKER.DEFAULT_SOCKET;
}
