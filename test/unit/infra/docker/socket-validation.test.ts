import { describe, it, expect } from '@jest/globals';
import { DOCKER } from '@/config/constants';
import { autoDetectDockerSocket, socketCandidates } from '@/infra/docker/socket-validation';

describe('autoDetectDockerSocket', () => {
  it('uses DOCKER_HOST and strips the unix scheme', () => {
    expect(autoDetectDockerSocket({ DOCKER_HOST: 'unix:///tmp/docker.sock' }, () => false, 'linux')).toBe('/tmp/docker.sock');
  });

  it('passes tcp endpoints through', () => {
    expect(autoDetectDockerSocket({ DOCKER_HOST: 'tcp://127.0.0.1:2375' }, () => false, 'win32')).toBe('tcp://127.0.0.1:2375');
  });

  it('picks the first existing candidate', () => {
    const desktop = socketCandidates()[1];

    expect(autoDetectDockerSocket({}, (path) => path === desktop, 'darwin')).toBe(desktop);
  });

  it('falls back to the default socket', () => {
    expect(autoDetectDockerSocket({}, () => false, 'linux')).toBe(DOCKER.DEFAULT_SOCKET);
  });

  it('uses the named pipe on Windows without DOCKER_HOST', () => {
    expect(autoDetectDockerSocket({}, () => true, 'win32')).toBe(DOCKER.WINDOWS_PIPE);
  });
});

describe('socketCandidates', () => {
  it('lists the system socket first and home-relative sockets after it', () => {
    const candidates = socketCandidates('/home/tester');

    expect(candidates[0]).toBe(DOCKER.DEFAULT_SOCKET);
    expect(candidates).toContain('/home/tester/.docker/run/docker.sock');
    expect(candidates).toContain('/home/tester/.colima/default/docker.sock');
  });
});
