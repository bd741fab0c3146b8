import { describe, it, expect } from '@jest/globals';
import { extractDockerErrorGuidance, isDockerStatus } from '@/infra/docker/errors';

describe('extractDockerErrorGuidance', () => {
  it('recognises an unreachable daemon', () => {
    const error = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:2375'), { code: 'ECONNREFUSED' });

    expect(extractDockerErrorGuidance(error)).toMatchObject({
      message: 'Cannot connect to the Docker daemon',
      details: { code: 'ECONNREFUSED' },
    });
  });

  it('recognises socket permission errors', () => {
    const error = Object.assign(new Error('connect EACCES /var/run/docker.sock'), { code: 'EACCES' });

    expect(extractDockerErrorGuidance(error).message).toBe(
      'Permission denied while connecting to the Docker daemon socket',
    );
  });

  it('prefers the daemon message for HTTP errors', () => {
    const error = Object.assign(new Error('(HTTP code 404) no such container'), {
      statusCode: 404,
      reason: 'no such container',
      json: { message: 'No such container: abc' },
    });

    expect(extractDockerErrorGuidance(error)).toEqual({
      message: 'No such container: abc',
      hint: 'The container or image does not exist',
      resolution: 'Check the name or id, and pull the image if it is missing',
      details: { statusCode: 404 },
    });
  });

  it('falls back to the reason when the body has no message', () => {
    const error = Object.assign(new Error('(HTTP code 500) server error'), {
      statusCode: 500,
      reason: 'server error',
    });

    expect(extractDockerErrorGuidance(error).message).toBe('server error');
  });

  it('handles plain errors and non-errors', () => {
    expect(extractDockerErrorGuidance(new Error('plain'))).toEqual({ message: 'plain' });
    expect(extractDockerErrorGuidance('text')).toEqual({ message: 'text' });
  });
});

describe('isDockerStatus', () => {
  it('matches on the engine status code', () => {
    const notModified = Object.assign(new Error('(HTTP code 304) container already stopped'), { statusCode: 304 });

    expect(isDockerStatus(notModified, 304)).toBe(true);
    expect(isDockerStatus(notModified, 404)).toBe(false);
    expect(isDockerStatus(new Error('plain'), 304)).toBe(false);
  });
});
