import { describe, it, expect } from 'vitest';
import { Err, formatAppError } from '../../../src/errors/index.js';

describe('formatAppError', () => {
  it('prints the fixed PROCESS_TYPE line whatever was received', () => {
    expect(formatAppError(Err.processTypeMissing(undefined))).toBe('PROCESS_TYPE environment variable not set.');
    expect(formatAppError(Err.processTypeMissing('staging'))).toBe('PROCESS_TYPE environment variable not set.');
  });

  it('reports spawn failures the way a shell does', () => {
    expect(formatAppError(Err.spawnFailed('uvicorn', 'ENOENT', 'spawn uvicorn ENOENT'))).toBe(
      'uvicorn: command not found'
    );
    expect(formatAppError(Err.spawnFailed('celery', 'EACCES', 'spawn celery EACCES'))).toBe(
      'celery: permission denied'
    );
    expect(formatAppError(Err.spawnFailed('celery', 'E2BIG', 'spawn E2BIG'))).toBe('celery: spawn E2BIG');
  });

  it('includes the cause of an unreadable env file', () => {
    const text = formatAppError(Err.envFileUnreadable('.env', new Error('ENOENT: no such file')));

    expect(text).toBe('Cannot read env file .env: Error: ENOENT: no such file');
  });

  it('includes the cause of an unexpected error', () => {
    expect(formatAppError(Err.unexpected('process-launcher crashed', { reason: 'x' }))).toBe(
      'process-launcher crashed\nCause: {"reason":"x"}'
    );
  });
});
