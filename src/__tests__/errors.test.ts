import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  CycleDetectedError,
  PlatformError,
  PreflightError,
  classifyHttpStatus,
  errorMessage
} from '../errors';

describe('classifyHttpStatus', () => {
  it('should treat a missing object as not-found', () => {
    expect(classifyHttpStatus(404)).toBe('not-found');
  });

  it('should retry throttling, timeouts and server errors', () => {
    expect([408, 429, 500, 502, 503, 504].map(status => classifyHttpStatus(status))).toEqual([
      'transient', 'transient', 'transient', 'transient', 'transient', 'transient'
    ]);
  });

  it('should separate existing objects from version clashes', () => {
    expect(classifyHttpStatus(409, 'AlreadyExists')).toBe('conflict');
    expect(classifyHttpStatus(409, 'Conflict')).toBe('transient');
  });

  it('should treat immutable field changes as conflicts', () => {
    expect(classifyHttpStatus(422, 'Invalid', 'spec.selector: Invalid value: field is immutable')).toBe('conflict');
    expect(classifyHttpStatus(422, 'Invalid', 'spec.replicas: must be positive')).toBe('fatal');
  });

  it('should give up on everything else', () => {
    expect(classifyHttpStatus(400)).toBe('fatal');
    expect(classifyHttpStatus(403)).toBe('fatal');
  });
});

describe('error types', () => {
  it('should carry the platform error details', () => {
    const cause = new Error('socket hang up');
    const error = new PlatformError('transient', 'request failed', { statusCode: 503, resource: 'v1/ConfigMap/apps/a', cause });

    expect(error.kind).toBe('transient');
    expect(error.statusCode).toBe(503);
    expect(error.resource).toBe('v1/ConfigMap/apps/a');
    expect(error.cause).toBe(cause);
  });

  it('should list every configuration issue in the message', () => {
    const error = new ConfigurationError([
      { location: 'db', message: 'no resources' },
      { location: 'platform.namespace', message: 'required' }
    ]);

    expect(error.message).toBe('Invalid configuration:\n  db: no resources\n  platform.namespace: required');
  });

  it('should describe a cycle by its path', () => {
    const error = new CycleDetectedError(['a', 'b', 'a']);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error.message).toBe('CycleDetected:\n  a: dependency cycle a -> b -> a');
  });

  it('should summarize pre-flight failures', () => {
    expect(new PreflightError([{ location: 'VAULT_TOKEN', message: 'not set' }]).message)
      .toBe('Pre-flight check failed:\n  VAULT_TOKEN: not set');
  });

  it('should render unknown thrown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
