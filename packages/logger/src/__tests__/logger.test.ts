import { describe, it, expect } from 'vitest';
import { createLogger, errorMessage } from '../index';

describe('createLogger', () => {
  it('tags every entry with the service name', () => {
    const logger = createLogger('monitor-api', { silent: true });
    expect(logger.defaultMeta).toEqual({ service: 'monitor-api' });
  });

  it('honours an explicit level', () => {
    const logger = createLogger('monitor-cli', { level: 'debug', silent: true });
    expect(logger.level).toBe('debug');
    expect(logger.isDebugEnabled()).toBe(true);
  });
});

describe('errorMessage', () => {
  it('unwraps Error instances and stringifies everything else', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
