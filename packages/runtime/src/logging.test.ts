// Tests for logging

import { describe, it, expect, vi, afterEach } from 'vitest';
import { consoleLogger, createCapturingLogger } from './logging.js';

describe('createCapturingLogger', () => {
  it('should record entries in order with their level and data', () => {
    const logger = createCapturingLogger();

    logger.debug('Mutation applied: addUser', { user: 'mae' });
    logger.warn('Mutation rejected: addUser');

    expect(logger.entries).toHaveLength(2);
    expect(logger.entries[0]).toMatchObject({
      level: 'debug',
      message: 'Mutation applied: addUser',
      data: { user: 'mae' },
    });
    expect(logger.entries[1].level).toBe('warn');
    expect(logger.entries[1].data).toBeUndefined();
  });
});

describe('consoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should prefix the level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});

    consoleLogger.info('Cascade removed dependents: removeGroup', { edges: 2 });

    expect(info).toHaveBeenCalledWith('[INFO] Cascade removed dependents: removeGroup', { edges: 2 });
  });

  it('should pass an empty string when there is no data', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    consoleLogger.error('boom');

    expect(error).toHaveBeenCalledWith('[ERROR] boom', '');
  });

  it('should route each level to its own console method', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    consoleLogger.debug('Query hasAccessToComponent', { allowed: true });
    consoleLogger.warn('Mutation rejected: addUser', { user: 'mae' });

    expect(debug).toHaveBeenCalledWith('[DEBUG] Query hasAccessToComponent', { allowed: true });
    expect(warn).toHaveBeenCalledWith('[WARN] Mutation rejected: addUser', { user: 'mae' });
    expect(debug).toHaveBeenCalledTimes(1);
  });
});
