// Tests for access manager configuration

import { describe, it, expect, vi } from 'vitest';
import { ValidationError } from '@grantgraph/protocol';
import { resolveConfig } from './config.js';
import { createCapturingLogger, silentLogger } from './logging.js';

describe('resolveConfig', () => {
  it('should fill in defaults', () => {
    const config = resolveConfig();

    expect(config.allowCircularGroupMappings).toBe(false);
    expect(config.logQueries).toBe(false);
    expect(config.logger).toBe(silentLogger);
    expect(typeof config.onMutation).toBe('function');
  });

  it('should keep values that are given', () => {
    const logger = createCapturingLogger();
    const onMutation = vi.fn();

    const config = resolveConfig({
      allowCircularGroupMappings: true,
      logger,
      logQueries: true,
      onMutation,
    });

    expect(config).toEqual({
      allowCircularGroupMappings: true,
      logger,
      logQueries: true,
      onMutation,
    });
  });

  it('should reject unknown keys', () => {
    const config = { logQueries: true, verbose: true };

    expect(() => resolveConfig(config)).toThrow(
      "Invalid access manager config: (root): Unrecognized key(s) in object: 'verbose'"
    );
  });

  it('should reject values of the wrong type', () => {
    expect(() => resolveConfig(JSON.parse('{"logQueries":"yes"}'))).toThrow(ValidationError);
    expect(() => resolveConfig(JSON.parse('{"logQueries":"yes"}'))).toThrow(
      'Invalid access manager config: logQueries: Expected boolean, received string'
    );
  });

  it('should reject a logger missing a level', () => {
    expect(() => resolveConfig(JSON.parse('{"logger":{"debug":1}}'))).toThrow(
      'Invalid access manager config: logger: must provide debug, info, warn and error functions'
    );
  });
});
