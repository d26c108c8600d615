// Access manager configuration

import { z } from 'zod';
import { ValidationError } from '@grantgraph/protocol';
import { silentLogger, type AccessLogger } from './logging.js';
import type { MutationRecord } from './mutation/types.js';

export type AccessManagerConfig = {
  /**
   * Accept group-to-group mappings that close a cycle.
   * Queries are cycle-safe either way. Defaults to false.
   */
  allowCircularGroupMappings?: boolean;

  /** Structured logger. Defaults to silentLogger. */
  logger?: AccessLogger;

  /** Log every query and its answer at debug level. Defaults to false. */
  logQueries?: boolean;

  /**
   * Called after each committed mutation, once the write has finished.
   * The hook may query the manager.
   */
  onMutation?: (record: MutationRecord) => void;
};

export type ResolvedAccessManagerConfig = Required<AccessManagerConfig>;

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

function isAccessLogger(value: unknown): value is AccessLogger {
  return (
    typeof value === 'object' &&
    value !== null &&
    LOG_LEVELS.every((level) => typeof Reflect.get(value, level) === 'function')
  );
}

const AccessManagerConfigSchema = z
  .object({
    allowCircularGroupMappings: z.boolean().optional(),
    logger: z
      .custom<AccessLogger>(isAccessLogger, {
        message: 'must provide debug, info, warn and error functions',
      })
      .optional(),
    logQueries: z.boolean().optional(),
    onMutation: z
      .custom<(record: MutationRecord) => void>((value) => typeof value === 'function', {
        message: 'must be a function',
      })
      .optional(),
  })
  .strict();

/**
 * Validate a configuration and fill in defaults.
 *
 * @throws ValidationError for unknown keys or values of the wrong type
 */
export function resolveConfig(config: AccessManagerConfig = {}): ResolvedAccessManagerConfig {
  const result = AccessManagerConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError(
      `Invalid access manager config: ${issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ')}`,
      { field: 'config', details: { issues } }
    );
  }

  const parsed = result.data;
  return {
    allowCircularGroupMappings: parsed.allowCircularGroupMappings ?? false,
    logger: parsed.logger ?? silentLogger,
    logQueries: parsed.logQueries ?? false,
    onMutation: parsed.onMutation ?? (() => {}),
  };
}
