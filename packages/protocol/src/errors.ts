// Access graph error types

import type { ElementKind } from './types/mappings.js';

/**
 * Base class for all access graph errors.
 * Provides structured error information for debugging and logging.
 */
export class AccessGraphError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'AccessGraphError';
    this.code = code;
  }
}

/**
 * Error when adding a node, edge, mapping, entity or entity type that
 * already exists.
 */
export class DuplicateElementError extends AccessGraphError {
  readonly elementKind: ElementKind;
  readonly key: string;

  constructor(elementKind: ElementKind, key: string, message: string) {
    super('DUPLICATE_ELEMENT', message);
    this.name = 'DuplicateElementError';
    this.elementKind = elementKind;
    this.key = key;
  }
}

/**
 * Error when a referenced element does not exist.
 */
export class NotFoundError extends AccessGraphError {
  readonly elementKind: ElementKind;
  readonly key: string;
  /** The argument that carried the missing reference */
  readonly argument?: string;

  constructor(
    elementKind: ElementKind,
    key: string,
    options?: { argument?: string; message?: string }
  ) {
    super(
      'NOT_FOUND',
      options?.message ??
        (options?.argument
          ? `${describeKind(elementKind)} '${key}' in argument '${options.argument}' does not exist.`
          : `${describeKind(elementKind)} '${key}' does not exist.`)
    );
    this.name = 'NotFoundError';
    this.elementKind = elementKind;
    this.key = key;
    this.argument = options?.argument;
  }
}

/**
 * Error when an edge is structurally invalid: a group mapped to itself,
 * or a group mapping that would close a cycle.
 */
export class InvalidReferenceError extends AccessGraphError {
  readonly fromKey: string;
  readonly toKey: string;

  constructor(fromKey: string, toKey: string, reason: string) {
    super('INVALID_REFERENCE', reason);
    this.name = 'InvalidReferenceError';
    this.fromKey = fromKey;
    this.toKey = toKey;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends AccessGraphError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Error when a write overlaps another read or write of the same engine.
 */
export class ConcurrentAccessError extends AccessGraphError {
  readonly operation: string;

  constructor(operation: string, reason: string) {
    super('CONCURRENT_ACCESS', `Cannot run '${operation}': ${reason}`);
    this.name = 'ConcurrentAccessError';
    this.operation = operation;
  }
}

const KIND_LABELS: Record<ElementKind, string> = {
  user: 'User',
  group: 'Group',
  userToGroupMapping: 'User to group mapping',
  groupToGroupMapping: 'Group to group mapping',
  componentMapping: 'Component mapping',
  entityType: 'Entity type',
  entity: 'Entity',
  entityMapping: 'Entity mapping',
};

export function describeKind(kind: ElementKind): string {
  return KIND_LABELS[kind];
}
