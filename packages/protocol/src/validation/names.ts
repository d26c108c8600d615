// Name validation for entity types and entities

import { z } from 'zod';
import { ValidationError } from '../errors.js';

/**
 * Entity types and entities are plain text names that must contain at
 * least one non-whitespace character.
 */
export const ElementNameSchema = z
  .string()
  .refine((value) => value.trim().length > 0, {
    message: 'must contain a non-whitespace character',
  });

export function isValidElementName(value: string): boolean {
  return ElementNameSchema.safeParse(value).success;
}

/**
 * Throw a ValidationError if `value` is not a usable entity type or entity name.
 */
export function assertValidElementName(
  value: string,
  field: 'entityType' | 'entity'
): void {
  const result = ElementNameSchema.safeParse(value);
  if (!result.success) {
    const label = field === 'entityType' ? 'Entity type' : 'Entity';
    throw new ValidationError(
      `${label} '${value}' in argument '${field}' must contain a valid character.`,
      { field, details: { issues: result.error.issues.map((issue) => issue.message) } }
    );
  }
}
