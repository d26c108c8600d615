// Snapshot validation
//
// Checks the shape of a snapshot document before it is loaded. Whether
// the references inside it line up is checked while loading, by the same
// code paths that guard ordinary mutations.

import { z } from 'zod';
import { SNAPSHOT_VERSION, type AccessGraphSnapshot } from '../types/snapshot.js';
import { ValidationError } from '../errors.js';
import { ElementNameSchema } from './names.js';

const KeySchema = z.string();

export const AccessGraphSnapshotSchema: z.ZodType<AccessGraphSnapshot> = z
  .object({
    version: z.literal(SNAPSHOT_VERSION),
    users: z.array(KeySchema),
    groups: z.array(KeySchema),
    userToGroup: z.array(z.object({ user: KeySchema, group: KeySchema }).strict()),
    groupToGroup: z.array(
      z.object({ fromGroup: KeySchema, toGroup: KeySchema }).strict()
    ),
    userToComponent: z.array(
      z.object({ user: KeySchema, component: KeySchema, accessLevel: KeySchema }).strict()
    ),
    groupToComponent: z.array(
      z.object({ group: KeySchema, component: KeySchema, accessLevel: KeySchema }).strict()
    ),
    entityTypes: z.array(
      z
        .object({ entityType: ElementNameSchema, entities: z.array(ElementNameSchema) })
        .strict()
    ),
    userToEntity: z.array(
      z.object({ user: KeySchema, entityType: KeySchema, entity: KeySchema }).strict()
    ),
    groupToEntity: z.array(
      z.object({ group: KeySchema, entityType: KeySchema, entity: KeySchema }).strict()
    ),
  })
  .strict();

/**
 * Parse an unknown value as a snapshot document.
 *
 * @throws ValidationError listing every issue found, by path
 */
export function parseSnapshot(input: unknown): AccessGraphSnapshot {
  const result = AccessGraphSnapshotSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError(
      `Invalid snapshot: ${issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ')}`,
      { field: 'snapshot', details: { issues } }
    );
  }
  return result.data;
}
