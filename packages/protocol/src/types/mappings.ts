// Mapping types - what a subject is granted

import type { SubjectKind } from './subjects.js';

/**
 * A component paired with a level of access to it
 */
export type ComponentAccess<TComponent, TAccess> = {
  component: TComponent;
  accessLevel: TAccess;
};

/**
 * A named entity within an entity type
 */
export type EntityRef = {
  entityType: string;
  entity: string;
};

/**
 * Kinds of element held by the engine. Used by errors and mutation records
 * to say what was touched.
 */
export type ElementKind =
  | SubjectKind
  | 'userToGroupMapping'
  | 'groupToGroupMapping'
  | 'componentMapping'
  | 'entityType'
  | 'entity'
  | 'entityMapping';
