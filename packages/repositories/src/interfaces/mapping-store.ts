import type { Subject, ComponentAccess, EntityRef } from '@grantgraph/protocol';

/**
 * Counts of what a cascading removal purged
 */
export type PurgeSummary = {
  /** Entities removed along with their entity type */
  entities: number;
  /** Component and entity mappings removed */
  mappings: number;
};

/**
 * Repository interface for component and entity mappings.
 *
 * Mappings are keyed by subject. The store also owns the entity type and
 * entity registry, since entity mappings cannot outlive either.
 */
export interface MappingStore<TUser, TGroup, TComponent, TAccess> {
  // --- Component mappings ---

  /**
   * @throws NotFoundError if the subject does not exist
   * @throws DuplicateElementError if the mapping exists
   */
  addComponentMapping(
    subject: Subject<TUser, TGroup>,
    component: TComponent,
    accessLevel: TAccess
  ): void;

  /**
   * @throws NotFoundError if the subject or the mapping does not exist
   */
  removeComponentMapping(
    subject: Subject<TUser, TGroup>,
    component: TComponent,
    accessLevel: TAccess
  ): void;

  /** Probe used while traversing; does not check the subject exists */
  hasComponentMapping(
    subject: Subject<TUser, TGroup>,
    component: TComponent,
    accessLevel: TAccess
  ): boolean;

  /**
   * Empty when the subject has no mappings
   * @throws NotFoundError if the subject does not exist
   */
  componentMappingsOf(subject: Subject<TUser, TGroup>): ComponentAccess<TComponent, TAccess>[];

  // --- Entity types and entities ---

  /**
   * @throws ValidationError if the name is blank
   * @throws DuplicateElementError if the entity type exists
   */
  addEntityType(entityType: string): void;

  /**
   * Remove an entity type, its entities and every mapping to them
   * @throws NotFoundError if the entity type does not exist
   */
  removeEntityType(entityType: string): PurgeSummary;

  hasEntityType(entityType: string): boolean;

  entityTypes(): string[];

  /**
   * @throws NotFoundError if the entity type does not exist
   * @throws ValidationError if the name is blank
   * @throws DuplicateElementError if the entity exists within its type
   */
  addEntity(entityType: string, entity: string): void;

  /**
   * Remove an entity and every mapping to it
   * @throws NotFoundError if the entity type or entity does not exist
   */
  removeEntity(entityType: string, entity: string): PurgeSummary;

  hasEntity(entityType: string, entity: string): boolean;

  /**
   * @throws NotFoundError if the entity type does not exist
   */
  entitiesOf(entityType: string): string[];

  // --- Entity mappings ---

  /**
   * @throws NotFoundError if the subject, entity type or entity does not exist
   * @throws DuplicateElementError if the mapping exists
   */
  addEntityMapping(subject: Subject<TUser, TGroup>, entityType: string, entity: string): void;

  /**
   * @throws NotFoundError if the subject, entity type, entity or mapping does not exist
   */
  removeEntityMapping(subject: Subject<TUser, TGroup>, entityType: string, entity: string): void;

  /** Probe used while traversing; does not check the subject exists */
  hasEntityMapping(subject: Subject<TUser, TGroup>, entityType: string, entity: string): boolean;

  /**
   * Entities of one type mapped to the subject. Empty when there are none,
   * including when the entity type is unknown.
   * @throws NotFoundError if the subject does not exist
   */
  entityMappingsOf(subject: Subject<TUser, TGroup>, entityType: string): string[];

  /**
   * Every entity mapped to the subject, across all types
   * @throws NotFoundError if the subject does not exist
   */
  allEntityMappingsOf(subject: Subject<TUser, TGroup>): EntityRef[];

  // --- Cascades ---

  /**
   * Drop every mapping of a subject. Returns how many were dropped. The
   * subject need not exist any more.
   */
  removeSubject(subject: Subject<TUser, TGroup>): number;

  /** Remove every mapping, entity and entity type */
  clear(): void;
}
