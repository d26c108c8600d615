// Access Manager
//
// The public face of the engine. Owns one pair of stores, runs every read
// and write under the reader/writer guard, and hands committed mutations to
// the configured hook once the write is over.

import {
  asGroup,
  asUser,
  parseSnapshot,
  stringCodecs,
  type AccessGraphCodecs,
  type AccessGraphSnapshot,
  type ComponentAccess,
  type EntityRef,
  type Subject,
} from '@grantgraph/protocol';
import {
  createInMemoryStoreContext,
  type StoreContextFactory,
  type TransactionalStoreContext,
} from '@grantgraph/repositories';
import { resolveConfig, type AccessManagerConfig, type ResolvedAccessManagerConfig } from './config.js';
import { ReadWriteGuard } from './concurrency/guard.js';
import { QueryEngine } from './query/engine.js';
import { MutationEngine } from './mutation/engine.js';
import type { MutationOperation, MutationRecord } from './mutation/types.js';
import { exportSnapshot } from './snapshot/snapshot.js';

/**
 * Options for creating an AccessManager.
 */
export type AccessManagerOptions<TUser, TGroup, TComponent, TAccess> = {
  /** How each caller-chosen type is compared and hashed */
  codecs: AccessGraphCodecs<TUser, TGroup, TComponent, TAccess>;

  /** Optional configuration */
  config?: AccessManagerConfig;

  /** Where the data lives. Defaults to the in-memory stores. */
  stores?: StoreContextFactory<TUser, TGroup, TComponent, TAccess>;
};

/**
 * AccessManager manages the access of users, and groups of users, to
 * application components and entities.
 *
 * @example
 * ```typescript
 * const access = createAccessManager({
 *   codecs: {
 *     user: stringCodec,
 *     group: stringCodec,
 *     component: createEnumCodec(Components),
 *     accessLevel: createEnumCodec(AccessLevels),
 *   },
 * });
 *
 * access.addUser('mae');
 * access.addGroup('sales-managers');
 * access.addUserToGroupMapping('mae', 'sales-managers');
 * access.addGroupToComponentMapping('sales-managers', 'ProductsSetup', 'Modify');
 *
 * access.hasAccessToComponent(asUser('mae'), 'ProductsSetup', 'Modify'); // true
 * ```
 */
export class AccessManager<TUser, TGroup, TComponent, TAccess> {
  private readonly stores: TransactionalStoreContext<TUser, TGroup, TComponent, TAccess>;
  private readonly guard = new ReadWriteGuard();
  private readonly queries: QueryEngine<TUser, TGroup, TComponent, TAccess>;
  private readonly mutations: MutationEngine<TUser, TGroup, TComponent, TAccess>;
  private readonly config: ResolvedAccessManagerConfig;

  constructor(options: AccessManagerOptions<TUser, TGroup, TComponent, TAccess>) {
    this.config = resolveConfig(options.config);
    const factory: StoreContextFactory<TUser, TGroup, TComponent, TAccess> =
      options.stores ?? createInMemoryStoreContext;
    this.stores = factory(options.codecs);
    this.queries = new QueryEngine(this.stores, {
      logger: this.config.logger,
      logQueries: this.config.logQueries,
    });
    this.mutations = new MutationEngine(this.stores, {
      logger: this.config.logger,
      allowCircularGroupMappings: this.config.allowCircularGroupMappings,
    });
  }

  // --- Users ---

  /** All users */
  get users(): TUser[] {
    return this.read('users', () => this.stores.graph.users());
  }

  addUser(user: TUser): void {
    this.write('addUser', () => this.mutations.addUser(user));
  }

  containsUser(user: TUser): boolean {
    return this.read('containsUser', () => this.stores.graph.hasUser(user));
  }

  /** Removes the user, its group memberships and its mappings */
  removeUser(user: TUser): void {
    this.write('removeUser', () => this.mutations.removeUser(user));
  }

  // --- Groups ---

  /** All groups */
  get groups(): TGroup[] {
    return this.read('groups', () => this.stores.graph.groups());
  }

  addGroup(group: TGroup): void {
    this.write('addGroup', () => this.mutations.addGroup(group));
  }

  containsGroup(group: TGroup): boolean {
    return this.read('containsGroup', () => this.stores.graph.hasGroup(group));
  }

  /** Removes the group, every membership edge touching it and its mappings */
  removeGroup(group: TGroup): void {
    this.write('removeGroup', () => this.mutations.removeGroup(group));
  }

  // --- Membership ---

  addUserToGroupMapping(user: TUser, group: TGroup): void {
    this.write('addUserToGroupMapping', () => this.mutations.addUserToGroupMapping(user, group));
  }

  /** Groups the user is directly a member of */
  getUserToGroupMappings(user: TUser): TGroup[] {
    return this.read('getUserToGroupMappings', () => this.stores.graph.groupsOfUser(user));
  }

  removeUserToGroupMapping(user: TUser, group: TGroup): void {
    this.write('removeUserToGroupMapping', () =>
      this.mutations.removeUserToGroupMapping(user, group)
    );
  }

  addGroupToGroupMapping(fromGroup: TGroup, toGroup: TGroup): void {
    this.write('addGroupToGroupMapping', () =>
      this.mutations.addGroupToGroupMapping(fromGroup, toGroup)
    );
  }

  /** Groups the group is directly a member of */
  getGroupToGroupMappings(group: TGroup): TGroup[] {
    return this.read('getGroupToGroupMappings', () => this.stores.graph.groupsOfGroup(group));
  }

  removeGroupToGroupMapping(fromGroup: TGroup, toGroup: TGroup): void {
    this.write('removeGroupToGroupMapping', () =>
      this.mutations.removeGroupToGroupMapping(fromGroup, toGroup)
    );
  }

  // --- Component mappings ---

  addUserToComponentMapping(user: TUser, component: TComponent, accessLevel: TAccess): void {
    this.write('addComponentMapping', () =>
      this.mutations.addComponentMapping(asUser(user), component, accessLevel)
    );
  }

  getUserToComponentMappings(user: TUser): ComponentAccess<TComponent, TAccess>[] {
    return this.read('getUserToComponentMappings', () =>
      this.stores.mappings.componentMappingsOf(asUser(user))
    );
  }

  removeUserToComponentMapping(user: TUser, component: TComponent, accessLevel: TAccess): void {
    this.write('removeComponentMapping', () =>
      this.mutations.removeComponentMapping(asUser(user), component, accessLevel)
    );
  }

  addGroupToComponentMapping(group: TGroup, component: TComponent, accessLevel: TAccess): void {
    this.write('addComponentMapping', () =>
      this.mutations.addComponentMapping(asGroup(group), component, accessLevel)
    );
  }

  getGroupToComponentMappings(group: TGroup): ComponentAccess<TComponent, TAccess>[] {
    return this.read('getGroupToComponentMappings', () =>
      this.stores.mappings.componentMappingsOf(asGroup(group))
    );
  }

  removeGroupToComponentMapping(group: TGroup, component: TComponent, accessLevel: TAccess): void {
    this.write('removeComponentMapping', () =>
      this.mutations.removeComponentMapping(asGroup(group), component, accessLevel)
    );
  }

  // --- Entity types and entities ---

  /** All entity types */
  get entityTypes(): string[] {
    return this.read('entityTypes', () => this.stores.mappings.entityTypes());
  }

  addEntityType(entityType: string): void {
    this.write('addEntityType', () => this.mutations.addEntityType(entityType));
  }

  containsEntityType(entityType: string): boolean {
    return this.read('containsEntityType', () => this.stores.mappings.hasEntityType(entityType));
  }

  /** Removes the entity type, its entities and every mapping to them */
  removeEntityType(entityType: string): void {
    this.write('removeEntityType', () => this.mutations.removeEntityType(entityType));
  }

  addEntity(entityType: string, entity: string): void {
    this.write('addEntity', () => this.mutations.addEntity(entityType, entity));
  }

  /** Entities of a type */
  getEntities(entityType: string): string[] {
    return this.read('getEntities', () => this.stores.mappings.entitiesOf(entityType));
  }

  containsEntity(entityType: string, entity: string): boolean {
    return this.read('containsEntity', () => this.stores.mappings.hasEntity(entityType, entity));
  }

  /** Removes the entity and every mapping to it */
  removeEntity(entityType: string, entity: string): void {
    this.write('removeEntity', () => this.mutations.removeEntity(entityType, entity));
  }

  // --- Entity mappings ---

  addUserToEntityMapping(user: TUser, entityType: string, entity: string): void {
    this.write('addEntityMapping', () =>
      this.mutations.addEntityMapping(asUser(user), entityType, entity)
    );
  }

  /**
   * Entities mapped directly to the user: every one, or those of one type.
   */
  getUserToEntityMappings(user: TUser): EntityRef[];
  getUserToEntityMappings(user: TUser, entityType: string): string[];
  getUserToEntityMappings(user: TUser, entityType?: string): EntityRef[] | string[] {
    return this.read('getUserToEntityMappings', () =>
      entityType === undefined
        ? this.stores.mappings.allEntityMappingsOf(asUser(user))
        : this.stores.mappings.entityMappingsOf(asUser(user), entityType)
    );
  }

  removeUserToEntityMapping(user: TUser, entityType: string, entity: string): void {
    this.write('removeEntityMapping', () =>
      this.mutations.removeEntityMapping(asUser(user), entityType, entity)
    );
  }

  addGroupToEntityMapping(group: TGroup, entityType: string, entity: string): void {
    this.write('addEntityMapping', () =>
      this.mutations.addEntityMapping(asGroup(group), entityType, entity)
    );
  }

  /**
   * Entities mapped directly to the group: every one, or those of one type.
   */
  getGroupToEntityMappings(group: TGroup): EntityRef[];
  getGroupToEntityMappings(group: TGroup, entityType: string): string[];
  getGroupToEntityMappings(group: TGroup, entityType?: string): EntityRef[] | string[] {
    return this.read('getGroupToEntityMappings', () =>
      entityType === undefined
        ? this.stores.mappings.allEntityMappingsOf(asGroup(group))
        : this.stores.mappings.entityMappingsOf(asGroup(group), entityType)
    );
  }

  removeGroupToEntityMapping(group: TGroup, entityType: string, entity: string): void {
    this.write('removeEntityMapping', () =>
      this.mutations.removeEntityMapping(asGroup(group), entityType, entity)
    );
  }

  // --- Queries ---

  /**
   * Whether the subject, or any group it belongs to, has the access level
   * to the component.
   * @throws NotFoundError if the subject does not exist
   */
  hasAccessToComponent(
    subject: Subject<TUser, TGroup>,
    component: TComponent,
    accessLevel: TAccess
  ): boolean {
    return this.read('hasAccessToComponent', () =>
      this.queries.hasAccessToComponent(subject, component, accessLevel)
    );
  }

  /**
   * Whether the subject, or any group it belongs to, is mapped to the entity.
   * @throws NotFoundError if the entity type, the entity or the subject does not exist
   */
  hasAccessToEntity(subject: Subject<TUser, TGroup>, entityType: string, entity: string): boolean {
    return this.read('hasAccessToEntity', () =>
      this.queries.hasAccessToEntity(subject, entityType, entity)
    );
  }

  /**
   * Entities of the type the subject, or any group it belongs to, is mapped to.
   * @throws NotFoundError if the subject does not exist
   */
  accessibleEntities(subject: Subject<TUser, TGroup>, entityType: string): Set<string> {
    return this.read('accessibleEntities', () =>
      this.queries.accessibleEntities(subject, entityType)
    );
  }

  /**
   * Every component and access level pair the subject holds, directly or
   * through its groups.
   * @throws NotFoundError if the subject does not exist
   */
  accessibleComponents(subject: Subject<TUser, TGroup>): ComponentAccess<TComponent, TAccess>[] {
    return this.read('accessibleComponents', () => this.queries.accessibleComponents(subject));
  }

  /**
   * Every group the subject belongs to, directly or transitively.
   * @throws NotFoundError if the subject does not exist
   */
  reachableGroups(subject: Subject<TUser, TGroup>): TGroup[] {
    return this.read('reachableGroups', () => this.queries.reachableGroups(subject));
  }

  // --- Snapshots ---

  /** Key-encoded copy of the whole state */
  exportSnapshot(): AccessGraphSnapshot {
    return this.read('exportSnapshot', () => exportSnapshot(this.stores));
  }

  /**
   * Replace the whole state with a snapshot. The snapshot is validated
   * first; if any of it does not load, the current state is kept.
   * @throws ValidationError for a malformed snapshot
   */
  importSnapshot(snapshot: unknown): void {
    const parsed = parseSnapshot(snapshot);
    this.write('importSnapshot', () => this.mutations.importSnapshot(parsed));
  }

  /** Remove everything */
  clear(): void {
    this.write('clear', () => this.mutations.clear());
  }

  // --- Helpers ---

  private read<T>(operation: string, fn: () => T): T {
    return this.guard.read(operation, fn);
  }

  private write(operation: MutationOperation, fn: () => MutationRecord): void {
    const record = this.guard.write(operation, fn);
    this.config.onMutation(record);
  }
}

/**
 * Create an AccessManager.
 */
export function createAccessManager<TUser, TGroup, TComponent, TAccess>(
  options: AccessManagerOptions<TUser, TGroup, TComponent, TAccess>
): AccessManager<TUser, TGroup, TComponent, TAccess> {
  return new AccessManager(options);
}

/**
 * Create an AccessManager whose users, groups, components and access
 * levels are all plain strings.
 */
export function createStringAccessManager(
  config?: AccessManagerConfig
): AccessManager<string, string, string, string> {
  return new AccessManager({ codecs: stringCodecs, config });
}
