// Mutation Engine
//
// The only writer. Each mutation validates what it touches before changing
// anything, and runs with its logging inside a store transaction, so a
// failure part way through a cascade or a throwing logger leaves no trace.

import {
  AccessGraphError,
  InvalidReferenceError,
  asGroup,
  asUser,
  isGroupSubject,
  isUserSubject,
  type AccessGraphSnapshot,
  type Subject,
} from '@grantgraph/protocol';
import type { TransactionalStoreContext } from '@grantgraph/repositories';
import type { AccessLogger } from '../logging.js';
import { someMembership } from '../query/traversal.js';
import { loadSnapshot } from '../snapshot/snapshot.js';
import type { CascadeSummary, MutationOperation, MutationRecord } from './types.js';

export type MutationEngineOptions = {
  logger: AccessLogger;
  /** Accept group-to-group mappings that close a cycle */
  allowCircularGroupMappings: boolean;
};

export class MutationEngine<TUser, TGroup, TComponent, TAccess> {
  constructor(
    private readonly stores: TransactionalStoreContext<TUser, TGroup, TComponent, TAccess>,
    private readonly options: MutationEngineOptions
  ) {}

  // --- Users and groups ---

  addUser(user: TUser): MutationRecord {
    return this.apply('addUser', { user: this.userKey(user) }, () => {
      this.stores.graph.addUser(user);
    });
  }

  /**
   * Remove a user with its group memberships and all its mappings.
   */
  removeUser(user: TUser): MutationRecord {
    return this.apply('removeUser', { user: this.userKey(user) }, () =>
      this.stores.transaction(({ graph, mappings }) => {
        const edges = graph.groupsOfUser(user).length;
        graph.removeUser(user);
        const removedMappings = mappings.removeSubject(asUser(user));
        return { edges, mappings: removedMappings, entities: 0 };
      })
    );
  }

  addGroup(group: TGroup): MutationRecord {
    return this.apply('addGroup', { group: this.groupKey(group) }, () => {
      this.stores.graph.addGroup(group);
    });
  }

  /**
   * Remove a group, every membership edge into or out of it, and all its
   * mappings. Finding the incoming edges means scanning every user and
   * group.
   */
  removeGroup(group: TGroup): MutationRecord {
    const key = this.groupKey(group);
    return this.apply('removeGroup', { group: key }, () =>
      this.stores.transaction(({ graph, mappings }) => {
        let edges = graph.groupsOfGroup(group).length;
        for (const user of graph.users()) {
          edges += this.countEdgesTo(graph.groupsOfUser(user), key);
        }
        for (const other of graph.groups()) {
          edges += this.countEdgesTo(graph.groupsOfGroup(other), key);
        }
        graph.removeGroup(group);
        const removedMappings = mappings.removeSubject(asGroup(group));
        return { edges, mappings: removedMappings, entities: 0 };
      })
    );
  }

  // --- Membership edges ---

  addUserToGroupMapping(user: TUser, group: TGroup): MutationRecord {
    return this.apply(
      'addUserToGroupMapping',
      { user: this.userKey(user), group: this.groupKey(group) },
      () => {
        this.stores.graph.addUserToGroupEdge(user, group);
      }
    );
  }

  removeUserToGroupMapping(user: TUser, group: TGroup): MutationRecord {
    return this.apply(
      'removeUserToGroupMapping',
      { user: this.userKey(user), group: this.groupKey(group) },
      () => {
        this.stores.graph.removeUserToGroupEdge(user, group);
      }
    );
  }

  /**
   * Make `fromGroup` a member of `toGroup`.
   *
   * Unless circular mappings are allowed, the edge is refused when
   * `toGroup` already reaches `fromGroup`.
   */
  addGroupToGroupMapping(fromGroup: TGroup, toGroup: TGroup): MutationRecord {
    const fromKey = this.groupKey(fromGroup);
    const toKey = this.groupKey(toGroup);
    return this.apply('addGroupToGroupMapping', { fromGroup: fromKey, toGroup: toKey }, () => {
      const { graph } = this.stores;
      if (
        !this.options.allowCircularGroupMappings &&
        fromKey !== toKey &&
        graph.hasGroup(fromGroup) &&
        graph.hasGroup(toGroup) &&
        this.reaches(toGroup, fromKey)
      ) {
        throw new InvalidReferenceError(
          fromKey,
          toKey,
          `A mapping between groups '${fromKey}' and '${toKey}' cannot be created as it would cause a circular reference.`
        );
      }
      graph.addGroupToGroupEdge(fromGroup, toGroup);
    });
  }

  removeGroupToGroupMapping(fromGroup: TGroup, toGroup: TGroup): MutationRecord {
    return this.apply(
      'removeGroupToGroupMapping',
      { fromGroup: this.groupKey(fromGroup), toGroup: this.groupKey(toGroup) },
      () => {
        this.stores.graph.removeGroupToGroupEdge(fromGroup, toGroup);
      }
    );
  }

  // --- Component mappings ---

  addComponentMapping(
    subject: Subject<TUser, TGroup>,
    component: TComponent,
    accessLevel: TAccess
  ): MutationRecord {
    return this.apply(
      'addComponentMapping',
      this.componentTarget(subject, component, accessLevel),
      () => {
        this.stores.mappings.addComponentMapping(subject, component, accessLevel);
      }
    );
  }

  removeComponentMapping(
    subject: Subject<TUser, TGroup>,
    component: TComponent,
    accessLevel: TAccess
  ): MutationRecord {
    return this.apply(
      'removeComponentMapping',
      this.componentTarget(subject, component, accessLevel),
      () => {
        this.stores.mappings.removeComponentMapping(subject, component, accessLevel);
      }
    );
  }

  // --- Entity types and entities ---

  addEntityType(entityType: string): MutationRecord {
    return this.apply('addEntityType', { entityType }, () => {
      this.stores.mappings.addEntityType(entityType);
    });
  }

  /**
   * Remove an entity type, all its entities and every mapping to them.
   */
  removeEntityType(entityType: string): MutationRecord {
    return this.apply('removeEntityType', { entityType }, () =>
      this.stores.transaction(({ mappings }) => {
        const purged = mappings.removeEntityType(entityType);
        return { edges: 0, mappings: purged.mappings, entities: purged.entities };
      })
    );
  }

  addEntity(entityType: string, entity: string): MutationRecord {
    return this.apply('addEntity', { entityType, entity }, () => {
      this.stores.mappings.addEntity(entityType, entity);
    });
  }

  /**
   * Remove an entity and every mapping to it.
   */
  removeEntity(entityType: string, entity: string): MutationRecord {
    return this.apply('removeEntity', { entityType, entity }, () =>
      this.stores.transaction(({ mappings }) => {
        const purged = mappings.removeEntity(entityType, entity);
        return { edges: 0, mappings: purged.mappings, entities: 0 };
      })
    );
  }

  // --- Entity mappings ---

  addEntityMapping(subject: Subject<TUser, TGroup>, entityType: string, entity: string): MutationRecord {
    return this.apply(
      'addEntityMapping',
      { ...this.subjectTarget(subject), entityType, entity },
      () => {
        this.stores.mappings.addEntityMapping(subject, entityType, entity);
      }
    );
  }

  removeEntityMapping(
    subject: Subject<TUser, TGroup>,
    entityType: string,
    entity: string
  ): MutationRecord {
    return this.apply(
      'removeEntityMapping',
      { ...this.subjectTarget(subject), entityType, entity },
      () => {
        this.stores.mappings.removeEntityMapping(subject, entityType, entity);
      }
    );
  }

  /**
   * Replace everything with the contents of a snapshot. Any bad reference
   * in the snapshot leaves the current state untouched.
   */
  importSnapshot(snapshot: AccessGraphSnapshot): MutationRecord {
    return this.apply(
      'importSnapshot',
      {
        users: String(snapshot.users.length),
        groups: String(snapshot.groups.length),
        entityTypes: String(snapshot.entityTypes.length),
      },
      () => {
        this.stores.transaction((stores) => {
          stores.graph.clear();
          stores.mappings.clear();
          loadSnapshot(this, stores.codecs, snapshot);
        });
      }
    );
  }

  /**
   * Remove everything.
   */
  clear(): MutationRecord {
    return this.apply('clear', {}, () => {
      this.stores.clear();
    });
  }

  // --- Helpers ---

  /**
   * Run a mutation, log the outcome and describe it.
   * A cascade summary returned by `fn` is logged at info and attached to the record.
   *
   * The write and its success logging share one transaction: if either
   * throws, the stores are rolled back before the error propagates.
   */
  private apply(
    operation: MutationOperation,
    target: Record<string, string>,
    fn: () => CascadeSummary | void
  ): MutationRecord {
    const { logger } = this.options;
    let cascade: CascadeSummary | void;
    try {
      cascade = this.stores.transaction(() => {
        const summary = fn();
        if (summary) {
          logger.info(`Cascade removed dependents: ${operation}`, { ...target, ...summary });
        }
        logger.debug(`Mutation applied: ${operation}`, target);
        return summary;
      });
    } catch (error) {
      logger.warn(`Mutation rejected: ${operation}`, {
        ...target,
        code: error instanceof AccessGraphError ? error.code : undefined,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    const record: MutationRecord = {
      operation,
      target,
      timestamp: new Date().toISOString(),
    };
    if (cascade) {
      record.cascade = cascade;
    }
    return record;
  }

  /**
   * Whether `start` reaches the group with key `targetKey`, itself included.
   */
  private reaches(start: TGroup, targetKey: string): boolean {
    return someMembership(
      this.stores,
      asGroup<TGroup>(start),
      (node) => isGroupSubject(node) && this.groupKey(node.id) === targetKey
    );
  }

  private countEdgesTo(groups: TGroup[], key: string): number {
    return groups.filter((group) => this.groupKey(group) === key).length;
  }

  private userKey(user: TUser): string {
    return this.stores.codecs.user.toKey(user);
  }

  private groupKey(group: TGroup): string {
    return this.stores.codecs.group.toKey(group);
  }

  private subjectTarget(subject: Subject<TUser, TGroup>): Record<string, string> {
    return isUserSubject(subject)
      ? { user: this.userKey(subject.id) }
      : { group: this.groupKey(subject.id) };
  }

  private componentTarget(
    subject: Subject<TUser, TGroup>,
    component: TComponent,
    accessLevel: TAccess
  ): Record<string, string> {
    const { codecs } = this.stores;
    return {
      ...this.subjectTarget(subject),
      component: codecs.component.toKey(component),
      accessLevel: codecs.accessLevel.toKey(accessLevel),
    };
  }
}
