// Query Engine
//
// Read-only permission and visibility questions. Every query walks the
// membership graph from the subject and checks the mapping store at each
// node it reaches; nothing here writes.

import {
  NotFoundError,
  isGroupSubject,
  isUserSubject,
  type ComponentAccess,
  type Subject,
} from '@grantgraph/protocol';
import type { StoreContext } from '@grantgraph/repositories';
import type { AccessLogger } from '../logging.js';
import { forEachMembership, someMembership } from './traversal.js';

export type QueryEngineOptions = {
  logger: AccessLogger;
  /** Log each query and its answer at debug level */
  logQueries: boolean;
};

/**
 * QueryEngine answers "may this subject do X" and "what may it see".
 *
 * All queries throw NotFoundError for a subject that does not exist; an
 * unknown subject is never reported as merely having no access.
 *
 * @example
 * ```typescript
 * const queries = new QueryEngine(stores, { logger: silentLogger, logQueries: false });
 *
 * if (queries.hasAccessToComponent(asUser('mae'), 'ProductsSetup', 'Modify')) {
 *   // Show the screen
 * }
 * ```
 */
export class QueryEngine<TUser, TGroup, TComponent, TAccess> {
  constructor(
    private readonly stores: StoreContext<TUser, TGroup, TComponent, TAccess>,
    private readonly options: QueryEngineOptions
  ) {}

  /**
   * Whether the subject, or a group it belongs to directly or transitively,
   * is mapped to the component at the access level.
   */
  hasAccessToComponent(
    subject: Subject<TUser, TGroup>,
    component: TComponent,
    accessLevel: TAccess
  ): boolean {
    const { mappings } = this.stores;
    const allowed = someMembership(this.stores, subject, (node) =>
      mappings.hasComponentMapping(node, component, accessLevel)
    );
    this.logQuery('hasAccessToComponent', subject, {
      component: this.stores.codecs.component.toKey(component),
      accessLevel: this.stores.codecs.accessLevel.toKey(accessLevel),
      allowed,
    });
    return allowed;
  }

  /**
   * Whether the subject, or a group it belongs to directly or transitively,
   * is mapped to the entity.
   *
   * @throws NotFoundError if the entity type, the entity or the subject does
   *   not exist, checked in that order
   */
  hasAccessToEntity(subject: Subject<TUser, TGroup>, entityType: string, entity: string): boolean {
    const { mappings } = this.stores;
    if (!mappings.hasEntityType(entityType)) {
      throw new NotFoundError('entityType', entityType, { argument: 'entityType' });
    }
    if (!mappings.hasEntity(entityType, entity)) {
      throw new NotFoundError('entity', entity, { argument: 'entity' });
    }
    const allowed = someMembership(this.stores, subject, (node) =>
      mappings.hasEntityMapping(node, entityType, entity)
    );
    this.logQuery('hasAccessToEntity', subject, { entityType, entity, allowed });
    return allowed;
  }

  /**
   * Every entity of the type that the subject, or any of its groups, is
   * mapped to. Empty when the entity type is unknown.
   */
  accessibleEntities(subject: Subject<TUser, TGroup>, entityType: string): Set<string> {
    const { mappings } = this.stores;
    const found = new Set<string>();
    if (!mappings.hasEntityType(entityType)) {
      this.requireSubject(subject);
    } else {
      forEachMembership(this.stores, subject, (node) => {
        for (const entity of mappings.entityMappingsOf(node, entityType)) {
          found.add(entity);
        }
      });
    }
    this.logQuery('accessibleEntities', subject, { entityType, count: found.size });
    return found;
  }

  /**
   * Every distinct component and access level pair granted to the subject
   * or any of its groups.
   */
  accessibleComponents(subject: Subject<TUser, TGroup>): ComponentAccess<TComponent, TAccess>[] {
    const { mappings, codecs } = this.stores;
    const found = new Map<string, ComponentAccess<TComponent, TAccess>>();
    forEachMembership(this.stores, subject, (node) => {
      for (const pair of mappings.componentMappingsOf(node)) {
        const key = JSON.stringify([
          codecs.component.toKey(pair.component),
          codecs.accessLevel.toKey(pair.accessLevel),
        ]);
        if (!found.has(key)) {
          found.set(key, pair);
        }
      }
    });
    this.logQuery('accessibleComponents', subject, { count: found.size });
    return Array.from(found.values());
  }

  /**
   * Every group the subject belongs to, directly or transitively, each
   * once, in depth-first order. A group is not its own ancestor.
   */
  reachableGroups(subject: Subject<TUser, TGroup>): TGroup[] {
    const groups: TGroup[] = [];
    forEachMembership(this.stores, subject, (node) => {
      if (isGroupSubject(node) && node !== subject) {
        groups.push(node.id);
      }
    });
    return groups;
  }

  private subjectKey(subject: Subject<TUser, TGroup>): string {
    const { codecs } = this.stores;
    return isUserSubject(subject) ? codecs.user.toKey(subject.id) : codecs.group.toKey(subject.id);
  }

  private requireSubject(subject: Subject<TUser, TGroup>): void {
    if (!this.stores.graph.hasSubject(subject)) {
      throw new NotFoundError(subject.kind, this.subjectKey(subject), { argument: subject.kind });
    }
  }

  private logQuery(
    query: string,
    subject: Subject<TUser, TGroup>,
    data: Record<string, unknown>
  ): void {
    if (!this.options.logQueries) return;
    this.options.logger.debug(`Query ${query}`, {
      subjectKind: subject.kind,
      subject: this.subjectKey(subject),
      ...data,
    });
  }
}
