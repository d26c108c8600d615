// In-memory mapping store

import {
  DuplicateElementError,
  NotFoundError,
  assertValidElementName,
  isUserSubject,
  type AccessGraphCodecs,
  type ComponentAccess,
  type EntityRef,
  type Subject,
} from '@grantgraph/protocol';
import type { MappingStore, PurgeSummary, SubjectLookup } from '../interfaces/index.js';
import { refill } from './membership-graph.js';

/**
 * Underlying data of the in-memory mapping store (for debugging/testing).
 *
 * Subjects are keyed as `user:<key>` or `group:<key>`, so a user and a
 * group whose codec keys coincide never share mappings.
 */
export type MappingStoreData<TComponent, TAccess> = {
  /** subject key → (component/access key → pair) */
  componentMappings: Map<string, Map<string, ComponentAccess<TComponent, TAccess>>>;
  /** entity type → entities */
  entities: Map<string, Set<string>>;
  /** subject key → (entity type → entities) */
  entityMappings: Map<string, Map<string, Set<string>>>;
};

export interface InMemoryMappingStore<TUser, TGroup, TComponent, TAccess>
  extends MappingStore<TUser, TGroup, TComponent, TAccess> {
  /** Direct access to underlying data (for debugging/testing) */
  _data: MappingStoreData<TComponent, TAccess>;
  /** Capture the current state; the returned function puts it back */
  _checkpoint(): () => void;
}

export type CreateInMemoryMappingStoreInput<TUser, TGroup, TComponent, TAccess> = {
  codecs: AccessGraphCodecs<TUser, TGroup, TComponent, TAccess>;
  /** Where subjects are looked up; usually the membership graph */
  subjects: SubjectLookup<TUser, TGroup>;
};

/**
 * Create an in-memory mapping store.
 */
export function createInMemoryMappingStore<TUser, TGroup, TComponent, TAccess>(
  input: CreateInMemoryMappingStoreInput<TUser, TGroup, TComponent, TAccess>
): InMemoryMappingStore<TUser, TGroup, TComponent, TAccess> {
  const { codecs, subjects } = input;
  const componentMappings = new Map<string, Map<string, ComponentAccess<TComponent, TAccess>>>();
  const entities = new Map<string, Set<string>>();
  const entityMappings = new Map<string, Map<string, Set<string>>>();

  const idKey = (subject: Subject<TUser, TGroup>): string =>
    isUserSubject(subject) ? codecs.user.toKey(subject.id) : codecs.group.toKey(subject.id);

  const subjectKey = (subject: Subject<TUser, TGroup>): string =>
    `${subject.kind}:${idKey(subject)}`;

  const pairKey = (component: TComponent, accessLevel: TAccess): string =>
    JSON.stringify([codecs.component.toKey(component), codecs.accessLevel.toKey(accessLevel)]);

  const describePair = (subject: Subject<TUser, TGroup>, component: TComponent, accessLevel: TAccess) =>
    `${subject.kind} '${idKey(subject)}' application component '${codecs.component.toKey(component)}' and access level '${codecs.accessLevel.toKey(accessLevel)}'`;

  const requireSubject = (subject: Subject<TUser, TGroup>): string => {
    const exists =
      isUserSubject(subject) ? subjects.hasUser(subject.id) : subjects.hasGroup(subject.id);
    if (!exists) {
      throw new NotFoundError(subject.kind, idKey(subject), { argument: subject.kind });
    }
    return subjectKey(subject);
  };

  const requireEntityType = (entityType: string): Set<string> => {
    const known = entities.get(entityType);
    if (!known) {
      throw new NotFoundError('entityType', entityType, { argument: 'entityType' });
    }
    return known;
  };

  const requireEntity = (entityType: string, entity: string): void => {
    if (!requireEntityType(entityType).has(entity)) {
      throw new NotFoundError('entity', entity, { argument: 'entity' });
    }
  };

  const describeEntityMapping = (subject: Subject<TUser, TGroup>, entityType: string, entity: string) =>
    `A mapping between ${subject.kind} '${idKey(subject)}' and entity '${entity}' with type '${entityType}'`;

  const store: InMemoryMappingStore<TUser, TGroup, TComponent, TAccess> = {
    addComponentMapping(subject, component, accessLevel) {
      const key = requireSubject(subject);
      const pair = pairKey(component, accessLevel);
      let pairs = componentMappings.get(key);
      if (pairs?.has(pair)) {
        throw new DuplicateElementError(
          'componentMapping',
          `${key}:${pair}`,
          `A mapping between ${describePair(subject, component, accessLevel)} already exists.`
        );
      }
      if (!pairs) {
        pairs = new Map();
        componentMappings.set(key, pairs);
      }
      pairs.set(pair, { component, accessLevel });
    },

    removeComponentMapping(subject, component, accessLevel) {
      const key = requireSubject(subject);
      const pair = pairKey(component, accessLevel);
      const pairs = componentMappings.get(key);
      if (!pairs || !pairs.delete(pair)) {
        throw new NotFoundError('componentMapping', `${key}:${pair}`, {
          message: `A mapping between ${describePair(subject, component, accessLevel)} doesn't exist.`,
        });
      }
      if (pairs.size === 0) {
        componentMappings.delete(key);
      }
    },

    hasComponentMapping(subject, component, accessLevel) {
      return componentMappings.get(subjectKey(subject))?.has(pairKey(component, accessLevel)) ?? false;
    },

    componentMappingsOf(subject) {
      const key = requireSubject(subject);
      return Array.from(componentMappings.get(key)?.values() ?? []);
    },

    addEntityType(entityType) {
      if (entities.has(entityType)) {
        throw new DuplicateElementError(
          'entityType',
          entityType,
          `Entity type '${entityType}' in argument 'entityType' already exists.`
        );
      }
      assertValidElementName(entityType, 'entityType');
      entities.set(entityType, new Set());
    },

    removeEntityType(entityType): PurgeSummary {
      const known = requireEntityType(entityType);
      let mappings = 0;
      for (const [key, byType] of entityMappings) {
        const mapped = byType.get(entityType);
        if (mapped) {
          mappings += mapped.size;
          byType.delete(entityType);
          if (byType.size === 0) {
            entityMappings.delete(key);
          }
        }
      }
      entities.delete(entityType);
      return { entities: known.size, mappings };
    },

    hasEntityType(entityType) {
      return entities.has(entityType);
    },

    entityTypes() {
      return Array.from(entities.keys());
    },

    addEntity(entityType, entity) {
      const known = requireEntityType(entityType);
      if (known.has(entity)) {
        throw new DuplicateElementError(
          'entity',
          entity,
          `Entity '${entity}' in argument 'entity' already exists.`
        );
      }
      assertValidElementName(entity, 'entity');
      known.add(entity);
    },

    removeEntity(entityType, entity): PurgeSummary {
      requireEntity(entityType, entity);
      let mappings = 0;
      for (const [key, byType] of entityMappings) {
        const mapped = byType.get(entityType);
        if (mapped?.delete(entity)) {
          mappings += 1;
          if (mapped.size === 0) {
            byType.delete(entityType);
          }
          if (byType.size === 0) {
            entityMappings.delete(key);
          }
        }
      }
      entities.get(entityType)?.delete(entity);
      return { entities: 1, mappings };
    },

    hasEntity(entityType, entity) {
      return entities.get(entityType)?.has(entity) ?? false;
    },

    entitiesOf(entityType) {
      return Array.from(requireEntityType(entityType));
    },

    addEntityMapping(subject, entityType, entity) {
      const key = requireSubject(subject);
      requireEntity(entityType, entity);
      let byType = entityMappings.get(key);
      if (byType?.get(entityType)?.has(entity)) {
        throw new DuplicateElementError(
          'entityMapping',
          `${key}:${entityType}:${entity}`,
          `${describeEntityMapping(subject, entityType, entity)} already exists.`
        );
      }
      if (!byType) {
        byType = new Map();
        entityMappings.set(key, byType);
      }
      let mapped = byType.get(entityType);
      if (!mapped) {
        mapped = new Set();
        byType.set(entityType, mapped);
      }
      mapped.add(entity);
    },

    removeEntityMapping(subject, entityType, entity) {
      const key = requireSubject(subject);
      requireEntity(entityType, entity);
      const byType = entityMappings.get(key);
      const mapped = byType?.get(entityType);
      if (!byType || !mapped || !mapped.delete(entity)) {
        throw new NotFoundError('entityMapping', `${key}:${entityType}:${entity}`, {
          message: `${describeEntityMapping(subject, entityType, entity)} doesn't exist.`,
        });
      }
      if (mapped.size === 0) {
        byType.delete(entityType);
      }
      if (byType.size === 0) {
        entityMappings.delete(key);
      }
    },

    hasEntityMapping(subject, entityType, entity) {
      return entityMappings.get(subjectKey(subject))?.get(entityType)?.has(entity) ?? false;
    },

    entityMappingsOf(subject, entityType) {
      const key = requireSubject(subject);
      return Array.from(entityMappings.get(key)?.get(entityType) ?? []);
    },

    allEntityMappingsOf(subject) {
      const key = requireSubject(subject);
      const refs: EntityRef[] = [];
      for (const [entityType, mapped] of entityMappings.get(key) ?? []) {
        for (const entity of mapped) {
          refs.push({ entityType, entity });
        }
      }
      return refs;
    },

    removeSubject(subject) {
      const key = subjectKey(subject);
      let removed = componentMappings.get(key)?.size ?? 0;
      for (const mapped of entityMappings.get(key)?.values() ?? []) {
        removed += mapped.size;
      }
      componentMappings.delete(key);
      entityMappings.delete(key);
      return removed;
    },

    clear() {
      componentMappings.clear();
      entities.clear();
      entityMappings.clear();
    },

    _data: { componentMappings, entities, entityMappings },

    _checkpoint() {
      const savedComponents = new Map(
        Array.from(componentMappings, ([key, pairs]) => [key, new Map(pairs)] as const)
      );
      const savedEntities = new Map(
        Array.from(entities, ([entityType, names]) => [entityType, new Set(names)] as const)
      );
      const savedEntityMappings = new Map(
        Array.from(
          entityMappings,
          ([key, byType]) =>
            [
              key,
              new Map(Array.from(byType, ([entityType, names]) => [entityType, new Set(names)] as const)),
            ] as const
        )
      );

      return () => {
        refill(componentMappings, savedComponents);
        refill(entities, savedEntities);
        refill(entityMappings, savedEntityMappings);
      };
    },
  };

  return store;
}
