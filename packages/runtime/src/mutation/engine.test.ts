// Tests for the mutation engine

import { describe, it, expect, beforeEach } from 'vitest';
import {
  DuplicateElementError,
  InvalidReferenceError,
  NotFoundError,
  ValidationError,
  asGroup,
  asUser,
  emptySnapshot,
  stringCodecs,
} from '@grantgraph/protocol';
import {
  createInMemoryStoreContext,
  type InMemoryStoreContext,
} from '@grantgraph/repositories';
import { createCapturingLogger, type LogEntry } from '../logging.js';
import { MutationEngine } from './engine.js';

// --- Test Fixtures ---

type Stores = InMemoryStoreContext<string, string, string, string>;

function createEngine(allowCircularGroupMappings = false) {
  const stores: Stores = createInMemoryStoreContext(stringCodecs);
  const logger = createCapturingLogger();
  const engine = new MutationEngine(stores, { logger, allowCircularGroupMappings });
  return { stores, logger, engine };
}

function last(entries: LogEntry[]): LogEntry | undefined {
  return entries[entries.length - 1];
}

// --- Tests ---

describe('MutationEngine', () => {
  let stores: Stores;
  let logger: ReturnType<typeof createCapturingLogger>;
  let engine: MutationEngine<string, string, string, string>;

  beforeEach(() => {
    ({ stores, logger, engine } = createEngine());
  });

  describe('records', () => {
    it('should describe each committed mutation by key', () => {
      const record = engine.addUser('mae');

      expect(record).toEqual({
        operation: 'addUser',
        target: { user: 'mae' },
        timestamp: expect.any(String),
      });
      expect(record.cascade).toBeUndefined();
    });

    it('should name the subject kind in mapping targets', () => {
      engine.addGroup('Sales');

      expect(engine.addComponentMapping(asGroup('Sales'), 'OrderSummary', 'View').target).toEqual({
        group: 'Sales',
        component: 'OrderSummary',
        accessLevel: 'View',
      });
    });
  });

  describe('logging', () => {
    it('should log an applied mutation at debug level', () => {
      engine.addGroup('Sales');

      expect(last(logger.entries)).toMatchObject({
        level: 'debug',
        message: 'Mutation applied: addGroup',
        data: { group: 'Sales' },
      });
    });

    it('should log a rejected mutation at warn level and rethrow', () => {
      engine.addUser('mae');

      expect(() => engine.addUser('mae')).toThrow(DuplicateElementError);
      expect(last(logger.entries)).toMatchObject({
        level: 'warn',
        message: 'Mutation rejected: addUser',
        data: {
          user: 'mae',
          code: 'DUPLICATE_ELEMENT',
          error: "User 'mae' in argument 'user' already exists.",
        },
      });
    });

    it('should roll back a committed write when the logger throws', () => {
      const failing = createCapturingLogger();
      const throwingLogger = {
        ...failing,
        debug: (message: string) => {
          if (message === 'Mutation applied: removeGroup') {
            throw new Error('log sink closed');
          }
        },
      };
      const guarded = new MutationEngine(stores, {
        logger: throwingLogger,
        allowCircularGroupMappings: false,
      });
      guarded.addUser('mae');
      guarded.addGroup('Sales');
      guarded.addUserToGroupMapping('mae', 'Sales');
      guarded.addComponentMapping(asGroup('Sales'), 'OrderSummary', 'View');

      expect(() => guarded.removeGroup('Sales')).toThrow('log sink closed');

      expect(stores.graph.groups()).toEqual(['Sales']);
      expect(stores.graph.groupsOfUser('mae')).toEqual(['Sales']);
      expect(stores.mappings.hasComponentMapping(asGroup('Sales'), 'OrderSummary', 'View')).toBe(
        true
      );
      expect(last(failing.entries)).toMatchObject({
        level: 'warn',
        message: 'Mutation rejected: removeGroup',
        data: { group: 'Sales', error: 'log sink closed' },
      });
    });
  });

  describe('removeUser', () => {
    it('should cascade to memberships and mappings', () => {
      engine.addUser('mae');
      engine.addGroup('Sales');
      engine.addGroup('AllStaff');
      engine.addUserToGroupMapping('mae', 'Sales');
      engine.addUserToGroupMapping('mae', 'AllStaff');
      engine.addComponentMapping(asUser('mae'), 'OrderSummary', 'View');

      const record = engine.removeUser('mae');

      expect(record.cascade).toEqual({ edges: 2, mappings: 1, entities: 0 });
      expect(stores.graph.users()).toEqual([]);
      expect(stores._data.mappings.componentMappings.size).toBe(0);
      expect(logger.entries.some((e) => e.message === 'Cascade removed dependents: removeUser')).toBe(
        true
      );
    });

    it('should throw NotFoundError for an unknown user', () => {
      expect(() => engine.removeUser('mae')).toThrow(NotFoundError);
    });
  });

  describe('removeGroup', () => {
    it('should remove incoming and outgoing edges and mappings', () => {
      engine.addUser('mae');
      engine.addGroup('SalesManagers');
      engine.addGroup('AllStaff');
      engine.addGroup('Company');
      engine.addUserToGroupMapping('mae', 'AllStaff');
      engine.addGroupToGroupMapping('SalesManagers', 'AllStaff');
      engine.addGroupToGroupMapping('AllStaff', 'Company');
      engine.addComponentMapping(asGroup('AllStaff'), 'Dashboard', 'View');
      engine.addEntityType('Clients');
      engine.addEntity('Clients', 'CompanyA');
      engine.addEntityMapping(asGroup('AllStaff'), 'Clients', 'CompanyA');

      const record = engine.removeGroup('AllStaff');

      expect(record.cascade).toEqual({ edges: 3, mappings: 2, entities: 0 });
      expect(stores.graph.groups()).toEqual(['SalesManagers', 'Company']);
      expect(stores.graph.groupsOfUser('mae')).toEqual([]);
      expect(stores.graph.groupsOfGroup('SalesManagers')).toEqual([]);
      expect(stores.mappings.entitiesOf('Clients')).toEqual(['CompanyA']);
    });
  });

  describe('addGroupToGroupMapping', () => {
    beforeEach(() => {
      for (const group of ['A', 'B', 'C']) {
        engine.addGroup(group);
      }
      engine.addGroupToGroupMapping('A', 'B');
      engine.addGroupToGroupMapping('B', 'C');
    });

    it('should reject an edge that closes a cycle', () => {
      expect(() => engine.addGroupToGroupMapping('C', 'A')).toThrow(InvalidReferenceError);
      expect(() => engine.addGroupToGroupMapping('C', 'A')).toThrow(
        "A mapping between groups 'C' and 'A' cannot be created as it would cause a circular reference."
      );
      expect(stores.graph.groupsOfGroup('C')).toEqual([]);
    });

    it('should accept an edge that only makes a diamond', () => {
      engine.addGroupToGroupMapping('A', 'C');

      expect(stores.graph.groupsOfGroup('A')).toEqual(['B', 'C']);
    });

    it('should report a self-loop before looking for cycles', () => {
      expect(() => engine.addGroupToGroupMapping('A', 'A')).toThrow(
        "Arguments 'fromGroup' and 'toGroup' cannot contain the same group ('A')."
      );
    });

    it('should report a missing group before looking for cycles', () => {
      expect(() => engine.addGroupToGroupMapping('C', 'Z')).toThrow(
        "Group 'Z' in argument 'toGroup' does not exist."
      );
    });

    it('should reject a duplicate edge', () => {
      expect(() => engine.addGroupToGroupMapping('A', 'B')).toThrow(DuplicateElementError);
    });

    it('should accept a cycle when circular mappings are allowed', () => {
      ({ stores, engine } = createEngine(true));
      engine.addGroup('A');
      engine.addGroup('B');
      engine.addGroupToGroupMapping('A', 'B');
      engine.addGroupToGroupMapping('B', 'A');

      expect(stores.graph.groupsOfGroup('B')).toEqual(['A']);
    });
  });

  describe('entity types and entities', () => {
    beforeEach(() => {
      engine.addUser('kishan');
      engine.addGroup('Sales');
      engine.addEntityType('Clients');
      engine.addEntity('Clients', 'CompanyA');
      engine.addEntity('Clients', 'CompanyB');
      engine.addEntityMapping(asUser('kishan'), 'Clients', 'CompanyA');
      engine.addEntityMapping(asGroup('Sales'), 'Clients', 'CompanyA');
      engine.addEntityMapping(asGroup('Sales'), 'Clients', 'CompanyB');
    });

    it('should cascade entity type removal to entities and mappings', () => {
      const record = engine.removeEntityType('Clients');

      expect(record.cascade).toEqual({ edges: 0, mappings: 3, entities: 2 });
      expect(stores.mappings.entityTypes()).toEqual([]);
      expect(stores.mappings.allEntityMappingsOf(asGroup('Sales'))).toEqual([]);
    });

    it('should cascade entity removal to mappings', () => {
      const record = engine.removeEntity('Clients', 'CompanyA');

      expect(record.cascade).toEqual({ edges: 0, mappings: 2, entities: 0 });
      expect(stores.mappings.entityMappingsOf(asGroup('Sales'), 'Clients')).toEqual(['CompanyB']);
    });

    it('should reject blank names', () => {
      expect(() => engine.addEntityType('   ')).toThrow(ValidationError);
      expect(() => engine.addEntity('Clients', '')).toThrow(ValidationError);
    });
  });

  describe('importSnapshot', () => {
    it('should replace the current state', () => {
      engine.addUser('mae');

      engine.importSnapshot({
        ...emptySnapshot(),
        users: ['kishan'],
        groups: ['Sales'],
        userToGroup: [{ user: 'kishan', group: 'Sales' }],
      });

      expect(stores.graph.users()).toEqual(['kishan']);
      expect(stores.graph.groupsOfUser('kishan')).toEqual(['Sales']);
    });

    it('should keep the current state when a reference does not resolve', () => {
      engine.addUser('mae');

      expect(() =>
        engine.importSnapshot({
          ...emptySnapshot(),
          users: ['kishan'],
          userToGroup: [{ user: 'kishan', group: 'Sales' }],
        })
      ).toThrow("Group 'Sales' in argument 'group' does not exist.");

      expect(stores.graph.users()).toEqual(['mae']);
    });

    it('should apply the cycle policy to imported edges', () => {
      expect(() =>
        engine.importSnapshot({
          ...emptySnapshot(),
          groups: ['A', 'B'],
          groupToGroup: [
            { fromGroup: 'A', toGroup: 'B' },
            { fromGroup: 'B', toGroup: 'A' },
          ],
        })
      ).toThrow(InvalidReferenceError);

      expect(stores.graph.groups()).toEqual([]);
    });
  });

  it('should remove everything on clear', () => {
    engine.addUser('mae');
    engine.addEntityType('Clients');

    expect(engine.clear().operation).toBe('clear');
    expect(stores.graph.users()).toEqual([]);
    expect(stores.mappings.entityTypes()).toEqual([]);
  });
});
