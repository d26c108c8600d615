// Tests for the in-memory store context

import { describe, it, expect } from 'vitest';
import { NotFoundError, asUser, stringCodecs } from '@grantgraph/protocol';
import { createInMemoryStoreContext } from './index.js';

describe('createInMemoryStoreContext', () => {
  it('should share subjects between the graph and the mapping store', () => {
    const stores = createInMemoryStoreContext(stringCodecs);
    stores.graph.addUser('kishan');
    stores.mappings.addComponentMapping(asUser('kishan'), 'OrderSummary', 'View');

    expect(stores.mappings.hasComponentMapping(asUser('kishan'), 'OrderSummary', 'View')).toBe(true);
    expect(() =>
      stores.mappings.addComponentMapping(asUser('mae'), 'OrderSummary', 'View')
    ).toThrow(NotFoundError);
  });

  describe('transaction', () => {
    it('should return the result of the callback', () => {
      const stores = createInMemoryStoreContext(stringCodecs);

      const result = stores.transaction((s) => {
        s.graph.addUser('kishan');
        return s.graph.users().length;
      });

      expect(result).toBe(1);
      expect(stores.graph.users()).toEqual(['kishan']);
    });

    it('should roll back both stores when the callback throws', () => {
      const stores = createInMemoryStoreContext(stringCodecs);
      stores.graph.addUser('kishan');
      stores.mappings.addEntityType('Clients');

      expect(() =>
        stores.transaction((s) => {
          s.graph.addGroup('Sales');
          s.graph.addUserToGroupEdge('kishan', 'Sales');
          s.mappings.addEntity('Clients', 'CompanyA');
          s.graph.addUser('kishan');
        })
      ).toThrow("User 'kishan' in argument 'user' already exists.");

      expect(stores.graph.groups()).toEqual([]);
      expect(stores.graph.groupsOfUser('kishan')).toEqual([]);
      expect(stores.mappings.entitiesOf('Clients')).toEqual([]);
    });

    it('should let nested transactions join the outer one', () => {
      const stores = createInMemoryStoreContext(stringCodecs);

      expect(() =>
        stores.transaction((outer) => {
          outer.graph.addUser('kishan');
          stores.transaction((inner) => inner.graph.addGroup('Sales'));
          throw new Error('abort');
        })
      ).toThrow('abort');

      expect(stores.graph.users()).toEqual([]);
      expect(stores.graph.groups()).toEqual([]);
    });
  });

  it('should empty both stores on clear', () => {
    const stores = createInMemoryStoreContext(stringCodecs);
    stores.graph.addUser('kishan');
    stores.mappings.addEntityType('Clients');
    stores.clear();

    expect(stores.graph.users()).toEqual([]);
    expect(stores.mappings.entityTypes()).toEqual([]);
  });
});
