// In-memory store implementations
//
// The default backing for an access manager: everything lives in Maps
// indexed by codec key. Data does not persist between restarts; use the
// runtime's snapshot export if it has to.

import type { AccessGraphCodecs } from '@grantgraph/protocol';
import type { TransactionalStoreContext, TransactionFn } from '../interfaces/index.js';
import {
  createInMemoryMembershipGraph,
  type InMemoryMembershipGraph,
  type MembershipGraphData,
} from './membership-graph.js';
import {
  createInMemoryMappingStore,
  type InMemoryMappingStore,
  type MappingStoreData,
} from './mapping-store.js';

export {
  createInMemoryMembershipGraph,
  type InMemoryMembershipGraph,
  type MembershipGraphData,
} from './membership-graph.js';
export {
  createInMemoryMappingStore,
  type InMemoryMappingStore,
  type MappingStoreData,
  type CreateInMemoryMappingStoreInput,
} from './mapping-store.js';

/**
 * Extended store context with access to underlying data.
 */
export interface InMemoryStoreContext<TUser, TGroup, TComponent, TAccess>
  extends TransactionalStoreContext<TUser, TGroup, TComponent, TAccess> {
  readonly graph: InMemoryMembershipGraph<TUser, TGroup>;
  readonly mappings: InMemoryMappingStore<TUser, TGroup, TComponent, TAccess>;
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: {
    graph: MembershipGraphData<TUser, TGroup>;
    mappings: MappingStoreData<TComponent, TAccess>;
  };
}

/**
 * Create a complete in-memory store context.
 *
 * @example
 * ```typescript
 * const stores = createInMemoryStoreContext(stringCodecs);
 *
 * stores.graph.addUser('kishan');
 * stores.mappings.addEntityType('Clients');
 *
 * // All or nothing
 * stores.transaction((s) => {
 *   s.graph.addGroup('sales');
 *   s.graph.addUserToGroupEdge('kishan', 'sales');
 * });
 * ```
 */
export function createInMemoryStoreContext<TUser, TGroup, TComponent, TAccess>(
  codecs: AccessGraphCodecs<TUser, TGroup, TComponent, TAccess>
): InMemoryStoreContext<TUser, TGroup, TComponent, TAccess> {
  const graph = createInMemoryMembershipGraph({ user: codecs.user, group: codecs.group });
  const mappings = createInMemoryMappingStore({ codecs, subjects: graph });
  let depth = 0;

  const context: InMemoryStoreContext<TUser, TGroup, TComponent, TAccess> = {
    codecs,
    graph,
    mappings,

    transaction<T>(fn: TransactionFn<TUser, TGroup, TComponent, TAccess, T>): T {
      // Nested transactions join the outermost one
      if (depth > 0) {
        return fn(context);
      }
      const restoreGraph = graph._checkpoint();
      const restoreMappings = mappings._checkpoint();
      depth += 1;
      try {
        return fn(context);
      } catch (error) {
        restoreGraph();
        restoreMappings();
        throw error;
      } finally {
        depth -= 1;
      }
    },

    clear() {
      graph.clear();
      mappings.clear();
    },

    _data: {
      graph: graph._data,
      mappings: mappings._data,
    },
  };

  return context;
}
