import type { AccessGraphCodecs } from '@grantgraph/protocol';
import type { MembershipGraph } from './membership-graph.js';
import type { MappingStore } from './mapping-store.js';

/**
 * StoreContext bundles the membership graph and the mapping store.
 *
 * This is the primary dependency injection point for the runtime.
 * Pass a StoreContext to any code that needs access data, and you can swap
 * implementations without changing the consuming code.
 *
 * Example usage:
 * ```typescript
 * const stores = createInMemoryStoreContext(stringCodecs);
 * const access = new AccessManager({ codecs: stringCodecs, stores: () => stores });
 * ```
 */
export interface StoreContext<TUser, TGroup, TComponent, TAccess> {
  readonly codecs: AccessGraphCodecs<TUser, TGroup, TComponent, TAccess>;
  readonly graph: MembershipGraph<TUser, TGroup>;
  readonly mappings: MappingStore<TUser, TGroup, TComponent, TAccess>;
}

/**
 * Factory type for creating a StoreContext.
 * Implementations can use this to provide their own initialization logic.
 */
export type StoreContextFactory<TUser, TGroup, TComponent, TAccess> = (
  codecs: AccessGraphCodecs<TUser, TGroup, TComponent, TAccess>
) => TransactionalStoreContext<TUser, TGroup, TComponent, TAccess>;

/**
 * Transaction wrapper type for atomic operations across stores.
 */
export type TransactionFn<TUser, TGroup, TComponent, TAccess, T> = (
  stores: StoreContext<TUser, TGroup, TComponent, TAccess>
) => T;

/**
 * Extended context with transaction support.
 */
export interface TransactionalStoreContext<TUser, TGroup, TComponent, TAccess>
  extends StoreContext<TUser, TGroup, TComponent, TAccess> {
  /**
   * Execute a function as one unit. Either everything it does is kept, or,
   * if it throws, the stores are put back as they were and the error is
   * rethrown.
   *
   * @param fn Function to execute within the transaction
   * @returns The return value of the function
   */
  transaction<T>(fn: TransactionFn<TUser, TGroup, TComponent, TAccess, T>): T;

  /** Remove everything from both stores */
  clear(): void;
}
