// Store interfaces
// These define the contract for access data operations.
// Implementations (in-memory, or a caller's own) must fulfill these interfaces.

export type { MembershipGraph, SubjectLookup } from './membership-graph.js';
export type { MappingStore, PurgeSummary } from './mapping-store.js';
export type {
  StoreContext,
  StoreContextFactory,
  TransactionFn,
  TransactionalStoreContext,
} from './repository-context.js';
