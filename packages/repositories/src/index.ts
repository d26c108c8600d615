// @grantgraph/repositories
// Store interfaces and implementations for the membership graph and mappings.
//
// This package defines the "contract" for access data. The in-memory
// implementation fulfills it; callers may supply their own, and the runtime
// works against the interfaces only.
//
// Key concepts:
// - Interfaces define WHAT operations are available, not HOW they're implemented
// - StoreContext bundles both stores for dependency injection
// - Transactions make multi-step changes all or nothing

export * from './interfaces/index.js';
export * from './in-memory/index.js';
