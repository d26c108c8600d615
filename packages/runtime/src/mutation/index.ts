// Mutation module
// The single writer, including cascading removal.

export { MutationEngine, type MutationEngineOptions } from './engine.js';
export type { MutationOperation, MutationRecord, CascadeSummary } from './types.js';
