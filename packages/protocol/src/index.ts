// @grantgraph/protocol
// Types, errors and validation shared by the stores and the runtime.

export * from './types/index.js';
export * from './errors.js';
export * from './validation/names.js';
export * from './validation/snapshot.js';
