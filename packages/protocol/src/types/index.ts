// Re-export all protocol types

export * from './keys.js';
export * from './subjects.js';
export * from './mappings.js';
export * from './snapshot.js';
