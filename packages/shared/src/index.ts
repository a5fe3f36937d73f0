// @showtime-console/shared
// Snapshot types, cache store, and utilities

export * from './types/snapshot.js';
export * from './types/theater.js';
export * from './types/result.js';
export * from './errors.js';
export * from './clock.js';
export * from './cache/store.js';
