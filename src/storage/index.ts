/**
 * Storage exports.
 */

export * from './store';
export * from './fs-blob-store';
export * from './sqlite-catalog';
export * from './cached-catalog';
