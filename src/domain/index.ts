/**
 * Domain model exports.
 */

export * from './artifact';
export * from './errors';
export * from './version';
