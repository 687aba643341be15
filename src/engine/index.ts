/**
 * Engine exports.
 */

export * from './garbage-collector';
export * from './maintenance';
export * from './purger';
export * from './reconciler';
export * from './retrieval-resolver';
export * from './retry';
export * from './state-machine';
export * from './upload-coordinator';
