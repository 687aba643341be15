/**
 * Potato Registry: artifact storage and metadata-consistency engine.
 *
 * Public exports for programmatic use. The HTTP server entry point is
 * src/main.ts.
 */

export { createApp, createAppContext } from './server';
export type { AppContext, AppContextOverrides } from './server';
export { Registry } from './registry';
export type { RegistryOptions } from './registry';
export { DEFAULT_CONFIG, loadConfig } from './config';
export type { RegistryConfig } from './config';
export { systemClock, ageMs } from './clock';
export type { Clock } from './clock';
export * from './logger';
export * from './domain';
export * from './engine';
export * from './storage';
