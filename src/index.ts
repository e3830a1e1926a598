/**
 * labkeeper library entry point.
 */

export * from './api.js';
export * from './core/errors.js';
export * from './challenge/index.js';
export * from './snapshot/index.js';
export * from './ssh/index.js';
export * from './libvirt/index.js';
export { loadSettings, resolveSettings } from './config/resolver.js';
export type { ResolvedSettings } from './config/types.js';
export { Logger } from './lib/logger.js';
export type { Clock } from './lib/clock.js';
export { systemClock } from './lib/clock.js';
