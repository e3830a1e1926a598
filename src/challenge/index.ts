/**
 * Challenge Module
 */

export * from './types.js';
export * from './threshold.js';
export * from './validator.js';
export * from './loader.js';
export * from './assertions.js';
export * from './hints.js';
export * from './runner.js';
