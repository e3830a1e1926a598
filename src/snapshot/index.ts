/**
 * Snapshot Module
 */

export * from './engine.js';
export * from './guest-agent.js';
