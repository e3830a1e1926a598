/**
 * SSH Module
 */

export * from './types.js';
export * from './transport.js';
export * from './node-ssh-transport.js';
export * from './credential.js';
export * from './editors.js';
export * from './session.js';
