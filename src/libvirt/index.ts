/**
 * libvirt Module
 *
 * Exports libvirt types, the virsh executor, command builders, XML helpers,
 * guest address discovery and the hypervisor backend.
 */

export * from './types.js';
export * from './executor.js';
export * from './commands.js';
export * from './xml.js';
export * from './hypervisor.js';
export * from './interfaces.js';
export * from './verbose.js';
