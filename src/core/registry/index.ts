/**
 * Registry exports barrel file.
 */
export * from './entity-registry.js';
