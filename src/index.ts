/**
 * convergent - drive remote infrastructure objects to a desired state
 */

export * from './core.js';
export * from './resources/index.js';
