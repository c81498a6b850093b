/**
 * Core utilities barrel exports
 */

// Math utilities
export * from './mathUtils';
