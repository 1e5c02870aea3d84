/**
 * Central export point for all type definitions
 */

export * from './extraction';
export * from './records';
