/**
 * Framework System
 * Main export file for framework signature matching
 */

export * from './framework.types';
export * from './framework.registry';
export * from './profiles';
