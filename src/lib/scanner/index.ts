/**
 * Scanner System
 * Main export file for structural pattern detection
 */

export * from './scanner.types';
export * from './scanner.strategy';
export * from './scanner.utils';
export * from './pattern-scanner';
export * from './strategies';
