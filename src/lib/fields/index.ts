/**
 * Field System
 * Main export file for field selector inference
 */

export * from './field.types';
export * from './field.errors';
export * from './field-inferencer';
export * from './structure.strategies';
