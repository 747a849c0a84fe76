/**
 * Analysis System
 * Main export file for page analysis and extraction previews
 */

export * from './analysis.types';
export * from './metadata';
export * from './statistics';
export * from './pagination';
export * from './preview';
export * from './page-analyzer';
