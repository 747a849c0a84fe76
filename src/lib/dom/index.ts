/**
 * DOM Access
 * Main export file for document helpers
 */

export * from './dom.types';
export * from './dom.utils';
