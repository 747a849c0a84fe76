/**
 * Selector System
 * Main export file for selector path construction
 */

export * from './selector-builder';
