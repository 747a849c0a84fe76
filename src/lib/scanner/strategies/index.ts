/**
 * Scanner Strategies
 * Export all item detection strategies
 */

export * from './repeated-class.strategy';
export * from './tag-class.strategy';
export * from './semantic-tag.strategy';
export * from './container-child.strategy';
export * from './link-path.strategy';
export * from './link-density.strategy';
