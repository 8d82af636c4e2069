/**
 * @tradewire/types - Shared type definitions
 */

export * from './events';
export * from './benchmark';
export * from './metrics';
