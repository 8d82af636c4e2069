/**
 * @tradewire/utils - Shared utilities
 */

export * from './logger';
export * from './task-supervisor';
export * from './timing';
