/**
 * @tradewire/transport - Pipeline transport and wire codec
 */

export * from './codec';
export * from './endpoint';
export * from './errors';
export * from './framing';
export * from './push-socket';
export * from './pull-socket';
export * from './publish-client';
