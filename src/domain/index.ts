/**
 * Domain model exports.
 */

export * from './errors';
export * from './events';
export * from './feature';
export * from './image';
export * from './job';
export * from './pipeline';
export * from './run';
export * from './target';
