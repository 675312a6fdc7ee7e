/**
 * Domain model exports.
 */

export * from './errors';
export * from './events';
export * from './identifier';
export * from './lifecycle';
export * from './node';
export * from './result';
export * from './test-tree';
