/**
 * Event assertion facility: record a session and verify its trace.
 */

export * from './conditions';
export * from './events';
export * from './recorder';
export * from './test-kit';
