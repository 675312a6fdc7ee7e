export * from './event-bus';
export * from './executor';
export * from './listener';
export * from './outcomes';
export * from './state-machine';
