export type * from './value.js';
export type * from './context.js';
export type * from './module.js';
export type * from './task-result.js';
export type * from './events.js';
