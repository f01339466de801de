export * from './types.js';
export * from './Schema.js';
export * from './validate.js';
