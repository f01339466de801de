export * from './types.js';
export * from './defineTransform.js';
export * from './ops.js';
export * from './TransformRegistry.js';
