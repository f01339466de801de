export * from './types.js';
export * from './builtins.js';
export * from './specs.js';
export * from './AnalyzerRegistry.js';
export * from './computeConstants.js';
