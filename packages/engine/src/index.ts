/**
 * @prepflow/engine
 *
 * Schema-driven feature preprocessing: validate a batch, compute full-pass
 * analyzer constants, transform every record with them, derive the output
 * schema and freeze the lot into a servable artifact.
 */

export * from './errors.js';
export * from './schema/index.js';
export * from './analyzers/index.js';
export * from './constants/ConstantsTable.js';
export * from './transform/index.js';
export * from './metadata/deriveOutputSchema.js';
export * from './execution/BatchExecutor.js';
export * from './artifact/FrozenArtifact.js';
export * from './artifact/io.js';
export * from './pipeline/PreprocessingPipeline.js';
