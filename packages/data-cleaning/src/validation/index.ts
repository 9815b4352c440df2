// Normalization, validation and deduplication components

export { default as SchemaValidator } from './SchemaValidator';
export { default as DataNormalizer } from './DataNormalizer';
export { default as DeduplicationEngine } from './DeduplicationEngine';
export { default as ETLPipeline } from './ETLPipeline';

export { builtInTransforms } from './transforms';
export { builtInValidators, builtInCrossFieldRules } from './SchemaValidator';

// Re-export types for convenience
export type { NormalizationResult, CompiledPipelineConfig } from '../types';
