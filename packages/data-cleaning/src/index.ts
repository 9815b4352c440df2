// Main exports for the data-cleaning package

// Types
export * from './types';

// Configuration
export { LOG_LEVELS, PipelineConfigSchema, RuntimeEnvSchema } from './config/schema';
export type { PipelineConfig, ParsedPipelineConfig, RuleStep, RuntimeEnv } from './config/schema';
export { compilePipelineConfig } from './config/compileConfig';
export { RuleRegistry } from './config/RuleRegistry';
export {
  defineRule,
  defineExtractor,
  defineTransform,
  defineValidator,
  defineCrossFieldRule,
  NoParams
} from './config/defineRule';
export { CONTACT_RECORDS_CONFIG, compileContactRecordsConfig } from './config/houseStyle';

// Extraction
export { FieldExtractor, asRawRow } from './extraction/FieldExtractor';
export { builtInExtractors, serialToIsoDate } from './extraction/extractors';

// Row sources
export { readCsvRows } from './parsers/CsvRowSource';
export type { CsvRowSourceOptions } from './parsers/CsvRowSource';

// Normalization, validation and deduplication
export {
  SchemaValidator,
  DataNormalizer,
  DeduplicationEngine,
  ETLPipeline,
  builtInTransforms,
  builtInValidators,
  builtInCrossFieldRules
} from './validation';

// Writing and orchestration
export { RecordWriter } from './workers/RecordWriter';
export type { AssemblyResult } from './workers/RecordWriter';
export { WriterLane } from './workers/WriterLane';
export { RunTracker } from './workers/RunTracker';
export { ETLOrchestrator } from './workers/ETLOrchestrator';
export type { ETLOrchestratorOptions, RowSource } from './workers/ETLOrchestrator';

// Utilities
export { ConfigurationError, getErrorMessage, isError } from './utils/errorUtils';
export { createComponentLogger, resolveRuntimeEnv, default as logger } from './utils/logger';
export type { ResolvedRuntimeEnv } from './utils/logger';

// Re-export shared record types for convenience
export { ReasonCode } from '@tidyrow/types';
export type {
  DestinationStore,
  DestinationRecord,
  CommitResult,
  ExistingIdentity,
  RunStatus,
  RunAbort,
  CandidateRecord,
  NormalizedField
} from '@tidyrow/types';
