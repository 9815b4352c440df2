import type {
  CandidateFieldSet,
  CrossFieldFailure,
  FieldValue,
  NormalizedField,
  RawScalar,
  ReasonCodeValue,
  RowOutcome,
  RunSummary,
  TargetField
} from '@tidyrow/types';

// Registry entries are bound to their params once, at compile time
export type BindResult<F> = { success: true; fn: F } | { success: false; error: string };

export interface Bindable<F> {
  bind(params: unknown): BindResult<F>;
}

export type ExtractFn = (raw: Exclude<RawScalar, null | undefined>) => FieldValue | undefined;
export type TransformFn = (value: FieldValue) => FieldValue;
export type ValidateFn = (value: FieldValue) => boolean;
export type CrossFieldFn = (values: FieldValue[]) => boolean;

export type ExtractorDefinition = Bindable<ExtractFn>;
export type TransformDefinition = Bindable<TransformFn>;
export type ValidatorDefinition = Bindable<ValidateFn>;
export type CrossFieldDefinition = Bindable<CrossFieldFn>;

// Compiled configuration
export interface CompiledFieldSource {
  column?: string;
  columnPattern?: RegExp;
  extractor: string;
  extract: ExtractFn;
}

export interface CompiledTransformStep {
  name: string;
  apply: TransformFn;
}

export interface CompiledFieldRules {
  transforms: CompiledTransformStep[];
  validator: {
    name: string;
    reason: ReasonCodeValue;
    test: ValidateFn;
  };
}

export interface CompiledCrossFieldRule {
  name: string;
  fields: TargetField[];
  reason: ReasonCodeValue;
  test: CrossFieldFn;
}

export interface RetryPolicy {
  maxAttempts: number;
  backoffBaseMs: number;
  timeoutMs: number;
}

export interface CompiledPipelineConfig {
  version: string;
  nullMarkers: ReadonlySet<string>;
  fields: readonly TargetField[];
  fieldMap: ReadonlyMap<TargetField, readonly CompiledFieldSource[]>;
  rules: ReadonlyMap<TargetField, CompiledFieldRules>;
  crossFieldRules: readonly CompiledCrossFieldRule[];
  requiredFields: readonly TargetField[];
  identityFields: readonly TargetField[];
  // required fields followed by identity fields not already required
  gatedFields: readonly TargetField[];
  retryPolicy: RetryPolicy;
}

// Stage results
export type ExtractionResult =
  | { ok: true; candidates: CandidateFieldSet }
  | { ok: false; detail: string };

export interface NormalizationResult {
  fields: Record<TargetField, NormalizedField>;
  crossFieldFailures: CrossFieldFailure[];
}

export type ProgressCallback = (processedRows: number, step: string) => void;

export interface RunOptions {
  signal?: AbortSignal;
  progressCallback?: ProgressCallback;
}

export interface RunResult {
  runId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  summary: RunSummary;
}

export type { RowOutcome, RunSummary };
