import type { CandidateFieldSet, NormalizedField, TargetField } from '@tidyrow/types';
import type { CompiledPipelineConfig, NormalizationResult } from '../types';
import { SchemaValidator } from './SchemaValidator';

/**
 * Rule-driven normalization for the cleaning pipeline.
 *
 * Per field, transforms run in declared order, each receiving the previous
 * output, and the validator runs last. Fields absent after extraction skip
 * the rules entirely and stay `absent`. Cross-field rules run after every
 * single-field validation of the row. Holds no per-row state.
 */
export class DataNormalizer {
  private readonly config: CompiledPipelineConfig;
  private readonly schemaValidator: SchemaValidator;

  constructor(config: CompiledPipelineConfig) {
    this.config = config;
    this.schemaValidator = new SchemaValidator(config.crossFieldRules);
  }

  normalizeRecord(candidates: CandidateFieldSet): NormalizationResult {
    const fields: Record<TargetField, NormalizedField> = {};

    for (const field of this.config.fields) {
      fields[field] = this.normalizeField(field, candidates);
    }

    return {
      fields,
      crossFieldFailures: this.schemaValidator.validateCrossFields(fields)
    };
  }

  normalizeField(field: TargetField, candidates: CandidateFieldSet): NormalizedField {
    const candidate = candidates[field];
    const rules = this.config.rules.get(field);

    if (!candidate || !candidate.present || !rules) {
      return { field, status: 'absent' };
    }

    let value = candidate.value;
    for (const step of rules.transforms) {
      value = step.apply(value);
    }

    if (rules.validator.test(value)) {
      return { field, status: 'valid', value, provenance: candidate.provenance };
    }

    return {
      field,
      status: 'invalid',
      reason: rules.validator.reason,
      value,
      provenance: candidate.provenance
    };
  }
}

export default DataNormalizer;
