import { ReasonCode } from '@tidyrow/types';
import type {
  CompiledCrossFieldRule,
  CompiledFieldRules,
  CompiledFieldSource,
  CompiledPipelineConfig,
  CompiledTransformStep
} from '../types';
import { ConfigurationError } from '../utils/errorUtils';
import { createComponentLogger } from '../utils/logger';
import { PipelineConfigSchema, type ParsedPipelineConfig, type RuleStep } from './schema';
import { RuleRegistry } from './RuleRegistry';

const logger = createComponentLogger('compileConfig');

function describeStep(step: RuleStep): string {
  return 'validate' in step ? `validate:${step.validate}` : `transform:${step.transform}`;
}

function compileSources(
  field: string,
  config: ParsedPipelineConfig,
  registry: RuleRegistry,
  issues: string[]
): CompiledFieldSource[] {
  const compiled: CompiledFieldSource[] = [];

  config.field_map[field].forEach((source, index) => {
    const where = `field_map.${field}[${index}]`;
    const definition = registry.getExtractor(source.extractor);
    if (!definition) {
      issues.push(`${where}: unknown extractor "${source.extractor}"`);
      return;
    }
    const bound = definition.bind(source.params);
    if (!bound.success) {
      issues.push(`${where}: invalid params for extractor "${source.extractor}": ${bound.error}`);
      return;
    }

    let columnPattern: RegExp | undefined;
    if (source.column_pattern !== undefined) {
      try {
        columnPattern = new RegExp(source.column_pattern, 'i');
      } catch {
        issues.push(`${where}: column_pattern "${source.column_pattern}" is not a valid regular expression`);
        return;
      }
    }

    compiled.push({
      column: source.column?.trim(),
      columnPattern,
      extractor: source.extractor,
      extract: bound.fn
    });
  });

  return compiled;
}

function compileRules(
  field: string,
  steps: RuleStep[],
  registry: RuleRegistry,
  issues: string[]
): CompiledFieldRules | undefined {
  const where = `rules.${field}`;
  const validateIndexes = steps.flatMap((step, index) => ('validate' in step ? [index] : []));
  const last = steps[steps.length - 1];

  if (validateIndexes.length !== 1 || !('validate' in last)) {
    issues.push(
      `${where}: rules must end with exactly one validate step and validate must come last ` +
      `(got ${steps.map(describeStep).join(' -> ')})`
    );
    return undefined;
  }

  const transforms: CompiledTransformStep[] = [];
  let ok = true;

  steps.slice(0, -1).forEach((step, index) => {
    if ('validate' in step) return;
    const definition = registry.getTransform(step.transform);
    if (!definition) {
      issues.push(`${where}[${index}]: unknown transform "${step.transform}"`);
      ok = false;
      return;
    }
    const bound = definition.bind(step.params);
    if (!bound.success) {
      issues.push(`${where}[${index}]: invalid params for transform "${step.transform}": ${bound.error}`);
      ok = false;
      return;
    }
    transforms.push({ name: step.transform, apply: bound.fn });
  });

  const validatorDefinition = registry.getValidator(last.validate);
  if (!validatorDefinition) {
    issues.push(`${where}[${steps.length - 1}]: unknown validator "${last.validate}"`);
    return undefined;
  }
  const validator = validatorDefinition.bind(last.params);
  if (!validator.success) {
    issues.push(`${where}[${steps.length - 1}]: invalid params for validator "${last.validate}": ${validator.error}`);
    return undefined;
  }

  return ok
    ? { transforms, validator: { name: last.validate, reason: last.reason, test: validator.fn } }
    : undefined;
}

function findRepeats(values: string[]): string[] {
  return values.filter((value, index) => values.indexOf(value) !== index);
}

/**
 * Validate a declarative pipeline configuration and resolve every named
 * extractor, transform and validator. Throws ConfigurationError listing
 * every contradiction found; nothing is processed with a broken config.
 */
export function compilePipelineConfig(
  input: unknown,
  registry: RuleRegistry = new RuleRegistry()
): CompiledPipelineConfig {
  const parsed = PipelineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }

  const config = parsed.data;
  const issues: string[] = [];
  const fields = Object.keys(config.field_map);
  const declared = new Set(fields);

  const fieldMap = new Map<string, CompiledFieldSource[]>();
  const rules = new Map<string, CompiledFieldRules>();

  for (const field of fields) {
    fieldMap.set(field, compileSources(field, config, registry, issues));

    const steps = config.rules[field];
    if (!steps) {
      issues.push(`rules.${field}: field is extracted but has no rules`);
      continue;
    }
    const compiled = compileRules(field, steps, registry, issues);
    if (compiled) rules.set(field, compiled);
  }

  for (const field of Object.keys(config.rules)) {
    if (!declared.has(field)) {
      issues.push(`rules.${field}: field is never extracted (missing from field_map)`);
    }
  }

  for (const field of config.required_fields) {
    if (!declared.has(field)) {
      issues.push(`required_fields: "${field}" is never extracted (missing from field_map)`);
    }
  }
  for (const field of findRepeats(config.required_fields)) {
    issues.push(`required_fields: "${field}" is listed more than once`);
  }

  if (config.identity_fields.length === 0) {
    issues.push('identity_fields: at least one field is needed to build the identity key');
  }
  for (const field of config.identity_fields) {
    if (!declared.has(field)) {
      issues.push(`identity_fields: "${field}" is never extracted (missing from field_map)`);
    }
  }
  for (const field of findRepeats(config.identity_fields)) {
    issues.push(`identity_fields: "${field}" is listed more than once`);
  }

  const crossFieldRules: CompiledCrossFieldRule[] = [];
  config.cross_field_rules.forEach((rule, index) => {
    const where = `cross_field_rules[${index}]`;
    const unknownFields = rule.fields.filter(field => !declared.has(field));
    if (unknownFields.length > 0) {
      issues.push(`${where}: fields never extracted: ${unknownFields.join(', ')}`);
    }
    const definition = registry.getCrossFieldRule(rule.rule);
    if (!definition) {
      issues.push(`${where}: unknown cross-field rule "${rule.rule}"`);
      return;
    }
    const bound = definition.bind(rule.params);
    if (!bound.success) {
      issues.push(`${where}: invalid params for "${rule.rule}": ${bound.error}`);
      return;
    }
    crossFieldRules.push({
      name: rule.rule,
      fields: rule.fields,
      reason: rule.reason ?? ReasonCode.CROSS_FIELD_INVALID,
      test: bound.fn
    });
  });

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  const gatedFields = [
    ...config.required_fields,
    ...config.identity_fields.filter(field => !config.required_fields.includes(field))
  ];

  logger.debug('Pipeline configuration compiled', {
    version: config.version,
    fields: fields.length,
    crossFieldRules: crossFieldRules.length
  });

  return {
    version: config.version,
    nullMarkers: new Set(config.null_markers.map(marker => marker.trim().toLowerCase())),
    fields,
    fieldMap,
    rules,
    crossFieldRules,
    requiredFields: config.required_fields,
    identityFields: config.identity_fields,
    gatedFields,
    retryPolicy: {
      maxAttempts: config.retry_policy.max_attempts,
      backoffBaseMs: config.retry_policy.backoff_base_ms,
      timeoutMs: config.retry_policy.timeout_ms
    }
  };
}
