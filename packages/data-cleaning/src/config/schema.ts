import { z } from 'zod';

const ParamsSchema = z.record(z.unknown()).optional();

const FieldSourceSchema = z
  .object({
    column: z.string().min(1).optional(),
    column_pattern: z.string().min(1).optional(),
    extractor: z.string().min(1),
    params: ParamsSchema
  })
  .refine(source => (source.column === undefined) !== (source.column_pattern === undefined), {
    message: 'Exactly one of column or column_pattern must be set'
  });

const TransformStepSchema = z.object({
  transform: z.string().min(1),
  params: ParamsSchema
}).strict();

const ValidateStepSchema = z.object({
  validate: z.string().min(1),
  reason: z.string().regex(/^[A-Z][A-Z0-9_]*$/, 'Reason codes are UPPER_SNAKE_CASE'),
  params: ParamsSchema
}).strict();

export const RuleStepSchema = z.union([TransformStepSchema, ValidateStepSchema]);

const CrossFieldRuleSchema = z.object({
  rule: z.string().min(1),
  fields: z.array(z.string().min(1)).min(1),
  reason: z.string().regex(/^[A-Z][A-Z0-9_]*$/).optional(),
  params: ParamsSchema
});

// Declarative pipeline configuration; functions are referenced by registry name
export const PipelineConfigSchema = z.object({
  version: z.string().min(1),
  null_markers: z.array(z.string()).default(['', 'n/a', 'na', 'null', 'none', '-', '--']),
  field_map: z.record(z.array(FieldSourceSchema).min(1)),
  rules: z.record(z.array(RuleStepSchema).min(1)),
  cross_field_rules: z.array(CrossFieldRuleSchema).default([]),
  required_fields: z.array(z.string().min(1)),
  identity_fields: z.array(z.string().min(1)),
  retry_policy: z.object({
    max_attempts: z.number().int().min(1).max(10),
    backoff_base_ms: z.number().int().min(0),
    timeout_ms: z.number().int().positive().default(10000)
  })
});

export type PipelineConfig = z.input<typeof PipelineConfigSchema>;
export type ParsedPipelineConfig = z.output<typeof PipelineConfigSchema>;
export type RuleStep = z.infer<typeof RuleStepSchema>;

// Runtime environment; LOG_LEVEL is matched case-insensitively
export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export const RuntimeEnvSchema = z.object({
  NODE_ENV: z.string().optional(),
  LOG_LEVEL: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).default('info')
});

export type RuntimeEnv = z.infer<typeof RuntimeEnvSchema>;
