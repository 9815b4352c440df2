import { z } from 'zod';
import { format, isValid, parse } from 'date-fns';
import type { CrossFieldFailure, FieldValue, NormalizedField, TargetField } from '@tidyrow/types';
import type {
  CompiledCrossFieldRule,
  CrossFieldDefinition,
  ValidatorDefinition
} from '../types';
import { defineCrossFieldRule, defineValidator, NoParams } from '../config/defineRule';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
// Canonical UK postcode: upper case, single space before the inward code
const UK_POSTCODE = /^(GIR 0AA|[A-Z]{1,2}\d[A-Z\d]? \d[A-Z]{2})$/;
const E164_PHONE = /^\+[1-9]\d{6,14}$/;

function isCalendarDate(text: string): boolean {
  if (!ISO_DATE.test(text)) return false;
  const parsed = parse(text, 'yyyy-MM-dd', new Date(2000, 0, 1));
  return isValid(parsed) && format(parsed, 'yyyy-MM-dd') === text;
}

export const nonEmpty: ValidatorDefinition = defineValidator(NoParams, () => value =>
  typeof value === 'number' || value.trim().length > 0
);

const IsoDateParams = z.object({
  min: z.string().regex(ISO_DATE).optional(),
  max: z.string().regex(ISO_DATE).optional()
}).strict();

export const isoDate: ValidatorDefinition = defineValidator(IsoDateParams, params => value => {
  if (typeof value !== 'string' || !isCalendarDate(value)) return false;
  if (params.min !== undefined && value < params.min) return false;
  if (params.max !== undefined && value > params.max) return false;
  return true;
});

export const postcode: ValidatorDefinition = defineValidator(NoParams, () => value =>
  typeof value === 'string' && UK_POSTCODE.test(value)
);

export const phone: ValidatorDefinition = defineValidator(NoParams, () => value =>
  typeof value === 'string' && E164_PHONE.test(value)
);

const MaxLengthParams = z.object({ max: z.number().int().positive() }).strict();

export const maxLength: ValidatorDefinition = defineValidator(MaxLengthParams, params => value =>
  String(value).length <= params.max
);

const IntegerRangeParams = z.object({
  min: z.number().int().optional(),
  max: z.number().int().optional()
}).strict();

export const integerRange: ValidatorDefinition = defineValidator(IntegerRangeParams, params => value =>
  typeof value === 'number' &&
  Number.isInteger(value) &&
  (params.min === undefined || value >= params.min) &&
  (params.max === undefined || value <= params.max)
);

const OneOfParams = z.object({ values: z.array(z.union([z.string(), z.number()])).min(1) }).strict();

export const oneOf: ValidatorDefinition = defineValidator(OneOfParams, params => {
  const allowed = new Set<FieldValue>(params.values);
  return value => allowed.has(value);
});

const MatchesParams = z.object({
  pattern: z.string().min(1),
  flags: z.string().regex(/^[imsu]*$/).optional()
}).strict();

export const matches: ValidatorDefinition = defineValidator(MatchesParams, params => {
  const regex = new RegExp(params.pattern, params.flags);
  return value => regex.test(String(value));
});

export const builtInValidators: Record<string, ValidatorDefinition> = {
  nonEmpty,
  isoDate,
  postcode,
  phone,
  maxLength,
  integerRange,
  oneOf,
  matches
};

// fields: [later, earlier]; ISO dates compare as strings
export const notBefore: CrossFieldDefinition = defineCrossFieldRule(NoParams, () => values => {
  if (values.length !== 2) return false;
  const [later, earlier] = values;
  return String(later) >= String(earlier);
});

export const builtInCrossFieldRules: Record<string, CrossFieldDefinition> = {
  notBefore
};

/**
 * Evaluates cross-field rules once every single-field validation for a
 * row is done. A rule is only checked when all of its fields are valid;
 * absent optional fields leave nothing to compare.
 */
export class SchemaValidator {
  private readonly rules: readonly CompiledCrossFieldRule[];

  constructor(rules: readonly CompiledCrossFieldRule[]) {
    this.rules = rules;
  }

  validateCrossFields(fields: Record<TargetField, NormalizedField>): CrossFieldFailure[] {
    const failures: CrossFieldFailure[] = [];

    for (const rule of this.rules) {
      const values: FieldValue[] = [];
      for (const name of rule.fields) {
        const field = fields[name];
        if (field?.status === 'valid') {
          values.push(field.value);
        }
      }
      if (values.length !== rule.fields.length) continue;

      if (!rule.test(values)) {
        failures.push({ rule: rule.name, fields: [...rule.fields], reason: rule.reason });
      }
    }

    return failures;
  }
}

export default SchemaValidator;
