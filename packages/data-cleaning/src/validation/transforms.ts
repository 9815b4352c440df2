import { z } from 'zod';
import { format, isValid, parse } from 'date-fns';
import { getCountries, parsePhoneNumberFromString } from 'libphonenumber-js';
import type { FieldValue } from '@tidyrow/types';
import type { TransformDefinition } from '../types';
import { defineTransform, NoParams } from '../config/defineRule';

// Text transforms leave numeric values alone
function onText(fn: (text: string) => string): (value: FieldValue) => FieldValue {
  return value => (typeof value === 'string' ? fn(value) : value);
}

export const trim: TransformDefinition = defineTransform(NoParams, () => onText(text => text.trim()));

export const collapseWhitespace: TransformDefinition = defineTransform(NoParams, () =>
  onText(text => text.replace(/\s+/g, ' '))
);

export const uppercase: TransformDefinition = defineTransform(NoParams, () =>
  onText(text => text.toUpperCase())
);

export const lowercase: TransformDefinition = defineTransform(NoParams, () =>
  onText(text => text.toLowerCase())
);

/**
 * "john o'neil-SMITH" -> "John O'Neil-Smith"
 */
export const titleCase: TransformDefinition = defineTransform(NoParams, () =>
  onText(text =>
    text
      .toLowerCase()
      .replace(/(^|[^\p{L}])(\p{L})/gu, (_match: string, before: string, letter: string) => before + letter.toUpperCase())
  )
);

export const stripNonDigits: TransformDefinition = defineTransform(NoParams, () =>
  onText(text => text.replace(/\D/g, ''))
);

const ReplaceParams = z.object({
  pattern: z.string().min(1),
  replacement: z.string(),
  flags: z.string().regex(/^[gimsu]*$/).default('g')
}).strict();

export const replace: TransformDefinition = defineTransform(ReplaceParams, params => {
  const regex = new RegExp(params.pattern, params.flags);
  return onText(text => text.replace(regex, params.replacement));
});

const CorrectParams = z.object({
  table: z.record(z.string()),
  case_insensitive: z.boolean().default(false)
}).strict();

/**
 * Known recurring errors -> canonical spelling. Values not in the table
 * pass through unchanged.
 */
export const correct: TransformDefinition = defineTransform(CorrectParams, params => {
  const table = new Map<string, string>();
  for (const [from, to] of Object.entries(params.table)) {
    table.set(params.case_insensitive ? from.toLowerCase() : from, to);
  }
  return onText(text => table.get(params.case_insensitive ? text.toLowerCase() : text) ?? text);
});

export const DEFAULT_DATE_FORMATS = [
  'yyyy-MM-dd',
  'M/d/yyyy',
  'M-d-yyyy',
  'MMMM d, yyyy',
  'MMM d, yyyy',
  'd MMMM yyyy',
  "do 'of' MMMM yyyy",
  'do MMMM yyyy'
];

const StandardizeDateParams = z.object({
  formats: z.array(z.string().min(1)).min(1).default(DEFAULT_DATE_FORMATS)
}).strict();

// Reference date for date-fns parsing; only fills fields the format omits
const PARSE_REFERENCE = new Date(2000, 0, 1);

// date-fns reads `yyyy` as one to four digits, so "1/5/23" would parse as year 23
const FOUR_DIGIT_YEAR = /(^|\D)\d{4}(\D|$)/;

/**
 * Try each format in order and rewrite the first match as YYYY-MM-DD.
 * Formats with a `yyyy` year only match text that carries a four-digit year.
 * Unparseable text is returned unchanged so the validator can reject it.
 */
export const standardizeDate: TransformDefinition = defineTransform(StandardizeDateParams, params =>
  onText(text => {
    for (const pattern of params.formats) {
      if (pattern.includes('yyyy') && !FOUR_DIGIT_YEAR.test(text)) continue;
      const parsed = parse(text, pattern, PARSE_REFERENCE);
      if (isValid(parsed)) {
        return format(parsed, 'yyyy-MM-dd');
      }
    }
    return text;
  })
);

// "sw1a1aa" -> "sw1a 1aa": the inward code is always the last three characters
export const formatPostcode: TransformDefinition = defineTransform(NoParams, () =>
  onText(text => {
    const compact = text.replace(/\s+/g, '');
    if (compact.length < 5 || compact.length > 7) {
      return text;
    }
    return `${compact.slice(0, -3)} ${compact.slice(-3)}`;
  })
);

const NormalizePhoneParams = z.object({
  default_country: z.string().length(2).default('GB')
}).strict();

export const normalizePhone: TransformDefinition = defineTransform(NormalizePhoneParams, params => {
  const country = getCountries().find(code => code === params.default_country.toUpperCase());
  if (!country) {
    throw new Error(`Unsupported default_country: ${params.default_country}`);
  }
  return value => {
    const parsed = parsePhoneNumberFromString(String(value), country);
    return parsed && parsed.isValid() ? parsed.number : value;
  };
});

export const builtInTransforms: Record<string, TransformDefinition> = {
  trim,
  collapseWhitespace,
  uppercase,
  lowercase,
  titleCase,
  stripNonDigits,
  replace,
  correct,
  standardizeDate,
  formatPostcode,
  normalizePhone
};
