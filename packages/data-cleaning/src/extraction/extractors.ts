import { z } from 'zod';
import type { ExtractorDefinition } from '../types';
import { defineExtractor, NoParams } from '../config/defineRule';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
// Spreadsheet day 0 once the 1900 leap-year bug is accounted for
const SERIAL_EPOCH_MS = Date.UTC(1899, 11, 30);
// 1900-03-01 .. 9999-12-31
const MIN_DATE_SERIAL = 61;
const MAX_DATE_SERIAL = 2958465;

export function serialToIsoDate(serial: number): string | undefined {
  if (!Number.isFinite(serial) || serial < MIN_DATE_SERIAL || serial > MAX_DATE_SERIAL) {
    return undefined;
  }
  return new Date(SERIAL_EPOCH_MS + Math.floor(serial) * MS_PER_DAY).toISOString().slice(0, 10);
}

function parseNumeric(text: string): number | undefined {
  const cleaned = text.trim().replace(/,/g, '');
  if (!/^[+-]?(\d+(\.\d*)?|\.\d+)$/.test(cleaned)) {
    return undefined;
  }
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Text cells pass through untouched; whitespace and casing are for the
 * normalization rules to deal with.
 */
export const text: ExtractorDefinition = defineExtractor(NoParams, () => raw => {
  if (typeof raw === 'string') return raw;
  if (typeof raw === 'number' && Number.isFinite(raw)) return String(raw);
  return undefined;
});

export const integer: ExtractorDefinition = defineExtractor(NoParams, () => raw => {
  const value = typeof raw === 'number' ? raw : typeof raw === 'string' ? parseNumeric(raw) : undefined;
  return value !== undefined && Number.isInteger(value) ? value : undefined;
});

export const number: ExtractorDefinition = defineExtractor(NoParams, () => raw => {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : undefined;
  if (typeof raw === 'string') return parseNumeric(raw);
  return undefined;
});

// Dates arrive either as free text or as spreadsheet serial day numbers
export const date: ExtractorDefinition = defineExtractor(NoParams, () => raw => {
  if (typeof raw === 'number') return serialToIsoDate(raw);
  if (typeof raw === 'string') return raw;
  return undefined;
});

const PatternParams = z.object({
  pattern: z.string().min(1),
  flags: z.string().regex(/^[imsu]*$/).optional(),
  group: z.number().int().min(0).default(0)
}).strict();

export const pattern: ExtractorDefinition = defineExtractor(PatternParams, params => {
  const regex = new RegExp(params.pattern, params.flags);
  return raw => {
    if (typeof raw !== 'string' && typeof raw !== 'number') return undefined;
    const match = String(raw).match(regex);
    const captured = match?.[params.group];
    return captured === undefined || captured === '' ? undefined : captured;
  };
});

export const builtInExtractors: Record<string, ExtractorDefinition> = {
  text,
  integer,
  number,
  date,
  pattern
};
