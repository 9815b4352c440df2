import type { CandidateField, CandidateFieldSet, RawRow, RawScalar } from '@tidyrow/types';
import type { CompiledFieldSource, CompiledPipelineConfig, ExtractionResult } from '../types';

function isRawScalar(value: unknown): value is RawScalar {
  return (
    value === null ||
    value === undefined ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

/**
 * A row is readable when it is a plain column -> scalar mapping.
 */
export function asRawRow(input: unknown): { ok: true; row: RawRow } | { ok: false; detail: string } {
  if (input === null || typeof input !== 'object') {
    return { ok: false, detail: `row is ${input === null ? 'null' : typeof input}, expected a column mapping` };
  }
  if (Array.isArray(input)) {
    return { ok: false, detail: 'row is an array, expected a column mapping' };
  }
  const proto: unknown = Object.getPrototypeOf(input);
  if (proto !== Object.prototype && proto !== null) {
    return { ok: false, detail: 'row is not a plain object' };
  }

  const row: RawRow = {};
  for (const [column, value] of Object.entries(input)) {
    if (!isRawScalar(value)) {
      return { ok: false, detail: `column "${column}" holds a non-scalar value` };
    }
    row[column] = value;
  }
  return { ok: true, row };
}

/**
 * Pulls the configured target fields out of a raw row. Pure: the same row
 * and configuration always give the same candidate set. Malformed cells
 * degrade to absent; only an unreadable row is a failure.
 */
export class FieldExtractor {
  private readonly config: CompiledPipelineConfig;

  constructor(config: CompiledPipelineConfig) {
    this.config = config;
  }

  extract(input: unknown): ExtractionResult {
    const readable = asRawRow(input);
    if (!readable.ok) {
      return { ok: false, detail: readable.detail };
    }

    const row = readable.row;
    const columns = Object.keys(row);
    const candidates: CandidateFieldSet = {};

    for (const field of this.config.fields) {
      candidates[field] = this.extractField(row, columns, this.config.fieldMap.get(field) ?? []);
    }

    return { ok: true, candidates };
  }

  // Sources are tried in declared priority order; first success wins
  private extractField(row: RawRow, columns: string[], sources: readonly CompiledFieldSource[]): CandidateField {
    for (const source of sources) {
      for (const column of this.matchColumns(columns, source)) {
        const raw = row[column];
        if (raw === null || raw === undefined || this.isBlank(raw)) continue;

        const value = source.extract(raw);
        if (value !== undefined) {
          return { present: true, value, provenance: { source_column: column, raw_value: raw } };
        }
      }
    }
    return { present: false };
  }

  private matchColumns(columns: string[], source: CompiledFieldSource): string[] {
    const { column, columnPattern } = source;
    if (column !== undefined) {
      const wanted = column.toLowerCase();
      return columns.filter(candidate => candidate.trim().toLowerCase() === wanted);
    }
    if (columnPattern) {
      return columns.filter(candidate => columnPattern.test(candidate.trim()));
    }
    return [];
  }

  private isBlank(raw: Exclude<RawScalar, null | undefined>): boolean {
    if (typeof raw === 'number') return Number.isNaN(raw);
    if (typeof raw === 'string') return this.config.nullMarkers.has(raw.trim().toLowerCase());
    return false;
  }
}

export default FieldExtractor;
