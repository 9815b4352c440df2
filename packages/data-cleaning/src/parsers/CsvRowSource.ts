import csv from 'csv-parser';
import { Readable } from 'stream';
import { createComponentLogger } from '../utils/logger';

const logger = createComponentLogger('CsvRowSource');

export interface CsvRowSourceOptions {
  separator?: string;
  skipLines?: number;
}

function isBlankRow(row: Record<string, unknown>): boolean {
  return Object.values(row).every(value => value === undefined || String(value).trim() === '');
}

/**
 * Lazily yield CSV rows as column -> string mappings. Header labels are
 * trimmed (and a leading BOM dropped); blank lines are skipped. A broken
 * stream surfaces as an error from the iterator. The input stream is
 * destroyed once iteration ends, also when the consumer stops early.
 */
export async function* readCsvRows(
  input: Readable | string | Buffer,
  options: CsvRowSourceOptions = {}
): AsyncGenerator<unknown, void, undefined> {
  const source = typeof input === 'string' || Buffer.isBuffer(input) ? Readable.from([input]) : input;
  const parser = csv({
    separator: options.separator ?? ',',
    skipLines: options.skipLines ?? 0,
    strict: false,
    mapHeaders: ({ header }) => header.replace(/^\uFEFF/, '').trim()
  });

  source.on('error', error => parser.destroy(error));
  source.pipe(parser);

  let yielded = 0;
  try {
    for await (const row of parser) {
      const record: Record<string, unknown> = { ...row };
      if (isBlankRow(record)) continue;
      yielded++;
      yield record;
    }
    logger.debug('CSV source exhausted', { rows: yielded });
  } finally {
    // A consumer that stops early only destroys the parser
    if (!source.destroyed) {
      source.destroy();
    }
  }
}
