/**
 * Field Extractor Tests
 * Source priority, column matching, null markers and unreadable rows
 */

import { describe, it, expect } from '@jest/globals';
import { FieldExtractor } from '../FieldExtractor';
import { builtInExtractors, serialToIsoDate } from '../extractors';
import { bound, compile, peopleConfig } from '../../__tests__/fixtures/pipeline';

describe('FieldExtractor', () => {
  const extractor = new FieldExtractor(compile(peopleConfig()));

  describe('Source priority', () => {
    it('should take the first declared source that yields a value', () => {
      const result = extractor.extract({ 'Full Name': 'Second Choice', Name: 'First Choice' });

      expect(result).toMatchObject({ ok: true });
      if (!result.ok) return;
      expect(result.candidates.name).toEqual({
        present: true,
        value: 'First Choice',
        provenance: { source_column: 'Name', raw_value: 'First Choice' }
      });
    });

    it('should fall back to a column pattern when the named column is blank', () => {
      const result = extractor.extract({ Name: '  ', full_name: 'Jane Doe' });

      if (!result.ok) throw new Error(result.detail);
      expect(result.candidates.name).toEqual({
        present: true,
        value: 'Jane Doe',
        provenance: { source_column: 'full_name', raw_value: 'Jane Doe' }
      });
    });

    it('should match column labels case-insensitively after trimming', () => {
      const result = extractor.extract({ ' NAME ': 'jane' });

      if (!result.ok) throw new Error(result.detail);
      expect(result.candidates.name).toEqual({
        present: true,
        value: 'jane',
        provenance: { source_column: ' NAME ', raw_value: 'jane' }
      });
    });
  });

  describe('Absent values', () => {
    it('should treat null markers, blanks, null and missing columns as absent', () => {
      const result = extractor.extract({ Name: 'N/A', Postcode: '   ', Joined: null });

      if (!result.ok) throw new Error(result.detail);
      expect(result.candidates).toEqual({
        name: { present: false },
        postcode: { present: false },
        joined: { present: false },
        note: { present: false }
      });
    });

    it('should treat booleans as absent for text fields', () => {
      const result = extractor.extract({ Name: true });

      if (!result.ok) throw new Error(result.detail);
      expect(result.candidates.name).toEqual({ present: false });
    });
  });

  describe('Spreadsheet cells', () => {
    it('should turn serial day numbers into ISO dates', () => {
      const result = extractor.extract({ Joined: 45000 });

      if (!result.ok) throw new Error(result.detail);
      expect(result.candidates.joined).toEqual({
        present: true,
        value: '2023-03-15',
        provenance: { source_column: 'Joined', raw_value: 45000 }
      });
    });

    it('should convert serials only inside the supported range', () => {
      expect(serialToIsoDate(61)).toBe('1900-03-01');
      expect(serialToIsoDate(60)).toBeUndefined();
      expect(serialToIsoDate(Number.NaN)).toBeUndefined();
    });
  });

  describe('Unreadable rows', () => {
    it('should reject non-object rows', () => {
      expect(extractor.extract('Jane,SW1A 1AA')).toEqual({
        ok: false,
        detail: 'row is string, expected a column mapping'
      });
      expect(extractor.extract(null)).toEqual({ ok: false, detail: 'row is null, expected a column mapping' });
      expect(extractor.extract(['Jane'])).toEqual({ ok: false, detail: 'row is an array, expected a column mapping' });
    });

    it('should reject rows holding nested values', () => {
      expect(extractor.extract({ Name: { first: 'Jane' } })).toEqual({
        ok: false,
        detail: 'column "Name" holds a non-scalar value'
      });
    });
  });

  it('should give the same candidates for the same row', () => {
    const row = { Name: 'Jane', Postcode: 'SW1A 1AA', Joined: '2023-04-20' };

    expect(extractor.extract(row)).toEqual(extractor.extract(row));
  });
});

describe('Built-in extractors', () => {
  it('should parse integers and reject fractions or text', () => {
    const integer = bound(builtInExtractors.integer);

    expect(integer('1,204')).toBe(1204);
    expect(integer(7)).toBe(7);
    expect(integer('7.5')).toBeUndefined();
    expect(integer('seven')).toBeUndefined();
  });

  it('should parse decimal numbers', () => {
    const number = bound(builtInExtractors.number);

    expect(number(' 3.25 ')).toBe(3.25);
    expect(number('12e3')).toBeUndefined();
  });

  it('should pull the configured capture group out of a pattern match', () => {
    const postcodeInAddress = bound(builtInExtractors.pattern, {
      pattern: '\\b([A-Z]{1,2}\\d[A-Z\\d]?\\s*\\d[A-Z]{2})\\b',
      flags: 'i',
      group: 1
    });

    expect(postcodeInAddress('10 Downing Street, London sw1a 2aa')).toBe('sw1a 2aa');
    expect(postcodeInAddress('no postcode here')).toBeUndefined();
  });

  it('should refuse unknown params when binding', () => {
    expect(builtInExtractors.text.bind({ trim: true })).toMatchObject({ success: false });
    expect(builtInExtractors.pattern.bind({})).toMatchObject({ success: false });
  });
});
