/**
 * Configuration compiler tests
 * Every contradiction is reported at startup, before any row is read
 */

import { describe, it, expect } from '@jest/globals';
import { compilePipelineConfig } from '../compileConfig';
import { RuleRegistry } from '../RuleRegistry';
import { defineTransform, NoParams } from '../defineRule';
import type { PipelineConfig } from '../schema';
import { ConfigurationError } from '../../utils/errorUtils';
import { peopleConfig } from '../../__tests__/fixtures/pipeline';

function issuesOf(input: unknown, registry?: RuleRegistry): string[] {
  try {
    compilePipelineConfig(input, registry);
  } catch (error) {
    if (error instanceof ConfigurationError) return error.issues;
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

function withRules(rules: PipelineConfig['rules']): PipelineConfig {
  const base = peopleConfig();
  return { ...base, rules: { ...base.rules, ...rules } };
}

describe('compilePipelineConfig', () => {
  it('should compile a consistent configuration', () => {
    const config = compilePipelineConfig(peopleConfig());

    expect(config.version).toBe('people/1');
    expect(config.fields).toEqual(['name', 'postcode', 'joined', 'note']);
    expect(config.requiredFields).toEqual(['joined']);
    expect(config.gatedFields).toEqual(['joined', 'name', 'postcode']);
    expect(config.retryPolicy).toEqual({ maxAttempts: 3, backoffBaseMs: 0, timeoutMs: 1000 });
    expect(config.nullMarkers.has('n/a')).toBe(true);
    expect(config.rules.get('postcode')?.transforms.map(step => step.name)).toEqual([
      'trim',
      'uppercase',
      'formatPostcode'
    ]);
  });

  it('should default the commit timeout', () => {
    const config = compilePipelineConfig({
      ...peopleConfig(),
      retry_policy: { max_attempts: 2, backoff_base_ms: 100 }
    });

    expect(config.retryPolicy.timeoutMs).toBe(10000);
  });

  describe('Rule order', () => {
    it('should refuse validation before a transform', () => {
      const issues = issuesOf(
        withRules({ name: [{ validate: 'nonEmpty', reason: 'MALFORMED_NAME' }, { transform: 'trim' }] })
      );

      expect(issues).toEqual([
        'rules.name: rules must end with exactly one validate step and validate must come last ' +
          '(got validate:nonEmpty -> transform:trim)'
      ]);
    });

    it('should refuse two validators for one field', () => {
      const issues = issuesOf(
        withRules({
          name: [
            { transform: 'trim' },
            { validate: 'nonEmpty', reason: 'MALFORMED_NAME' },
            { validate: 'maxLength', params: { max: 5 }, reason: 'NAME_TOO_LONG' }
          ]
        })
      );

      expect(issues).toEqual([
        'rules.name: rules must end with exactly one validate step and validate must come last ' +
          '(got transform:trim -> validate:nonEmpty -> validate:maxLength)'
      ]);
    });
  });

  describe('Field references', () => {
    it('should refuse identity fields that are never extracted', () => {
      expect(issuesOf({ ...peopleConfig(), identity_fields: ['name', 'email'] })).toEqual([
        'identity_fields: "email" is never extracted (missing from field_map)'
      ]);
    });

    it('should refuse an empty identity', () => {
      expect(issuesOf({ ...peopleConfig(), identity_fields: [] })).toEqual([
        'identity_fields: at least one field is needed to build the identity key'
      ]);
    });

    it('should refuse extracted fields without rules and rules for unknown fields', () => {
      const base = peopleConfig();
      const issues = issuesOf({
        ...base,
        field_map: { ...base.field_map, email: [{ column: 'Email', extractor: 'text' }] },
        rules: { ...base.rules, phone: [{ validate: 'phone', reason: 'MALFORMED_PHONE' }] }
      });

      expect(issues).toEqual([
        'rules.email: field is extracted but has no rules',
        'rules.phone: field is never extracted (missing from field_map)'
      ]);
    });

    it('should refuse cross-field rules over unknown fields', () => {
      const issues = issuesOf({
        ...peopleConfig(),
        cross_field_rules: [{ rule: 'notBefore', fields: ['left', 'joined'] }]
      });

      expect(issues).toEqual(['cross_field_rules[0]: fields never extracted: left']);
    });
  });

  describe('Registry lookups', () => {
    it('should collect every unknown name and bad parameter', () => {
      const base = peopleConfig();
      const issues = issuesOf({
        ...base,
        field_map: { ...base.field_map, name: [{ column_pattern: '(', extractor: 'text' }] },
        rules: {
          ...base.rules,
          name: [{ transform: 'shout' }, { validate: 'nonEmpty', reason: 'MALFORMED_NAME' }],
          note: [{ transform: 'trim' }, { validate: 'maxLength', params: { max: -1 }, reason: 'NOTE_TOO_LONG' }]
        }
      });

      expect(issues).toEqual([
        'field_map.name[0]: column_pattern "(" is not a valid regular expression',
        'rules.name[0]: unknown transform "shout"',
        expect.stringMatching(/^rules\.note\[1\]: invalid params for validator "maxLength": max: /)
      ]);
    });

    it('should resolve functions registered by the caller', () => {
      const registry = new RuleRegistry().registerTransform(
        'shout',
        defineTransform(NoParams, () => value => (typeof value === 'string' ? `${value}!` : value))
      );

      const config = compilePipelineConfig(
        withRules({ name: [{ transform: 'shout' }, { validate: 'nonEmpty', reason: 'MALFORMED_NAME' }] }),
        registry
      );

      expect(config.rules.get('name')?.transforms[0].apply('hi')).toBe('hi!');
    });

    it('should refuse to register a name twice', () => {
      expect(() =>
        new RuleRegistry().registerTransform('trim', defineTransform(NoParams, () => value => value))
      ).toThrow('A transform named "trim" is already registered');
    });
  });

  describe('Schema', () => {
    it('should report schema violations with their paths', () => {
      const issues = issuesOf({ ...peopleConfig(), retry_policy: { max_attempts: 0, backoff_base_ms: 0 } });

      expect(issues).toEqual([expect.stringMatching(/^retry_policy\.max_attempts: /)]);
    });

    it('should refuse a source naming both a column and a pattern', () => {
      const base = peopleConfig();
      const issues = issuesOf({
        ...base,
        field_map: { ...base.field_map, note: [{ column: 'Note', column_pattern: 'note', extractor: 'text' }] }
      });

      expect(issues).toEqual(['field_map.note.0: Exactly one of column or column_pattern must be set']);
    });

    it('should refuse input that is not an object', () => {
      expect(() => compilePipelineConfig('people/1')).toThrow(ConfigurationError);
    });
  });
});
