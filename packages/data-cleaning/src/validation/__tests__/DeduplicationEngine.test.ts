/**
 * Deduplication Engine Tests
 */

import { describe, it, expect } from '@jest/globals';
import { DeduplicationEngine } from '../DeduplicationEngine';

describe('DeduplicationEngine', () => {
  describe('Identity keys', () => {
    it('should normalise key components', () => {
      expect(DeduplicationEngine.normalizeForKey('  jane   doe. ')).toBe('JANE DOE');
      expect(DeduplicationEngine.normalizeForKey(1204)).toBe('1204');
    });

    it('should give equal keys for values that differ only in case, spacing or punctuation', () => {
      const first = DeduplicationEngine.identityKey(DeduplicationEngine.identityParts(['Jane Doe', 'SW1A 1AA']));
      const second = DeduplicationEngine.identityKey(DeduplicationEngine.identityParts(['jane  doe.', 'sw1a 1aa']));

      expect(first).toBe(second);
      expect(first).toMatch(/^[0-9a-f]{16}$/);
    });

    it('should give different keys for different identities', () => {
      expect(DeduplicationEngine.identityKey(['JANE DOE', 'SW1A 1AA'])).not.toBe(
        DeduplicationEngine.identityKey(['JANE DOE', 'M1 1AE'])
      );
    });
  });

  describe('Index', () => {
    it('should record committed keys once', () => {
      const engine = new DeduplicationEngine();

      engine.recordCommitted('key-1', 'rec-1');

      expect(engine.lookup('key-1')).toBe('rec-1');
      expect(engine.lookup('key-2')).toBeUndefined();
      expect(() => engine.recordCommitted('key-1', 'rec-2')).toThrow('Identity key key-1 is already committed');
      expect(engine.size).toBe(1);
    });

    it('should prime from existing identities without overwriting', () => {
      const engine = new DeduplicationEngine();

      const added = engine.prime([
        { identity_key: 'key-1', record_id: 'rec-1' },
        { identity_key: 'key-2', record_id: 'rec-2' },
        { identity_key: 'key-1', record_id: 'rec-9' }
      ]);

      expect(added).toBe(2);
      expect(engine.lookup('key-1')).toBe('rec-1');
    });
  });
});
