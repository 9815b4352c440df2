import crypto from 'crypto';
import type { ExistingIdentity, FieldValue } from '@tidyrow/types';

/**
 * Identity keys and the run's dedup index.
 *
 * First write wins: a key is only recorded once its record has been
 * committed, and any later row with the same key is a duplicate of the
 * committed one. Records are never merged.
 */
export class DeduplicationEngine {
  private readonly index = new Map<string, string>();

  /**
   * Key component for one normalized value: upper case, punctuation
   * dropped, whitespace collapsed. "jane  doe." and "JANE DOE" collide.
   */
  static normalizeForKey(value: FieldValue): string {
    return String(value)
      .normalize('NFKC')
      .toUpperCase()
      .replace(/[^\p{L}\p{N}\s]/gu, '')
      .trim()
      .replace(/\s+/g, ' ');
  }

  static identityParts(values: FieldValue[]): string[] {
    return values.map(value => DeduplicationEngine.normalizeForKey(value));
  }

  /**
   * Hash components to create the composite identity key
   */
  static identityKey(parts: string[]): string {
    const joined = parts.join('|');
    return crypto.createHash('sha256').update(joined).digest('hex').slice(0, 16);
  }

  /**
   * Load identities already present at the destination so reruns resolve
   * to duplicates instead of writing again.
   */
  prime(existing: ExistingIdentity[]): number {
    let added = 0;
    for (const identity of existing) {
      if (!this.index.has(identity.identity_key)) {
        this.index.set(identity.identity_key, identity.record_id);
        added++;
      }
    }
    return added;
  }

  lookup(identityKey: string): string | undefined {
    return this.index.get(identityKey);
  }

  // Only call after the destination has confirmed the write
  recordCommitted(identityKey: string, recordId: string): void {
    if (this.index.has(identityKey)) {
      throw new Error(`Identity key ${identityKey} is already committed`);
    }
    this.index.set(identityKey, recordId);
  }

  get size(): number {
    return this.index.size;
  }
}

export default DeduplicationEngine;
