// In-process destination store for local runs and tests

import type {
  CommitResult,
  DestinationRecord,
  DestinationStore,
  ExistingIdentity,
} from '@tidyrow/types'

export interface StoredRecord extends DestinationRecord {
  record_id: string
}

export class InMemoryDestinationStore implements DestinationStore {
  private readonly rows = new Map<string, StoredRecord>()
  private nextId = 1

  constructor(seed: StoredRecord[] = []) {
    for (const record of seed) {
      this.rows.set(record.record_id, Object.freeze({ ...record, fields: { ...record.fields } }))
      this.nextId++
    }
  }

  async commit(record: DestinationRecord): Promise<CommitResult> {
    for (const stored of this.rows.values()) {
      if (stored.identity_key === record.identity_key) {
        return { status: 'structural_failure', reason: `identity_key ${record.identity_key} already stored` }
      }
    }

    const recordId = `rec-${this.nextId++}`
    this.rows.set(recordId, Object.freeze({ ...record, fields: { ...record.fields }, record_id: recordId }))
    return { status: 'success', record_id: recordId }
  }

  async existingIdentities(): Promise<ExistingIdentity[]> {
    return [...this.rows.values()].map(record => ({
      identity_key: record.identity_key,
      record_id: record.record_id,
    }))
  }

  get records(): StoredRecord[] {
    return [...this.rows.values()]
  }

  get size(): number {
    return this.rows.size
  }
}
