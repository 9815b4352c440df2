/**
 * Shared configuration and destination stand-ins for pipeline tests
 */

import type { CommitResult, DestinationRecord, DestinationStore, ExistingIdentity } from '@tidyrow/types';
import type { Bindable, CompiledPipelineConfig, NormalizationResult } from '../../types';
import type { PipelineConfig } from '../../config/schema';
import { compilePipelineConfig } from '../../config/compileConfig';
import { RuleRegistry } from '../../config/RuleRegistry';
import { FieldExtractor } from '../../extraction/FieldExtractor';
import { DataNormalizer } from '../../validation/DataNormalizer';

/**
 * name + postcode identity, a required join date and an optional note
 * capped at ten characters. No backoff so retries run immediately.
 */
export function peopleConfig(): PipelineConfig {
  return {
    version: 'people/1',
    field_map: {
      name: [
        { column: 'Name', extractor: 'text' },
        { column_pattern: '^full[ _]?name$', extractor: 'text' }
      ],
      postcode: [{ column: 'Postcode', extractor: 'text' }],
      joined: [{ column: 'Joined', extractor: 'date' }],
      note: [{ column: 'Note', extractor: 'text' }]
    },
    rules: {
      name: [
        { transform: 'trim' },
        { transform: 'collapseWhitespace' },
        { transform: 'uppercase' },
        { validate: 'nonEmpty', reason: 'MALFORMED_NAME' }
      ],
      postcode: [
        { transform: 'trim' },
        { transform: 'uppercase' },
        { transform: 'formatPostcode' },
        { validate: 'postcode', reason: 'MALFORMED_POSTCODE' }
      ],
      joined: [
        { transform: 'trim' },
        { transform: 'standardizeDate' },
        { validate: 'isoDate', reason: 'MALFORMED_DATE' }
      ],
      note: [
        { transform: 'trim' },
        { validate: 'maxLength', params: { max: 10 }, reason: 'NOTE_TOO_LONG' }
      ]
    },
    required_fields: ['joined'],
    identity_fields: ['name', 'postcode'],
    retry_policy: { max_attempts: 3, backoff_base_ms: 0, timeout_ms: 1000 }
  };
}

// peopleConfig plus a `left` date that must not precede `joined`
export function peopleWithLeavingDateConfig(): PipelineConfig {
  const base = peopleConfig();
  return {
    ...base,
    field_map: { ...base.field_map, left: [{ column: 'Left', extractor: 'date' }] },
    rules: {
      ...base.rules,
      left: [
        { transform: 'trim' },
        { transform: 'standardizeDate' },
        { validate: 'isoDate', reason: 'MALFORMED_DATE' }
      ]
    },
    cross_field_rules: [{ rule: 'notBefore', fields: ['left', 'joined'], reason: 'LEFT_BEFORE_JOINED' }]
  };
}

export function withRetryPolicy(
  config: PipelineConfig,
  retryPolicy: PipelineConfig['retry_policy']
): PipelineConfig {
  return { ...config, retry_policy: retryPolicy };
}

export function compile(config: PipelineConfig, registry: RuleRegistry = new RuleRegistry()): CompiledPipelineConfig {
  return compilePipelineConfig(config, registry);
}

// Run extraction and normalization the way the pipeline does
export function normalizeRow(config: CompiledPipelineConfig, row: Record<string, unknown>): NormalizationResult {
  const extraction = new FieldExtractor(config).extract(row);
  if (!extraction.ok) {
    throw new Error(extraction.detail);
  }
  return new DataNormalizer(config).normalizeRecord(extraction.candidates);
}

export function bound<F>(definition: Bindable<F>, params?: unknown): F {
  const result = definition.bind(params);
  if (!result.success) {
    throw new Error(result.error);
  }
  return result.fn;
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

// One scripted reaction per commit call; once the script runs out every commit succeeds
export type ScriptedCommit = CommitResult | Error | 'hang';

export class ScriptedDestination implements DestinationStore {
  readonly committed: DestinationRecord[] = [];
  calls = 0;
  private readonly script: ScriptedCommit[];
  private nextId = 1;

  constructor(script: ScriptedCommit[] = []) {
    this.script = [...script];
  }

  async commit(record: DestinationRecord): Promise<CommitResult> {
    this.calls++;
    const step = this.script.shift();

    if (step === undefined) {
      this.committed.push(record);
      return { status: 'success', record_id: `rec-${this.nextId++}` };
    }
    if (step === 'hang') {
      return new Promise<CommitResult>(() => undefined);
    }
    if (step instanceof Error) {
      throw step;
    }
    if (step.status === 'success') {
      this.committed.push(record);
    }
    return step;
  }
}

// Destination whose commits take a while, for lane ordering checks
export class SlowDestination extends ScriptedDestination {
  private readonly latencyMs: number;

  constructor(latencyMs: number) {
    super();
    this.latencyMs = latencyMs;
  }

  async commit(record: DestinationRecord): Promise<CommitResult> {
    await delay(this.latencyMs);
    return super.commit(record);
  }
}

export class UnreadableDestination extends ScriptedDestination {
  async existingIdentities(): Promise<ExistingIdentity[]> {
    throw new Error('connection refused');
  }
}

/**
 * Stores each record as soon as commit is called, like a database that
 * applies the insert before the reply is lost. The first call only answers
 * after `firstReplyMs`; repeats of a stored identity get a unique-key conflict.
 */
export class LateReplyDestination implements DestinationStore {
  readonly stored = new Map<string, string>();
  calls = 0;
  private readonly firstReplyMs: number;

  constructor(firstReplyMs: number) {
    this.firstReplyMs = firstReplyMs;
  }

  async commit(record: DestinationRecord): Promise<CommitResult> {
    this.calls++;
    if (this.stored.has(record.identity_key)) {
      return { status: 'structural_failure', reason: '23505: duplicate key value violates unique constraint' };
    }
    const recordId = `rec-${this.stored.size + 1}`;
    this.stored.set(record.identity_key, recordId);
    if (this.calls === 1) {
      await delay(this.firstReplyMs);
    }
    return { status: 'success', record_id: recordId };
  }

  async existingIdentities(): Promise<ExistingIdentity[]> {
    return [...this.stored].map(([identity_key, record_id]) => ({ identity_key, record_id }));
  }
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}
