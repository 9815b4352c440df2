import { setTimeout as sleep } from 'timers/promises';
import {
  ReasonCode,
  type CandidateRecord,
  type CommitResult,
  type DestinationRecord,
  type DestinationStore,
  type FieldValue,
  type ReasonCodeValue,
  type RowOutcome,
  type TargetField
} from '@tidyrow/types';
import type { CompiledPipelineConfig, NormalizationResult } from '../types';
import { DeduplicationEngine } from '../validation/DeduplicationEngine';
import { getErrorMessage } from '../utils/errorUtils';
import { createComponentLogger } from '../utils/logger';
import { WriterLane } from './WriterLane';

const logger = createComponentLogger('RecordWriter');

export type AssemblyResult =
  | { ok: true; record: CandidateRecord }
  | { ok: false; outcome: RowOutcome };

/**
 * Record assembler and supervised writer.
 *
 * Per row: Pending -> Rejected (gated field not valid, cross-field failure)
 * or Pending -> IdentityComputed -> Duplicate | Committed | Rejected (write).
 * The identity check, the write and the index update run together inside
 * the writer lane, and the index only learns a key after the destination
 * confirmed the write.
 */
export class RecordWriter {
  private readonly config: CompiledPipelineConfig;
  private readonly destination: DestinationStore;
  private readonly dedup: DeduplicationEngine;
  private readonly lane: WriterLane;

  constructor(
    config: CompiledPipelineConfig,
    destination: DestinationStore,
    dedup: DeduplicationEngine = new DeduplicationEngine(),
    lane: WriterLane = new WriterLane()
  ) {
    this.config = config;
    this.destination = destination;
    this.dedup = dedup;
    this.lane = lane;
  }

  assemble(rowNumber: number, normalization: NormalizationResult): AssemblyResult {
    const { fields, crossFieldFailures } = normalization;

    for (const name of this.config.gatedFields) {
      const field = fields[name];
      if (!field || field.status === 'absent') {
        return this.reject(rowNumber, ReasonCode.MISSING_REQUIRED_FIELD, name, `required field "${name}" is absent`);
      }
      if (field.status === 'invalid') {
        return this.reject(
          rowNumber,
          field.reason,
          name,
          `required field "${name}" failed validation with value ${JSON.stringify(field.value)}`
        );
      }
    }

    if (crossFieldFailures.length > 0) {
      const [failure] = crossFieldFailures;
      return this.reject(
        rowNumber,
        failure.reason,
        failure.fields.join(','),
        `cross-field rule "${failure.rule}" failed`
      );
    }

    const identityValues: FieldValue[] = [];
    for (const name of this.config.identityFields) {
      const field = fields[name];
      if (field?.status === 'valid') identityValues.push(field.value);
    }
    const identityParts = DeduplicationEngine.identityParts(identityValues);

    const values: Record<TargetField, FieldValue> = {};
    const dropped: CandidateRecord['dropped_fields'] = [];
    for (const name of this.config.fields) {
      const field = fields[name];
      if (field?.status === 'valid') {
        values[name] = field.value;
      } else if (field?.status === 'invalid') {
        dropped.push({ field: name, reason: field.reason });
      }
    }

    return {
      ok: true,
      record: {
        row_number: rowNumber,
        identity_key: DeduplicationEngine.identityKey(identityParts),
        identity_parts: identityParts,
        fields: values,
        dropped_fields: dropped
      }
    };
  }

  /**
   * Assemble, dedup and commit one row. Never throws for bad data or
   * destination failures; those come back as the row outcome.
   */
  async write(rowNumber: number, normalization: NormalizationResult, signal?: AbortSignal): Promise<RowOutcome> {
    const assembled = this.assemble(rowNumber, normalization);
    if (!assembled.ok) {
      return assembled.outcome;
    }
    const record = assembled.record;

    return this.lane.run(async (): Promise<RowOutcome> => {
      const existing = this.dedup.lookup(record.identity_key);
      if (existing !== undefined) {
        logger.debug('Duplicate identity key', { rowNumber, identityKey: record.identity_key, duplicateOf: existing });
        return {
          row_number: rowNumber,
          status: 'duplicate',
          identity_key: record.identity_key,
          duplicate_of: existing
        };
      }

      const result = await this.commitWithRetry(this.toDestinationRecord(record), signal);

      switch (result.status) {
        case 'success':
          this.dedup.recordCommitted(record.identity_key, result.record_id);
          return {
            row_number: rowNumber,
            status: 'accepted',
            record_id: result.record_id,
            identity_key: record.identity_key,
            dropped_fields: record.dropped_fields
          };
        case 'structural_failure':
          logger.warn('Destination rejected record', { rowNumber, reason: result.reason });
          return this.rejectedOutcome(rowNumber, ReasonCode.DESTINATION_REJECTED, undefined, result.reason);
        case 'transient_failure':
          logger.error('Write failed after retries', { rowNumber, reason: result.reason });
          return this.rejectedOutcome(rowNumber, ReasonCode.WRITE_FAILED, undefined, result.reason);
      }
    });
  }

  private toDestinationRecord(record: CandidateRecord): DestinationRecord {
    return {
      identity_key: record.identity_key,
      config_version: this.config.version,
      source_row: record.row_number,
      fields: { ...record.fields }
    };
  }

  /**
   * Bounded retry with exponential backoff for transient failures.
   * Structural failures are final on the first attempt.
   *
   * A timed-out attempt may still land. Its commit is kept and given up to
   * one more timeout to settle before the next attempt and before giving up,
   * and a structural failure after a timeout is checked against the
   * destination, so a record that was stored is reported as committed.
   */
  private async commitWithRetry(record: DestinationRecord, signal?: AbortSignal): Promise<CommitResult> {
    const { maxAttempts, backoffBaseMs } = this.config.retryPolicy;
    const timedOut: Promise<CommitResult>[] = [];
    let lastReason = 'no attempt made';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (attempt > 1) {
        const delay = backoffBaseMs * 2 ** (attempt - 2);
        logger.warn('Retrying commit', { rowNumber: record.source_row, attempt, delayMs: delay, lastReason });
        try {
          await sleep(delay, undefined, { signal });
        } catch {
          return this.recoverOrFail(record, timedOut, {
            status: 'transient_failure',
            reason: `cancelled while waiting to retry: ${lastReason}`
          });
        }
      }
      if (signal?.aborted) {
        return this.recoverOrFail(record, timedOut, {
          status: 'transient_failure',
          reason: `cancelled before attempt ${attempt}: ${lastReason}`
        });
      }

      const landed = await this.settleLateCommits(record, timedOut);
      if (landed) {
        return landed;
      }

      const { result, late } = await this.commitOnce(record);
      if (late) {
        timedOut.push(late);
      }
      if (result.status === 'success') {
        return result;
      }
      if (result.status === 'structural_failure') {
        return this.recoverOrFail(record, timedOut, result);
      }
      lastReason = result.reason;
    }

    return this.recoverOrFail(record, timedOut, {
      status: 'transient_failure',
      reason: `gave up after ${maxAttempts} attempt(s): ${lastReason}`
    });
  }

  // A thrown error or a timeout counts as a transient failure
  private async commitOnce(
    record: DestinationRecord
  ): Promise<{ result: CommitResult; late?: Promise<CommitResult> }> {
    const { timeoutMs } = this.config.retryPolicy;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<'timeout'>(resolve => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });
    const attempt = Promise.resolve()
      .then(() => this.destination.commit(record))
      .catch((error: unknown): CommitResult => ({ status: 'transient_failure', reason: getErrorMessage(error) }));

    try {
      const result = await Promise.race([attempt, timeout]);
      if (result === 'timeout') {
        return {
          result: { status: 'transient_failure', reason: `commit timed out after ${timeoutMs}ms` },
          late: attempt
        };
      }
      return { result };
    } finally {
      clearTimeout(timer);
    }
  }

  private async recoverOrFail(
    record: DestinationRecord,
    timedOut: Promise<CommitResult>[],
    failure: CommitResult
  ): Promise<CommitResult> {
    if (timedOut.length === 0) {
      return failure;
    }
    return (await this.settleLateCommits(record, timedOut)) ?? (await this.findStored(record)) ?? failure;
  }

  /**
   * Wait up to one timeout for any timed-out attempt to succeed.
   * Resolves undefined when none did.
   */
  private settleLateCommits(
    record: DestinationRecord,
    timedOut: Promise<CommitResult>[]
  ): Promise<CommitResult | undefined> {
    if (timedOut.length === 0) {
      return Promise.resolve(undefined);
    }
    const { timeoutMs } = this.config.retryPolicy;

    return new Promise(resolve => {
      const timer = setTimeout(() => resolve(undefined), timeoutMs);
      const finish = (result: CommitResult | undefined): void => {
        clearTimeout(timer);
        resolve(result);
      };

      void Promise.all(
        timedOut.map(attempt =>
          attempt.then(result => {
            if (result.status === 'success') {
              logger.warn('Timed-out commit landed late', { rowNumber: record.source_row, recordId: result.record_id });
              finish(result);
            }
          })
        )
      ).then(() => finish(undefined));
    });
  }

  // After a timeout the destination may hold the record even though no attempt reported it
  private async findStored(record: DestinationRecord): Promise<CommitResult | undefined> {
    if (!this.destination.existingIdentities) {
      return undefined;
    }
    try {
      const identities = await this.destination.existingIdentities();
      const stored = identities.find(identity => identity.identity_key === record.identity_key);
      if (!stored) {
        return undefined;
      }
      logger.warn('Record found in destination after a timed-out commit', {
        rowNumber: record.source_row,
        recordId: stored.record_id
      });
      return { status: 'success', record_id: stored.record_id };
    } catch (error) {
      logger.error('Could not check destination for a timed-out commit', {
        rowNumber: record.source_row,
        error: getErrorMessage(error)
      });
      return undefined;
    }
  }

  private reject(rowNumber: number, reason: ReasonCodeValue, field: TargetField, detail: string): AssemblyResult {
    return { ok: false, outcome: this.rejectedOutcome(rowNumber, reason, field, detail) };
  }

  private rejectedOutcome(
    rowNumber: number,
    reason: ReasonCodeValue,
    field: TargetField | undefined,
    detail: string
  ): RowOutcome {
    return field === undefined
      ? { row_number: rowNumber, status: 'rejected', reason, detail }
      : { row_number: rowNumber, status: 'rejected', reason, field, detail };
  }
}

export default RecordWriter;
