import { EventEmitter } from 'events';
import type { RowOutcome, RunAbort, RunStatus, RunSummary } from '@tidyrow/types';

function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Collects per-row outcomes for one run and produces the final summary.
 *
 * Events: `runStarted`, `rowProcessed` (RowOutcome), `runFinished` (RunSummary).
 */
export class RunTracker extends EventEmitter {
  readonly runId: string;
  private readonly configVersion: string;
  private readonly outcomes: RowOutcome[] = [];
  private accepted = 0;
  private duplicates = 0;
  private rejected = 0;
  private readonly rejectedByReason = new Map<string, number>();
  private trailingWriteFailures = 0;
  private summary: RunSummary | null = null;

  constructor(runId: string, configVersion: string) {
    super();
    this.runId = runId;
    this.configVersion = configVersion;
  }

  start(): void {
    this.emit('runStarted', { runId: this.runId, configVersion: this.configVersion });
  }

  record(outcome: RowOutcome): void {
    if (this.summary) {
      throw new Error(`Run ${this.runId} is already finished`);
    }

    this.outcomes.push(outcome);

    switch (outcome.status) {
      case 'accepted':
        this.accepted++;
        this.trailingWriteFailures = 0;
        break;
      case 'duplicate':
        this.duplicates++;
        break;
      case 'rejected':
        this.rejected++;
        this.rejectedByReason.set(outcome.reason, (this.rejectedByReason.get(outcome.reason) ?? 0) + 1);
        if (outcome.reason === 'WRITE_FAILED') {
          this.trailingWriteFailures++;
        } else if (outcome.reason === 'DESTINATION_REJECTED') {
          // the destination answered, so it is reachable
          this.trailingWriteFailures = 0;
        }
        break;
    }

    this.emit('rowProcessed', outcome);
  }

  get processedRows(): number {
    return this.outcomes.length;
  }

  // Write attempts that ended WRITE_FAILED with no successful write in between
  get consecutiveWriteFailures(): number {
    return this.trailingWriteFailures;
  }

  finish(status: RunStatus, abort?: RunAbort): RunSummary {
    if (this.summary) {
      return this.summary;
    }

    const rejectedByReason: Record<string, number> = {};
    for (const reason of [...this.rejectedByReason.keys()].sort()) {
      rejectedByReason[reason] = this.rejectedByReason.get(reason) ?? 0;
    }

    const summary: RunSummary = {
      config_version: this.configVersion,
      status,
      total_rows: this.outcomes.length,
      accepted: this.accepted,
      duplicates: this.duplicates,
      rejected: this.rejected,
      rejected_by_reason: rejectedByReason,
      outcomes: [...this.outcomes]
    };
    if (abort) {
      summary.abort = abort;
    }

    this.summary = deepFreeze(summary);
    this.emit('runFinished', this.summary);
    return this.summary;
  }
}

export default RunTracker;
