import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { ReasonCode, type DestinationStore, type RunAbort, type RunStatus } from '@tidyrow/types';
import type { CompiledPipelineConfig, RunOptions, RunResult } from '../types';
import { compilePipelineConfig } from '../config/compileConfig';
import { RuleRegistry } from '../config/RuleRegistry';
import { ETLPipeline } from '../validation/ETLPipeline';
import { getErrorMessage } from '../utils/errorUtils';
import { createComponentLogger } from '../utils/logger';
import { RunTracker } from './RunTracker';
import { WriterLane } from './WriterLane';

const logger = createComponentLogger('ETLOrchestrator');

export interface ETLOrchestratorOptions {
  destination: DestinationStore;
  registry?: RuleRegistry;
  // consecutive WRITE_FAILED rows before the destination counts as unreachable
  maxConsecutiveWriteFailures?: number;
  primeFromDestination?: boolean;
}

export type RowSource = Iterable<unknown> | AsyncIterable<unknown>;

async function* rowsOf(source: RowSource): AsyncGenerator<unknown, void, undefined> {
  yield* source;
}

/**
 * ETL Orchestrator drives every row of a source through the pipeline in
 * input order and produces the run summary. The configuration is compiled
 * on construction, so a contradictory configuration fails before any row
 * is read.
 *
 * Re-emits `runStarted`, `rowProcessed` and `runFinished` from the run tracker.
 */
export class ETLOrchestrator extends EventEmitter {
  private readonly config: CompiledPipelineConfig;
  private readonly destination: DestinationStore;
  private readonly maxConsecutiveWriteFailures: number;
  private readonly primeFromDestination: boolean;
  private readonly lane = new WriterLane();

  constructor(config: unknown, options: ETLOrchestratorOptions) {
    super();
    this.config = compilePipelineConfig(config, options.registry);
    this.destination = options.destination;
    this.maxConsecutiveWriteFailures = options.maxConsecutiveWriteFailures ?? 3;
    this.primeFromDestination = options.primeFromDestination ?? true;

    if (!Number.isInteger(this.maxConsecutiveWriteFailures) || this.maxConsecutiveWriteFailures < 1) {
      throw new Error('maxConsecutiveWriteFailures must be a positive integer');
    }
  }

  get configVersion(): string {
    return this.config.version;
  }

  async run(rows: RowSource, options: RunOptions = {}): Promise<RunResult> {
    const { signal, progressCallback } = options;
    const runId = uuidv4();
    const startedAt = new Date();
    const tracker = new RunTracker(runId, this.config.version);
    const pipeline = new ETLPipeline(this.config, this.destination, this.lane);

    tracker.on('runStarted', payload => this.emit('runStarted', payload));
    tracker.on('rowProcessed', outcome => this.emit('rowProcessed', outcome));
    tracker.on('runFinished', summary => this.emit('runFinished', summary));

    logger.info('Run started', { runId, configVersion: this.config.version });
    tracker.start();

    let status: RunStatus = 'completed';
    let abort: RunAbort | undefined;

    if (this.primeFromDestination) {
      try {
        await pipeline.primeFromDestination();
      } catch (error) {
        status = 'aborted';
        abort = {
          code: 'DESTINATION_UNREACHABLE',
          message: `Could not read existing identities: ${getErrorMessage(error)}`
        };
      }
    }

    if (!abort) {
      ({ status, abort } = await this.processRows(rows, pipeline, tracker, signal, progressCallback));
    }

    const summary = tracker.finish(status, abort);
    const finishedAt = new Date();

    if (abort) {
      logger.error('Run aborted', { runId, ...abort, committed: summary.accepted });
    } else {
      logger.info('Run finished', {
        runId,
        status,
        totalRows: summary.total_rows,
        accepted: summary.accepted,
        duplicates: summary.duplicates,
        rejected: summary.rejected,
        knownIdentities: pipeline.knownIdentities
      });
    }

    return {
      runId,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      summary
    };
  }

  private async processRows(
    rows: RowSource,
    pipeline: ETLPipeline,
    tracker: RunTracker,
    signal: AbortSignal | undefined,
    progressCallback: RunOptions['progressCallback']
  ): Promise<{ status: RunStatus; abort?: RunAbort }> {
    const iterator = rowsOf(rows);
    let rowNumber = 0;

    try {
      for (;;) {
        if (signal?.aborted) {
          return { status: 'cancelled' };
        }

        let next: IteratorResult<unknown, void>;
        try {
          next = await iterator.next();
        } catch (error) {
          return {
            status: 'aborted',
            abort: {
              code: 'SOURCE_FAILED',
              message: `Row source failed: ${getErrorMessage(error)}`,
              row_number: rowNumber + 1
            }
          };
        }
        if (next.done) {
          return { status: 'completed' };
        }

        rowNumber++;
        const outcome = await pipeline.processRow(rowNumber, next.value, signal);
        tracker.record(outcome);
        logger.debug('Row processed', { rowNumber, status: outcome.status });
        progressCallback?.(tracker.processedRows, outcome.status);

        if (outcome.status === 'rejected' && outcome.reason === ReasonCode.WRITE_FAILED && signal?.aborted) {
          return { status: 'cancelled' };
        }
        if (tracker.consecutiveWriteFailures >= this.maxConsecutiveWriteFailures) {
          return {
            status: 'aborted',
            abort: {
              code: 'DESTINATION_UNREACHABLE',
              message: `Destination unreachable: ${tracker.consecutiveWriteFailures} consecutive rows failed to write after all retries`,
              row_number: rowNumber
            }
          };
        }
      }
    } finally {
      await iterator.return(undefined).catch((error: unknown) => {
        logger.warn('Row source did not close cleanly', { error: getErrorMessage(error) });
      });
    }
  }
}

export default ETLOrchestrator;
