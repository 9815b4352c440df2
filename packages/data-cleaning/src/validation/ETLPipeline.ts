import { ReasonCode, type DestinationStore, type RowOutcome } from '@tidyrow/types';
import type { CompiledPipelineConfig, NormalizationResult } from '../types';
import { FieldExtractor } from '../extraction/FieldExtractor';
import { RecordWriter } from '../workers/RecordWriter';
import { WriterLane } from '../workers/WriterLane';
import { getErrorMessage } from '../utils/errorUtils';
import { createComponentLogger } from '../utils/logger';
import DataNormalizer from './DataNormalizer';
import DeduplicationEngine from './DeduplicationEngine';

const logger = createComponentLogger('ETLPipeline');

/**
 * Per-row ETL pipeline: extraction -> normalization/validation ->
 * assembly, dedup and commit. One instance holds the dedup index for
 * one run.
 */
export class ETLPipeline {
  private readonly config: CompiledPipelineConfig;
  private readonly destination: DestinationStore;
  private readonly fieldExtractor: FieldExtractor;
  private readonly dataNormalizer: DataNormalizer;
  private readonly deduplicationEngine: DeduplicationEngine;
  private readonly recordWriter: RecordWriter;

  constructor(config: CompiledPipelineConfig, destination: DestinationStore, lane: WriterLane = new WriterLane()) {
    this.config = config;
    this.destination = destination;
    this.fieldExtractor = new FieldExtractor(config);
    this.dataNormalizer = new DataNormalizer(config);
    this.deduplicationEngine = new DeduplicationEngine();
    this.recordWriter = new RecordWriter(config, destination, this.deduplicationEngine, lane);
  }

  /**
   * Seed the dedup index with identities the destination already holds.
   * Throws when the destination cannot be read.
   */
  async primeFromDestination(): Promise<number> {
    if (!this.destination.existingIdentities) {
      return 0;
    }
    const existing = await this.destination.existingIdentities();
    const added = this.deduplicationEngine.prime(existing);
    logger.info('Dedup index primed from destination', { identities: added });
    return added;
  }

  async processRow(rowNumber: number, input: unknown, signal?: AbortSignal): Promise<RowOutcome> {
    let normalization: NormalizationResult;

    try {
      const extraction = this.fieldExtractor.extract(input);
      if (!extraction.ok) {
        return { row_number: rowNumber, status: 'rejected', reason: ReasonCode.STRUCTURAL_ERROR, detail: extraction.detail };
      }
      normalization = this.dataNormalizer.normalizeRecord(extraction.candidates);
    } catch (error) {
      logger.error('Rule function threw while processing row', { rowNumber, error: getErrorMessage(error) });
      return {
        row_number: rowNumber,
        status: 'rejected',
        reason: ReasonCode.PROCESSING_ERROR,
        detail: getErrorMessage(error)
      };
    }

    return this.recordWriter.write(rowNumber, normalization, signal);
  }

  get knownIdentities(): number {
    return this.deduplicationEngine.size;
  }

  get configVersion(): string {
    return this.config.version;
  }
}

export default ETLPipeline;
