import contactRecords from './contact-records.v1.json';
import type { CompiledPipelineConfig } from '../types';
import { compilePipelineConfig } from './compileConfig';
import { RuleRegistry } from './RuleRegistry';
import type { PipelineConfig } from './schema';

/**
 * House style for contact lists exported from legacy spreadsheets:
 * title-cased names, ISO signup dates, UK postcodes, corrected regions.
 * Identity is name + postcode.
 */
export const CONTACT_RECORDS_CONFIG: PipelineConfig = contactRecords;

export function compileContactRecordsConfig(registry: RuleRegistry = new RuleRegistry()): CompiledPipelineConfig {
  return compilePipelineConfig(CONTACT_RECORDS_CONFIG, registry);
}
