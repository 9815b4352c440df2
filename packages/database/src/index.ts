// Database package exports: destination stores for cleaned records

export {
  createClient,
  createDestinationClient,
  loadDestinationEnv,
  DestinationEnvSchema,
  DestinationConfigError,
} from './client'
export type { DestinationEnv } from './client'

export {
  SupabaseDestinationStore,
  classifyWriteError,
  isStructuralError,
} from './destination/SupabaseDestinationStore'
export type { SupabaseDestinationOptions, PostgrestErrorLike } from './destination/SupabaseDestinationStore'

export { InMemoryDestinationStore } from './destination/InMemoryDestinationStore'
export type { StoredRecord } from './destination/InMemoryDestinationStore'
