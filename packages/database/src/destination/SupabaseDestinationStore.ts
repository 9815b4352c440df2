// Destination store backed by a Supabase (PostgreSQL) table
// Expected table shape:
//   id uuid primary key default gen_random_uuid(),
//   identity_key text not null unique,
//   config_version text not null,
//   source_row integer not null,
//   fields jsonb not null

import type { SupabaseClient } from '@supabase/supabase-js'
import { z } from 'zod'
import type { CommitResult, DestinationRecord, DestinationStore, ExistingIdentity } from '@tidyrow/types'
import { createDestinationClient, loadDestinationEnv } from '../client'

const RecordIdSchema = z.union([z.string().min(1), z.number()]).transform(String)

const InsertedRowSchema = z.object({
  id: RecordIdSchema,
})

const IdentityRowSchema = z.object({
  id: RecordIdSchema,
  identity_key: z.string().min(1),
})

export interface PostgrestErrorLike {
  code?: string
  message: string
  details?: string | null
}

// Data errors (class 22), integrity violations (class 23, including
// unique_violation 23505), unknown columns: retrying cannot help
export function isStructuralError(error: PostgrestErrorLike): boolean {
  const code = error.code ?? ''
  return /^2[23][0-9A-Z]{3}$/.test(code) || code === '42703' || code === 'PGRST204'
}

export function classifyWriteError(error: PostgrestErrorLike): CommitResult {
  const reason = error.code ? `${error.code}: ${error.message}` : error.message
  return isStructuralError(error)
    ? { status: 'structural_failure', reason }
    : { status: 'transient_failure', reason }
}

export interface SupabaseDestinationOptions {
  table?: string
  // page size used when reading existing identities
  pageSize?: number
}

export class SupabaseDestinationStore implements DestinationStore {
  private readonly client: SupabaseClient
  private readonly table: string
  private readonly pageSize: number

  constructor(client: SupabaseClient, options: SupabaseDestinationOptions = {}) {
    this.client = client
    this.table = options.table ?? 'cleaned_records'
    this.pageSize = options.pageSize ?? 1000
  }

  // Build a store from SUPABASE_URL / SUPABASE_SERVICE_ROLE_KEY / TIDYROW_DESTINATION_TABLE
  static fromEnv(env: NodeJS.ProcessEnv = process.env): SupabaseDestinationStore {
    const settings = loadDestinationEnv(env)
    return new SupabaseDestinationStore(createDestinationClient(settings), {
      table: settings.TIDYROW_DESTINATION_TABLE,
    })
  }

  // A single-row insert is one statement, so it lands whole or not at all
  async commit(record: DestinationRecord): Promise<CommitResult> {
    try {
      const { data, error } = await this.client
        .from(this.table)
        .insert({
          identity_key: record.identity_key,
          config_version: record.config_version,
          source_row: record.source_row,
          fields: record.fields,
        })
        .select('id')
        .single()

      if (error) {
        return classifyWriteError(error)
      }

      const inserted = InsertedRowSchema.safeParse(data)
      if (!inserted.success) {
        return this.readBack(record.identity_key)
      }
      return { status: 'success', record_id: inserted.data.id }
    } catch (error) {
      return {
        status: 'transient_failure',
        reason: error instanceof Error ? error.message : String(error),
      }
    }
  }

  // The insert went through without returning its id; look the row up by identity_key
  private async readBack(identityKey: string): Promise<CommitResult> {
    const { data, error } = await this.client
      .from(this.table)
      .select('id')
      .eq('identity_key', identityKey)
      .maybeSingle()

    const stored = InsertedRowSchema.safeParse(data)
    if (error || !stored.success) {
      return {
        status: 'transient_failure',
        reason: `insert returned no record id and the row could not be read back${error ? `: ${error.message}` : ''}`,
      }
    }
    return { status: 'success', record_id: stored.data.id }
  }

  async existingIdentities(): Promise<ExistingIdentity[]> {
    const identities: ExistingIdentity[] = []

    for (let from = 0; ; from += this.pageSize) {
      const { data, error } = await this.client
        .from(this.table)
        .select('id, identity_key')
        .order('id', { ascending: true })
        .range(from, from + this.pageSize - 1)

      if (error) {
        throw new Error(`Failed to read identities from ${this.table}: ${error.message}`)
      }

      const rows = z.array(IdentityRowSchema).parse(data ?? [])
      for (const row of rows) {
        identities.push({ identity_key: row.identity_key, record_id: row.id })
      }
      if (rows.length < this.pageSize) {
        return identities
      }
    }
  }
}
