// Supabase client configuration for the cleaned-record destination
// Settings are read from the environment and validated on demand, so
// importing this module never throws

import { createClient, type SupabaseClient } from '@supabase/supabase-js'
import { z } from 'zod'

// Re-export createClient for callers that build their own client
export { createClient }

export const DestinationEnvSchema = z.object({
  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1),
  TIDYROW_DESTINATION_TABLE: z
    .string()
    .regex(/^[a-z_][a-z0-9_]*$/, 'Table names are lower_snake_case')
    .default('cleaned_records'),
})

export type DestinationEnv = z.infer<typeof DestinationEnvSchema>

// Raised when a Supabase destination is requested without usable settings
export class DestinationConfigError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid destination settings:\n - ${issues.join('\n - ')}`)
    this.name = 'DestinationConfigError'
    this.issues = issues
  }
}

export function loadDestinationEnv(env: NodeJS.ProcessEnv = process.env): DestinationEnv {
  const parsed = DestinationEnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new DestinationConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    )
  }
  return parsed.data
}

// Service-role client for the batch writer; no user session is involved
export function createDestinationClient(settings: DestinationEnv): SupabaseClient {
  return createClient(settings.SUPABASE_URL, settings.SUPABASE_SERVICE_ROLE_KEY, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
    db: {
      schema: 'public',
    },
    global: {
      headers: {
        'X-Client-Info': 'tidyrow-cleaner'
      }
    }
  })
}
