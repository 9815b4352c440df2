// Core record types shared by the cleaning pipeline and destination adapters

// Scalar cell values an input reader may hand over
export type RawScalar = string | number | boolean | null | undefined;

// One unprocessed input row: column label -> scalar
export type RawRow = Record<string, RawScalar>;

// Values that survive extraction and normalization
export type FieldValue = string | number;

export type TargetField = string;

// Reason codes produced by the pipeline itself. Field-level codes
// (MALFORMED_DATE, MALFORMED_POSTCODE, ...) are declared by configuration.
export const ReasonCode = {
  STRUCTURAL_ERROR: 'STRUCTURAL_ERROR' as const,
  MISSING_REQUIRED_FIELD: 'MISSING_REQUIRED_FIELD' as const,
  CROSS_FIELD_INVALID: 'CROSS_FIELD_INVALID' as const,
  WRITE_FAILED: 'WRITE_FAILED' as const,
  DESTINATION_REJECTED: 'DESTINATION_REJECTED' as const,
  // a custom rule threw; the row is isolated and the run continues
  PROCESSING_ERROR: 'PROCESSING_ERROR' as const
} as const;

export type BuiltInReasonCode = typeof ReasonCode[keyof typeof ReasonCode];

// Any reason code, built-in or configured
export type ReasonCodeValue = BuiltInReasonCode | (string & {});

// Where a candidate value came from
export interface FieldProvenance {
  source_column: string;
  raw_value: RawScalar;
}

export type CandidateField =
  | { present: true; value: FieldValue; provenance: FieldProvenance }
  | { present: false };

export type CandidateFieldSet = Record<TargetField, CandidateField>;

export type NormalizedField =
  | { field: TargetField; status: 'valid'; value: FieldValue; provenance: FieldProvenance }
  | { field: TargetField; status: 'invalid'; reason: ReasonCodeValue; value: FieldValue; provenance: FieldProvenance }
  | { field: TargetField; status: 'absent' };

export type FieldStatus = NormalizedField['status'];

export interface CrossFieldFailure {
  rule: string;
  fields: TargetField[];
  reason: ReasonCodeValue;
}

export interface CandidateRecord {
  row_number: number;
  identity_key: string;
  identity_parts: string[];
  fields: Record<TargetField, FieldValue>;
  dropped_fields: Array<{ field: TargetField; reason: ReasonCodeValue }>;
}

// What is handed to the destination store
export interface DestinationRecord {
  identity_key: string;
  config_version: string;
  source_row: number;
  fields: Record<TargetField, FieldValue>;
}

export type CommitResult =
  | { status: 'success'; record_id: string }
  | { status: 'structural_failure'; reason: string }
  | { status: 'transient_failure'; reason: string };

export interface ExistingIdentity {
  identity_key: string;
  record_id: string;
}

/**
 * Destination collaborator. Each `commit` call is expected to be atomic:
 * either the whole record is stored or nothing is.
 */
export interface DestinationStore {
  commit(record: DestinationRecord): Promise<CommitResult>;
  existingIdentities?(): Promise<ExistingIdentity[]>;
}

export type RowOutcome =
  | {
      row_number: number;
      status: 'accepted';
      record_id: string;
      identity_key: string;
      dropped_fields: Array<{ field: TargetField; reason: ReasonCodeValue }>;
    }
  | {
      row_number: number;
      status: 'duplicate';
      identity_key: string;
      duplicate_of: string;
    }
  | {
      row_number: number;
      status: 'rejected';
      reason: ReasonCodeValue;
      field?: TargetField;
      detail?: string;
    };

export type RunStatus = 'completed' | 'aborted' | 'cancelled';

export interface RunAbort {
  code: 'DESTINATION_UNREACHABLE' | 'SOURCE_FAILED';
  message: string;
  row_number?: number;
}

export interface RunSummary {
  config_version: string;
  status: RunStatus;
  total_rows: number;
  accepted: number;
  duplicates: number;
  rejected: number;
  rejected_by_reason: Record<string, number>;
  outcomes: RowOutcome[];
  abort?: RunAbort;
}
