export type IngestErrorCode =
  | "empty_response"
  | "json_parse_error"
  | "unknown_discriminator"
  | "invariant_violation"
  | "cross_reference_mismatch"
  | "collaborator_failure"
  | "db_error"
  | "invalid_input"
  | "unknown";

export type CollaboratorFailureKind =
  | "timeout"
  | "rate_limited"
  | "provider_error"
  | "config_error"
  | "empty_output"
  | "network_error";

export type IngestState =
  | "requested"
  | "raw_received"
  | "parsed"
  | "discriminator_resolved"
  | "validated"
  | "accepted"
  | "parse_failed"
  | "resolution_failed"
  | "validation_failed"
  | "rejected";

export interface InvariantViolationDto {
  rule: string;
  field: string;
  message: string;
}

export interface IngestRejectionDto {
  code: IngestErrorCode;
  failedAt: IngestState;
  message: string;
  violations: InvariantViolationDto[];
  rawSnippet: string | null;
  failureKind?: CollaboratorFailureKind | null;
}

export interface BatchReportDto {
  requestedCount: number;
  receivedCount: number;
  acceptedCount: number;
  ignoredCount: number;
  needsTopUp: boolean;
}
