import type {
  CollaboratorFailureKind,
  IngestErrorCode,
  IngestRejectionDto,
  IngestState,
} from '@examcraft/contracts';
import type { InvariantViolation } from '../content/invariants';

export type { IngestErrorCode };

export interface IngestRejection extends IngestRejectionDto {
  violations: InvariantViolation[];
}

const KNOWN_ERROR_CODES: ReadonlySet<string> = new Set<IngestErrorCode>([
  'empty_response',
  'json_parse_error',
  'unknown_discriminator',
  'invariant_violation',
  'cross_reference_mismatch',
  'collaborator_failure',
  'db_error',
  'invalid_input',
  'unknown',
]);

const RAW_SNIPPET_LIMIT = 2_000;

function isKnownErrorCode(value: string): value is IngestErrorCode {
  return KNOWN_ERROR_CODES.has(value);
}

function asKnownErrorCode(value?: string | null): IngestErrorCode | null {
  const raw = String(value || '').trim().toLowerCase();
  return isKnownErrorCode(raw) ? raw : null;
}

export function classifyIngestError(
  input?: { errorCode?: string | null } | string | null
): IngestErrorCode {
  if (!input) return 'unknown';

  if (typeof input === 'string') {
    return asKnownErrorCode(input) ?? 'unknown';
  }

  return asKnownErrorCode(input.errorCode) ?? 'unknown';
}

export function toRawSnippet(raw: string | null | undefined): string | null {
  if (raw === null || raw === undefined) return null;
  return raw.length > RAW_SNIPPET_LIMIT ? `${raw.slice(0, RAW_SNIPPET_LIMIT)}…` : raw;
}

export function buildRejection(input: {
  code: IngestErrorCode;
  failedAt: IngestState;
  message: string;
  violations?: InvariantViolation[];
  raw?: string | null;
  failureKind?: CollaboratorFailureKind | null;
}): IngestRejection {
  return {
    code: input.code,
    failedAt: input.failedAt,
    message: input.message,
    violations: input.violations ?? [],
    rawSnippet: toRawSnippet(input.raw),
    ...(input.failureKind ? { failureKind: input.failureKind } : {}),
  };
}

/** One line per violation, for logs and correction prompts. */
export function formatViolations(violations: InvariantViolation[]): string {
  return violations.map((entry) => `${entry.field}: ${entry.message} (${entry.rule})`).join('; ');
}

export function getUserFacingIngestMessage(
  code: IngestErrorCode,
  fallback?: string | null
): string {
  switch (code) {
    case 'empty_response':
      return 'The model returned nothing. Regenerate to try again.';
    case 'json_parse_error':
      return 'The model reply was not a single JSON object. Regenerate to try again.';
    case 'unknown_discriminator':
      return 'The generated item is not a supported question or asset type. Regenerate to try again.';
    case 'invariant_violation':
      return fallback?.trim()
        ? `The generated item breaks content rules: ${fallback.trim()}. Correct it or regenerate.`
        : 'The generated item breaks content rules. Correct it or regenerate.';
    case 'cross_reference_mismatch':
      return 'A generated question points at a different passage and was left out.';
    case 'collaborator_failure':
      return fallback?.trim() || 'The model provider could not be reached. Try again later.';
    case 'db_error':
      return 'The content was generated but could not be saved. Try again.';
    case 'invalid_input':
      return fallback?.trim()
        ? `The generation request is incomplete: ${fallback.trim()}.`
        : 'The generation request is incomplete.';
    case 'unknown':
    default:
      return fallback?.trim() || 'Content generation failed. Try again.';
  }
}
