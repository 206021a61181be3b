import type { BatchReportDto } from '@examcraft/contracts';
import type { AnyQuestion } from '../content/questions';
import type { InvariantViolation } from '../content/invariants';
import { createLogger } from '../observability/logger';
import { buildRejection, type IngestRejection } from './errors';
import { ingestQuestionValue, isRecord, type IngestOptions } from './pipeline';

const log = createLogger('ingest:batch');

export const BATCH_ENVELOPE_FIELD = 'questions_list';

export interface BatchIngestOptions extends IngestOptions {
  requestedCount: number;
}

export interface RejectedElement {
  index: number;
  error: IngestRejection;
}

export type BatchOutcome =
  | {
    success: true;
    data: AnyQuestion[];
    rejected: RejectedElement[];
    report: BatchReportDto;
  }
  | {
    success: false;
    error: IngestRejection;
    rejected: RejectedElement[];
    report: BatchReportDto;
  };

function buildReport(requestedCount: number, receivedCount: number, acceptedCount: number): BatchReportDto {
  const considered = Math.min(receivedCount, Math.max(0, requestedCount));
  return {
    requestedCount,
    receivedCount,
    acceptedCount,
    ignoredCount: receivedCount - considered,
    needsTopUp: acceptedCount < requestedCount,
  };
}

function failEnvelope(error: IngestRejection, requestedCount: number): BatchOutcome {
  log.warn(`batch rejected: ${error.code}`, error.message);
  return {
    success: false,
    error,
    rejected: [],
    report: buildReport(requestedCount, 0, 0),
  };
}

/**
 * Each element runs the question pipeline on its own; a failing element is
 * dropped while its siblings continue. Elements past the requested count are
 * ignored.
 */
export function ingestQuestionElements(elements: unknown[], options: BatchIngestOptions): BatchOutcome {
  const requestedCount = Math.max(0, Math.floor(options.requestedCount));
  const considered = elements.slice(0, requestedCount);
  if (elements.length > considered.length) {
    log.info(`ignoring ${elements.length - considered.length} element(s) beyond the requested ${requestedCount}`, {
      traceId: options.traceId ?? null,
    });
  }

  const accepted: AnyQuestion[] = [];
  const rejected: RejectedElement[] = [];
  considered.forEach((element, index) => {
    const outcome = ingestQuestionValue(element, { ...options, label: `${BATCH_ENVELOPE_FIELD}[${index}]` });
    if (outcome.success) {
      accepted.push(outcome.data);
      return;
    }
    rejected.push({ index, error: outcome.error });
  });

  const report = buildReport(requestedCount, elements.length, accepted.length);
  if (accepted.length > 0) {
    return { success: true, data: accepted, rejected, report };
  }

  const violations: InvariantViolation[] = rejected.flatMap(({ index, error }) => (
    error.violations.map((entry) => ({
      ...entry,
      field: `${BATCH_ENVELOPE_FIELD}.${index}.${entry.field}`,
    }))
  ));
  return {
    success: false,
    error: buildRejection({
      code: rejected.length > 0 ? rejected[0].error.code : 'invariant_violation',
      failedAt: 'rejected',
      message: `0 of ${requestedCount} requested questions accepted`,
      violations,
    }),
    rejected,
    report,
  };
}

export function ingestQuestionBatch(raw: string, options: BatchIngestOptions): BatchOutcome {
  const requestedCount = Math.max(0, Math.floor(options.requestedCount));
  if (raw.trim().length === 0) {
    return failEnvelope(buildRejection({
      code: 'empty_response',
      failedAt: 'raw_received',
      message: 'model returned empty text',
      raw,
    }), requestedCount);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return failEnvelope(buildRejection({
      code: 'json_parse_error',
      failedAt: 'parse_failed',
      message: error instanceof Error ? error.message : String(error),
      raw,
    }), requestedCount);
  }
  if (!isRecord(parsed)) {
    return failEnvelope(buildRejection({
      code: 'json_parse_error',
      failedAt: 'parse_failed',
      message: 'top-level JSON value must be an object',
      raw,
    }), requestedCount);
  }

  const elements = parsed[BATCH_ENVELOPE_FIELD];
  if (!Array.isArray(elements)) {
    return failEnvelope(buildRejection({
      code: 'invariant_violation',
      failedAt: 'validation_failed',
      message: `${BATCH_ENVELOPE_FIELD} must be an array`,
      violations: [{
        rule: elements === undefined ? 'required_field' : 'type_mismatch',
        field: BATCH_ENVELOPE_FIELD,
        message: `${BATCH_ENVELOPE_FIELD} must be an array of question objects`,
      }],
      raw,
    }), requestedCount);
  }

  return ingestQuestionElements(elements, { ...options, requestedCount });
}
