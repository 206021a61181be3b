import type { IngestState } from '@examcraft/contracts';
import { constructAsset, constructQuestion, type ConstructOutcome } from '../content/construct';
import {
  DISCRIMINATOR_FIELDS,
  resolveAssetType,
  resolveQuestionType,
  type EntityKind,
  type VariantResolution,
} from '../content/discriminator';
import { validateAsset, validateQuestion, type InvariantViolation } from '../content/invariants';
import type { AnyQuestion } from '../content/questions';
import type { AnyAsset } from '../content/assets';
import type { ModelCallResult } from '../ai/model-caller';
import { createLogger } from '../observability/logger';
import { buildRejection, formatViolations, type IngestRejection } from './errors';

const log = createLogger('ingest');

// Wire forms like `explanation_en` / `explanation_zh_tw` fold into `explanation`.
const LOCALIZED_FIELDS = ['title', 'description', 'explanation', 'sourceText'] as const;

export type IngestSource = 'model' | 'fallback' | 'stored' | 'manual';

export interface IngestOptions {
  /** Request-owned fields merged under the payload; payload keys win. */
  defaults?: Record<string, unknown>;
  /** Request-owned fields merged over the payload; the payload cannot change them. */
  overrides?: Record<string, unknown>;
  /** Pins the variant; a payload carrying another tag is rejected. */
  expectedType?: string;
  now?: () => Date;
  source?: IngestSource;
  traceId?: string;
  /** Names the input in log lines, e.g. `element 2` of a batch. */
  label?: string;
}

export type IngestOutcome<T> =
  | { success: true; data: T; stages: IngestState[]; source: IngestSource }
  | { success: false; error: IngestRejection; stages: IngestState[]; source: IngestSource };

interface EntityPipeline<TType extends string, TEntity> {
  kind: EntityKind;
  resolve: (tag: unknown) => VariantResolution<TType>;
  construct: (type: TType, fields: Record<string, unknown>) => ConstructOutcome<TEntity>;
  check: (entity: TEntity) => InvariantViolation[];
}

const QUESTION_PIPELINE: EntityPipeline<AnyQuestion['questionType'], AnyQuestion> = {
  kind: 'question',
  resolve: resolveQuestionType,
  construct: constructQuestion,
  check: validateQuestion,
};

const ASSET_PIPELINE: EntityPipeline<AnyAsset['assetType'], AnyAsset> = {
  kind: 'asset',
  resolve: resolveAssetType,
  construct: constructAsset,
  check: validateAsset,
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function normalizeWireFields(payload: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...payload };
  for (const field of LOCALIZED_FIELDS) {
    const enKey = `${field}_en`;
    const zhKey = `${field}_zh_tw`;
    const hasFlat = enKey in payload || zhKey in payload;
    if (hasFlat && out[field] === undefined) {
      out[field] = { en: payload[enKey], zh_tw: payload[zhKey] };
    }
    delete out[enKey];
    delete out[zhKey];
  }
  return out;
}

function stampTimestamps(fields: Record<string, unknown>, now: () => Date): Record<string, unknown> {
  if (fields.createdAt !== undefined && fields.updatedAt !== undefined) return fields;
  const stamp = now();
  return {
    ...fields,
    createdAt: fields.createdAt ?? new Date(stamp.getTime()),
    updatedAt: fields.updatedAt ?? new Date(stamp.getTime()),
  };
}

function reject<T>(
  stages: IngestState[],
  failureState: IngestState | null,
  error: IngestRejection,
  options: IngestOptions
): IngestOutcome<T> {
  if (failureState) stages.push(failureState);
  stages.push('rejected');
  const source = options.source ?? 'model';
  const subject = options.label ? `${options.label} rejected` : 'rejected';
  log.warn(`${subject} at ${error.failedAt}: ${error.code}`, {
    traceId: options.traceId ?? null,
    source,
    message: error.message,
  });
  return { success: false, error, stages, source };
}

function runParsed<TType extends string, TEntity>(
  pipeline: EntityPipeline<TType, TEntity>,
  parsed: Record<string, unknown>,
  options: IngestOptions,
  stages: IngestState[],
  raw: string | null
): IngestOutcome<TEntity> {
  const fields = stampTimestamps(
    { ...(options.defaults ?? {}), ...normalizeWireFields(parsed), ...(options.overrides ?? {}) },
    options.now ?? (() => new Date())
  );

  const field = DISCRIMINATOR_FIELDS[pipeline.kind];
  const resolution = pipeline.resolve(fields[field]);
  if (!resolution.ok) {
    return reject(stages, 'resolution_failed', buildRejection({
      code: 'unknown_discriminator',
      failedAt: 'resolution_failed',
      message: resolution.error.message,
      raw,
    }), options);
  }
  if (options.expectedType !== undefined && resolution.value !== options.expectedType) {
    return reject(stages, 'resolution_failed', buildRejection({
      code: 'unknown_discriminator',
      failedAt: 'resolution_failed',
      message: `${field} "${resolution.value}" does not match the requested ${options.expectedType}`,
      raw,
    }), options);
  }
  stages.push('discriminator_resolved');

  const constructed = pipeline.construct(resolution.value, fields);
  const violations = constructed.ok ? pipeline.check(constructed.value) : constructed.violations;
  if (!constructed.ok || violations.length > 0) {
    return reject(stages, 'validation_failed', buildRejection({
      code: 'invariant_violation',
      failedAt: 'validation_failed',
      message: formatViolations(violations),
      violations,
      raw,
    }), options);
  }

  stages.push('validated', 'accepted');
  return { success: true, data: constructed.value, stages, source: options.source ?? 'model' };
}

function runRaw<TType extends string, TEntity>(
  pipeline: EntityPipeline<TType, TEntity>,
  raw: string,
  options: IngestOptions
): IngestOutcome<TEntity> {
  const stages: IngestState[] = ['requested', 'raw_received'];
  if (raw.trim().length === 0) {
    return reject(stages, null, buildRejection({
      code: 'empty_response',
      failedAt: 'raw_received',
      message: 'model returned empty text',
      raw,
    }), options);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return reject(stages, 'parse_failed', buildRejection({
      code: 'json_parse_error',
      failedAt: 'parse_failed',
      message,
      raw,
    }), options);
  }
  if (!isRecord(parsed)) {
    return reject(stages, 'parse_failed', buildRejection({
      code: 'json_parse_error',
      failedAt: 'parse_failed',
      message: 'top-level JSON value must be an object',
      raw,
    }), options);
  }
  stages.push('parsed');
  return runParsed(pipeline, parsed, options, stages, raw);
}

/**
 * Runs an already-decoded value (a batch element, a stored document) through
 * the same states as raw text. A string value is decoded as JSON first.
 */
function runValue<TType extends string, TEntity>(
  pipeline: EntityPipeline<TType, TEntity>,
  value: unknown,
  options: IngestOptions
): IngestOutcome<TEntity> {
  if (typeof value === 'string') {
    return runRaw(pipeline, value, options);
  }
  const stages: IngestState[] = ['requested', 'raw_received'];
  const raw = JSON.stringify(value) ?? null;
  if (!isRecord(value)) {
    return reject(stages, 'parse_failed', buildRejection({
      code: 'json_parse_error',
      failedAt: 'parse_failed',
      message: 'value must be a JSON object',
      raw,
    }), options);
  }
  stages.push('parsed');
  return runParsed(pipeline, value, options, stages, raw);
}

export function ingestQuestion(raw: string, options: IngestOptions = {}): IngestOutcome<AnyQuestion> {
  return runRaw(QUESTION_PIPELINE, raw, options);
}

export function ingestAsset(raw: string, options: IngestOptions = {}): IngestOutcome<AnyAsset> {
  return runRaw(ASSET_PIPELINE, raw, options);
}

export function ingestQuestionValue(value: unknown, options: IngestOptions = {}): IngestOutcome<AnyQuestion> {
  return runValue(QUESTION_PIPELINE, value, options);
}

export function ingestAssetValue(value: unknown, options: IngestOptions = {}): IngestOutcome<AnyAsset> {
  return runValue(ASSET_PIPELINE, value, options);
}

export function ingest(kind: 'question', raw: string, options?: IngestOptions): IngestOutcome<AnyQuestion>;
export function ingest(kind: 'asset', raw: string, options?: IngestOptions): IngestOutcome<AnyAsset>;
export function ingest(
  kind: EntityKind,
  raw: string,
  options: IngestOptions = {}
): IngestOutcome<AnyQuestion> | IngestOutcome<AnyAsset> {
  return kind === 'question' ? ingestQuestion(raw, options) : ingestAsset(raw, options);
}

/** Collaborator failures are surfaced as-is; text continues through {@link ingest}. */
export function ingestModelResponse(
  kind: 'question',
  response: ModelCallResult,
  options?: IngestOptions
): IngestOutcome<AnyQuestion>;
export function ingestModelResponse(
  kind: 'asset',
  response: ModelCallResult,
  options?: IngestOptions
): IngestOutcome<AnyAsset>;
export function ingestModelResponse(
  kind: EntityKind,
  response: ModelCallResult,
  options: IngestOptions = {}
): IngestOutcome<AnyQuestion> | IngestOutcome<AnyAsset> {
  if (!response.success) {
    return reject<never>(['requested'], null, buildRejection({
      code: 'collaborator_failure',
      failedAt: 'requested',
      message: response.failure.message,
      failureKind: response.failure.kind,
    }), options);
  }
  return kind === 'question' ? ingestQuestion(response.text, options) : ingestAsset(response.text, options);
}
