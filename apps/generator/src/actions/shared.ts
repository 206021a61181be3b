import { randomUUID } from 'node:crypto';
import type { IngestErrorCode } from '@examcraft/contracts';
import { z } from 'zod';
import type { ModelCaller, ModelCallRequest, ModelCallResult } from '../lib/ai/model-caller';
import { DIFFICULTY_STAGE_VALUES } from '../lib/content/primitives';
import type { AnyQuestion } from '../lib/content/questions';
import { QUESTIONS_COLLECTION } from '../lib/content/assets';
import { toContentDocument } from '../lib/content/serialize';
import {
  buildRejection,
  getUserFacingIngestMessage,
  type IngestRejection,
} from '../lib/ingest/errors';
import { getFallbackPayload, type FallbackShape } from '../lib/ingest/fallback';
import type { IngestSource } from '../lib/ingest/pipeline';
import type { DocumentStore } from '../lib/store/document-store';
import { AUTO_ID } from '../lib/store/document-store';
import type { Logger } from '../lib/observability/logger';

export interface GeneratorDeps {
  /** `null` means no credentials: fallback payloads stand in for the model. */
  caller: ModelCaller | null;
  store: DocumentStore;
  now?: () => Date;
  createId?: () => string;
  createdBy?: string;
  /** Questions per batch when a request does not say. */
  questionBatchSize?: number;
}

export const DEFAULT_QUESTION_BATCH_SIZE = 3;

export function resolveQuestionCount(requested: number | undefined, deps: GeneratorDeps): number {
  return requested ?? deps.questionBatchSize ?? DEFAULT_QUESTION_BATCH_SIZE;
}

export type ActionResult<T> =
  | { success: true; data: T; traceId: string; fallbackUsed: boolean }
  | {
    success: false;
    code: IngestErrorCode;
    error: string;
    traceId: string;
    rejection: IngestRejection | null;
  };

export const DifficultyInputShape = {
  stage: z.enum(DIFFICULTY_STAGE_VALUES),
  grade: z.number().int().min(1),
  level: z.number().int().min(1).max(10),
  learningObjectives: z.array(z.string().min(1)).default(() => []),
};

export interface ModelText {
  response: ModelCallResult;
  source: IngestSource;
}

/**
 * One model call for one generation unit. Without a caller the fixture reply
 * for `shape` is returned instead, marked as a fallback.
 */
export async function requestModelText(
  caller: ModelCaller | null,
  request: ModelCallRequest,
  shape: FallbackShape,
  log: Logger,
  traceId: string
): Promise<ModelText> {
  if (!caller) {
    log.info(`no model configured; using fallback payload ${shape}`, { traceId });
    return {
      response: {
        success: true,
        text: getFallbackPayload(shape),
        meta: {
          provider: 'fallback',
          model: shape,
          attemptCount: 0,
          retried: false,
          status: null,
          latencyMs: 0,
        },
      },
      source: 'fallback',
    };
  }

  const response = await caller.call(request);
  log.debug(`${caller.provider} responded`, { traceId, meta: response.meta });
  return { response, source: 'model' };
}

export function collaboratorRejection(response: Extract<ModelCallResult, { success: false }>): IngestRejection {
  return buildRejection({
    code: 'collaborator_failure',
    failedAt: 'requested',
    message: response.failure.message,
    failureKind: response.failure.kind,
  });
}

export function failWith<T>(rejection: IngestRejection, traceId: string): ActionResult<T> {
  const detail = rejection.code === 'invariant_violation' || rejection.code === 'collaborator_failure'
    ? rejection.message
    : null;
  return {
    success: false,
    code: rejection.code,
    error: getUserFacingIngestMessage(rejection.code, detail),
    traceId,
    rejection,
  };
}

export function failInput<T>(issues: readonly { message: string; path: readonly PropertyKey[] }[], traceId: string): ActionResult<T> {
  const detail = issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message))
    .join(', ');
  return {
    success: false,
    code: 'invalid_input',
    error: getUserFacingIngestMessage('invalid_input', detail),
    traceId,
    rejection: null,
  };
}

export function failStore<T>(error: unknown, traceId: string, log: Logger): ActionResult<T> {
  const message = error instanceof Error ? error.message : String(error);
  log.error('save failed', { traceId, message });
  return {
    success: false,
    code: 'db_error',
    error: getUserFacingIngestMessage('db_error'),
    traceId,
    rejection: null,
  };
}

export function resolveIdFactory(deps: Pick<GeneratorDeps, 'createId'>): () => string {
  return deps.createId ?? (() => randomUUID());
}

export async function saveQuestions(store: DocumentStore, questions: AnyQuestion[]): Promise<string[]> {
  const ids: string[] = [];
  for (const question of questions) {
    ids.push(await store.put(QUESTIONS_COLLECTION, AUTO_ID, toContentDocument(question)));
  }
  return ids;
}
