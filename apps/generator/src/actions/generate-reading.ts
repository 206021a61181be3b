import type { BatchReportDto } from '@examcraft/contracts';
import { z } from 'zod';
import { createComprehensionBatchPrompt, createPassagePrompt } from '../lib/ai/prompts';
import { createGenerationTraceId } from '../lib/ai/trace-id';
import { ASSET_COLLECTIONS, type PassageAsset } from '../lib/content/assets';
import { buildDifficultyDetail } from '../lib/content/primitives';
import type { AnyQuestion } from '../lib/content/questions';
import { toContentDocument } from '../lib/content/serialize';
import { ingestQuestionBatch } from '../lib/ingest/batch';
import { buildRejection } from '../lib/ingest/errors';
import { assembleReadingMaterial, type CrossReferenceMismatch } from '../lib/ingest/linker';
import { ingestModelResponse } from '../lib/ingest/pipeline';
import { createLogger } from '../lib/observability/logger';
import {
  DifficultyInputShape,
  collaboratorRejection,
  failInput,
  failStore,
  failWith,
  requestModelText,
  resolveIdFactory,
  resolveQuestionCount,
  saveQuestions,
  type ActionResult,
  type GeneratorDeps,
} from './shared';

const log = createLogger('actions:reading');

export const GenerateReadingInputSchema = z.object({
  ...DifficultyInputShape,
  topic: z.string().trim().min(1, 'topic is required'),
  questionCount: z.number().int().min(1).max(10).optional(),
  wordCount: z.number().int().min(50).max(1000).optional(),
});

export type GenerateReadingInput = z.input<typeof GenerateReadingInputSchema>;

export interface GeneratedReading {
  passageAsset: PassageAsset;
  questions: AnyQuestion[];
  questionIds: string[];
  report: BatchReportDto;
  mismatches: CrossReferenceMismatch[];
}

/**
 * Passage, then its question batch, then the link check; both are saved only
 * when at least one question survives.
 */
export async function generateReadingMaterial(
  input: GenerateReadingInput,
  deps: GeneratorDeps
): Promise<ActionResult<GeneratedReading>> {
  const traceId = createGenerationTraceId('reading_material');
  const parsed = GenerateReadingInputSchema.safeParse(input);
  if (!parsed.success) {
    return failInput(parsed.error.issues, traceId);
  }
  const request = parsed.data;
  const difficulty = buildDifficultyDetail(request.stage, request.grade, request.level);
  const createId = resolveIdFactory(deps);
  const questionCount = resolveQuestionCount(request.questionCount, deps);
  log.info('generate start', { traceId, topic: request.topic, questionCount });

  const passageText = await requestModelText(
    deps.caller,
    createPassagePrompt({
      topic: request.topic,
      difficulty,
      learningObjectives: request.learningObjectives,
      wordCount: request.wordCount,
    }),
    'PASSAGE',
    log,
    traceId
  );
  const passageOutcome = ingestModelResponse('asset', passageText.response, {
    defaults: {
      assetType: 'PASSAGE',
      difficulty,
      learningObjectives: request.learningObjectives,
      tags: [request.topic],
    },
    overrides: {
      assetId: createId(),
      status: 'DRAFT',
      version: 1,
      source: passageText.source === 'fallback' ? 'fallback' : 'generated',
      createdBy: deps.createdBy ?? null,
    },
    expectedType: 'PASSAGE',
    now: deps.now,
    source: passageText.source,
    traceId,
  });
  if (!passageOutcome.success) {
    return failWith(passageOutcome.error, traceId);
  }
  if (passageOutcome.data.assetType !== 'PASSAGE') {
    return failWith(buildRejection({
      code: 'unknown_discriminator',
      failedAt: 'resolution_failed',
      message: `expected a PASSAGE, got ${passageOutcome.data.assetType}`,
    }), traceId);
  }
  const passageAsset = passageOutcome.data;

  const batchText = await requestModelText(
    deps.caller,
    createComprehensionBatchPrompt({
      material: passageAsset.content,
      difficulty,
      count: questionCount,
      mode: 'reading',
    }),
    'READING_COMPREHENSION_BATCH',
    log,
    traceId
  );
  if (!batchText.response.success) {
    return failWith(collaboratorRejection(batchText.response), traceId);
  }
  const batch = ingestQuestionBatch(batchText.response.text, {
    requestedCount: questionCount,
    defaults: {
      questionType: 'READING_COMPREHENSION',
      contentAssetId: passageAsset.assetId,
      difficulty: passageAsset.difficulty,
      learningObjectives: passageAsset.learningObjectives,
    },
    expectedType: 'READING_COMPREHENSION',
    now: deps.now,
    source: batchText.source,
    traceId,
  });
  if (!batch.success) {
    return failWith(batch.error, traceId);
  }

  const { material, mismatches } = assembleReadingMaterial(passageAsset, batch.data);
  if (material.questions_list.length === 0) {
    return failWith(buildRejection({
      code: 'cross_reference_mismatch',
      failedAt: 'rejected',
      message: `no question references passage "${passageAsset.assetId}"`,
    }), traceId);
  }
  const report: BatchReportDto = {
    ...batch.report,
    acceptedCount: material.questions_list.length,
    needsTopUp: material.questions_list.length < batch.report.requestedCount,
  };
  if (report.needsTopUp) {
    log.warn(`accepted ${report.acceptedCount} of ${report.requestedCount} questions`, { traceId });
  }

  let questionIds: string[];
  try {
    // questions first: a passage is never stored without them
    questionIds = await saveQuestions(deps.store, material.questions_list);
    await deps.store.put(ASSET_COLLECTIONS.PASSAGE, passageAsset.assetId, toContentDocument(passageAsset));
  } catch (error) {
    return failStore(error, traceId, log);
  }

  log.info('generate complete', { traceId, passageId: passageAsset.assetId, questionCount: questionIds.length });
  return {
    success: true,
    data: {
      passageAsset,
      questions: material.questions_list,
      questionIds,
      report,
      mismatches,
    },
    traceId,
    fallbackUsed: passageText.source === 'fallback' || batchText.source === 'fallback',
  };
}
