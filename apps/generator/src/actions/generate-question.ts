import type { BatchReportDto } from '@examcraft/contracts';
import { z } from 'zod';
import {
  createComprehensionBatchPrompt,
  createFillInTheBlankPrompt,
  createPictureDescriptionPrompt,
  createSpellingCorrectionPrompt,
  createTranslationPrompt,
} from '../lib/ai/prompts';
import type { ModelCallRequest } from '../lib/ai/model-caller';
import { createGenerationTraceId } from '../lib/ai/trace-id';
import {
  ASSET_COLLECTIONS,
  type AnyAsset,
  type AssetOfType,
  type AssetTypeValue,
  type AudioAsset,
  type ImageAsset,
  type PassageAsset,
} from '../lib/content/assets';
import { buildDifficultyDetail, type DifficultyDetail } from '../lib/content/primitives';
import { ANSWER_INPUT_TYPE_VALUES, type AnyQuestion } from '../lib/content/questions';
import { ingestQuestionBatch } from '../lib/ingest/batch';
import { buildRejection, type IngestRejection } from '../lib/ingest/errors';
import type { FallbackShape } from '../lib/ingest/fallback';
import { linkQuestionsToAsset } from '../lib/ingest/linker';
import { ingestAssetValue, ingestModelResponse } from '../lib/ingest/pipeline';
import { createLogger } from '../lib/observability/logger';
import type { DocumentStore } from '../lib/store/document-store';
import {
  DifficultyInputShape,
  collaboratorRejection,
  failInput,
  failStore,
  failWith,
  requestModelText,
  resolveQuestionCount,
  saveQuestions,
  type ActionResult,
  type GeneratorDeps,
} from './shared';

const log = createLogger('actions:question');

// ==========================================
// Single questions
// ==========================================

export const GenerateQuestionInputSchema = z.discriminatedUnion('questionType', [
  z.object({
    ...DifficultyInputShape,
    questionType: z.literal('FILL_IN_THE_BLANK'),
    grammarPoint: z.string().trim().min(1, 'grammarPoint is required'),
    answerInputType: z.enum(ANSWER_INPUT_TYPE_VALUES).default('MULTIPLE_CHOICE'),
  }),
  z.object({
    ...DifficultyInputShape,
    questionType: z.literal('TRANSLATION'),
    theme: z.string().trim().min(1, 'theme is required'),
  }),
  z.object({
    ...DifficultyInputShape,
    questionType: z.literal('PICTURE_DESCRIPTION'),
    imageAssetId: z.string().trim().min(1, 'imageAssetId is required'),
  }),
  z.object({
    ...DifficultyInputShape,
    questionType: z.literal('SPELLING_CORRECTION'),
    mode: z.enum(['word_choices', 'sentence']).default('word_choices'),
  }),
]);

export type GenerateQuestionInput = z.input<typeof GenerateQuestionInputSchema>;
type ParsedQuestionInput = z.output<typeof GenerateQuestionInputSchema>;

export interface GeneratedQuestion {
  question: AnyQuestion;
  questionId: string;
}

/** Reads a stored asset back through the ingestion pipeline. */
export async function loadAsset<T extends AssetTypeValue>(
  store: DocumentStore,
  assetType: T,
  assetId: string
): Promise<{ success: true; data: AssetOfType<T> } | { success: false; error: IngestRejection }> {
  const stored = await store.get(ASSET_COLLECTIONS[assetType], assetId);
  if (!stored) {
    return {
      success: false,
      error: buildRejection({
        code: 'cross_reference_mismatch',
        failedAt: 'rejected',
        message: `${assetType} asset "${assetId}" does not exist`,
      }),
    };
  }
  const outcome = ingestAssetValue(stored.document, {
    defaults: { assetId: stored.id },
    expectedType: assetType,
    source: 'stored',
  });
  if (!outcome.success) return { success: false, error: outcome.error };
  const asset = outcome.data;
  if (!isAssetOfType(asset, assetType)) {
    return {
      success: false,
      error: buildRejection({
        code: 'unknown_discriminator',
        failedAt: 'resolution_failed',
        message: `asset "${assetId}" is not a ${assetType}`,
      }),
    };
  }
  return { success: true, data: asset };
}

function isAssetOfType<T extends AssetTypeValue>(
  asset: AnyAsset,
  assetType: T
): asset is AssetOfType<T> {
  return asset.assetType === assetType;
}

function describeImage(image: ImageAsset): string {
  return image.description ? `${image.title.en}. ${image.description.en}` : image.title.en;
}

function planSingle(
  request: ParsedQuestionInput,
  difficulty: DifficultyDetail,
  image: ImageAsset | null
): { prompt: ModelCallRequest; shape: FallbackShape; defaults: Record<string, unknown> } {
  switch (request.questionType) {
    case 'FILL_IN_THE_BLANK':
      return {
        prompt: createFillInTheBlankPrompt({
          grammarPoint: request.grammarPoint,
          difficulty,
          answerInputType: request.answerInputType,
        }),
        shape: request.answerInputType === 'MULTIPLE_CHOICE'
          ? 'FILL_IN_THE_BLANK:MULTIPLE_CHOICE'
          : 'FILL_IN_THE_BLANK:TEXT_INPUT',
        defaults: { answerInputType: request.answerInputType },
      };
    case 'TRANSLATION':
      return {
        prompt: createTranslationPrompt({ theme: request.theme, difficulty }),
        shape: 'TRANSLATION',
        defaults: { targetLanguage: 'en' },
      };
    case 'PICTURE_DESCRIPTION':
      return {
        prompt: createPictureDescriptionPrompt({
          imageDescription: image ? describeImage(image) : request.imageAssetId,
          difficulty,
        }),
        shape: 'PICTURE_DESCRIPTION',
        defaults: { imageAssetId: request.imageAssetId },
      };
    case 'SPELLING_CORRECTION':
      return {
        prompt: createSpellingCorrectionPrompt({ difficulty, mode: request.mode }),
        shape: request.mode === 'word_choices'
          ? 'SPELLING_CORRECTION:WORD_CHOICES'
          : 'SPELLING_CORRECTION:SENTENCE',
        defaults: {},
      };
  }
}

export async function generateQuestion(
  input: GenerateQuestionInput,
  deps: GeneratorDeps
): Promise<ActionResult<GeneratedQuestion>> {
  const traceId = createGenerationTraceId('question');
  const parsed = GenerateQuestionInputSchema.safeParse(input);
  if (!parsed.success) {
    return failInput(parsed.error.issues, traceId);
  }
  const request = parsed.data;
  const difficulty = buildDifficultyDetail(request.stage, request.grade, request.level);
  log.info('generate start', { traceId, questionType: request.questionType });

  let image: ImageAsset | null = null;
  if (request.questionType === 'PICTURE_DESCRIPTION') {
    try {
      const loaded = await loadAsset(deps.store, 'IMAGE', request.imageAssetId);
      if (!loaded.success) return failWith(loaded.error, traceId);
      image = loaded.data;
    } catch (error) {
      return failStore(error, traceId, log);
    }
  }

  const plan = planSingle(request, difficulty, image);
  const text = await requestModelText(deps.caller, plan.prompt, plan.shape, log, traceId);
  const outcome = ingestModelResponse('question', text.response, {
    defaults: {
      ...plan.defaults,
      questionType: request.questionType,
      difficulty,
      learningObjectives: request.learningObjectives,
    },
    expectedType: request.questionType,
    now: deps.now,
    source: text.source,
    traceId,
  });
  if (!outcome.success) {
    return failWith(outcome.error, traceId);
  }
  const question = outcome.data;

  if (image) {
    const { mismatches } = linkQuestionsToAsset(image, [question]);
    if (mismatches.length > 0) {
      return failWith(buildRejection({
        code: 'cross_reference_mismatch',
        failedAt: 'rejected',
        message: mismatches[0].message,
      }), traceId);
    }
  }

  let questionIds: string[];
  try {
    questionIds = await saveQuestions(deps.store, [question]);
  } catch (error) {
    return failStore(error, traceId, log);
  }

  log.info('generate complete', { traceId, questionId: questionIds[0] });
  return {
    success: true,
    data: { question, questionId: questionIds[0] },
    traceId,
    fallbackUsed: text.source === 'fallback',
  };
}

// ==========================================
// Comprehension questions for a stored asset
// ==========================================

export const GenerateComprehensionInputSchema = z.object({
  questionType: z.enum(['READING_COMPREHENSION', 'LISTENING_COMPREHENSION']),
  assetId: z.string().trim().min(1, 'assetId is required'),
  questionCount: z.number().int().min(1).max(10).optional(),
});

export type GenerateComprehensionInput = z.input<typeof GenerateComprehensionInputSchema>;

export interface GeneratedComprehension {
  questions: AnyQuestion[];
  questionIds: string[];
  report: BatchReportDto;
}

function comprehensionMaterial(asset: PassageAsset | AudioAsset): string | null {
  if (asset.assetType === 'PASSAGE') return asset.content;
  return asset.transcript?.trim() ? asset.transcript : null;
}

/**
 * Tops up questions for a passage or audio clip already in the store, e.g. one
 * returned by findPassagesWithoutQuestions.
 */
export async function generateComprehensionQuestions(
  input: GenerateComprehensionInput,
  deps: GeneratorDeps
): Promise<ActionResult<GeneratedComprehension>> {
  const traceId = createGenerationTraceId('comprehension');
  const parsed = GenerateComprehensionInputSchema.safeParse(input);
  if (!parsed.success) {
    return failInput(parsed.error.issues, traceId);
  }
  const request = parsed.data;
  const reading = request.questionType === 'READING_COMPREHENSION';
  const questionCount = resolveQuestionCount(request.questionCount, deps);

  let loaded: { success: true; data: PassageAsset | AudioAsset } | { success: false; error: IngestRejection };
  try {
    loaded = reading
      ? await loadAsset(deps.store, 'PASSAGE', request.assetId)
      : await loadAsset(deps.store, 'AUDIO', request.assetId);
  } catch (error) {
    return failStore(error, traceId, log);
  }
  if (!loaded.success) return failWith(loaded.error, traceId);
  const asset = loaded.data;

  const material = comprehensionMaterial(asset);
  if (material === null) {
    return failWith(buildRejection({
      code: 'invariant_violation',
      failedAt: 'validation_failed',
      message: `audio asset "${asset.assetId}" has no transcript to write questions from`,
      violations: [{ rule: 'required_field', field: 'transcript', message: 'transcript is required' }],
    }), traceId);
  }

  const text = await requestModelText(
    deps.caller,
    createComprehensionBatchPrompt({
      material,
      difficulty: asset.difficulty,
      count: questionCount,
      mode: reading ? 'reading' : 'listening',
    }),
    reading ? 'READING_COMPREHENSION_BATCH' : 'LISTENING_COMPREHENSION_BATCH',
    log,
    traceId
  );
  if (!text.response.success) {
    return failWith(collaboratorRejection(text.response), traceId);
  }

  const batch = ingestQuestionBatch(text.response.text, {
    requestedCount: questionCount,
    defaults: {
      questionType: request.questionType,
      contentAssetId: asset.assetId,
      difficulty: asset.difficulty,
      learningObjectives: asset.learningObjectives,
    },
    expectedType: request.questionType,
    now: deps.now,
    source: text.source,
    traceId,
  });
  if (!batch.success) {
    return failWith(batch.error, traceId);
  }

  const { linked } = linkQuestionsToAsset(asset, batch.data);
  if (linked.length === 0) {
    return failWith(buildRejection({
      code: 'cross_reference_mismatch',
      failedAt: 'rejected',
      message: `no question references asset "${asset.assetId}"`,
    }), traceId);
  }

  let questionIds: string[];
  try {
    questionIds = await saveQuestions(deps.store, linked);
  } catch (error) {
    return failStore(error, traceId, log);
  }

  return {
    success: true,
    data: {
      questions: linked,
      questionIds,
      report: {
        ...batch.report,
        acceptedCount: linked.length,
        needsTopUp: linked.length < batch.report.requestedCount,
      },
    },
    traceId,
    fallbackUsed: text.source === 'fallback',
  };
}
