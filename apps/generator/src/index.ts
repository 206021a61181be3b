export * from './lib/content/primitives';
export * from './lib/content/questions';
export * from './lib/content/assets';
export { DISCRIMINATOR_FIELDS, resolveAssetType, resolveQuestionType } from './lib/content/discriminator';
export type { EntityKind, UnknownVariant, VariantResolution } from './lib/content/discriminator';
export { validate, validateAsset, validateQuestion } from './lib/content/invariants';
export type { InvariantRule, InvariantViolation, ValidationOutcome } from './lib/content/invariants';
export { constructAsset, constructQuestion } from './lib/content/construct';
export type { ConstructOutcome } from './lib/content/construct';
export { toContentDocument } from './lib/content/serialize';

export {
  ingest,
  ingestAsset,
  ingestAssetValue,
  ingestModelResponse,
  ingestQuestion,
  ingestQuestionValue,
  normalizeWireFields,
} from './lib/ingest/pipeline';
export type { IngestOutcome, IngestSource, IngestOptions } from './lib/ingest/pipeline';
export { BATCH_ENVELOPE_FIELD, ingestQuestionBatch, ingestQuestionElements } from './lib/ingest/batch';
export type { BatchIngestOptions, BatchOutcome, RejectedElement } from './lib/ingest/batch';
export { assembleReadingMaterial, linkQuestionsToAsset } from './lib/ingest/linker';
export type { CrossReferenceMismatch, GeneratedReadingMaterial, LinkResult } from './lib/ingest/linker';
export { ingestReadingMaterial } from './lib/ingest/reading-material';
export type { ReadingMaterialOutcome, ReadingMaterialOptions } from './lib/ingest/reading-material';
export {
  buildRejection,
  classifyIngestError,
  formatViolations,
  getUserFacingIngestMessage,
} from './lib/ingest/errors';
export type { IngestRejection } from './lib/ingest/errors';
export { FALLBACK_SHAPES, getFallbackPayload } from './lib/ingest/fallback';
export type { FallbackShape } from './lib/ingest/fallback';

export type { ModelCaller, ModelCallRequest, ModelCallResult } from './lib/ai/model-caller';
export { createGeminiCaller, createModelCaller, createOpenAICaller } from './lib/ai/providers';
export * from './lib/ai/prompts';
export { loadGeneratorConfig } from './lib/config/env';
export type { GeneratorConfig } from './lib/config/env';
export { createLogger, logger, setLogLevel } from './lib/observability/logger';

export { AUTO_ID, DocumentStoreError } from './lib/store/document-store';
export type { DocumentFilter, DocumentStore, StoredDocument } from './lib/store/document-store';
export { MemoryDocumentStore } from './lib/store/memory-store';
export { SupabaseDocumentStore, createSupabaseDocumentStore } from './lib/store/supabase-store';

export { generateReadingMaterial } from './actions/generate-reading';
export type { GenerateReadingInput, GeneratedReading } from './actions/generate-reading';
export {
  generateComprehensionQuestions,
  generateQuestion,
} from './actions/generate-question';
export type {
  GenerateComprehensionInput,
  GenerateQuestionInput,
  GeneratedComprehension,
  GeneratedQuestion,
} from './actions/generate-question';
export { findPassagesWithoutQuestions } from './actions/passages';
export type { ActionResult, GeneratorDeps } from './actions/shared';
export { DEFAULT_QUESTION_BATCH_SIZE } from './actions/shared';
export { createGeneratorDeps, createGeneratorDepsFromEnv } from './bootstrap';
export { addAsset, listQuestionsForAsset } from './actions/assets';
export type { ManualEntryDeps, StoredQuestion } from './actions/assets';
