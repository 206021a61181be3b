import { createGenerationTraceId } from '../lib/ai/trace-id';
import {
  ASSET_COLLECTIONS,
  QUESTIONS_COLLECTION,
  type AnyAsset,
  type AssetTypeValue,
} from '../lib/content/assets';
import type { AnyQuestion } from '../lib/content/questions';
import { toContentDocument } from '../lib/content/serialize';
import { ingestAssetValue, ingestQuestionValue } from '../lib/ingest/pipeline';
import { createLogger } from '../lib/observability/logger';
import type { DocumentStore } from '../lib/store/document-store';
import {
  failStore,
  failWith,
  resolveIdFactory,
  type ActionResult,
  type GeneratorDeps,
} from './shared';

const log = createLogger('actions:assets');

export type ManualEntryDeps = Pick<GeneratorDeps, 'store' | 'now' | 'createId' | 'createdBy'>;

/**
 * Hand-entered passage, audio clip or image. Runs the same checks as model
 * output and is saved under a freshly assigned id only when accepted.
 */
export async function addAsset(
  assetType: AssetTypeValue,
  fields: Record<string, unknown>,
  deps: ManualEntryDeps
): Promise<ActionResult<AnyAsset>> {
  const traceId = createGenerationTraceId('manual_asset');
  const createId = resolveIdFactory(deps);
  const outcome = ingestAssetValue(fields, {
    defaults: { assetType },
    overrides: {
      assetId: createId(),
      source: 'manual',
      ...(deps.createdBy ? { createdBy: deps.createdBy } : {}),
    },
    expectedType: assetType,
    now: deps.now,
    source: 'manual',
    traceId,
  });
  if (!outcome.success) {
    return failWith(outcome.error, traceId);
  }
  const asset = outcome.data;

  try {
    await deps.store.put(ASSET_COLLECTIONS[asset.assetType], asset.assetId, toContentDocument(asset));
  } catch (error) {
    return failStore(error, traceId, log);
  }

  log.info(`added ${asset.assetType} asset ${asset.assetId}`, { traceId });
  return { success: true, data: asset, traceId, fallbackUsed: false };
}

export interface StoredQuestion {
  questionId: string;
  question: AnyQuestion;
}

/** Questions that point at `assetId`, through either reference field. */
export async function listQuestionsForAsset(store: DocumentStore, assetId: string): Promise<StoredQuestion[]> {
  const [byContent, byImage] = await Promise.all([
    store.query(QUESTIONS_COLLECTION, { contentAssetId: assetId }),
    store.query(QUESTIONS_COLLECTION, { imageAssetId: assetId }),
  ]);

  const found: StoredQuestion[] = [];
  for (const { id, document } of [...byContent, ...byImage]) {
    const outcome = ingestQuestionValue(document, { source: 'stored', label: `question ${id}` });
    if (outcome.success) {
      found.push({ questionId: id, question: outcome.data });
    }
  }
  return found;
}
