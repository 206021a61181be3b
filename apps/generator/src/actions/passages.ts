import { ASSET_COLLECTIONS, QUESTIONS_COLLECTION, type PassageAsset } from '../lib/content/assets';
import { ingestAssetValue } from '../lib/ingest/pipeline';
import { createLogger } from '../lib/observability/logger';
import type { DocumentStore } from '../lib/store/document-store';

const log = createLogger('actions:passages');

/**
 * Passages no reading-comprehension question points at. Linear scan over both
 * collections; stored passages that no longer validate are skipped and logged.
 */
export async function findPassagesWithoutQuestions(store: DocumentStore): Promise<PassageAsset[]> {
  const [passages, questions] = await Promise.all([
    store.query(ASSET_COLLECTIONS.PASSAGE),
    store.query(QUESTIONS_COLLECTION, { questionType: 'READING_COMPREHENSION' }),
  ]);

  const referenced = new Set<string>();
  for (const { document } of questions) {
    if (typeof document.contentAssetId === 'string') {
      referenced.add(document.contentAssetId);
    }
  }

  const orphans: PassageAsset[] = [];
  for (const { id, document } of passages) {
    const outcome = ingestAssetValue(document, {
      defaults: { assetId: id },
      expectedType: 'PASSAGE',
      source: 'stored',
    });
    if (!outcome.success) {
      log.warn(`skipping stored passage ${id}: ${outcome.error.code}`, outcome.error.message);
      continue;
    }
    const passage = outcome.data;
    if (passage.assetType === 'PASSAGE' && !referenced.has(passage.assetId)) {
      orphans.push(passage);
    }
  }
  return orphans;
}
