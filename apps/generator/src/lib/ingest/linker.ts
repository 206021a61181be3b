import type { AnyAsset, AssetTypeValue, PassageAsset } from '../content/assets';
import type { AnyQuestion, QuestionTypeValue } from '../content/questions';
import { createLogger } from '../observability/logger';

const log = createLogger('ingest:linker');

export interface CrossReferenceMismatch {
  code: 'cross_reference_mismatch';
  index: number;
  questionType: QuestionTypeValue;
  field: 'contentAssetId' | 'imageAssetId' | null;
  expectedAssetId: string;
  receivedAssetId: string | null;
  message: string;
}

export interface LinkResult {
  linked: AnyQuestion[];
  mismatches: CrossReferenceMismatch[];
}

export interface GeneratedReadingMaterial {
  passageAsset: PassageAsset;
  questions_list: AnyQuestion[];
}

interface QuestionReference {
  field: 'contentAssetId' | 'imageAssetId';
  assetId: string;
  assetType: AssetTypeValue;
}

function referenceOf(question: AnyQuestion): QuestionReference | null {
  switch (question.questionType) {
    case 'READING_COMPREHENSION':
      return { field: 'contentAssetId', assetId: question.contentAssetId, assetType: 'PASSAGE' };
    case 'LISTENING_COMPREHENSION':
      return { field: 'contentAssetId', assetId: question.contentAssetId, assetType: 'AUDIO' };
    case 'PICTURE_DESCRIPTION':
      return { field: 'imageAssetId', assetId: question.imageAssetId, assetType: 'IMAGE' };
    default:
      return null;
  }
}

function checkLink(asset: AnyAsset, question: AnyQuestion, index: number): CrossReferenceMismatch | null {
  const reference = referenceOf(question);
  const base = {
    code: 'cross_reference_mismatch' as const,
    index,
    questionType: question.questionType,
    expectedAssetId: asset.assetId,
  };
  if (!reference) {
    return {
      ...base,
      field: null,
      receivedAssetId: null,
      message: `${question.questionType} does not reference an asset`,
    };
  }
  if (reference.assetType !== asset.assetType) {
    return {
      ...base,
      field: reference.field,
      receivedAssetId: reference.assetId,
      message: `${question.questionType} needs a ${reference.assetType} asset, got ${asset.assetType}`,
    };
  }
  if (reference.assetId !== asset.assetId) {
    return {
      ...base,
      field: reference.field,
      receivedAssetId: reference.assetId,
      message: `${reference.field} "${reference.assetId}" does not match asset "${asset.assetId}"`,
    };
  }
  return null;
}

/**
 * Keeps the questions of one generation unit that point at `asset`. A bad
 * reference drops only that question and is reported, never thrown.
 */
export function linkQuestionsToAsset(asset: AnyAsset, questions: AnyQuestion[]): LinkResult {
  const linked: AnyQuestion[] = [];
  const mismatches: CrossReferenceMismatch[] = [];
  questions.forEach((question, index) => {
    const mismatch = checkLink(asset, question, index);
    if (mismatch) {
      log.warn(`excluded question ${index}`, mismatch.message);
      mismatches.push(mismatch);
      return;
    }
    linked.push(question);
  });
  return { linked, mismatches };
}

export function assembleReadingMaterial(
  passageAsset: PassageAsset,
  questions: AnyQuestion[]
): { material: GeneratedReadingMaterial; mismatches: CrossReferenceMismatch[] } {
  const { linked, mismatches } = linkQuestionsToAsset(passageAsset, questions);
  return {
    material: { passageAsset, questions_list: linked },
    mismatches,
  };
}
