import { ASSET_TYPE_VALUES, type AssetTypeValue } from './assets';
import { QUESTION_TYPE_VALUES, type QuestionTypeValue } from './questions';

export type EntityKind = 'question' | 'asset';

export const DISCRIMINATOR_FIELDS: Record<EntityKind, 'questionType' | 'assetType'> = {
  question: 'questionType',
  asset: 'assetType',
};

export interface UnknownVariant {
  kind: EntityKind;
  field: string;
  received: unknown;
  message: string;
}

export type VariantResolution<T> =
  | { ok: true; value: T }
  | { ok: false; error: UnknownVariant };

function describe(value: unknown): string {
  if (value === undefined) return 'nothing';
  if (typeof value === 'string') return `"${value}"`;
  return JSON.stringify(value) ?? String(value);
}

// Exact, case-sensitive lookup. "reading_comprehension" is not READING_COMPREHENSION.
function resolveFrom<T extends string>(
  kind: EntityKind,
  allowed: readonly T[],
  tag: unknown
): VariantResolution<T> {
  const field = DISCRIMINATOR_FIELDS[kind];
  const match = typeof tag === 'string' ? allowed.find((candidate) => candidate === tag) : undefined;
  if (match !== undefined) {
    return { ok: true, value: match };
  }
  return {
    ok: false,
    error: {
      kind,
      field,
      received: tag,
      message: tag === undefined
        ? `${field} is missing`
        : `${field} ${describe(tag)} is not one of ${allowed.join(', ')}`,
    },
  };
}

export function resolveQuestionType(tag: unknown): VariantResolution<QuestionTypeValue> {
  return resolveFrom('question', QUESTION_TYPE_VALUES, tag);
}

export function resolveAssetType(tag: unknown): VariantResolution<AssetTypeValue> {
  return resolveFrom('asset', ASSET_TYPE_VALUES, tag);
}
