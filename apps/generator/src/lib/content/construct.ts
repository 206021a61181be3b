import { z } from 'zod';
import {
  FillInTheBlankQuestionSchema,
  ListeningComprehensionQuestionSchema,
  PictureDescriptionQuestionSchema,
  ReadingComprehensionQuestionSchema,
  SpellingCorrectionQuestionSchema,
  TranslationQuestionSchema,
  type AnyQuestion,
  type QuestionTypeValue,
} from './questions';
import {
  AudioAssetSchema,
  ImageAssetSchema,
  PassageAssetSchema,
  type AnyAsset,
  type AssetTypeValue,
} from './assets';
import type { InvariantViolation } from './invariants';

interface ParseIssueLike {
  path: PropertyKey[];
  message: string;
}

type SafeParseLike<T> =
  | { success: true; data: T }
  | { success: false; error: { issues: readonly ParseIssueLike[] } };

export type ConstructOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; violations: InvariantViolation[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function formatPath(path: readonly PropertyKey[]): string {
  return path.length === 0 ? '(root)' : path.map((segment) => String(segment)).join('.');
}

function readPath(input: unknown, path: readonly PropertyKey[]): unknown {
  let current: unknown = input;
  for (const segment of path) {
    if (Array.isArray(current) && typeof segment === 'number') {
      current = current[segment];
    } else if (isRecord(current) && typeof segment === 'string') {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

function toViolation(issue: ParseIssueLike, input: unknown): InvariantViolation {
  const field = formatPath(issue.path);
  if (readPath(input, issue.path) === undefined) {
    return { rule: 'required_field', field, message: `${field} is required` };
  }
  return { rule: 'type_mismatch', field, message: `${field}: ${issue.message}` };
}

interface VariantSchema<T> {
  shape: Readonly<Record<string, z.core.$ZodType>>;
  safeParse(input: unknown): SafeParseLike<T>;
}

/** `null` on a key the variant may leave out means absent. */
export function dropNullOptionals(
  shape: Readonly<Record<string, z.core.$ZodType>>,
  fields: Record<string, unknown>
): Record<string, unknown> {
  const out: Record<string, unknown> = { ...fields };
  for (const [key, value] of Object.entries(fields)) {
    if (value === null && key in shape && z.safeParse(shape[key], undefined).success) {
      delete out[key];
    }
  }
  return out;
}

function parseVariant<T>(schema: VariantSchema<T>, fields: Record<string, unknown>): ConstructOutcome<T> {
  const input = dropNullOptionals(schema.shape, fields);
  const result = schema.safeParse(input);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return { ok: false, violations: result.error.issues.map((issue) => toViolation(issue, input)) };
}

/**
 * Field-by-field construction of the resolved variant. Mismatched or missing
 * fields come back as violations; unknown keys are dropped, and so is `null`
 * on an optional or defaulted key.
 */
export function constructQuestion(
  questionType: QuestionTypeValue,
  fields: Record<string, unknown>
): ConstructOutcome<AnyQuestion> {
  switch (questionType) {
    case 'FILL_IN_THE_BLANK':
      return parseVariant(FillInTheBlankQuestionSchema, fields);
    case 'TRANSLATION':
      return parseVariant(TranslationQuestionSchema, fields);
    case 'PICTURE_DESCRIPTION':
      return parseVariant(PictureDescriptionQuestionSchema, fields);
    case 'READING_COMPREHENSION':
      return parseVariant(ReadingComprehensionQuestionSchema, fields);
    case 'LISTENING_COMPREHENSION':
      return parseVariant(ListeningComprehensionQuestionSchema, fields);
    case 'SPELLING_CORRECTION':
      return parseVariant(SpellingCorrectionQuestionSchema, fields);
  }
}

export function constructAsset(
  assetType: AssetTypeValue,
  fields: Record<string, unknown>
): ConstructOutcome<AnyAsset> {
  switch (assetType) {
    case 'PASSAGE':
      return parseVariant(PassageAssetSchema, fields);
    case 'AUDIO':
      return parseVariant(AudioAssetSchema, fields);
    case 'IMAGE':
      return parseVariant(ImageAssetSchema, fields);
  }
}
