import type { AssetStatus, AssetType } from '@examcraft/contracts';
import { z } from 'zod';
import { DifficultyDetailSchema, LocalizedStringSchema, TimestampSchema } from './primitives';

// ==========================================
// Asset family
// ==========================================

export const ASSET_TYPE_VALUES = ['PASSAGE', 'AUDIO', 'IMAGE'] as const satisfies readonly AssetType[];
export type AssetTypeValue = (typeof ASSET_TYPE_VALUES)[number];

export const ASSET_STATUS_VALUES = ['DRAFT', 'PUBLISHED', 'ARCHIVED'] as const satisfies readonly AssetStatus[];
export type AssetStatusValue = (typeof ASSET_STATUS_VALUES)[number];

const AssetBaseShape = {
  assetId: z.string(),
  title: LocalizedStringSchema,
  description: LocalizedStringSchema.optional(),
  difficulty: DifficultyDetailSchema,
  learningObjectives: z.array(z.string()).default(() => []),
  tags: z.array(z.string()).default(() => []),
  status: z.enum(ASSET_STATUS_VALUES).default('DRAFT'),
  version: z.number().int().default(1),
  source: z.string().optional(),
  createdBy: z.string().optional(),
  createdAt: TimestampSchema,
  updatedAt: TimestampSchema,
};

export const PassageAssetSchema = z.object({
  ...AssetBaseShape,
  assetType: z.literal('PASSAGE'),
  content: z.string(),
});

export const AudioAssetSchema = z.object({
  ...AssetBaseShape,
  assetType: z.literal('AUDIO'),
  audioUrl: z.string(),
  durationSeconds: z.number(),
  transcript: z.string().optional(),
  speakerInfo: z.array(z.string()).optional(),
});

export const ImageAssetSchema = z.object({
  ...AssetBaseShape,
  assetType: z.literal('IMAGE'),
  imageUrl: z.string(),
});

export type PassageAsset = z.infer<typeof PassageAssetSchema>;
export type AudioAsset = z.infer<typeof AudioAssetSchema>;
export type ImageAsset = z.infer<typeof ImageAssetSchema>;

export type AnyAsset = PassageAsset | AudioAsset | ImageAsset;

export type AssetOfType<T extends AssetTypeValue> = Extract<AnyAsset, { assetType: T }>;

export const ASSET_COLLECTIONS: Record<AssetTypeValue, string> = {
  PASSAGE: 'passage_assets',
  AUDIO: 'audio_assets',
  IMAGE: 'image_assets',
};

export const QUESTIONS_COLLECTION = 'questions';
