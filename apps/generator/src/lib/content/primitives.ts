import type {
  ChoiceDetailDto,
  DifficultyDetailDto,
  DifficultyStage,
  LocaleCode,
  LocalizedStringDto,
} from '@examcraft/contracts';
import { z } from 'zod';

// ==========================================
// Primitive value types shared by questions and assets
// ==========================================

export const DIFFICULTY_STAGE_VALUES = ['ELEMENTARY', 'JUNIOR_HIGH', 'SENIOR_HIGH'] as const satisfies readonly DifficultyStage[];
export type DifficultyStageValue = (typeof DIFFICULTY_STAGE_VALUES)[number];

export const LOCALE_VALUES = ['en', 'zh_tw'] as const satisfies readonly LocaleCode[];
export type LocaleValue = (typeof LOCALE_VALUES)[number];

export const DIFFICULTY_LEVEL_RANGE = { min: 1, max: 10 } as const;

export const LocalizedStringSchema = z.object({
  en: z.string(),
  zh_tw: z.string(),
}) satisfies z.ZodType<LocalizedStringDto>;

export type LocalizedString = Readonly<z.infer<typeof LocalizedStringSchema>>;

export const DifficultyDetailSchema = z.object({
  stage: z.enum(DIFFICULTY_STAGE_VALUES),
  grade: z.number().int(),
  level: z.number().int(),
  name: LocalizedStringSchema,
}) satisfies z.ZodType<DifficultyDetailDto>;

export type DifficultyDetail = z.infer<typeof DifficultyDetailSchema>;

export const ChoiceDetailSchema = z.object({
  text: z.string(),
  isCorrect: z.boolean(),
}) satisfies z.ZodType<ChoiceDetailDto>;

export type ChoiceDetail = z.infer<typeof ChoiceDetailSchema>;

// Stored documents carry ISO strings; constructed entities carry Dates.
export const TimestampSchema = z.union([
  z.date(),
  z.iso.datetime({ offset: true }).transform((value) => new Date(value)),
]);

const ZH_TW_GRADE_NAMES: Partial<Record<DifficultyStageValue, Record<number, string>>> = {
  ELEMENTARY: {
    1: '國小一年級',
    2: '國小二年級',
    3: '國小三年級',
    4: '國小四年級',
    5: '國小五年級',
    6: '國小六年級',
  },
  JUNIOR_HIGH: {
    1: '國中一年級',
    2: '國中二年級',
    3: '國中三年級',
  },
  SENIOR_HIGH: {
    1: '高中一年級',
    2: '高中二年級',
    3: '高中三年級',
  },
};

export function formatStageLabel(stage: DifficultyStageValue): string {
  return stage
    .split('_')
    .map((part) => part.charAt(0) + part.slice(1).toLowerCase())
    .join(' ');
}

/**
 * Builds a difficulty with its bilingual display name. Grades missing from the
 * Traditional Chinese table reuse the English name.
 */
export function buildDifficultyDetail(
  stage: DifficultyStageValue,
  grade: number,
  level: number
): DifficultyDetail {
  const en = `${formatStageLabel(stage)} - Grade ${grade}`;
  const zhTw = ZH_TW_GRADE_NAMES[stage]?.[grade] ?? en;
  return { stage, grade, level, name: { en, zh_tw: zhTw } };
}
