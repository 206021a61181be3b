import type { AnswerInputType, QuestionType } from '@examcraft/contracts';
import { z } from 'zod';
import {
  ChoiceDetailSchema,
  DifficultyDetailSchema,
  LOCALE_VALUES,
  LocalizedStringSchema,
  TimestampSchema,
} from './primitives';

// ==========================================
// Question family
// ==========================================

export const QUESTION_TYPE_VALUES = [
  'FILL_IN_THE_BLANK',
  'TRANSLATION',
  'PICTURE_DESCRIPTION',
  'READING_COMPREHENSION',
  'LISTENING_COMPREHENSION',
  'SPELLING_CORRECTION',
] as const satisfies readonly QuestionType[];
export type QuestionTypeValue = (typeof QUESTION_TYPE_VALUES)[number];

export const ANSWER_INPUT_TYPE_VALUES = ['MULTIPLE_CHOICE', 'TEXT_INPUT'] as const satisfies readonly AnswerInputType[];
export type AnswerInputTypeValue = (typeof ANSWER_INPUT_TYPE_VALUES)[number];

const QuestionBaseShape = {
  difficulty: DifficultyDetailSchema,
  learningObjectives: z.array(z.string()).default(() => []),
  questionText: z.string().optional(),
  explanation: LocalizedStringSchema.optional(),
  createdAt: TimestampSchema,
  updatedAt: TimestampSchema,
};

export const FillInTheBlankQuestionSchema = z.object({
  ...QuestionBaseShape,
  questionType: z.literal('FILL_IN_THE_BLANK'),
  // the sentence that carries the blank
  questionText: z.string(),
  answerInputType: z.enum(ANSWER_INPUT_TYPE_VALUES),
  choices: z.array(ChoiceDetailSchema).optional(),
  acceptableAnswers: z.array(z.string()).optional(),
});

export const TranslationQuestionSchema = z.object({
  ...QuestionBaseShape,
  questionType: z.literal('TRANSLATION'),
  sourceText: LocalizedStringSchema,
  targetLanguage: z.enum(LOCALE_VALUES),
  acceptableTranslations: z.array(z.string()),
});

export const PictureDescriptionQuestionSchema = z.object({
  ...QuestionBaseShape,
  questionType: z.literal('PICTURE_DESCRIPTION'),
  imageAssetId: z.string(),
  suggestedKeywords: z.array(z.string()).optional(),
});

const ComprehensionShape = {
  contentAssetId: z.string(),
  choices: z.array(ChoiceDetailSchema).optional(),
  acceptableAnswers: z.array(z.string()).optional(),
};

export const ReadingComprehensionQuestionSchema = z.object({
  ...QuestionBaseShape,
  ...ComprehensionShape,
  questionType: z.literal('READING_COMPREHENSION'),
});

export const ListeningComprehensionQuestionSchema = z.object({
  ...QuestionBaseShape,
  ...ComprehensionShape,
  questionType: z.literal('LISTENING_COMPREHENSION'),
});

export const SpellingCorrectionQuestionSchema = z.object({
  ...QuestionBaseShape,
  questionType: z.literal('SPELLING_CORRECTION'),
  wordChoices: z.array(z.string()).optional(),
  correctWord: z.string().optional(),
  sentenceWithMisspelledWord: z.string().optional(),
  misspelledWordInSentence: z.string().optional(),
});

export type FillInTheBlankQuestion = z.infer<typeof FillInTheBlankQuestionSchema>;
export type TranslationQuestion = z.infer<typeof TranslationQuestionSchema>;
export type PictureDescriptionQuestion = z.infer<typeof PictureDescriptionQuestionSchema>;
export type ReadingComprehensionQuestion = z.infer<typeof ReadingComprehensionQuestionSchema>;
export type ListeningComprehensionQuestion = z.infer<typeof ListeningComprehensionQuestionSchema>;
export type SpellingCorrectionQuestion = z.infer<typeof SpellingCorrectionQuestionSchema>;

export type AnyQuestion =
  | FillInTheBlankQuestion
  | TranslationQuestion
  | PictureDescriptionQuestion
  | ReadingComprehensionQuestion
  | ListeningComprehensionQuestion
  | SpellingCorrectionQuestion;

export type ComprehensionQuestion = ReadingComprehensionQuestion | ListeningComprehensionQuestion;
