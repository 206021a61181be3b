export type LocaleCode = "en" | "zh_tw";

export type DifficultyStage = "ELEMENTARY" | "JUNIOR_HIGH" | "SENIOR_HIGH";

export type QuestionType =
  | "FILL_IN_THE_BLANK"
  | "TRANSLATION"
  | "PICTURE_DESCRIPTION"
  | "READING_COMPREHENSION"
  | "LISTENING_COMPREHENSION"
  | "SPELLING_CORRECTION";

export type AssetType = "PASSAGE" | "AUDIO" | "IMAGE";

export type AssetStatus = "DRAFT" | "PUBLISHED" | "ARCHIVED";

export type AnswerInputType = "MULTIPLE_CHOICE" | "TEXT_INPUT";

export interface LocalizedStringDto {
  en: string;
  zh_tw: string;
}

export interface DifficultyDetailDto {
  stage: DifficultyStage;
  grade: number;
  level: number;
  name: LocalizedStringDto;
}

export interface ChoiceDetailDto {
  text: string;
  isCorrect: boolean;
}

/**
 * Stored form of a question or asset: camelCase keys, ISO-8601 timestamps,
 * optional fields omitted rather than null.
 */
export type ContentDocument = Record<string, unknown>;

/** Envelope a model returns for a batch of N questions. */
export interface QuestionBatchEnvelopeDto {
  questions_list: unknown[];
}

/** Single multiple-choice question as a model returns it. */
export interface MultipleChoiceQuestionWireDto {
  questionText: string;
  choices: ChoiceDetailDto[];
  explanation_en: string;
  explanation_zh_tw: string;
}
