import { buildDifficultyDetail } from '../lib/content/primitives';

export const FIXED_NOW_ISO = '2024-03-01T08:00:00.000Z';

export function fixedNow(): Date {
  return new Date(FIXED_NOW_ISO);
}

export const JUNIOR_DIFFICULTY = buildDifficultyDetail('JUNIOR_HIGH', 2, 5);

export function readingQuestionFields(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    questionType: 'READING_COMPREHENSION',
    contentAssetId: 'passage-1',
    difficulty: JUNIOR_DIFFICULTY,
    questionText: 'Why did Ken finish the plate?',
    choices: [
      { text: 'He liked it after all.', isCorrect: true },
      { text: 'He was told to.', isCorrect: false },
      { text: 'It was free.', isCorrect: false },
    ],
    createdAt: FIXED_NOW_ISO,
    updatedAt: FIXED_NOW_ISO,
    ...overrides,
  };
}

export function fillInTheBlankFields(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    questionType: 'FILL_IN_THE_BLANK',
    difficulty: JUNIOR_DIFFICULTY,
    questionText: 'She ___ to school.',
    answerInputType: 'TEXT_INPUT',
    acceptableAnswers: ['walks'],
    createdAt: FIXED_NOW_ISO,
    updatedAt: FIXED_NOW_ISO,
    ...overrides,
  };
}

export function passageFields(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    assetType: 'PASSAGE',
    assetId: 'passage-1',
    title: { en: 'Night Market', zh_tw: '夜市' },
    difficulty: JUNIOR_DIFFICULTY,
    content: 'Every Friday, the Lin family walks to the night market.',
    createdAt: FIXED_NOW_ISO,
    updatedAt: FIXED_NOW_ISO,
    ...overrides,
  };
}
