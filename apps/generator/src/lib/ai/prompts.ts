import type { MultipleChoiceQuestionWireDto, QuestionBatchEnvelopeDto } from '@examcraft/contracts';
import type { DifficultyDetail } from '../content/primitives';
import type { AnswerInputTypeValue } from '../content/questions';
import type { ModelCallRequest } from './model-caller';

const SYSTEM_PROMPT = `You write English exam content for students in Taiwan.
Reply with exactly one JSON object and nothing else: no markdown, no code fences, no commentary.
Use the field names given in the request literally.`;

function describeDifficulty(difficulty: DifficultyDetail): string {
  return `${difficulty.name.en} (${difficulty.name.zh_tw}), level ${difficulty.level} of 10`;
}

function listObjectives(objectives: readonly string[]): string {
  return objectives.length > 0 ? objectives.join(', ') : 'general comprehension';
}

function request(userPrompt: string): ModelCallRequest {
  return { systemPrompt: SYSTEM_PROMPT, userPrompt, wantJson: true };
}

// ==========================================
// Assets
// ==========================================

export interface PassagePromptInput {
  topic: string;
  difficulty: DifficultyDetail;
  learningObjectives: readonly string[];
  wordCount?: number;
}

export function createPassagePrompt(input: PassagePromptInput): ModelCallRequest {
  const wordCount = input.wordCount ?? 150;
  return request(`## Task
Write one reading passage.

- **Topic**: ${input.topic}
- **Difficulty**: ${describeDifficulty(input.difficulty)}
- **Learning objectives**: ${listObjectives(input.learningObjectives)}
- **Length**: about ${wordCount} words

## Rules
1. "content" is the passage in English, plain text paragraphs.
2. "title_en" / "title_zh_tw": the title in English and Traditional Chinese.
3. "description_en" / "description_zh_tw": one sentence describing the passage.
4. "learningObjectives": the objectives above as a list of strings.

Respond with exactly this structure:
{
  "title_en": "...",
  "title_zh_tw": "...",
  "description_en": "...",
  "description_zh_tw": "...",
  "content": "...",
  "learningObjectives": ["..."]
}`);
}

// ==========================================
// Comprehension batches
// ==========================================

export interface ComprehensionBatchPromptInput {
  /** Passage text or audio transcript the questions are about. */
  material: string;
  difficulty: DifficultyDetail;
  count: number;
  mode: 'reading' | 'listening';
}

const MULTIPLE_CHOICE_EXAMPLE: MultipleChoiceQuestionWireDto = {
  questionText: '...',
  choices: [{ text: '...', isCorrect: false }, { text: '...', isCorrect: true }],
  explanation_en: '...',
  explanation_zh_tw: '...',
};

const BATCH_EXAMPLE: QuestionBatchEnvelopeDto = { questions_list: [MULTIPLE_CHOICE_EXAMPLE] };

export function createComprehensionBatchPrompt(input: ComprehensionBatchPromptInput): ModelCallRequest {
  const label = input.mode === 'reading' ? 'passage' : 'audio transcript';
  return request(`## Task
Write ${input.count} ${input.mode} comprehension questions about the ${label} below.

- **Difficulty**: ${describeDifficulty(input.difficulty)}

## ${label}
"""
${input.material}
"""

## Rules
1. Write exactly ${input.count} questions inside "questions_list".
2. Each question has "questionText" and either "choices" or "acceptableAnswers", never both.
3. "choices": 3 or 4 options of the form {"text": "...", "isCorrect": true|false}; exactly one is correct.
4. "acceptableAnswers": a non-empty list of short accepted answers.
5. "explanation_en" / "explanation_zh_tw": why the answer is right, in English and Traditional Chinese.
6. Do not add ids or asset references.

Respond with exactly this structure:
${JSON.stringify(BATCH_EXAMPLE, null, 2)}`);
}

// ==========================================
// Single questions
// ==========================================

export interface FillInTheBlankPromptInput {
  grammarPoint: string;
  difficulty: DifficultyDetail;
  answerInputType: AnswerInputTypeValue;
}

export function createFillInTheBlankPrompt(input: FillInTheBlankPromptInput): ModelCallRequest {
  const answerRule = input.answerInputType === 'MULTIPLE_CHOICE'
    ? '"choices": 4 options of the form {"text": "...", "isCorrect": true|false}; exactly one is correct. Do not include "acceptableAnswers".'
    : '"acceptableAnswers": every accepted spelling of the missing word. Do not include "choices".';
  return request(`## Task
Write one fill-in-the-blank question.

- **Grammar point**: ${input.grammarPoint}
- **Difficulty**: ${describeDifficulty(input.difficulty)}

## Rules
1. "questionType" is "FILL_IN_THE_BLANK" and "answerInputType" is "${input.answerInputType}".
2. "questionText" is one sentence with the gap written as ___.
3. ${answerRule}
4. "explanation_en" / "explanation_zh_tw": the grammar behind the answer.`);
}

export interface TranslationPromptInput {
  theme: string;
  difficulty: DifficultyDetail;
}

export function createTranslationPrompt(input: TranslationPromptInput): ModelCallRequest {
  return request(`## Task
Write one Chinese-to-English translation question.

- **Theme**: ${input.theme}
- **Difficulty**: ${describeDifficulty(input.difficulty)}

## Rules
1. "questionType" is "TRANSLATION" and "targetLanguage" is "en".
2. "questionText" is the instruction shown to the student.
3. "sourceText_en" is "" and "sourceText_zh_tw" is the Traditional Chinese sentence.
4. "acceptableTranslations": a non-empty list of correct English translations.
5. "explanation_en" / "explanation_zh_tw": key vocabulary and structure.`);
}

export interface PictureDescriptionPromptInput {
  imageDescription: string;
  difficulty: DifficultyDetail;
}

export function createPictureDescriptionPrompt(input: PictureDescriptionPromptInput): ModelCallRequest {
  return request(`## Task
Write one picture description question for this picture: ${input.imageDescription}

- **Difficulty**: ${describeDifficulty(input.difficulty)}

## Rules
1. "questionType" is "PICTURE_DESCRIPTION".
2. "questionText" tells the student what to describe.
3. "suggestedKeywords": 3 to 6 English words the student may use.
4. Do not add ids or asset references.`);
}

export interface SpellingCorrectionPromptInput {
  difficulty: DifficultyDetail;
  mode: 'word_choices' | 'sentence';
}

export function createSpellingCorrectionPrompt(input: SpellingCorrectionPromptInput): ModelCallRequest {
  const modeRule = input.mode === 'word_choices'
    ? `"wordChoices": 4 spellings of one word, exactly one correct; "correctWord" is that correct spelling.
   Do not include "sentenceWithMisspelledWord" or "misspelledWordInSentence".`
    : `"sentenceWithMisspelledWord": one sentence containing one misspelled word;
   "misspelledWordInSentence": the misspelled word as written; "correctWord": its correct spelling.
   Do not include "wordChoices".`;
  return request(`## Task
Write one spelling correction question.

- **Difficulty**: ${describeDifficulty(input.difficulty)}

## Rules
1. "questionType" is "SPELLING_CORRECTION".
2. "questionText" is the instruction shown to the student.
3. ${modeRule}
4. "explanation_en" / "explanation_zh_tw": the spelling rule involved.`);
}
