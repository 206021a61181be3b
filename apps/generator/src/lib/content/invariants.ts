import { DIFFICULTY_LEVEL_RANGE, type ChoiceDetail, type DifficultyDetail } from './primitives';
import type {
  AnyQuestion,
  ComprehensionQuestion,
  FillInTheBlankQuestion,
  SpellingCorrectionQuestion,
  TranslationQuestion,
} from './questions';
import type { AnyAsset } from './assets';
import type { InvariantViolationDto } from '@examcraft/contracts';

export type InvariantRule =
  | 'required_field'
  | 'type_mismatch'
  | 'exactly_one_correct_choice'
  | 'answer_mode_exclusive'
  | 'answer_mode_matches_input_type'
  | 'correct_word_in_choices'
  | 'non_empty_list'
  | 'non_empty_text'
  | 'reference_required'
  | 'grade_range'
  | 'level_range'
  | 'version_range'
  | 'duration_positive';

export interface InvariantViolation extends InvariantViolationDto {
  rule: InvariantRule;
}

export type ValidationOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; violations: InvariantViolation[] };

function violation(rule: InvariantRule, field: string, message: string): InvariantViolation {
  return { rule, field, message };
}

function isBlank(value: string): boolean {
  return value.trim().length === 0;
}

function checkDifficulty(difficulty: DifficultyDetail): InvariantViolation[] {
  const found: InvariantViolation[] = [];
  if (difficulty.grade < 1) {
    found.push(violation('grade_range', 'difficulty.grade', `grade must be at least 1, got ${difficulty.grade}`));
  }
  if (difficulty.level < DIFFICULTY_LEVEL_RANGE.min || difficulty.level > DIFFICULTY_LEVEL_RANGE.max) {
    found.push(violation(
      'level_range',
      'difficulty.level',
      `level must be between ${DIFFICULTY_LEVEL_RANGE.min} and ${DIFFICULTY_LEVEL_RANGE.max}, got ${difficulty.level}`
    ));
  }
  return found;
}

function checkTextList(field: string, values: string[]): InvariantViolation[] {
  if (values.length === 0) {
    return [violation('non_empty_list', field, `${field} must contain at least one entry`)];
  }
  return values.flatMap((value, index) => (
    isBlank(value)
      ? [violation('non_empty_text', `${field}.${index}`, `${field}[${index}] must not be empty`)]
      : []
  ));
}

function checkChoices(choices: ChoiceDetail[]): InvariantViolation[] {
  if (choices.length === 0) {
    return [violation('non_empty_list', 'choices', 'choices must contain at least one entry')];
  }
  const found: InvariantViolation[] = [];
  choices.forEach((choice, index) => {
    if (isBlank(choice.text)) {
      found.push(violation('non_empty_text', `choices.${index}.text`, `choices[${index}].text must not be empty`));
    }
  });
  const correctCount = choices.filter((choice) => choice.isCorrect).length;
  if (correctCount !== 1) {
    found.push(violation(
      'exactly_one_correct_choice',
      'choices',
      `exactly one choice must be correct, found ${correctCount}`
    ));
  }
  return found;
}

// Both or neither answer mode is a violation; the chosen mode is then checked on its own.
function checkAnswerModes(question: {
  choices?: ChoiceDetail[];
  acceptableAnswers?: string[];
}): InvariantViolation[] {
  const hasChoices = question.choices !== undefined;
  const hasAnswers = question.acceptableAnswers !== undefined;
  if (hasChoices && hasAnswers) {
    return [violation('answer_mode_exclusive', 'choices', 'choices and acceptableAnswers cannot both be provided')];
  }
  if (question.choices !== undefined) return checkChoices(question.choices);
  if (question.acceptableAnswers !== undefined) {
    return checkTextList('acceptableAnswers', question.acceptableAnswers);
  }
  return [violation('answer_mode_exclusive', 'choices', 'either choices or acceptableAnswers must be provided')];
}

function checkFillInTheBlank(question: FillInTheBlankQuestion): InvariantViolation[] {
  const found = checkAnswerModes(question);
  if (found.some((entry) => entry.rule === 'answer_mode_exclusive')) return found;

  if (question.answerInputType === 'MULTIPLE_CHOICE' && question.choices === undefined) {
    found.push(violation(
      'answer_mode_matches_input_type',
      'answerInputType',
      'MULTIPLE_CHOICE requires choices, not acceptableAnswers'
    ));
  }
  if (question.answerInputType === 'TEXT_INPUT' && question.acceptableAnswers === undefined) {
    found.push(violation(
      'answer_mode_matches_input_type',
      'answerInputType',
      'TEXT_INPUT requires acceptableAnswers, not choices'
    ));
  }
  return found;
}

function checkTranslation(question: TranslationQuestion): InvariantViolation[] {
  return checkTextList('acceptableTranslations', question.acceptableTranslations);
}

function checkReference(field: string, value: string): InvariantViolation[] {
  return isBlank(value) ? [violation('reference_required', field, `${field} must reference an asset`)] : [];
}

function checkComprehension(question: ComprehensionQuestion): InvariantViolation[] {
  return [
    ...checkReference('contentAssetId', question.contentAssetId),
    ...checkAnswerModes(question),
  ];
}

function checkSpellingCorrection(question: SpellingCorrectionQuestion): InvariantViolation[] {
  const hasWordChoices = question.wordChoices !== undefined;
  const hasSentence = question.sentenceWithMisspelledWord !== undefined
    || question.misspelledWordInSentence !== undefined;

  if (hasWordChoices && hasSentence) {
    return [violation(
      'answer_mode_exclusive',
      'wordChoices',
      'provide wordChoices or sentenceWithMisspelledWord, not both'
    )];
  }
  if (!hasWordChoices && !hasSentence) {
    return [violation(
      'answer_mode_exclusive',
      'wordChoices',
      'either wordChoices or sentenceWithMisspelledWord must be provided'
    )];
  }

  const found: InvariantViolation[] = [];
  if (question.wordChoices !== undefined) {
    found.push(...checkTextList('wordChoices', question.wordChoices));
    if (question.correctWord === undefined) {
      found.push(violation('required_field', 'correctWord', 'correctWord is required with wordChoices'));
    } else if (!question.wordChoices.includes(question.correctWord)) {
      found.push(violation(
        'correct_word_in_choices',
        'correctWord',
        `correctWord "${question.correctWord}" is not one of wordChoices`
      ));
    }
    return found;
  }

  if (question.sentenceWithMisspelledWord === undefined) {
    found.push(violation('required_field', 'sentenceWithMisspelledWord', 'sentenceWithMisspelledWord is required'));
  }
  if (question.misspelledWordInSentence === undefined) {
    found.push(violation(
      'required_field',
      'misspelledWordInSentence',
      'misspelledWordInSentence is required with sentenceWithMisspelledWord'
    ));
  }
  if (question.correctWord === undefined) {
    found.push(violation('required_field', 'correctWord', 'correctWord is required with sentenceWithMisspelledWord'));
  }
  return found;
}

export function validateQuestion(question: AnyQuestion): InvariantViolation[] {
  const common = checkDifficulty(question.difficulty);
  switch (question.questionType) {
    case 'FILL_IN_THE_BLANK':
      return [...common, ...checkFillInTheBlank(question)];
    case 'TRANSLATION':
      return [...common, ...checkTranslation(question)];
    case 'PICTURE_DESCRIPTION':
      return [...common, ...checkReference('imageAssetId', question.imageAssetId)];
    case 'READING_COMPREHENSION':
    case 'LISTENING_COMPREHENSION':
      return [...common, ...checkComprehension(question)];
    case 'SPELLING_CORRECTION':
      return [...common, ...checkSpellingCorrection(question)];
  }
}

export function validateAsset(asset: AnyAsset): InvariantViolation[] {
  const found = checkDifficulty(asset.difficulty);
  if (isBlank(asset.assetId)) {
    found.push(violation('reference_required', 'assetId', 'assetId must not be empty'));
  }
  if (asset.version < 1) {
    found.push(violation('version_range', 'version', `version must be at least 1, got ${asset.version}`));
  }
  switch (asset.assetType) {
    case 'PASSAGE':
      if (isBlank(asset.content)) {
        found.push(violation('non_empty_text', 'content', 'passage content must not be empty'));
      }
      break;
    case 'AUDIO':
      if (!Number.isFinite(asset.durationSeconds) || asset.durationSeconds <= 0) {
        found.push(violation(
          'duration_positive',
          'durationSeconds',
          `durationSeconds must be greater than 0, got ${asset.durationSeconds}`
        ));
      }
      break;
    case 'IMAGE':
      break;
  }
  return found;
}

/**
 * Runs every rule for the entity's variant and reports all violations at once.
 * Pure: the same entity always yields the same list.
 */
export function validate<T extends AnyQuestion | AnyAsset>(entity: T): ValidationOutcome<T> {
  const target: AnyQuestion | AnyAsset = entity;
  const violations = 'questionType' in target
    ? validateQuestion(target)
    : validateAsset(target);
  return violations.length === 0 ? { ok: true, value: entity } : { ok: false, violations };
}
