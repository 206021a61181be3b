import { test } from 'node:test';
import assert from 'node:assert/strict';

import {
  createComprehensionBatchPrompt,
  createFillInTheBlankPrompt,
  createPassagePrompt,
  createSpellingCorrectionPrompt,
} from './prompts';
import { JUNIOR_DIFFICULTY } from '../../testing/builders';

test('passage prompt asks for the bilingual wire fields', () => {
  const request = createPassagePrompt({
    topic: 'Night markets',
    difficulty: JUNIOR_DIFFICULTY,
    learningObjectives: [],
  });
  assert.equal(request.wantJson, true);
  assert.match(request.userPrompt, /- \*\*Difficulty\*\*: Junior High - Grade 2 \(國中二年級\), level 5 of 10/);
  assert.match(request.userPrompt, /- \*\*Learning objectives\*\*: general comprehension/);
  assert.match(request.userPrompt, /about 150 words/);
  assert.match(request.userPrompt, /"title_zh_tw": "\.\.\."/);
});

test('batch prompt pins the envelope and count', () => {
  const request = createComprehensionBatchPrompt({
    material: 'It rained all day.',
    difficulty: JUNIOR_DIFFICULTY,
    count: 4,
    mode: 'listening',
  });
  assert.match(request.userPrompt, /Write exactly 4 questions inside "questions_list"\./);
  assert.match(request.userPrompt, /## audio transcript/);
  assert.match(request.userPrompt, /\{\n  "questions_list": \[\n    \{\n      "questionText": "\.\.\.",\n      "choices": \[/);
  assert.match(request.userPrompt, /"explanation_zh_tw": "\.\.\."\n    \}\n  \]\n\}$/);
});

test('fill-in-the-blank prompt follows the answer input type', () => {
  const textInput = createFillInTheBlankPrompt({
    grammarPoint: 'past simple',
    difficulty: JUNIOR_DIFFICULTY,
    answerInputType: 'TEXT_INPUT',
  });
  assert.match(textInput.userPrompt, /"acceptableAnswers": every accepted spelling/);
  assert.match(textInput.userPrompt, /"answerInputType" is "TEXT_INPUT"/);
});

test('spelling prompt describes the chosen mode only', () => {
  const request = createSpellingCorrectionPrompt({ difficulty: JUNIOR_DIFFICULTY, mode: 'sentence' });
  assert.match(request.userPrompt, /"misspelledWordInSentence"/);
  assert.match(request.userPrompt, /Do not include "wordChoices"\./);
});
