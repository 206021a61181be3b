import { test } from 'node:test';
import assert from 'node:assert/strict';

import { FALLBACK_SHAPES, getFallbackPayload, isFallbackShape } from './fallback';
import { ingestQuestionBatch } from './batch';
import { ingestAsset, ingestQuestion } from './pipeline';
import { JUNIOR_DIFFICULTY, fixedNow } from '../../testing/builders';

test('every generated shape has a fallback payload', () => {
  assert.deepEqual([...FALLBACK_SHAPES].sort(), [
    'FILL_IN_THE_BLANK:MULTIPLE_CHOICE',
    'FILL_IN_THE_BLANK:TEXT_INPUT',
    'LISTENING_COMPREHENSION_BATCH',
    'PASSAGE',
    'PICTURE_DESCRIPTION',
    'READING_COMPREHENSION_BATCH',
    'SPELLING_CORRECTION:SENTENCE',
    'SPELLING_CORRECTION:WORD_CHOICES',
    'TRANSLATION',
  ]);
  assert.equal(isFallbackShape('ESSAY'), false);
});

test('every fallback payload is accepted by the pipeline', () => {
  for (const shape of FALLBACK_SHAPES) {
    const raw = getFallbackPayload(shape);
    if (shape === 'PASSAGE') {
      const outcome = ingestAsset(raw, {
        defaults: { assetType: 'PASSAGE', assetId: 'passage-1', difficulty: JUNIOR_DIFFICULTY },
        now: fixedNow,
        source: 'fallback',
      });
      assert.equal(outcome.success, true, shape);
      continue;
    }
    if (shape === 'READING_COMPREHENSION_BATCH' || shape === 'LISTENING_COMPREHENSION_BATCH') {
      const outcome = ingestQuestionBatch(raw, {
        requestedCount: 3,
        defaults: {
          questionType: shape === 'READING_COMPREHENSION_BATCH' ? 'READING_COMPREHENSION' : 'LISTENING_COMPREHENSION',
          contentAssetId: 'asset-1',
          difficulty: JUNIOR_DIFFICULTY,
        },
        now: fixedNow,
        source: 'fallback',
      });
      assert.equal(outcome.report.acceptedCount, 3, shape);
      continue;
    }
    const outcome = ingestQuestion(raw, {
      defaults: { difficulty: JUNIOR_DIFFICULTY, imageAssetId: 'image-1' },
      now: fixedNow,
      source: 'fallback',
    });
    assert.equal(outcome.success, true, shape);
  }
});

test('fallback text is the JSON of the stored reply', () => {
  const parsed: unknown = JSON.parse(getFallbackPayload('FILL_IN_THE_BLANK:TEXT_INPUT'));
  assert.deepEqual(parsed, {
    questionType: 'FILL_IN_THE_BLANK',
    answerInputType: 'TEXT_INPUT',
    questionText: 'Yesterday we ___ (go) to the zoo.',
    acceptableAnswers: ['went'],
    explanation: {
      en: "'Yesterday' signals the past tense; the past of 'go' is 'went'.",
      zh_tw: '「Yesterday」表示過去式，go 的過去式是 went。',
    },
  });
});
