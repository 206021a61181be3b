import { test } from 'node:test';
import assert from 'node:assert/strict';

import { ingestReadingMaterial } from './reading-material';
import { JUNIOR_DIFFICULTY, fixedNow } from '../../testing/builders';

const PASSAGE = {
  assetId: 'passage-1',
  title_en: 'Night Market',
  title_zh_tw: '夜市',
  difficulty: JUNIOR_DIFFICULTY,
  learningObjectives: ['Main idea'],
  content: 'Every Friday, the Lin family walks to the night market.',
};

function mcQuestion(contentAssetId: string): Record<string, unknown> {
  return {
    contentAssetId,
    questionText: 'Where does the family go?',
    choices: [
      { text: 'The night market', isCorrect: true },
      { text: 'The zoo', isCorrect: false },
    ],
  };
}

test('a full document yields the passage and its linked questions', () => {
  const outcome = ingestReadingMaterial(JSON.stringify({
    passageAsset: PASSAGE,
    questions_list: [mcQuestion('passage-1'), mcQuestion('passage-2')],
  }), { now: fixedNow });

  assert.equal(outcome.success, true);
  if (outcome.success) {
    assert.equal(outcome.data.passageAsset.title.en, 'Night Market');
    assert.equal(outcome.data.questions_list.length, 1);
    const [linked] = outcome.data.questions_list;
    assert.equal(linked.questionType, 'READING_COMPREHENSION');
    assert.deepEqual(linked.learningObjectives, ['Main idea']);
    assert.deepEqual(outcome.report, {
      requestedCount: 2,
      receivedCount: 2,
      acceptedCount: 1,
      ignoredCount: 0,
      needsTopUp: true,
    });
  }
  assert.deepEqual(outcome.mismatches.map((entry) => entry.receivedAssetId), ['passage-2']);
});

test('a document whose questions all point elsewhere is rejected', () => {
  const outcome = ingestReadingMaterial(JSON.stringify({
    passageAsset: PASSAGE,
    questions_list: [mcQuestion('passage-7')],
  }), { now: fixedNow });
  assert.equal(outcome.success, false);
  if (!outcome.success) {
    assert.equal(outcome.error.code, 'cross_reference_mismatch');
    assert.equal(outcome.error.message, 'no question references passage "passage-1"');
  }
  assert.equal(outcome.mismatches.length, 1);
});

test('a document without a passage fails before any question is read', () => {
  const outcome = ingestReadingMaterial(JSON.stringify({ questions_list: [mcQuestion('passage-1')] }));
  assert.equal(outcome.success, false);
  if (!outcome.success) {
    assert.equal(outcome.error.code, 'json_parse_error');
    assert.equal(outcome.error.message, 'value must be a JSON object');
  }
  assert.equal(outcome.report, null);
});

test('a passage tagged as another asset type is rejected', () => {
  const outcome = ingestReadingMaterial(JSON.stringify({
    passageAsset: { ...PASSAGE, assetType: 'IMAGE', imageUrl: 'https://media.example.test/1.png' },
    questions_list: [],
  }), { now: fixedNow });
  assert.equal(outcome.success, false);
  if (!outcome.success) {
    assert.equal(outcome.error.code, 'unknown_discriminator');
  }
});
