import { test } from 'node:test';
import assert from 'node:assert/strict';

import { constructAsset, constructQuestion, formatPath } from './construct';
import { passageFields, readingQuestionFields } from '../../testing/builders';

test('formatPath joins segments and names the root', () => {
  assert.equal(formatPath(['choices', 0, 'text']), 'choices.0.text');
  assert.equal(formatPath([]), '(root)');
});

test('a missing required field is reported as required_field', () => {
  const outcome = constructQuestion('READING_COMPREHENSION', readingQuestionFields({ contentAssetId: undefined }));
  assert.deepEqual(outcome, {
    ok: false,
    violations: [{ rule: 'required_field', field: 'contentAssetId', message: 'contentAssetId is required' }],
  });
});

test('a present field of the wrong kind is reported as type_mismatch', () => {
  const outcome = constructQuestion('READING_COMPREHENSION', readingQuestionFields({
    choices: [{ text: 'A', isCorrect: 'yes' }],
  }));
  assert.equal(outcome.ok, false);
  if (!outcome.ok) {
    assert.equal(outcome.violations.length, 1);
    assert.equal(outcome.violations[0].rule, 'type_mismatch');
    assert.equal(outcome.violations[0].field, 'choices.0.isCorrect');
    assert.match(outcome.violations[0].message, /^choices\.0\.isCorrect: /);
  }
});

test('unknown keys are dropped and asset defaults applied', () => {
  const outcome = constructAsset('PASSAGE', passageFields({ wordCount: 42 }));
  assert.equal(outcome.ok, true);
  if (outcome.ok) {
    assert.equal('wordCount' in outcome.value, false);
    assert.equal(outcome.value.status, 'DRAFT');
    assert.equal(outcome.value.version, 1);
    assert.deepEqual(outcome.value.tags, []);
    assert.deepEqual(outcome.value.learningObjectives, []);
    assert.equal(outcome.value.createdAt.toISOString(), '2024-03-01T08:00:00.000Z');
  }
});

test('the resolved variant decides the schema, not the payload tag', () => {
  const outcome = constructQuestion('SPELLING_CORRECTION', readingQuestionFields());
  assert.equal(outcome.ok, false);
  if (!outcome.ok) {
    assert.deepEqual(outcome.violations.map((entry) => entry.field), ['questionType']);
    assert.equal(outcome.violations[0].rule, 'type_mismatch');
  }
});
