import { test } from 'node:test';
import assert from 'node:assert/strict';

import { resolveAssetType, resolveQuestionType } from './discriminator';

test('resolveQuestionType keeps the exact variant', () => {
  assert.deepEqual(resolveQuestionType('SPELLING_CORRECTION'), { ok: true, value: 'SPELLING_CORRECTION' });
});

test('resolveQuestionType is case-sensitive', () => {
  const result = resolveQuestionType('reading_comprehension');
  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.error.field, 'questionType');
    assert.equal(result.error.received, 'reading_comprehension');
    assert.equal(
      result.error.message,
      'questionType "reading_comprehension" is not one of FILL_IN_THE_BLANK, TRANSLATION, '
        + 'PICTURE_DESCRIPTION, READING_COMPREHENSION, LISTENING_COMPREHENSION, SPELLING_CORRECTION'
    );
  }
});

test('resolveQuestionType reports a missing tag', () => {
  const result = resolveQuestionType(undefined);
  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.error.message, 'questionType is missing');
  }
});

test('resolveAssetType rejects non-string tags', () => {
  assert.deepEqual(resolveAssetType('AUDIO'), { ok: true, value: 'AUDIO' });
  const result = resolveAssetType(42);
  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.error.kind, 'asset');
    assert.equal(result.error.message, 'assetType 42 is not one of PASSAGE, AUDIO, IMAGE');
  }
});
