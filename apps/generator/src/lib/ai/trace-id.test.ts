import { test } from 'node:test';
import assert from 'node:assert/strict';

import { createGenerationTraceId } from './trace-id';

test('createGenerationTraceId prefixes a sanitised pipeline name', () => {
  assert.match(createGenerationTraceId('reading material'), /^reading_material_\d+_[a-z0-9]*$/);
  assert.match(createGenerationTraceId(''), /^generate_\d+_/);
});
