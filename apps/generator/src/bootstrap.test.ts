import { afterEach, test } from 'node:test';
import assert from 'node:assert/strict';

import { createGeneratorDeps } from './bootstrap';
import { generateReadingMaterial } from './actions/generate-reading';
import { loadGeneratorConfig } from './lib/config/env';
import { setLogLevel } from './lib/observability/logger';
import { MemoryDocumentStore } from './lib/store/memory-store';
import { fixedNow } from './testing/builders';

afterEach(() => {
  setLogLevel(null);
});

test('createGeneratorDeps: no credentials means fallback payloads and an in-memory store', () => {
  const deps = createGeneratorDeps(loadGeneratorConfig({ AI_PROVIDER: 'none', APP_LOG_LEVEL: 'error' }));
  assert.equal(deps.caller, null);
  assert.ok(deps.store instanceof MemoryDocumentStore);
  assert.equal(deps.questionBatchSize, 3);
});

test('createGeneratorDeps: builds the configured provider caller', () => {
  const deps = createGeneratorDeps(loadGeneratorConfig({
    AI_PROVIDER: 'openai',
    OPENAI_API_KEY: 'test-secret',
    OPENAI_MODEL: 'test-model',
    APP_LOG_LEVEL: 'error',
  }));
  assert.equal(deps.caller?.provider, 'openai');
  assert.equal(deps.caller?.model, 'test-model');
});

test('createGeneratorDeps: QUESTION_BATCH_SIZE is the default question count', async () => {
  const deps = createGeneratorDeps(
    loadGeneratorConfig({ AI_PROVIDER: 'none', QUESTION_BATCH_SIZE: '2', APP_LOG_LEVEL: 'error' }),
    { now: fixedNow, createId: () => 'passage-1' }
  );
  const result = await generateReadingMaterial({ topic: 'Night markets', stage: 'JUNIOR_HIGH', grade: 2, level: 5 }, deps);
  assert.equal(result.success, true);
  if (!result.success) return;
  assert.equal(result.data.report.requestedCount, 2);
  assert.equal(result.data.questions.length, 2);
  assert.equal(result.data.report.ignoredCount, 1);
});
