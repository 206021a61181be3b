import { test } from 'node:test';
import assert from 'node:assert/strict';

import { loadGeneratorConfig } from './env';

test('loadGeneratorConfig applies defaults to an empty env', () => {
  assert.deepEqual(loadGeneratorConfig({}), {
    provider: 'gemini',
    gemini: { apiKey: null, model: 'gemini-2.0-flash' },
    openai: { apiKey: null, model: 'gpt-4o-mini' },
    timeoutMs: 45_000,
    maxRetries: 1,
    retryBaseMs: 250,
    questionBatchSize: 3,
    supabase: null,
    logLevel: null,
  });
});

test('loadGeneratorConfig reads provider settings', () => {
  const config = loadGeneratorConfig({
    AI_PROVIDER: ' OpenAI ',
    OPENAI_API_KEY: 'test-secret',
    OPENAI_MODEL: 'gpt-4o',
    MODEL_MAX_RETRIES: '3',
    QUESTION_BATCH_SIZE: '5',
    SUPABASE_URL: 'https://db.example.test',
    SUPABASE_SERVICE_ROLE_KEY: 'test-service-key',
    APP_LOG_LEVEL: 'WARN',
  });
  assert.equal(config.provider, 'openai');
  assert.deepEqual(config.openai, { apiKey: 'test-secret', model: 'gpt-4o' });
  assert.equal(config.maxRetries, 3);
  assert.equal(config.questionBatchSize, 5);
  assert.deepEqual(config.supabase, { url: 'https://db.example.test', serviceRoleKey: 'test-service-key' });
  assert.equal(config.logLevel, 'warn');
});

test('blank keys count as missing', () => {
  assert.equal(loadGeneratorConfig({ GEMINI_API_KEY: '   ' }).gemini.apiKey, null);
});

test('loadGeneratorConfig rejects invalid values', () => {
  assert.throws(() => loadGeneratorConfig({ AI_PROVIDER: 'mystery' }), /Invalid generator env/);
  assert.throws(() => loadGeneratorConfig({ QUESTION_BATCH_SIZE: 'three' }), /Invalid generator env/);
  assert.throws(() => loadGeneratorConfig({ QUESTION_BATCH_SIZE: '0' }), /QUESTION_BATCH_SIZE must be between 1 and 10/);
  assert.throws(() => loadGeneratorConfig({ QUESTION_BATCH_SIZE: '11' }), /QUESTION_BATCH_SIZE must be between 1 and 10/);
  assert.throws(() => loadGeneratorConfig({ APP_LOG_LEVEL: 'loud' }), /Invalid generator env/);
});
