import { test } from 'node:test';
import assert from 'node:assert/strict';

import { createGeminiCaller } from './gemini';
import { createOpenAICaller } from './openai';
import { createModelCaller } from './index';
import { loadGeneratorConfig } from '../../config/env';
import type { ModelCallRequest } from '../model-caller';

interface CapturedRequest {
  url: string;
  headers: Headers;
  body: unknown;
}

function stubFetch(responses: Array<() => Promise<Response>>): { captured: CapturedRequest[]; restore: () => void } {
  const originalFetch = globalThis.fetch;
  const captured: CapturedRequest[] = [];
  let call = 0;
  globalThis.fetch = async (input, init) => {
    const rawBody = init?.body;
    captured.push({
      url: String(input),
      headers: new Headers(init?.headers),
      body: typeof rawBody === 'string' ? JSON.parse(rawBody) : null,
    });
    const next = responses[Math.min(call, responses.length - 1)];
    call += 1;
    return next();
  };
  return {
    captured,
    restore: () => {
      globalThis.fetch = originalFetch;
    },
  };
}

function json(body: unknown, status = 200): () => Promise<Response> {
  return async () => new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

const REQUEST: ModelCallRequest = {
  systemPrompt: 'Reply with JSON.',
  userPrompt: 'Write one question.',
  wantJson: true,
};

const FAST_POLICY = { timeoutMs: 1_000, maxRetries: 1, retryBaseMs: 0 };

test('gemini caller returns the candidate text', async () => {
  const stub = stubFetch([json({ candidates: [{ content: { parts: [{ text: '{"ok":' }, { text: 'true}' }] } }] })]);
  try {
    const caller = createGeminiCaller({ apiKey: 'test-secret', model: 'gemini-2.0-flash', policy: FAST_POLICY });
    const result = await caller.call(REQUEST);

    assert.equal(result.success, true);
    if (result.success) {
      assert.equal(result.text, '{"ok":true}');
      assert.equal(result.meta.provider, 'gemini');
      assert.equal(result.meta.attemptCount, 1);
      assert.equal(result.meta.retried, false);
      assert.equal(result.meta.status, 200);
    }
    assert.equal(
      stub.captured[0].url,
      'https://generativelanguage.googleapis.com/v1beta/models/gemini-2.0-flash:generateContent'
    );
    assert.equal(stub.captured[0].headers.get('x-goog-api-key'), 'test-secret');
    assert.deepEqual(stub.captured[0].body, {
      systemInstruction: { parts: [{ text: 'Reply with JSON.' }] },
      contents: [{ role: 'user', parts: [{ text: 'Write one question.' }] }],
      generationConfig: { responseMimeType: 'application/json' },
    });
  } finally {
    stub.restore();
  }
});

test('a 503 is retried and the second attempt succeeds', async () => {
  const stub = stubFetch([
    json({ error: { message: 'overloaded' } }, 503),
    json({ candidates: [{ content: { parts: [{ text: '{}' }] } }] }),
  ]);
  try {
    const caller = createGeminiCaller({ apiKey: 'test-secret', model: 'gemini-2.0-flash', policy: FAST_POLICY });
    const result = await caller.call(REQUEST);
    assert.equal(result.success, true);
    assert.equal(result.meta.attemptCount, 2);
    assert.equal(result.meta.retried, true);
  } finally {
    stub.restore();
  }
});

test('a 429 after the last retry is reported as rate limited', async () => {
  const stub = stubFetch([json({ error: { message: 'quota exceeded' } }, 429)]);
  try {
    const caller = createGeminiCaller({
      apiKey: 'test-secret',
      model: 'gemini-2.0-flash',
      policy: { ...FAST_POLICY, maxRetries: 0 },
    });
    const result = await caller.call(REQUEST);
    assert.equal(result.success, false);
    if (!result.success) {
      assert.deepEqual(result.failure, {
        kind: 'rate_limited',
        message: 'Provider API error: 429 quota exceeded',
        status: 429,
      });
    }
  } finally {
    stub.restore();
  }
});

test('an auth failure is a config error and is not retried', async () => {
  const stub = stubFetch([json({ error: { message: 'bad key' } }, 401)]);
  try {
    const caller = createOpenAICaller({
      apiKey: 'test-secret',
      model: 'gpt-4o-mini',
      policy: { ...FAST_POLICY, maxRetries: 2 },
    });
    const result = await caller.call(REQUEST);
    assert.equal(result.success, false);
    if (!result.success) {
      assert.equal(result.failure.kind, 'config_error');
    }
    assert.equal(result.meta.attemptCount, 1);
    assert.equal(stub.captured.length, 1);
  } finally {
    stub.restore();
  }
});

test('network errors are retried then reported', async () => {
  const stub = stubFetch([async () => {
    throw new TypeError('fetch failed');
  }]);
  try {
    const caller = createGeminiCaller({ apiKey: 'test-secret', model: 'gemini-2.0-flash', policy: FAST_POLICY });
    const result = await caller.call(REQUEST);
    assert.equal(result.success, false);
    if (!result.success) {
      assert.equal(result.failure.kind, 'network_error');
      assert.equal(result.failure.message, 'fetch failed (after 2 attempts)');
    }
    assert.equal(stub.captured.length, 2);
  } finally {
    stub.restore();
  }
});

test('a reply without text is empty output', async () => {
  const stub = stubFetch([json({ candidates: [] })]);
  try {
    const caller = createGeminiCaller({
      apiKey: 'test-secret',
      model: 'gemini-2.0-flash',
      policy: { ...FAST_POLICY, maxRetries: 0 },
    });
    const result = await caller.call(REQUEST);
    assert.equal(result.success, false);
    if (!result.success) {
      assert.equal(result.failure.kind, 'empty_output');
      assert.equal(result.failure.message, 'Provider returned no text');
    }
  } finally {
    stub.restore();
  }
});

test('a call that never answers times out', async () => {
  const stub = stubFetch([() => new Promise<Response>(() => {})]);
  try {
    const caller = createGeminiCaller({
      apiKey: 'test-secret',
      model: 'gemini-2.0-flash',
      policy: { timeoutMs: 20, maxRetries: 0, retryBaseMs: 0 },
    });
    const result = await caller.call(REQUEST);
    assert.equal(result.success, false);
    if (!result.success) {
      assert.equal(result.failure.kind, 'timeout');
      assert.equal(result.failure.message, 'gemini call timed out after 20ms');
    }
  } finally {
    stub.restore();
  }
});

test('openai caller sends JSON mode and reads the message content', async () => {
  const stub = stubFetch([json({ choices: [{ message: { content: '{"questions_list":[]}' } }] })]);
  try {
    const caller = createOpenAICaller({ apiKey: 'test-secret', model: 'gpt-4o-mini', policy: FAST_POLICY });
    const result = await caller.call(REQUEST);
    assert.equal(result.success, true);
    if (result.success) {
      assert.equal(result.text, '{"questions_list":[]}');
    }
    assert.equal(stub.captured[0].url, 'https://api.openai.com/v1/chat/completions');
    assert.equal(stub.captured[0].headers.get('authorization'), 'Bearer test-secret');
    assert.deepEqual(stub.captured[0].body, {
      model: 'gpt-4o-mini',
      messages: [
        { role: 'system', content: 'Reply with JSON.' },
        { role: 'user', content: 'Write one question.' },
      ],
      response_format: { type: 'json_object' },
    });
  } finally {
    stub.restore();
  }
});

test('createModelCaller follows the configured provider', () => {
  assert.equal(createModelCaller(loadGeneratorConfig({ AI_PROVIDER: 'none', GEMINI_API_KEY: 'test-secret' })), null);
  assert.equal(createModelCaller(loadGeneratorConfig({ AI_PROVIDER: 'gemini' })), null);

  const caller = createModelCaller(loadGeneratorConfig({ AI_PROVIDER: 'openai', OPENAI_API_KEY: 'test-secret' }));
  assert.equal(caller?.provider, 'openai');
  assert.equal(caller?.model, 'gpt-4o-mini');
});
