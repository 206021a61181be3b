import type { GeneratorConfig } from '../../config/env';
import { createLogger } from '../../observability/logger';
import type { ModelCaller } from '../model-caller';
import { createGeminiCaller } from './gemini';
import { createOpenAICaller } from './openai';
import type { RetryPolicy } from './http';

const log = createLogger('ai:providers');

function policyOf(config: GeneratorConfig): RetryPolicy {
  return {
    timeoutMs: config.timeoutMs,
    maxRetries: config.maxRetries,
    retryBaseMs: config.retryBaseMs,
  };
}

/**
 * Builds the caller for the configured provider. Returns `null` when the
 * provider is `none` or its key is missing; callers then use fallback payloads.
 */
export function createModelCaller(config: GeneratorConfig): ModelCaller | null {
  switch (config.provider) {
    case 'gemini':
      if (!config.gemini.apiKey) {
        log.info('GEMINI_API_KEY is not set; using fallback payloads');
        return null;
      }
      return createGeminiCaller({
        apiKey: config.gemini.apiKey,
        model: config.gemini.model,
        policy: policyOf(config),
      });
    case 'openai':
      if (!config.openai.apiKey) {
        log.info('OPENAI_API_KEY is not set; using fallback payloads');
        return null;
      }
      return createOpenAICaller({
        apiKey: config.openai.apiKey,
        model: config.openai.model,
        policy: policyOf(config),
      });
    case 'none':
      return null;
  }
}

export { createGeminiCaller } from './gemini';
export { createOpenAICaller } from './openai';
export type { RetryPolicy } from './http';
