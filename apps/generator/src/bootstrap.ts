import { createModelCaller } from './lib/ai/providers';
import { loadGeneratorConfig, type GeneratorConfig } from './lib/config/env';
import { createLogger, setLogLevel } from './lib/observability/logger';
import type { DocumentStore } from './lib/store/document-store';
import { MemoryDocumentStore } from './lib/store/memory-store';
import { createSupabaseDocumentStore } from './lib/store/supabase-store';
import type { GeneratorDeps } from './actions/shared';

const log = createLogger('bootstrap');

/**
 * Wires the actions from configuration. Without Supabase credentials content
 * is kept in memory for the life of the process.
 */
export function createGeneratorDeps(config: GeneratorConfig, overrides: Partial<GeneratorDeps> = {}): GeneratorDeps {
  setLogLevel(config.logLevel);

  let store: DocumentStore;
  if (config.supabase) {
    store = createSupabaseDocumentStore(config.supabase);
  } else {
    log.warn('SUPABASE_URL is not set; generated content is kept in memory only');
    store = new MemoryDocumentStore();
  }

  return {
    caller: createModelCaller(config),
    store,
    questionBatchSize: config.questionBatchSize,
    ...overrides,
  };
}

export function createGeneratorDepsFromEnv(env: NodeJS.ProcessEnv = process.env): GeneratorDeps {
  return createGeneratorDeps(loadGeneratorConfig(env));
}
