import { randomUUID } from 'node:crypto';
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { ContentDocument } from '@examcraft/contracts';
import { createLogger } from '../observability/logger';
import {
  AUTO_ID,
  DocumentStoreError,
  type DocumentFilter,
  type DocumentStore,
  type StoredDocument,
} from './document-store';

const log = createLogger('store:supabase');

// One table per collection: `id text primary key, document jsonb`.
const DocumentRowSchema = z.object({
  id: z.string(),
  document: z.record(z.string(), z.unknown()),
});

function toStored(row: unknown, collection: string, operation: 'get' | 'query'): StoredDocument {
  const parsed = DocumentRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new DocumentStoreError(operation, collection, `malformed row: ${parsed.error.message}`);
  }
  return parsed.data;
}

/**
 * Service-role client. Bypasses RLS, so only construct it in server-side code.
 */
export function createAdminClient(url: string, serviceRoleKey: string): SupabaseClient {
  return createClient(url, serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}

export class SupabaseDocumentStore implements DocumentStore {
  constructor(private readonly client: SupabaseClient) {}

  async get(collection: string, id: string): Promise<StoredDocument | null> {
    const { data, error } = await this.client
      .from(collection)
      .select('id, document')
      .eq('id', id)
      .maybeSingle();
    if (error) throw new DocumentStoreError('get', collection, error.message);
    return data ? toStored(data, collection, 'get') : null;
  }

  async put(collection: string, id: string, document: ContentDocument): Promise<string> {
    const resolvedId = id === AUTO_ID ? randomUUID() : id;
    const { error } = await this.client
      .from(collection)
      .upsert({ id: resolvedId, document });
    if (error) throw new DocumentStoreError('put', collection, error.message);
    log.debug(`put ${collection}/${resolvedId}`);
    return resolvedId;
  }

  async query(collection: string, filter: DocumentFilter = {}): Promise<StoredDocument[]> {
    const base = this.client.from(collection).select('id, document');
    const { data, error } = Object.keys(filter).length > 0
      ? await base.contains('document', filter)
      : await base;
    if (error) throw new DocumentStoreError('query', collection, error.message);
    return (data ?? []).map((row: unknown) => toStored(row, collection, 'query'));
  }
}

export function createSupabaseDocumentStore(config: { url: string; serviceRoleKey: string }): SupabaseDocumentStore {
  return new SupabaseDocumentStore(createAdminClient(config.url, config.serviceRoleKey));
}
