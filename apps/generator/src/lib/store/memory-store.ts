import { randomUUID } from 'node:crypto';
import type { ContentDocument } from '@examcraft/contracts';
import {
  AUTO_ID,
  matchesFilter,
  type DocumentFilter,
  type DocumentStore,
  type StoredDocument,
} from './document-store';

/** Process-local store for tests and offline runs. Documents are copied in and out. */
export class MemoryDocumentStore implements DocumentStore {
  private readonly collections = new Map<string, Map<string, ContentDocument>>();

  private collection(name: string): Map<string, ContentDocument> {
    let found = this.collections.get(name);
    if (!found) {
      found = new Map();
      this.collections.set(name, found);
    }
    return found;
  }

  async get(collection: string, id: string): Promise<StoredDocument | null> {
    const document = this.collection(collection).get(id);
    return document ? { id, document: structuredClone(document) } : null;
  }

  async put(collection: string, id: string, document: ContentDocument): Promise<string> {
    const resolvedId = id === AUTO_ID ? randomUUID() : id;
    this.collection(collection).set(resolvedId, structuredClone(document));
    return resolvedId;
  }

  async query(collection: string, filter: DocumentFilter = {}): Promise<StoredDocument[]> {
    const results: StoredDocument[] = [];
    for (const [id, document] of this.collection(collection)) {
      if (matchesFilter(document, filter)) {
        results.push({ id, document: structuredClone(document) });
      }
    }
    return results;
  }
}
