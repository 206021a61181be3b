import type { ContentDocument } from '@examcraft/contracts';

export type DocumentFilterValue = string | number | boolean | null;

/** Top-level field equality, e.g. `{ contentAssetId: 'passage-1' }`. */
export type DocumentFilter = Record<string, DocumentFilterValue>;

export interface StoredDocument {
  id: string;
  document: ContentDocument;
}

export const AUTO_ID = 'auto';

export interface DocumentStore {
  get(collection: string, id: string): Promise<StoredDocument | null>;
  /** Pass {@link AUTO_ID} to have the store assign an id. Returns the id written. */
  put(collection: string, id: string, document: ContentDocument): Promise<string>;
  query(collection: string, filter?: DocumentFilter): Promise<StoredDocument[]>;
}

export class DocumentStoreError extends Error {
  collection: string;
  operation: 'get' | 'put' | 'query';

  constructor(operation: 'get' | 'put' | 'query', collection: string, detail: string) {
    super(`Document store ${operation} on ${collection} failed: ${detail}`);
    this.name = 'DocumentStoreError';
    this.collection = collection;
    this.operation = operation;
  }
}

export function matchesFilter(document: ContentDocument, filter: DocumentFilter): boolean {
  return Object.entries(filter).every(([key, value]) => document[key] === value);
}
