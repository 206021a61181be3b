import type { ContentDocument } from '@examcraft/contracts';
import type { AnyQuestion } from './questions';
import type { AnyAsset } from './assets';

function toWireValue(value: unknown): unknown {
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(toWireValue);
  if (typeof value === 'object' && value !== null) {
    const out: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry === undefined) continue;
      out[key] = toWireValue(entry);
    }
    return out;
  }
  return value;
}

/** Stored map for an accepted entity; feeding it back through ingestion yields an equal entity. */
export function toContentDocument(entity: AnyQuestion | AnyAsset): ContentDocument {
  const out: ContentDocument = {};
  for (const [key, entry] of Object.entries(entity)) {
    if (entry === undefined) continue;
    out[key] = toWireValue(entry);
  }
  return out;
}
