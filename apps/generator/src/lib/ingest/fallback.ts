import fallbackPayloads from './fixtures/fallback-payloads.json';

// Keys of the fixture: one example model reply per generated shape.
export type FallbackShape = keyof typeof fallbackPayloads;

export const FALLBACK_SHAPES = Object.keys(fallbackPayloads).filter(isFallbackShape);

export function isFallbackShape(value: string): value is FallbackShape {
  return Object.prototype.hasOwnProperty.call(fallbackPayloads, value);
}

/**
 * Returns the pre-authored reply for `shape` as raw text, so it goes through
 * the same parse and validation states a model reply would.
 */
export function getFallbackPayload(shape: FallbackShape): string {
  return JSON.stringify(fallbackPayloads[shape]);
}
