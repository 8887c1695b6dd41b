/**
 * Ordered extraction of "the current price" from a quote.
 *
 * Quotes carry the price under different fields depending on market
 * session and instrument type. Extractors are tried in order; the first
 * one yielding a positive finite number wins.
 */

export type Payload = Record<string, unknown>;

export interface PriceExtractor {
  name: string;
  extract(quote: Payload): number | undefined;
}

export function isPayload(value: unknown): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asPrice(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : undefined;
}

function field(name: string): PriceExtractor {
  return {
    name,
    extract: (quote) => asPrice(quote[name]),
  };
}

export const PRICE_EXTRACTORS: readonly PriceExtractor[] = [
  field('regularMarketPrice'),
  field('currentPrice'),
  field('postMarketPrice'),
  field('preMarketPrice'),
  field('regularMarketPreviousClose'),
  field('previousClose'),
];

export interface ExtractedPrice {
  price: number;
  source: string;
}

export function extractPrice(
  quote: Payload,
  extractors: readonly PriceExtractor[] = PRICE_EXTRACTORS,
): ExtractedPrice | null {
  for (const extractor of extractors) {
    const price = extractor.extract(quote);
    if (price !== undefined) {
      return { price, source: extractor.name };
    }
  }
  return null;
}
