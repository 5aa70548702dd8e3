import { StockType } from './entities/asset.entity';

export type TickerClass =
  | { category: 'stocks'; stockType: StockType }
  | { category: 'bdrs' }
  | { category: 'etfs' }
  | { category: 'funds' };

// Online search answers "Stock", "ETF" or "Fund" for an ambiguous ticker.
export type SearchedAssetType = 'Stock' | 'ETF' | 'Fund';

const TICKER_PATTERN = /^[A-Z0-9]{4}\d{1,2}$/;

/**
 * Uppercases and strips the fractional market suffix: "petr4f" → "PETR4".
 */
export function normalizeTicker(raw: string): string {
  const ticker = raw.trim().toUpperCase();
  if (ticker.endsWith('F') && TICKER_PATTERN.test(ticker.slice(0, -1))) {
    return ticker.slice(0, -1);
  }
  return ticker;
}

/**
 * Infers the asset class from the B3 ticker suffix.
 * Returns null for unit-like suffixes ("11") that need a lookup,
 * and for anything else that cannot be classified.
 */
export function classifyTicker(ticker: string): TickerClass | null {
  if (ticker.endsWith('34') || ticker.endsWith('35') || ticker.endsWith('39')) {
    return { category: 'bdrs' };
  }
  if (ticker.endsWith('11')) {
    return null;
  }
  if (ticker.endsWith('3')) {
    return { category: 'stocks', stockType: 'ON' };
  }
  if (ticker.endsWith('4') || ticker.endsWith('5') || ticker.endsWith('6')) {
    return { category: 'stocks', stockType: 'PN' };
  }
  return null;
}

export function classFromSearch(type: SearchedAssetType): TickerClass {
  switch (type) {
    case 'Stock':
      return { category: 'stocks', stockType: 'UNIT' };
    case 'ETF':
      return { category: 'etfs' };
    case 'Fund':
      return { category: 'funds' };
  }
}
