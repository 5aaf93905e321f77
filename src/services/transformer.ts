import type { CleanCoinRecord, RawCoinRecord } from '../types/coin';

// Blank collapses to null so both normalizers are fixed points.
export function normalizeSymbol(symbol: string | null | undefined): string | null {
  const trimmed = symbol?.trim().toLowerCase();
  return trimmed ? trimmed : null;
}

export function normalizeName(name: string | null | undefined): string | null {
  const trimmed = name?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Dedupes by `coin_id` (first occurrence wins, input order kept), normalizes
 * text fields and stamps every record with the same `loadedAt`.
 */
export function transformCoins(records: readonly RawCoinRecord[], loadedAt: Date = new Date()): CleanCoinRecord[] {
  console.log('Transforming data...');

  const seen = new Set<string>();
  const deduped: CleanCoinRecord[] = [];

  for (const item of records) {
    if (!item.coin_id) {
      throw new TypeError('coin record without coin_id reached the transformer');
    }
    if (seen.has(item.coin_id)) continue;
    seen.add(item.coin_id);

    deduped.push({
      coin_id: item.coin_id,
      symbol: normalizeSymbol(item.symbol),
      name: normalizeName(item.name),
      current_price: item.current_price,
      market_cap: item.market_cap,
      load_timestamp: loadedAt,
    });
  }

  console.log(`Deduplication complete: kept ${deduped.length} of ${records.length} records.`);
  return deduped;
}
