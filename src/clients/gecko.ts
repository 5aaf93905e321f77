import { z } from 'zod';
import { http } from '../lib/http';
import { DEFAULT_API_URL } from '../config';
import { RemoteFetchError } from '../errors';
import type { RawCoinRecord } from '../types/coin';

export type MarketsOptions = {
  baseUrl?: string;
  apiKey?: string;
  timeoutMs?: number;
};

// Entries without an id, price or market cap key are dropped; a null value is kept.
const marketEntrySchema = z.object({
  id: z.string().min(1),
  symbol: z.string().nullish().catch(null),
  name: z.string().nullish().catch(null),
  current_price: z.number().finite().nullable(),
  market_cap: z.number().finite().nullable(),
});

export function mapMarketEntry(entry: unknown): RawCoinRecord | null {
  const parsed = marketEntrySchema.safeParse(entry);
  if (!parsed.success) return null;
  const m = parsed.data;
  return {
    coin_id: m.id,
    symbol: m.symbol ?? null,
    name: m.name ?? null,
    current_price: m.current_price,
    market_cap: m.market_cap === null ? null : Math.round(m.market_cap),
  };
}

function preview(body: string) {
  return body.length > 200 ? `${body.slice(0, 200)}...` : body;
}

/**
 * Fetches the first page of `/coins/markets`, quoted in USD and ordered by
 * market cap, and projects each usable entry onto a {@link RawCoinRecord}.
 */
export async function fetchTopCoins(limit: number, opts: MarketsOptions = {}): Promise<RawCoinRecord[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`limit must be a positive integer, got ${limit}`);
  }

  const headers: Record<string, string> = {};
  if (opts.apiKey) {
    headers['x-cg-demo-api-key'] = opts.apiKey;
  }

  const url = `${opts.baseUrl ?? DEFAULT_API_URL}/coins/markets`;
  console.log('Extracting crypto market data from CoinGecko...');

  const res = await http
    .get(url, {
      searchParams: {
        vs_currency: 'usd',
        order: 'market_cap_desc',
        per_page: limit,
        page: 1,
        sparkline: 'false',
      },
      headers,
      responseType: 'text',
      ...(opts.timeoutMs ? { timeout: opts.timeoutMs } : {}),
    })
    .catch((err: unknown) => {
      const reason = err instanceof Error ? err.message : String(err);
      throw new RemoteFetchError(null, '', `API call failed: ${reason}`, err);
    });

  if (res.statusCode < 200 || res.statusCode >= 300) {
    throw new RemoteFetchError(res.statusCode, res.body, `API call failed ${res.statusCode} = ${preview(res.body)}`);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(res.body);
  } catch (e) {
    throw new RemoteFetchError(res.statusCode, res.body, 'API returned malformed JSON', e);
  }
  if (!Array.isArray(payload)) {
    throw new RemoteFetchError(res.statusCode, res.body, 'API returned an unexpected payload, expected an array');
  }

  const coins: RawCoinRecord[] = [];
  for (const entry of payload) {
    const coin = mapMarketEntry(entry);
    if (coin) coins.push(coin);
  }

  console.log(`Extracted ${coins.length} coins from API`);
  return coins;
}
