import { describe, it, expect, vi, beforeEach } from 'vitest';

const hoisted = vi.hoisted(() => ({
  getMock: vi.fn(),
}));
vi.mock('../src/lib/http', () => ({ http: { get: hoisted.getMock } }));

import { fetchTopCoins, mapMarketEntry } from '../src/clients/gecko';
import { RemoteFetchError } from '../src/errors';

const ok = (payload: unknown) => Promise.resolve({ statusCode: 200, body: JSON.stringify(payload) });

describe('coingecko markets extraction', () => {
  beforeEach(() => {
    hoisted.getMock.mockReset();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('requests the first market-cap page in usd without sparkline', async () => {
    hoisted.getMock.mockImplementationOnce(() => ok([]));

    await fetchTopCoins(5, { apiKey: 'test-key', timeoutMs: 2000 });

    const [url, opts] = hoisted.getMock.mock.calls[0];
    expect(url).toBe('https://api.coingecko.com/api/v3/coins/markets');
    expect(opts.searchParams).toEqual({
      vs_currency: 'usd',
      order: 'market_cap_desc',
      per_page: 5,
      page: 1,
      sparkline: 'false',
    });
    expect(opts.headers).toEqual({ 'x-cg-demo-api-key': 'test-key' });
    expect(opts.timeout).toBe(2000);
    expect(opts.responseType).toBe('text');
  });

  it('omits the api key header when no key is configured', async () => {
    hoisted.getMock.mockImplementationOnce(() => ok([]));

    await fetchTopCoins(3, { baseUrl: 'http://localhost:9999/v3' });

    const [url, opts] = hoisted.getMock.mock.calls[0];
    expect(url).toBe('http://localhost:9999/v3/coins/markets');
    expect(opts.headers).toEqual({});
    expect(opts.timeout).toBeUndefined();
  });

  it('keeps only entries carrying id, price and market cap and projects them', async () => {
    hoisted.getMock.mockImplementationOnce(() =>
      ok([
        { id: 'bitcoin', symbol: 'btc', name: 'Bitcoin', current_price: 50000, market_cap: 900000000000, total_volume: 1 },
        { id: 'ethereum', symbol: 'eth', name: 'Ethereum', current_price: 3000, market_cap: 360000000000.4 },
        { id: 'x' },
        { id: 'tether', symbol: 'usdt', name: 'Tether', current_price: null, market_cap: 1 },
        { id: 'solana', symbol: null, current_price: 150, market_cap: 70000000000 },
        { symbol: 'nil', current_price: 1, market_cap: 1 },
      ]),
    );

    const res = await fetchTopCoins(10);

    expect(res).toEqual([
      { coin_id: 'bitcoin', symbol: 'btc', name: 'Bitcoin', current_price: 50000, market_cap: 900000000000 },
      { coin_id: 'ethereum', symbol: 'eth', name: 'Ethereum', current_price: 3000, market_cap: 360000000000 },
      { coin_id: 'tether', symbol: 'usdt', name: 'Tether', current_price: null, market_cap: 1 },
      { coin_id: 'solana', symbol: null, name: null, current_price: 150, market_cap: 70000000000 },
    ]);
  });

  it('raises RemoteFetchError with status and body on a non-success response', async () => {
    hoisted.getMock.mockImplementationOnce(() => Promise.resolve({ statusCode: 429, body: '{"error":"rate limited"}' }));

    const err = await fetchTopCoins(5).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RemoteFetchError);
    const remote = err as RemoteFetchError;
    expect(remote.statusCode).toBe(429);
    expect(remote.body).toBe('{"error":"rate limited"}');
    expect(remote.message).toBe('API call failed 429 = {"error":"rate limited"}');
  });

  it('wraps transport failures without a status code', async () => {
    hoisted.getMock.mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND api.coingecko.com'));

    const err = await fetchTopCoins(5).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RemoteFetchError);
    expect((err as RemoteFetchError).statusCode).toBeNull();
    expect((err as RemoteFetchError).message).toBe('API call failed: getaddrinfo ENOTFOUND api.coingecko.com');
  });

  it('rejects a payload that is not an array', async () => {
    hoisted.getMock.mockImplementationOnce(() => ok({ status: { error_code: 1 } }));

    await expect(fetchTopCoins(5)).rejects.toThrow('API returned an unexpected payload, expected an array');
  });

  it('rejects malformed JSON', async () => {
    hoisted.getMock.mockImplementationOnce(() => Promise.resolve({ statusCode: 200, body: '<html>' }));

    await expect(fetchTopCoins(5)).rejects.toBeInstanceOf(RemoteFetchError);
  });

  it('refuses a non-positive limit before calling the api', async () => {
    await expect(fetchTopCoins(0)).rejects.toBeInstanceOf(RangeError);
    expect(hoisted.getMock).not.toHaveBeenCalled();
  });
});

describe('mapMarketEntry', () => {
  it('nulls non-string text fields instead of dropping the coin', () => {
    expect(mapMarketEntry({ id: 'dogecoin', symbol: 42, name: ['Doge'], current_price: 0.1, market_cap: 15 })).toEqual({
      coin_id: 'dogecoin',
      symbol: null,
      name: null,
      current_price: 0.1,
      market_cap: 15,
    });
  });

  it('keeps a coin whose price is present but null', () => {
    expect(mapMarketEntry({ id: 'newcoin', symbol: 'nc', name: 'New', current_price: null, market_cap: 0 })).toEqual({
      coin_id: 'newcoin',
      symbol: 'nc',
      name: 'New',
      current_price: null,
      market_cap: 0,
    });
  });

  it('drops a coin whose market cap key is absent', () => {
    expect(mapMarketEntry({ id: 'newcoin', current_price: null })).toBeNull();
  });

  it('drops entries with an empty id', () => {
    expect(mapMarketEntry({ id: '', current_price: 1, market_cap: 1 })).toBeNull();
  });
});
