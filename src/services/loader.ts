import { withTransaction, type DbPool } from '../lib/db';
import type { CleanCoinRecord } from '../types/coin';

export const TABLE_NAME = 'crypto_market';

export const CREATE_TABLE_SQL = `create table if not exists ${TABLE_NAME} (
  coin_id text primary key,
  symbol text,
  name text,
  current_price numeric,
  market_cap bigint,
  load_timestamp timestamp
)`;

const COLUMNS = ['coin_id', 'symbol', 'name', 'current_price', 'market_cap', 'load_timestamp'] as const;

// TIMESTAMP has no zone; store the UTC wall-clock time.
function utcTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').replace('Z', '');
}

/**
 * Builds one multi-row upsert. On conflict only price, market cap and load
 * timestamp are refreshed; symbol and name keep their first-loaded values.
 */
export function buildUpsert(records: readonly CleanCoinRecord[]): { text: string; values: unknown[] } {
  const values: unknown[] = [];
  const rows = records.map((item, i) => {
    values.push(
      item.coin_id,
      item.symbol,
      item.name,
      item.current_price,
      item.market_cap,
      utcTimestamp(item.load_timestamp),
    );
    const base = i * COLUMNS.length;
    return `(${COLUMNS.map((_, j) => `$${base + j + 1}`).join(', ')})`;
  });

  const text = `insert into ${TABLE_NAME} (${COLUMNS.join(', ')})
values ${rows.join(',\n       ')}
on conflict (coin_id) do update
  set current_price = excluded.current_price,
      market_cap = excluded.market_cap,
      load_timestamp = excluded.load_timestamp`;

  return { text, values };
}

export async function loadCoins(pool: DbPool, records: readonly CleanCoinRecord[]): Promise<number> {
  console.log('Connecting to PostgreSQL...');

  const affected = await withTransaction(pool, async (client) => {
    await client.query(CREATE_TABLE_SQL);
    if (!records.length) return 0;
    const { text, values } = buildUpsert(records);
    const result = await client.query(text, values);
    return result.rowCount ?? records.length;
  });

  console.log(`Load complete: ${affected} rows inserted/updated.`);
  return affected;
}
