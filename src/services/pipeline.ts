import { fetchTopCoins } from '../clients/gecko';
import { createPool, type DbPool } from '../lib/db';
import type { DatabaseConfig, PipelineConfig } from '../config';
import type { CleanCoinRecord, RawCoinRecord } from '../types/coin';
import { loadCoins } from './loader';
import { transformCoins } from './transformer';

export type PipelineDeps = {
  extract: (limit: number, config: PipelineConfig) => Promise<RawCoinRecord[]>;
  transform: (records: RawCoinRecord[], loadedAt: Date) => CleanCoinRecord[];
  load: (pool: DbPool, records: CleanCoinRecord[]) => Promise<number>;
  createPool: (db: DatabaseConfig) => DbPool;
  now: () => Date;
};

export type PipelineSummary = {
  extracted: number;
  loaded: number;
  loadedAt: Date;
};

const defaultDeps: PipelineDeps = {
  extract: (limit, config) => fetchTopCoins(limit, config.api),
  transform: transformCoins,
  load: loadCoins,
  createPool,
  now: () => new Date(),
};

export async function runPipeline(config: PipelineConfig, deps: Partial<PipelineDeps> = {}): Promise<PipelineSummary> {
  const d = { ...defaultDeps, ...deps };

  const raw = await d.extract(config.limit, config);
  const loadedAt = d.now();
  const transformed = d.transform(raw, loadedAt);

  const pool = d.createPool(config.database);
  let loaded: number;
  try {
    loaded = await d.load(pool, transformed);
  } finally {
    await pool.end().catch((err: unknown) => {
      console.error('Failed to close database pool', err);
    });
  }

  console.log('Pipeline completed successfully');
  return { extracted: raw.length, loaded, loadedAt };
}
