export type RawCoinRecord = {
  coin_id: string;
  symbol: string | null;
  name: string | null;
  current_price: number | null;
  market_cap: number | null;
};

export type CleanCoinRecord = RawCoinRecord & {
  load_timestamp: Date;
};
