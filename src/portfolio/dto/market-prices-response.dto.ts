// Snapshot used for valuation
export interface MarketPricesResponseDto {
  prices: Record<string, number>;  // { "BTC": 97500, "ETH": 5250 }
  fetchedAt: string;               // ISO timestamp
  source: string;                  // "oracle", "fallback" or "mixed"
  stale: boolean;
}
