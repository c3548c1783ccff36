// Current position for a single asset
export interface PositionDto {
  asset: string;
  quantity: number;
  price: number | null;            // null when the snapshot has no price
  value: number;                   // quantity * price, 0 when unpriced
}

export interface HoldingsResponseDto {
  positions: PositionDto[];
  totalValue: number;              // sum of all position values
  pricesStale: boolean;
  unpricedAssets: string[];
}

// Pool-level figures
export interface PortfolioOverviewDto {
  totalContributed: number;
  totalSpent: number;
  availableBalance: number;        // may be negative, see anomalies
  portfolioValue: number;
  gainLoss: number;                // portfolioValue - totalContributed
  gainLossPct: number;             // 0 while the pool is empty
  gainOnSpent: number;             // portfolioValue - totalSpent
  gainOnSpentPct: number;          // 0 while nothing has been spent
  pricesStale: boolean;
  unpricedAssets: string[];
  anomalies: string[];
}
