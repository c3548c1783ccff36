export interface MemberEquityDto {
  contributed: number;
  ownershipPct: number;            // 0..100
  equityValue: number;             // ownershipPct / 100 * portfolioValue
}

export interface EquityTableDto {
  portfolioValue: number;
  pricesStale: boolean;
  unpricedAssets: string[];
  members: Record<string, MemberEquityDto>;
}
