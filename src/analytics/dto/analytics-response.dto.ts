import { PortfolioOverviewDto } from '../../portfolio/dto/portfolio-response.dto';

export interface AssetRoiDto {
  invested: number;                // sum of total cost incl. fees
  currentValue: number;            // amountHeld * current price
  roiPct: number;
  amountHeld: number;
}

// Assets never bought are absent; bought but unpriced assets are listed separately
export interface RoiReportDto {
  assets: Record<string, AssetRoiDto>;
  unpricedAssets: string[];
  pricesStale: boolean;
}

export interface WeeklyDeltaDto {
  contributionsAdded: number;      // contributed in the last 7 days
  ownershipChange: number;         // percentage points
  currentOwnership: number;
}

export interface HeatmapDto {
  weekStarts: string[];            // Monday of each week, yyyy-MM-dd
  members: string[];
  matrix: number[][];              // [member][week] summed contributions
}

export interface TrendPointDto {
  occurredAt: string;
  asset: string;
  value: number;                   // cumulative holdings at current prices
}

export interface MemberSummaryDto extends WeeklyDeltaDto {
  memberId: string;
  streakWeeks: number;
}

export interface WeeklySummaryDto {
  generatedAt: string;
  overview: PortfolioOverviewDto;
  members: MemberSummaryDto[];
}
