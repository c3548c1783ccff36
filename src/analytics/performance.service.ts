import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { startOfISOWeek, subDays } from 'date-fns';
import { ContributionLedgerService } from '../contribution/contribution-ledger.service';
import { MemberRegistry } from '../contribution/member-registry.service';
import { ContributionBook } from '../contribution/entities/contribution-record.entity';
import { memberTotal, ownershipShare } from '../contribution/contribution-math';
import { TransactionLedgerService } from '../transaction/transaction-ledger.service';
import { TransactionKind, normalizeAsset } from '../transaction/entities/transaction-record.entity';
import { PortfolioQueryService } from '../portfolio/portfolio-query.service';
import { HoldingsMap } from '../portfolio/entities/holdings.entity';
import { PriceSnapshot, priceOf } from '../market-price/entities/price-snapshot.entity';
import { ZERO, percentOf, toNumber } from '../common/utils/decimal.util';
import { isoWeekKey, previousWeekStart, weekStartLabel, weekStartsBetween } from '../common/utils/iso-week.util';
import {
  AssetRoiDto,
  HeatmapDto,
  RoiReportDto,
  TrendPointDto,
  WeeklyDeltaDto,
  WeeklySummaryDto,
} from './dto/analytics-response.dto';

/**
 * Time-windowed and per-asset performance figures.
 * Everything here is a pure read over the ledgers; `asOf` defaults to now.
 */
@Injectable()
export class PerformanceService {
  constructor(
    private readonly contributions: ContributionLedgerService,
    private readonly registry: MemberRegistry,
    private readonly transactions: TransactionLedgerService,
    private readonly portfolio: PortfolioQueryService,
  ) {}

  /**
   * ROI per asset over its buy records.
   * Assets with nothing invested are omitted; assets the snapshot cannot price
   * are omitted too and listed in unpricedAssets.
   */
  roiByAsset(snapshot: PriceSnapshot): RoiReportDto {
    const stats = new Map<string, { invested: Decimal; amountHeld: Decimal }>();
    for (const record of this.transactions.history({ sortBy: 'occurredAt', order: 'asc' })) {
      if (record.kind !== TransactionKind.BUY) {
        continue;
      }
      const entry = stats.get(record.asset) ?? { invested: ZERO, amountHeld: ZERO };
      stats.set(record.asset, {
        invested: entry.invested.plus(record.totalCost),
        amountHeld: entry.amountHeld.plus(record.unitAmount),
      });
    }

    const assets: Record<string, AssetRoiDto> = {};
    const unpricedAssets: string[] = [];
    for (const [asset, { invested, amountHeld }] of stats) {
      if (invested.isZero()) {
        continue;
      }
      const price = priceOf(snapshot, asset);
      if (!price) {
        unpricedAssets.push(asset);
        continue;
      }
      const currentValue = amountHeld.times(price);
      assets[asset] = {
        invested: toNumber(invested),
        currentValue: toNumber(currentValue),
        roiPct: toNumber(percentOf(currentValue.minus(invested), invested)),
        amountHeld: toNumber(amountHeld),
      };
    }

    return { assets, unpricedAssets, pricesStale: snapshot.stale };
  }

  /** ROI for one asset; undefined when it was never bought or has no price */
  roi(asset: string, snapshot: PriceSnapshot): AssetRoiDto | undefined {
    return this.roiByAsset(snapshot).assets[normalizeAsset(asset)];
  }

  /**
   * This week's ownership against the ownership one week earlier.
   * "Last week" re-cuts every member's total at asOf - 7 days, so the pool
   * total is restricted to the same boundary as the member's own.
   */
  weeklyDelta(memberId: string, asOf: Date = new Date()): WeeklyDeltaDto {
    return this.deltaFor(this.contributions.getBook(), memberId, asOf);
  }

  weeklyDeltas(asOf: Date = new Date()): Record<string, WeeklyDeltaDto> {
    const book = this.contributions.getBook();
    const deltas: Record<string, WeeklyDeltaDto> = {};
    for (const memberId of this.registry.list()) {
      deltas[memberId] = this.deltaFor(book, memberId, asOf);
    }
    return deltas;
  }

  /**
   * Consecutive ISO weeks with at least one contribution, counting back from
   * the week containing asOf. 0 when the current week has none.
   */
  contributionStreak(memberId: string, asOf: Date = new Date()): number {
    return this.streakFor(this.contributions.getBook(), memberId, asOf);
  }

  streaks(asOf: Date = new Date()): Record<string, number> {
    const book = this.contributions.getBook();
    const streaks: Record<string, number> = {};
    for (const memberId of this.registry.list()) {
      streaks[memberId] = this.streakFor(book, memberId, asOf);
    }
    return streaks;
  }

  /**
   * Contributions summed into Monday-aligned weeks, from the week of the
   * earliest contribution to the week of the latest, per member.
   */
  weeklyHeatmap(): HeatmapDto {
    const book = this.contributions.getBook();
    const members = [...this.registry.list()];
    const records = members.flatMap((memberId) => book[memberId] ?? []);
    if (records.length === 0) {
      return { weekStarts: [], members, matrix: members.map(() => []) };
    }

    const times = records.map((record) => record.occurredAt.getTime());
    const weekStarts = weekStartsBetween(new Date(Math.min(...times)), new Date(Math.max(...times))).map(
      weekStartLabel,
    );
    const column = new Map(weekStarts.map((label, index): [string, number] => [label, index]));

    const matrix = members.map((memberId) => {
      const row = weekStarts.map(() => ZERO);
      for (const record of book[memberId] ?? []) {
        const index = column.get(weekStartLabel(record.occurredAt));
        if (index !== undefined) {
          row[index] = row[index].plus(record.amount);
        }
      }
      return row.map(toNumber);
    });

    return { weekStarts, members, matrix };
  }

  /**
   * Portfolio value after each purchase, in purchase-date order, with every
   * point valued at the snapshot's prices.
   */
  portfolioTrend(snapshot: PriceSnapshot): TrendPointDto[] {
    const cumulative: HoldingsMap = {};
    return this.transactions.history({ sortBy: 'occurredAt', order: 'asc' }).map((record) => {
      cumulative[record.asset] = (cumulative[record.asset] ?? ZERO).plus(record.unitAmount);
      return {
        occurredAt: record.occurredAt.toISOString(),
        asset: record.asset,
        value: toNumber(this.portfolio.portfolioValue(snapshot, cumulative).value),
      };
    });
  }

  /** Overview plus each member's weekly delta and streak */
  weeklySummary(snapshot: PriceSnapshot, asOf: Date = new Date()): WeeklySummaryDto {
    const book = this.contributions.getBook();
    return {
      generatedAt: asOf.toISOString(),
      overview: this.portfolio.getOverview(snapshot),
      members: this.registry.list().map((memberId) => ({
        memberId,
        ...this.deltaFor(book, memberId, asOf),
        streakWeeks: this.streakFor(book, memberId, asOf),
      })),
    };
  }

  private deltaFor(book: ContributionBook, memberId: string, asOf: Date): WeeklyDeltaDto {
    const members = this.registry.list();
    const cutoff = subDays(asOf, 7);

    const thisTotal = memberTotal(book, memberId);
    const lastTotal = memberTotal(book, memberId, cutoff);
    const thisPct = ownershipShare(book, members, memberId);
    const lastPct = ownershipShare(book, members, memberId, cutoff);

    return {
      contributionsAdded: toNumber(thisTotal.minus(lastTotal)),
      ownershipChange: toNumber(thisPct.minus(lastPct)),
      currentOwnership: toNumber(thisPct),
    };
  }

  private streakFor(book: ContributionBook, memberId: string, asOf: Date): number {
    const weeks = new Set((book[memberId] ?? []).map((record) => isoWeekKey(record.occurredAt)));

    let streak = 0;
    for (let cursor = startOfISOWeek(asOf); weeks.has(isoWeekKey(cursor)); cursor = previousWeekStart(cursor)) {
      streak++;
    }
    return streak;
  }
}
