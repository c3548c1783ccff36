import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { LedgerStore } from '../storage/ledger.store';
import { ContributionLedgerService } from '../contribution/contribution-ledger.service';
import { TransactionLedgerService } from '../transaction/transaction-ledger.service';
import { HoldingsMap } from './entities/holdings.entity';
import { PriceSnapshot, priceOf } from '../market-price/entities/price-snapshot.entity';
import { HoldingsResponseDto, PortfolioOverviewDto } from './dto/portfolio-response.dto';
import { ZERO, percentOf, sum, toNumber } from '../common/utils/decimal.util';

export interface PositionValue {
  asset: string;
  quantity: Decimal;
  price?: Decimal;
  value: Decimal;
}

export interface PortfolioValuation {
  value: Decimal;
  unpricedAssets: string[];        // held but missing from the snapshot, valued at 0
}

export interface HoldingsDiscrepancy {
  asset: string;
  recorded: Decimal;               // stored holdings
  expected: Decimal;               // sum of buy unitAmounts
}

// Read-only projection of holdings and their market value.
// Queries separated from ledger mutations.
@Injectable()
export class PortfolioQueryService {
  constructor(
    private readonly store: LedgerStore,
    private readonly contributions: ContributionLedgerService,
    private readonly transactions: TransactionLedgerService,
  ) {}

  /** Copy of asset -> quantity owned */
  holdings(): HoldingsMap {
    return { ...this.store.loadHoldings() };
  }

  /** Held assets (quantity > 0) valued against the snapshot, sorted by symbol */
  getPositions(snapshot: PriceSnapshot, holdings: HoldingsMap = this.holdings()): PositionValue[] {
    return Object.entries(holdings)
      .filter(([, quantity]) => quantity.greaterThan(0))
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([asset, quantity]) => {
        const price = priceOf(snapshot, asset);
        return { asset, quantity, price, value: price ? quantity.times(price) : ZERO };
      });
  }

  /**
   * Market value of all holdings.
   * Assets the snapshot cannot price count as 0 and are listed in unpricedAssets.
   */
  portfolioValue(snapshot: PriceSnapshot, holdings: HoldingsMap = this.holdings()): PortfolioValuation {
    const positions = this.getPositions(snapshot, holdings);
    return {
      value: sum(positions.map((position) => position.value)),
      unpricedAssets: positions.filter((position) => !position.price).map((position) => position.asset),
    };
  }

  /** Assets whose stored quantity differs from the sum of their buy records */
  findHoldingsDiscrepancies(): HoldingsDiscrepancy[] {
    const holdings = this.holdings();
    const expected: HoldingsMap = {};
    for (const record of this.transactions.history({ sortBy: 'occurredAt', order: 'asc' })) {
      expected[record.asset] = (expected[record.asset] ?? ZERO).plus(record.unitAmount);
    }

    const assets = new Set([...Object.keys(holdings), ...Object.keys(expected)]);
    return Array.from(assets)
      .sort()
      .map((asset) => ({
        asset,
        recorded: holdings[asset] ?? ZERO,
        expected: expected[asset] ?? ZERO,
      }))
      .filter((entry) => !entry.recorded.equals(entry.expected));
  }

  getHoldings(snapshot: PriceSnapshot): HoldingsResponseDto {
    const positions = this.getPositions(snapshot);
    const valuation = this.portfolioValue(snapshot);

    return {
      positions: positions.map((position) => ({
        asset: position.asset,
        quantity: toNumber(position.quantity),
        price: position.price ? toNumber(position.price) : null,
        value: toNumber(position.value),
      })),
      totalValue: toNumber(valuation.value),
      pricesStale: snapshot.stale,
      unpricedAssets: valuation.unpricedAssets,
    };
  }

  /**
   * Pool totals, valuation and gain/loss against everything contributed.
   * gainOnSpent measures the holdings against their cost only.
   * Flags a negative balance and holdings drift as anomalies rather than correcting them.
   */
  getOverview(snapshot: PriceSnapshot): PortfolioOverviewDto {
    const totalContributed = this.contributions.totalPool();
    const totalSpent = this.transactions.totalSpent();
    const availableBalance = totalContributed.minus(totalSpent);
    const valuation = this.portfolioValue(snapshot);
    const gainLoss = valuation.value.minus(totalContributed);
    const gainOnSpent = valuation.value.minus(totalSpent);

    const anomalies: string[] = [];
    if (availableBalance.lessThan(0)) {
      anomalies.push(`Available balance is negative: ${availableBalance.toString()}`);
    }
    for (const drift of this.findHoldingsDiscrepancies()) {
      anomalies.push(
        `Holdings for ${drift.asset} (${drift.recorded.toString()}) do not match purchases (${drift.expected.toString()})`,
      );
    }

    return {
      totalContributed: toNumber(totalContributed),
      totalSpent: toNumber(totalSpent),
      availableBalance: toNumber(availableBalance),
      portfolioValue: toNumber(valuation.value),
      gainLoss: toNumber(gainLoss),
      gainLossPct: toNumber(percentOf(gainLoss, totalContributed)),
      gainOnSpent: toNumber(gainOnSpent),
      gainOnSpentPct: toNumber(percentOf(gainOnSpent, totalSpent)),
      pricesStale: snapshot.stale,
      unpricedAssets: valuation.unpricedAssets,
      anomalies,
    };
  }
}
