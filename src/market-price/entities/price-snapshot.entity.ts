import Decimal from 'decimal.js';
import { toDecimal } from '../../common/utils/decimal.util';

// "mixed" = some prices live, some from the fallback map
export type PriceSource = 'oracle' | 'fallback' | 'mixed';

// Point-in-time price per unit for each asset, in the reference currency.
export interface PriceSnapshot {
  readonly prices: Readonly<Record<string, Decimal>>;
  readonly stale: boolean;          // true when any price came from the fallback map
  readonly source: PriceSource;
  readonly fetchedAt: Date;
}

export interface PriceSnapshotOptions {
  stale?: boolean;
  source?: PriceSource;
  fetchedAt?: Date;
}

/**
 * Builds a snapshot from a symbol -> price map.
 * @throws RangeError if any price is not positive
 */
export function createPriceSnapshot(
  prices: Record<string, Decimal.Value>,
  options: PriceSnapshotOptions = {},
): PriceSnapshot {
  const entries = Object.entries(prices).map(([symbol, price]): [string, Decimal] => {
    const value = toDecimal(price);
    if (value.lessThanOrEqualTo(0)) {
      throw new RangeError(`Price must be positive, got ${value.toString()} for ${symbol}`);
    }
    return [symbol.toUpperCase(), value];
  });

  return Object.freeze({
    prices: Object.freeze(Object.fromEntries(entries)),
    stale: options.stale ?? false,
    source: options.source ?? 'oracle',
    fetchedAt: options.fetchedAt ?? new Date(),
  });
}

/** Price for an asset, undefined when the snapshot does not cover it */
export function priceOf(snapshot: PriceSnapshot, asset: string): Decimal | undefined {
  return snapshot.prices[asset];
}
