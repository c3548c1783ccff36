import { Inject, Injectable, Logger } from '@nestjs/common';
import { POOL_CONFIG, PoolConfig } from '../config/pool.config';
import { CoinGeckoClient } from './coingecko.client';
import { PriceSnapshot, PriceSource, createPriceSnapshot } from './entities/price-snapshot.entity';

/**
 * Price snapshots for valuation.
 * Live quotes come from the oracle; anything it cannot supply is filled from
 * the configured fallback map and the snapshot is flagged stale.
 * getSnapshot never rejects.
 */
@Injectable()
export class MarketPriceService {
  private readonly logger = new Logger(MarketPriceService.name);

  constructor(
    private readonly client: CoinGeckoClient,
    @Inject(POOL_CONFIG) private readonly config: PoolConfig,
  ) {}

  /** Fallback prices for the given symbols - always stale */
  getFallbackSnapshot(symbols: string[] = this.config.supportedAssets): PriceSnapshot {
    const prices: Record<string, number> = {};
    for (const symbol of this.normalize(symbols)) {
      const price = this.config.fallbackPrices[symbol];
      if (price !== undefined) {
        prices[symbol] = price;
      }
    }
    return createPriceSnapshot(prices, { stale: true, source: 'fallback' });
  }

  async getSnapshot(symbols: string[] = this.config.supportedAssets): Promise<PriceSnapshot> {
    const requested = this.normalize(symbols);
    const quoted = requested.filter((symbol) => this.config.priceOracleIds[symbol] !== undefined);
    if (quoted.length === 0) {
      return this.getFallbackSnapshot(requested);
    }

    const currency = this.config.referenceCurrency;
    let quotes: Record<string, Record<string, number>>;
    try {
      quotes = await this.client.fetchSpotPrices(
        quoted.map((symbol) => this.config.priceOracleIds[symbol]),
        currency,
      );
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Price oracle unavailable, using fallback prices: ${reason}`);
      return this.getFallbackSnapshot(requested);
    }

    const prices: Record<string, number> = {};
    let liveCount = 0;
    for (const symbol of quoted) {
      const price = quotes[this.config.priceOracleIds[symbol]]?.[currency];
      if (price !== undefined && Number.isFinite(price) && price > 0) {
        prices[symbol] = price;
        liveCount++;
      }
    }

    const filled: string[] = [];
    for (const symbol of requested) {
      const fallback = this.config.fallbackPrices[symbol];
      if (prices[symbol] === undefined && fallback !== undefined) {
        prices[symbol] = fallback;
        filled.push(symbol);
      }
    }
    if (filled.length > 0) {
      this.logger.warn(`No live quote for ${filled.join(', ')}, using fallback prices`);
    }

    let source: PriceSource = 'oracle';
    if (liveCount === 0) {
      source = 'fallback';
    } else if (filled.length > 0) {
      source = 'mixed';
    }
    return createPriceSnapshot(prices, { stale: source !== 'oracle', source });
  }

  /** Snapshot covering the supported assets plus whatever the pool holds */
  getValuationSnapshot(heldAssets: string[]): Promise<PriceSnapshot> {
    return this.getSnapshot([...this.config.supportedAssets, ...heldAssets]);
  }

  private normalize(symbols: string[]): string[] {
    const normalized = symbols.map((symbol) => symbol.trim().toUpperCase()).filter((symbol) => symbol.length > 0);
    return Array.from(new Set(normalized));
  }
}
