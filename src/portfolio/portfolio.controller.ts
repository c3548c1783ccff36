import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { PortfolioQueryService } from './portfolio-query.service';
import { AttributionService } from './attribution.service';
import { MarketPriceService } from '../market-price/market-price.service';
import { PriceSnapshot } from '../market-price/entities/price-snapshot.entity';
import { HoldingsResponseDto, PortfolioOverviewDto } from './dto/portfolio-response.dto';
import { EquityTableDto } from './dto/equity-response.dto';
import { MarketPricesResponseDto } from './dto/market-prices-response.dto';
import { toNumber } from '../common/utils/decimal.util';

@Controller('portfolio')
export class PortfolioController {
  constructor(
    private readonly queryService: PortfolioQueryService,
    private readonly attributionService: AttributionService,
    private readonly marketPriceService: MarketPriceService,
  ) {}

  /**
   * Pool totals, market value and anomalies.
   *
   * GET /portfolio/overview
   */
  @Get('overview')
  @HttpCode(HttpStatus.OK)
  async getOverview(): Promise<PortfolioOverviewDto> {
    return this.queryService.getOverview(await this.currentSnapshot());
  }

  /**
   * Current holdings valued at market prices.
   *
   * GET /portfolio/holdings
   */
  @Get('holdings')
  @HttpCode(HttpStatus.OK)
  async getHoldings(): Promise<HoldingsResponseDto> {
    return this.queryService.getHoldings(await this.currentSnapshot());
  }

  /**
   * Per-member contribution, ownership and equity.
   *
   * GET /portfolio/equity
   */
  @Get('equity')
  @HttpCode(HttpStatus.OK)
  async getEquity(): Promise<EquityTableDto> {
    return this.attributionService.equityTable(await this.currentSnapshot());
  }

  /**
   * Prices used for valuation, with the stale flag when the oracle failed.
   *
   * GET /portfolio/prices
   */
  @Get('prices')
  @HttpCode(HttpStatus.OK)
  async getMarketPrices(): Promise<MarketPricesResponseDto> {
    const snapshot = await this.currentSnapshot();
    const prices: Record<string, number> = {};
    for (const [symbol, price] of Object.entries(snapshot.prices)) {
      prices[symbol] = toNumber(price);
    }
    return {
      prices,
      fetchedAt: snapshot.fetchedAt.toISOString(),
      source: snapshot.source,
      stale: snapshot.stale,
    };
  }

  // supported assets plus anything the pool actually holds
  private currentSnapshot(): Promise<PriceSnapshot> {
    return this.marketPriceService.getValuationSnapshot(Object.keys(this.queryService.holdings()));
  }
}
