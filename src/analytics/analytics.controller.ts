import { Controller, Get, HttpCode, HttpStatus, Query } from '@nestjs/common';
import { parseISO } from 'date-fns';
import { PerformanceService } from './performance.service';
import { MarketPriceService } from '../market-price/market-price.service';
import { PortfolioQueryService } from '../portfolio/portfolio-query.service';
import { PriceSnapshot } from '../market-price/entities/price-snapshot.entity';
import { AsOfQueryDto } from './dto/as-of-query.dto';
import { HeatmapDto, RoiReportDto, TrendPointDto, WeeklyDeltaDto, WeeklySummaryDto } from './dto/analytics-response.dto';

@Controller('analytics')
export class AnalyticsController {
  constructor(
    private readonly performanceService: PerformanceService,
    private readonly marketPriceService: MarketPriceService,
    private readonly queryService: PortfolioQueryService,
  ) {}

  /**
   * GET /analytics/roi
   */
  @Get('roi')
  @HttpCode(HttpStatus.OK)
  async getRoi(): Promise<RoiReportDto> {
    return this.performanceService.roiByAsset(await this.currentSnapshot());
  }

  /**
   * Ownership change over the last 7 days, per member.
   *
   * GET /analytics/weekly?asOf=2024-03-15
   */
  @Get('weekly')
  @HttpCode(HttpStatus.OK)
  getWeeklyDeltas(@Query() query: AsOfQueryDto): Record<string, WeeklyDeltaDto> {
    return this.performanceService.weeklyDeltas(toAsOf(query));
  }

  /**
   * GET /analytics/streaks?asOf=2024-03-15
   */
  @Get('streaks')
  @HttpCode(HttpStatus.OK)
  getStreaks(@Query() query: AsOfQueryDto): Record<string, number> {
    return this.performanceService.streaks(toAsOf(query));
  }

  /**
   * GET /analytics/heatmap
   */
  @Get('heatmap')
  @HttpCode(HttpStatus.OK)
  getHeatmap(): HeatmapDto {
    return this.performanceService.weeklyHeatmap();
  }

  /**
   * GET /analytics/trend
   */
  @Get('trend')
  @HttpCode(HttpStatus.OK)
  async getTrend(): Promise<TrendPointDto[]> {
    return this.performanceService.portfolioTrend(await this.currentSnapshot());
  }

  /**
   * GET /analytics/summary?asOf=2024-03-15
   */
  @Get('summary')
  @HttpCode(HttpStatus.OK)
  async getSummary(@Query() query: AsOfQueryDto): Promise<WeeklySummaryDto> {
    return this.performanceService.weeklySummary(await this.currentSnapshot(), toAsOf(query));
  }

  private currentSnapshot(): Promise<PriceSnapshot> {
    return this.marketPriceService.getValuationSnapshot(Object.keys(this.queryService.holdings()));
  }
}

function toAsOf(query: AsOfQueryDto): Date {
  return query.asOf !== undefined ? parseISO(query.asOf) : new Date();
}
