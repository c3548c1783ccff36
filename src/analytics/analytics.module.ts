import { Module } from '@nestjs/common';
import { AnalyticsController } from './analytics.controller';
import { PerformanceService } from './performance.service';
import { ContributionModule } from '../contribution/contribution.module';
import { TransactionModule } from '../transaction/transaction.module';
import { PortfolioModule } from '../portfolio/portfolio.module';
import { MarketPriceModule } from '../market-price/market-price.module';

@Module({
  imports: [ContributionModule, TransactionModule, PortfolioModule, MarketPriceModule],
  controllers: [AnalyticsController],
  providers: [PerformanceService],
})
export class AnalyticsModule {}
