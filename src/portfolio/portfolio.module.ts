import { Module } from '@nestjs/common';
import { PortfolioController } from './portfolio.controller';
import { PortfolioQueryService } from './portfolio-query.service';
import { AttributionService } from './attribution.service';
import { ContributionModule } from '../contribution/contribution.module';
import { TransactionModule } from '../transaction/transaction.module';
import { MarketPriceModule } from '../market-price/market-price.module';

@Module({
  imports: [ContributionModule, TransactionModule, MarketPriceModule],
  controllers: [PortfolioController],
  providers: [
    PortfolioQueryService, // Holdings projection and valuation
    AttributionService,    // Per-member equity
  ],
  exports: [PortfolioQueryService],
})
export class PortfolioModule {}
