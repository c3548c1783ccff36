import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { PoolConfigModule } from './config/config.module';
import { StorageModule } from './storage/storage.module';
import { ContributionModule } from './contribution/contribution.module';
import { TransactionModule } from './transaction/transaction.module';
import { PortfolioModule } from './portfolio/portfolio.module';
import { AnalyticsModule } from './analytics/analytics.module';

@Module({
  imports: [
    PoolConfigModule,
    StorageModule,
    ContributionModule,
    TransactionModule,
    PortfolioModule,
    AnalyticsModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
