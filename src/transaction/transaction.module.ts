import { Module } from '@nestjs/common';
import { ContributionModule } from '../contribution/contribution.module';
import { TransactionController } from './transaction.controller';
import { TransactionLedgerService } from './transaction-ledger.service';

@Module({
  imports: [ContributionModule],
  controllers: [TransactionController],
  providers: [TransactionLedgerService],
  exports: [TransactionLedgerService],
})
export class TransactionModule {}
