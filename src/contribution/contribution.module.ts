import { Module } from '@nestjs/common';
import { ContributionController } from './contribution.controller';
import { ContributionLedgerService } from './contribution-ledger.service';
import { MemberRegistry } from './member-registry.service';

@Module({
  controllers: [ContributionController],
  providers: [MemberRegistry, ContributionLedgerService],
  exports: [MemberRegistry, ContributionLedgerService],
})
export class ContributionModule {}
