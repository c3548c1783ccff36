import { Injectable } from '@nestjs/common';
import { ContributionLedgerService } from '../contribution/contribution-ledger.service';
import { PortfolioQueryService } from './portfolio-query.service';
import { PriceSnapshot } from '../market-price/entities/price-snapshot.entity';
import { EquityTableDto, MemberEquityDto } from './dto/equity-response.dto';
import { toNumber } from '../common/utils/decimal.util';

// Each member's share of the portfolio's market value.
@Injectable()
export class AttributionService {
  constructor(
    private readonly contributions: ContributionLedgerService,
    private readonly portfolio: PortfolioQueryService,
  ) {}

  /**
   * equityValue = ownershipPct / 100 × portfolio value, per member in registry order.
   * No side effects; a zero portfolio value gives every member 0 equity.
   */
  equityTable(snapshot: PriceSnapshot): EquityTableDto {
    const valuation = this.portfolio.portfolioValue(snapshot);
    const members: Record<string, MemberEquityDto> = {};

    for (const row of this.contributions.ownershipTable()) {
      members[row.memberId] = {
        contributed: toNumber(row.contributed),
        ownershipPct: toNumber(row.ownershipPct),
        equityValue: toNumber(row.ownershipPct.dividedBy(100).times(valuation.value)),
      };
    }

    return {
      portfolioValue: toNumber(valuation.value),
      pricesStale: snapshot.stale,
      unpricedAssets: valuation.unpricedAssets,
      members,
    };
  }
}
