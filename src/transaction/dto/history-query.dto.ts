import { IsIn, IsOptional, IsString } from 'class-validator';
import { HistorySortKey, SortOrder } from '../transaction-ledger.service';

// GET /transactions query string
export class HistoryQueryDto {
  @IsOptional()
  @IsIn(['occurredAt', 'recordedAt'])
  sortBy?: HistorySortKey;

  @IsOptional()
  @IsIn(['asc', 'desc'])
  order?: SortOrder;

  @IsOptional()
  @IsString()
  asset?: string;
}
