import { Body, Controller, Get, HttpCode, HttpStatus, Post, Query } from '@nestjs/common';
import { parseISO } from 'date-fns';
import { TransactionLedgerService } from './transaction-ledger.service';
import { ContributionLedgerService } from '../contribution/contribution-ledger.service';
import { CreatePurchaseDto } from './dto/create-purchase.dto';
import { HistoryQueryDto } from './dto/history-query.dto';
import { BalanceResponseDto, TransactionDto } from './dto/transaction-response.dto';
import { TransactionRecord } from './entities/transaction-record.entity';
import { toNumber } from '../common/utils/decimal.util';

@Controller('transactions')
export class TransactionController {
  constructor(
    private readonly ledger: TransactionLedgerService,
    private readonly contributions: ContributionLedgerService,
  ) {}

  /**
   * Records a purchase against the available balance.
   * 400 on bad input, 422 when the pool cannot cover the total cost.
   *
   * POST /transactions/purchases
   */
  @Post('purchases')
  @HttpCode(HttpStatus.CREATED)
  recordPurchase(@Body() dto: CreatePurchaseDto): TransactionDto {
    const record = this.ledger.recordPurchase({
      asset: dto.asset,
      unitAmount: dto.unitAmount,
      unitPrice: dto.unitPrice,
      fee: dto.fee,
      occurredAt: dto.occurredAt !== undefined ? parseISO(dto.occurredAt) : undefined,
      notes: dto.notes,
    });
    return toTransactionDto(record);
  }

  /**
   * Purchase history.
   *
   * GET /transactions?sortBy=occurredAt&order=asc&asset=BTC
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  getHistory(@Query() query: HistoryQueryDto): TransactionDto[] {
    return this.ledger.history(query).map(toTransactionDto);
  }

  /**
   * GET /transactions/balance
   */
  @Get('balance')
  @HttpCode(HttpStatus.OK)
  getBalance(): BalanceResponseDto {
    const totalContributed = this.contributions.totalPool();
    const totalSpent = this.ledger.totalSpent();
    return {
      totalContributed: toNumber(totalContributed),
      totalSpent: toNumber(totalSpent),
      availableBalance: toNumber(totalContributed.minus(totalSpent)),
    };
  }
}

function toTransactionDto(record: TransactionRecord): TransactionDto {
  return {
    id: record.id,
    asset: record.asset,
    kind: record.kind,
    unitAmount: toNumber(record.unitAmount),
    unitPrice: toNumber(record.unitPrice),
    fee: toNumber(record.fee),
    totalCost: toNumber(record.totalCost),
    occurredAt: record.occurredAt.toISOString(),
    ...(record.notes !== undefined ? { notes: record.notes } : {}),
    recordedAt: record.recordedAt.toISOString(),
  };
}
