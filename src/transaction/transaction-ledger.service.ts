import { Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { LedgerStore } from '../storage/ledger.store';
import { ContributionLedgerService } from '../contribution/contribution-ledger.service';
import { NewPurchase, TransactionRecord, createPurchaseRecord, normalizeAsset } from './entities/transaction-record.entity';
import { InsufficientBalanceError } from '../common/errors/ledger.errors';
import { ZERO, sum } from '../common/utils/decimal.util';

export type HistorySortKey = 'occurredAt' | 'recordedAt';
export type SortOrder = 'asc' | 'desc';

export interface HistoryOptions {
  sortBy?: HistorySortKey;
  order?: SortOrder;
  asset?: string;
}

export type PurchaseInput = Omit<NewPurchase, 'id' | 'recordedAt'>;

// Purchase recording against the pool balance.
// Appending a purchase is the only path that changes holdings.
@Injectable()
export class TransactionLedgerService {
  private readonly logger = new Logger(TransactionLedgerService.name);

  constructor(
    private readonly store: LedgerStore,
    private readonly contributions: ContributionLedgerService,
  ) {}

  /**
   * Records a buy and adds its quantity to holdings.
   * The balance check and the append are not atomic; single writer assumed.
   * @throws ValidationError for malformed input
   * @throws InsufficientBalanceError when total cost exceeds the available balance
   */
  recordPurchase(input: PurchaseInput): TransactionRecord {
    const record = createPurchaseRecord(input);

    const transactions = this.store.loadTransactions();
    const available = this.contributions.totalPool().minus(this.spentBy(transactions));
    if (record.totalCost.greaterThan(available)) {
      throw new InsufficientBalanceError(record.totalCost, available);
    }

    const holdings = this.store.loadHoldings();
    this.store.saveTransactions([...transactions, record]);
    this.store.saveHoldings({
      ...holdings,
      [record.asset]: (holdings[record.asset] ?? ZERO).plus(record.unitAmount),
    });

    this.logger.log(
      `Recorded purchase of ${record.unitAmount.toString()} ${record.asset} for ${record.totalCost.toString()}`,
    );
    return record;
  }

  /**
   * Total pool minus everything spent.
   * Not clamped: a negative value is an anomaly for callers to report.
   */
  availableBalance(): Decimal {
    return this.contributions.totalPool().minus(this.totalSpent());
  }

  totalSpent(): Decimal {
    return this.spentBy(this.store.loadTransactions());
  }

  /** Fresh sorted copy on every call; equal keys keep append order */
  history(options: HistoryOptions = {}): TransactionRecord[] {
    const { sortBy = 'recordedAt', order = 'desc' } = options;
    const direction = order === 'asc' ? 1 : -1;

    let records = this.store.loadTransactions();
    if (options.asset !== undefined) {
      const asset = normalizeAsset(options.asset);
      records = records.filter((record) => record.asset === asset);
    }

    return records
      .map((record, index) => ({ record, index }))
      .sort((a, b) => {
        const diff = a.record[sortBy].getTime() - b.record[sortBy].getTime();
        return diff !== 0 ? diff * direction : a.index - b.index;
      })
      .map(({ record }) => record);
  }

  private spentBy(transactions: readonly TransactionRecord[]): Decimal {
    return sum(transactions.map((record) => record.totalCost));
  }
}
