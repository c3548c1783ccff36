import { Injectable } from '@nestjs/common';
import { ContributionBook } from '../contribution/entities/contribution-record.entity';
import { TransactionRecord } from '../transaction/entities/transaction-record.entity';
import { HoldingsMap } from '../portfolio/entities/holdings.entity';
import { LedgerStore, copyBook } from './ledger.store';

// Process-local store. Records are frozen so only the containers are copied.
@Injectable()
export class InMemoryLedgerStore extends LedgerStore {
  private contributions: ContributionBook = {};
  private transactions: TransactionRecord[] = [];
  private holdings: HoldingsMap = {};

  loadContributions(): ContributionBook {
    return copyBook(this.contributions);
  }

  saveContributions(book: ContributionBook): void {
    this.contributions = copyBook(book);
  }

  loadTransactions(): TransactionRecord[] {
    return [...this.transactions];
  }

  saveTransactions(records: readonly TransactionRecord[]): void {
    this.transactions = [...records];
  }

  loadHoldings(): HoldingsMap {
    return { ...this.holdings };
  }

  saveHoldings(holdings: HoldingsMap): void {
    this.holdings = { ...holdings };
  }

  /** Nukes all collections - test harness only */
  clear(): void {
    this.contributions = {};
    this.transactions = [];
    this.holdings = {};
  }
}
