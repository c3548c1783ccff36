import { ContributionBook, ContributionRecord } from '../contribution/entities/contribution-record.entity';
import { TransactionRecord } from '../transaction/entities/transaction-record.entity';
import { HoldingsMap } from '../portfolio/entities/holdings.entity';

// Whole-document repository for the three ledger collections.
// Loads never throw: a missing or unreadable document loads as empty.
// Saves replace the whole document.
export abstract class LedgerStore {
  abstract loadContributions(): ContributionBook;
  abstract saveContributions(book: ContributionBook): void;

  abstract loadTransactions(): TransactionRecord[];
  abstract saveTransactions(records: readonly TransactionRecord[]): void;

  abstract loadHoldings(): HoldingsMap;
  abstract saveHoldings(holdings: HoldingsMap): void;
}

/** Copies the book so callers can append without touching stored arrays. */
export function copyBook(book: ContributionBook): Record<string, ContributionRecord[]> {
  const copy: Record<string, ContributionRecord[]> = {};
  for (const [memberId, records] of Object.entries(book)) {
    copy[memberId] = [...records];
  }
  return copy;
}
