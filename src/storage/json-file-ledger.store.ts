import { Logger } from '@nestjs/common';
import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { ContributionBook } from '../contribution/entities/contribution-record.entity';
import { TransactionRecord } from '../transaction/entities/transaction-record.entity';
import { HoldingsMap } from '../portfolio/entities/holdings.entity';
import { LedgerStore } from './ledger.store';
import {
  decodeContributions,
  decodeHoldings,
  decodeTransactions,
  encodeContributions,
  encodeHoldings,
  encodeTransactions,
} from './ledger-document.codec';

export const CONTRIBUTIONS_FILE = 'contributions.json';
export const TRANSACTIONS_FILE = 'transactions.json';
export const HOLDINGS_FILE = 'holdings.json';

/**
 * One JSON document per collection under a data directory.
 * Writes go to a temp file first and are renamed over the target,
 * so a crash mid-save leaves the previous document intact.
 */
export class JsonFileLedgerStore extends LedgerStore {
  private readonly logger = new Logger(JsonFileLedgerStore.name);

  constructor(private readonly directory: string) {
    super();
    mkdirSync(directory, { recursive: true });
  }

  loadContributions(): ContributionBook {
    return this.load(CONTRIBUTIONS_FILE, decodeContributions, {});
  }

  saveContributions(book: ContributionBook): void {
    this.save(CONTRIBUTIONS_FILE, encodeContributions(book));
  }

  loadTransactions(): TransactionRecord[] {
    return this.load(TRANSACTIONS_FILE, decodeTransactions, []);
  }

  saveTransactions(records: readonly TransactionRecord[]): void {
    this.save(TRANSACTIONS_FILE, encodeTransactions(records));
  }

  loadHoldings(): HoldingsMap {
    return this.load(HOLDINGS_FILE, decodeHoldings, {});
  }

  saveHoldings(holdings: HoldingsMap): void {
    this.save(HOLDINGS_FILE, encodeHoldings(holdings));
  }

  // Missing file -> empty. Unreadable or malformed file -> empty, logged as corruption.
  private load<T>(fileName: string, decode: (raw: unknown) => T, empty: T): T {
    const path = join(this.directory, fileName);
    if (!existsSync(path)) {
      return empty;
    }

    try {
      return decode(JSON.parse(readFileSync(path, 'utf8')));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Corrupt ledger document ${path}, loading as empty: ${reason}`);
      return empty;
    }
  }

  private save(fileName: string, document: unknown): void {
    const path = join(this.directory, fileName);
    const tempPath = `${path}.${process.pid}.tmp`;
    try {
      writeFileSync(tempPath, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
      renameSync(tempPath, path);
    } catch (error) {
      rmSync(tempPath, { force: true });
      throw error;
    }
  }
}
