import { isValid, parseISO } from 'date-fns';
import { z } from 'zod';
import {
  ContributionBook,
  ContributionRecord,
  createContributionRecord,
} from '../contribution/entities/contribution-record.entity';
import {
  TransactionKind,
  TransactionRecord,
  createPurchaseRecord,
} from '../transaction/entities/transaction-record.entity';
import { HoldingsMap } from '../portfolio/entities/holdings.entity';
import { parseAmount } from '../common/utils/ledger-input.util';

// On-disk shapes. Decimals are written as strings so no precision is lost;
// numbers are accepted on read for hand-edited documents.

const decimalValue = z.union([z.string(), z.number()]);

const isoDate = z.string().transform((raw, ctx) => {
  const date = parseISO(raw);
  if (!isValid(date)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid date "${raw}"` });
    return z.NEVER;
  }
  return date;
});

const contributionSchema = z.object({
  id: z.string().min(1),
  amount: decimalValue,
  occurredAt: isoDate,
  recordedAt: isoDate,
});

const transactionSchema = z.object({
  id: z.string().min(1),
  asset: z.string(),
  kind: z.nativeEnum(TransactionKind),
  unitAmount: decimalValue,
  unitPrice: decimalValue,
  fee: decimalValue.default(0),
  totalCost: decimalValue.optional(), // informational, recomputed on load
  occurredAt: isoDate,
  notes: z.string().optional(),
  recordedAt: isoDate,
});

export const contributionsDocumentSchema = z.record(z.array(contributionSchema));
export const transactionsDocumentSchema = z.array(transactionSchema);
export const holdingsDocumentSchema = z.record(decimalValue);

export type ContributionsDocument = z.input<typeof contributionsDocumentSchema>;
export type TransactionsDocument = z.input<typeof transactionsDocumentSchema>;
export type HoldingsDocument = z.input<typeof holdingsDocumentSchema>;

// Decoders throw (ZodError or ValidationError) on malformed input; the store decides what to do.

export function decodeContributions(raw: unknown): ContributionBook {
  const document = contributionsDocumentSchema.parse(raw);
  const book: Record<string, ContributionRecord[]> = {};
  for (const [memberId, entries] of Object.entries(document)) {
    book[memberId] = entries.map((entry) => createContributionRecord({ memberId, ...entry }));
  }
  return book;
}

export function decodeTransactions(raw: unknown): TransactionRecord[] {
  return transactionsDocumentSchema.parse(raw).map((entry) => createPurchaseRecord(entry));
}

export function decodeHoldings(raw: unknown): HoldingsMap {
  const holdings: HoldingsMap = {};
  for (const [asset, value] of Object.entries(holdingsDocumentSchema.parse(raw))) {
    const quantity = parseAmount(value, `Holding ${asset}`);
    if (quantity.lessThan(0)) {
      throw new RangeError(`Holding ${asset} is negative: ${quantity.toString()}`);
    }
    holdings[asset] = quantity;
  }
  return holdings;
}

export function encodeContributions(book: ContributionBook): ContributionsDocument {
  const document: ContributionsDocument = {};
  for (const [memberId, records] of Object.entries(book)) {
    document[memberId] = records.map((record) => ({
      id: record.id,
      amount: record.amount.toString(),
      occurredAt: record.occurredAt.toISOString(),
      recordedAt: record.recordedAt.toISOString(),
    }));
  }
  return document;
}

export function encodeTransactions(records: readonly TransactionRecord[]): TransactionsDocument {
  return records.map((record) => ({
    id: record.id,
    asset: record.asset,
    kind: record.kind,
    unitAmount: record.unitAmount.toString(),
    unitPrice: record.unitPrice.toString(),
    fee: record.fee.toString(),
    totalCost: record.totalCost.toString(),
    occurredAt: record.occurredAt.toISOString(),
    ...(record.notes !== undefined ? { notes: record.notes } : {}),
    recordedAt: record.recordedAt.toISOString(),
  }));
}

export function encodeHoldings(holdings: HoldingsMap): HoldingsDocument {
  return Object.fromEntries(
    Object.entries(holdings).map(([asset, quantity]) => [asset, quantity.toString()]),
  );
}
