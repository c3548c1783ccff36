import Decimal from 'decimal.js';
import { ContributionBook } from './entities/contribution-record.entity';
import { ZERO, percentOf, sum } from '../common/utils/decimal.util';

// Pure ownership arithmetic over a loaded contribution book.
// `cutoff` restricts every total to records with occurredAt <= cutoff.

export function memberTotal(book: ContributionBook, memberId: string, cutoff?: Date): Decimal {
  const records = book[memberId] ?? [];
  return sum(
    records
      .filter((record) => cutoff === undefined || record.occurredAt <= cutoff)
      .map((record) => record.amount),
  );
}

export function poolTotal(book: ContributionBook, members: readonly string[], cutoff?: Date): Decimal {
  return members.reduce((total, memberId) => total.plus(memberTotal(book, memberId, cutoff)), ZERO);
}

/** 0..100; 0 for everyone while the pool is empty */
export function ownershipShare(
  book: ContributionBook,
  members: readonly string[],
  memberId: string,
  cutoff?: Date,
): Decimal {
  return percentOf(memberTotal(book, memberId, cutoff), poolTotal(book, members, cutoff));
}
