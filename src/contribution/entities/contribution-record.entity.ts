import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import { ValidationError } from '../../common/errors/ledger.errors';
import { assertValidDate, parseAmount } from '../../common/utils/ledger-input.util';

// One deposit into the pool by one member. Frozen once created.
export interface ContributionRecord {
  readonly id: string;
  readonly memberId: string;
  readonly amount: Decimal;        // > 0, reference currency
  readonly occurredAt: Date;       // may be backdated
  readonly recordedAt: Date;
}

// member id -> that member's records in append order
export type ContributionBook = Record<string, readonly ContributionRecord[]>;

export interface NewContribution {
  memberId: string;
  amount: Decimal.Value;
  occurredAt?: Date;
  recordedAt?: Date;
  id?: string;
}

/**
 * Builds a validated, frozen contribution.
 * @throws ValidationError when the amount is not a positive decimal
 */
export function createContributionRecord(input: NewContribution): ContributionRecord {
  const amount = parseAmount(input.amount, 'Contribution amount');
  if (amount.lessThanOrEqualTo(0)) {
    throw new ValidationError(`Contribution amount must be positive, got ${amount.toString()}`);
  }

  const recordedAt = input.recordedAt ?? new Date();
  return Object.freeze({
    id: input.id ?? uuidv4(),
    memberId: input.memberId,
    amount,
    occurredAt: assertValidDate(input.occurredAt ?? recordedAt, 'Contribution date'),
    recordedAt,
  });
}
