import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import { ValidationError } from '../../common/errors/ledger.errors';
import { assertValidDate, parseAmount } from '../../common/utils/ledger-input.util';

export enum TransactionKind {
  BUY = 'buy',
}

// Purchase of an asset against the pool balance. Frozen once created.
export interface TransactionRecord {
  readonly id: string;
  readonly asset: string;          // upper-cased symbol, e.g. BTC
  readonly kind: TransactionKind;
  readonly unitAmount: Decimal;    // quantity bought, > 0
  readonly unitPrice: Decimal;     // price per unit, > 0
  readonly fee: Decimal;           // >= 0
  readonly totalCost: Decimal;     // unitAmount × unitPrice + fee
  readonly occurredAt: Date;       // purchase date, may be backdated
  readonly notes?: string;
  readonly recordedAt: Date;
}

export interface NewPurchase {
  asset: string;
  unitAmount: Decimal.Value;
  unitPrice: Decimal.Value;
  fee?: Decimal.Value;
  occurredAt?: Date;
  notes?: string;
  recordedAt?: Date;
  id?: string;
}

export function normalizeAsset(asset: string): string {
  return asset.trim().toUpperCase();
}

/**
 * Builds a validated, frozen buy record with its total cost.
 * @throws ValidationError for an empty asset, non-positive amount or price, or negative fee
 */
export function createPurchaseRecord(input: NewPurchase): TransactionRecord {
  const asset = normalizeAsset(input.asset);
  if (asset.length === 0) {
    throw new ValidationError('Asset symbol must not be empty');
  }

  const unitAmount = parseAmount(input.unitAmount, 'Unit amount');
  if (unitAmount.lessThanOrEqualTo(0)) {
    throw new ValidationError(`Unit amount must be positive, got ${unitAmount.toString()}`);
  }

  const unitPrice = parseAmount(input.unitPrice, 'Unit price');
  if (unitPrice.lessThanOrEqualTo(0)) {
    throw new ValidationError(`Unit price must be positive, got ${unitPrice.toString()}`);
  }

  const fee = parseAmount(input.fee ?? 0, 'Fee');
  if (fee.lessThan(0)) {
    throw new ValidationError(`Fee must not be negative, got ${fee.toString()}`);
  }

  const recordedAt = input.recordedAt ?? new Date();
  const notes = input.notes?.trim();

  return Object.freeze({
    id: input.id ?? uuidv4(),
    asset,
    kind: TransactionKind.BUY,
    unitAmount,
    unitPrice,
    fee,
    totalCost: unitAmount.times(unitPrice).plus(fee),
    occurredAt: assertValidDate(input.occurredAt ?? recordedAt, 'Purchase date'),
    ...(notes ? { notes } : {}),
    recordedAt,
  });
}
