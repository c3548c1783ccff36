import Decimal from 'decimal.js';
import { isValid } from 'date-fns';
import { ValidationError } from '../errors/ledger.errors';
import { toDecimal } from './decimal.util';

/**
 * Parses a number-like ledger input into a finite Decimal.
 * @throws ValidationError naming the field when the value is not a number
 */
export function parseAmount(value: Decimal.Value, field: string): Decimal {
  let amount: Decimal;
  try {
    amount = toDecimal(value);
  } catch {
    throw new ValidationError(`${field} must be a number, got ${String(value)}`);
  }
  if (!amount.isFinite()) {
    throw new ValidationError(`${field} must be finite, got ${amount.toString()}`);
  }
  return amount;
}

/** @throws ValidationError for an Invalid Date */
export function assertValidDate(value: Date, field: string): Date {
  if (!isValid(value)) {
    throw new ValidationError(`${field} is not a valid date`);
  }
  return value;
}
