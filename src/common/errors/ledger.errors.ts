import { BadRequestException, UnprocessableEntityException } from '@nestjs/common';
import Decimal from 'decimal.js';

// Malformed input to a ledger mutation. Raised before anything is written.
export class ValidationError extends BadRequestException {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// Purchase would overspend the pool. The transaction is never appended.
export class InsufficientBalanceError extends UnprocessableEntityException {
  constructor(
    readonly required: Decimal,
    readonly available: Decimal,
  ) {
    super(
      `Insufficient balance. Available: ${available.toString()}, Required: ${required.toString()}`,
    );
    this.name = 'InsufficientBalanceError';
  }
}
