import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { LedgerStore } from '../storage/ledger.store';
import { MemberRegistry } from './member-registry.service';
import {
  ContributionBook,
  ContributionRecord,
  createContributionRecord,
} from './entities/contribution-record.entity';
import { memberTotal, ownershipShare, poolTotal } from './contribution-math';
import { ValidationError } from '../common/errors/ledger.errors';
import { POOL_CONFIG, PoolConfig } from '../config/pool.config';

export interface MemberOwnership {
  memberId: string;
  contributed: Decimal;
  ownershipPct: Decimal;
}

// Append-only member deposits and the ownership they buy.
// Each mutation is load -> append -> save against the store (single writer).
@Injectable()
export class ContributionLedgerService {
  private readonly logger = new Logger(ContributionLedgerService.name);

  constructor(
    private readonly store: LedgerStore,
    private readonly registry: MemberRegistry,
    @Inject(POOL_CONFIG) private readonly config: PoolConfig,
  ) {}

  /**
   * Appends one deposit for a registered member.
   * @throws ValidationError for an unknown member or a non-positive amount
   */
  recordContribution(memberId: string, amount: Decimal.Value, occurredAt?: Date): ContributionRecord {
    this.assertMember(memberId);
    const record = createContributionRecord({ memberId, amount, occurredAt });

    const book = this.store.loadContributions();
    this.store.saveContributions({ ...book, [memberId]: [...(book[memberId] ?? []), record] });

    this.logger.log(`Recorded contribution ${record.amount.toString()} for ${memberId}`);
    return record;
  }

  /**
   * Appends the same deposit for every member in a single save.
   * Validation happens before anything is written, so it is all or nothing.
   */
  recordContributionForAllMembers(
    amount: Decimal.Value = this.config.weeklyContribution,
    occurredAt?: Date,
  ): ContributionRecord[] {
    const recordedAt = new Date();
    const records = this.registry
      .list()
      .map((memberId) => createContributionRecord({ memberId, amount, occurredAt, recordedAt }));

    const book: ContributionBook = { ...this.store.loadContributions() };
    for (const record of records) {
      book[record.memberId] = [...(book[record.memberId] ?? []), record];
    }
    this.store.saveContributions(book);

    this.logger.log(`Recorded contribution of ${String(amount)} for all ${records.length} members`);
    return records;
  }

  /** Consistent view of every member's records for pure calculations */
  getBook(): ContributionBook {
    return this.store.loadContributions();
  }

  /** Newest first by recordedAt; registry members only */
  getContributions(memberId?: string): ContributionRecord[] {
    const book = this.store.loadContributions();
    const members = memberId !== undefined ? [memberId] : this.registry.list();
    return members
      .flatMap((member) => book[member] ?? [])
      .sort((a, b) => b.recordedAt.getTime() - a.recordedAt.getTime());
  }

  totalContributed(memberId: string): Decimal {
    return memberTotal(this.store.loadContributions(), memberId);
  }

  totalPool(): Decimal {
    return poolTotal(this.store.loadContributions(), this.registry.list());
  }

  ownershipPercentage(memberId: string): Decimal {
    return ownershipShare(this.store.loadContributions(), this.registry.list(), memberId);
  }

  /** Every member in registry order, computed from one load */
  ownershipTable(book: ContributionBook = this.store.loadContributions()): MemberOwnership[] {
    const members = this.registry.list();
    return members.map((memberId) => ({
      memberId,
      contributed: memberTotal(book, memberId),
      ownershipPct: ownershipShare(book, members, memberId),
    }));
  }

  private assertMember(memberId: string): void {
    if (!this.registry.has(memberId)) {
      throw new ValidationError(`Unknown member: ${memberId}`);
    }
  }
}
