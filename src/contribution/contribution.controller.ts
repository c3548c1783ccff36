import { Body, Controller, Get, HttpCode, HttpStatus, Post, Query } from '@nestjs/common';
import { parseISO } from 'date-fns';
import { ContributionLedgerService } from './contribution-ledger.service';
import { CreateBulkContributionDto, CreateContributionDto } from './dto/create-contribution.dto';
import { ContributionDto, OwnershipResponseDto } from './dto/contribution-response.dto';
import { ContributionRecord } from './entities/contribution-record.entity';
import { sum, toNumber } from '../common/utils/decimal.util';

@Controller('contributions')
export class ContributionController {
  constructor(private readonly ledger: ContributionLedgerService) {}

  /**
   * Records one member's deposit.
   *
   * POST /contributions
   * @returns 201 with the stored record
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  addContribution(@Body() dto: CreateContributionDto): ContributionDto {
    const occurredAt = dto.occurredAt !== undefined ? parseISO(dto.occurredAt) : undefined;
    return toContributionDto(this.ledger.recordContribution(dto.memberId, dto.amount, occurredAt));
  }

  /**
   * Records the same deposit for every member.
   *
   * POST /contributions/all
   */
  @Post('all')
  @HttpCode(HttpStatus.CREATED)
  addContributionForAll(@Body() dto: CreateBulkContributionDto): ContributionDto[] {
    const occurredAt = dto.occurredAt !== undefined ? parseISO(dto.occurredAt) : undefined;
    return this.ledger.recordContributionForAllMembers(dto.amount, occurredAt).map(toContributionDto);
  }

  /**
   * Contribution history, newest first.
   *
   * GET /contributions?member=Alice
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  getContributions(@Query('member') member?: string): ContributionDto[] {
    return this.ledger.getContributions(member).map(toContributionDto);
  }

  /**
   * Ownership percentage per member.
   *
   * GET /contributions/ownership
   */
  @Get('ownership')
  @HttpCode(HttpStatus.OK)
  getOwnership(): OwnershipResponseDto {
    const table = this.ledger.ownershipTable();
    return {
      totalPool: toNumber(sum(table.map((row) => row.contributed))),
      members: table.map((row) => ({
        memberId: row.memberId,
        contributed: toNumber(row.contributed),
        ownershipPct: toNumber(row.ownershipPct),
      })),
    };
  }
}

function toContributionDto(record: ContributionRecord): ContributionDto {
  return {
    id: record.id,
    memberId: record.memberId,
    amount: toNumber(record.amount),
    occurredAt: record.occurredAt.toISOString(),
    recordedAt: record.recordedAt.toISOString(),
  };
}
