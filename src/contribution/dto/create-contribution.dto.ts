import { IsDateString, IsNotEmpty, IsNumber, IsOptional, IsPositive, IsString } from 'class-validator';

// DTO for one member's deposit into the pool.
export class CreateContributionDto {
  @IsString()
  @IsNotEmpty()
  memberId!: string;

  @IsNumber()
  @IsPositive()
  amount!: number;

  @IsOptional()
  @IsDateString()
  occurredAt?: string;             // defaults to now; may be backdated
}

// Same deposit for every member at once. Amount defaults to the configured weekly amount.
export class CreateBulkContributionDto {
  @IsOptional()
  @IsNumber()
  @IsPositive()
  amount?: number;

  @IsOptional()
  @IsDateString()
  occurredAt?: string;
}
