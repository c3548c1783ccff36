import {
  IsDateString,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';

// DTO for recording a crypto purchase paid from the pool.
export class CreatePurchaseDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(10)
  asset!: string;                  // case-insensitive, stored upper-cased

  @IsNumber()
  @IsPositive()
  unitAmount!: number;

  @IsNumber()
  @IsPositive()
  unitPrice!: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  fee?: number;

  @IsOptional()
  @IsDateString()
  occurredAt?: string;             // purchase date, may be backdated

  @IsOptional()
  @IsString()
  @MaxLength(500)
  notes?: string;
}
