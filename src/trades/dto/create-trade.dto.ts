import { IsEnum, IsISO8601, IsNotEmpty, IsNumberString, IsOptional, IsString } from 'class-validator';
import { TradeSide } from '../entities/trade-record.entity';

// DTO for recording a fill that's already executed.
// Amounts are decimal strings so no precision is lost in transit.
export class CreateTradeDto {
  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @IsEnum(TradeSide)
  side!: TradeSide;

  @IsNumberString()
  quantity!: string;

  @IsNumberString()
  fillPrice!: string;

  @IsISO8601({ strict: true })
  executionTimestamp!: string;

  @IsNumberString()
  netAmount!: string;

  @IsOptional()
  @IsNumberString()
  commission?: string;
}
