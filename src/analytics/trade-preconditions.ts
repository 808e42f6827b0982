import { BadRequestException } from '@nestjs/common';
import { TradeRecord, TradeSide } from '../trades/entities/trade-record.entity';

const SIDES: readonly string[] = Object.values(TradeSide);

/**
 * Fails fast on a fill that upstream validation should have rejected.
 * @throws BadRequestException naming the offending field
 */
export function assertValidTrade(trade: TradeRecord): void {
  const label = trade.symbol ? `${trade.symbol} trade` : 'Trade';

  if (!trade.symbol || trade.symbol.trim() === '') {
    throw new BadRequestException('Trade symbol must not be empty');
  }
  if (!SIDES.includes(trade.side)) {
    throw new BadRequestException(`${label} has unknown side: ${String(trade.side)}`);
  }
  if (!trade.quantity.isFinite() || !trade.quantity.greaterThan(0)) {
    throw new BadRequestException(`${label} quantity must be positive, got ${trade.quantity.toString()}`);
  }
  if (!trade.fillPrice.isFinite() || trade.fillPrice.isNegative()) {
    throw new BadRequestException(`${label} fill price must be non-negative, got ${trade.fillPrice.toString()}`);
  }
  if (!trade.commission.isFinite() || trade.commission.isNegative()) {
    throw new BadRequestException(`${label} commission must be non-negative, got ${trade.commission.toString()}`);
  }
  if (!trade.netAmount.isFinite()) {
    throw new BadRequestException(`${label} net amount must be finite, got ${trade.netAmount.toString()}`);
  }
  if (Number.isNaN(trade.executionTimestamp.getTime())) {
    throw new BadRequestException(`${label} has an invalid execution timestamp`);
  }
}
