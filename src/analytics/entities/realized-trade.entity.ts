import Decimal from 'decimal.js';

// One closed round-trip portion produced by position matching.
export interface RealizedTrade {
  symbol: string;
  quantity: Decimal;      // closed quantity
  entryPrice: Decimal;    // average price of the position being closed
  exitPrice: Decimal;     // fill price of the closing trade
  pnl: Decimal;           // price difference x quantity, before commission
  commission: Decimal;    // commission of the closing fill
  closedAt: Date;
}
