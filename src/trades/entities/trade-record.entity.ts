import Decimal from 'decimal.js';

export enum TradeSide {
  BUY = 'buy',
  SELL = 'sell',
}

// Executed fill with Decimal precision for financial values.
// The analytics engine consumes these already parsed and deduplicated.
export interface TradeRecord {
  symbol: string;             // AAPL, TSLA, etc.
  side: TradeSide;
  quantity: Decimal;          // > 0
  fillPrice: Decimal;
  executionTimestamp: Date;   // UTC, second precision
  netAmount: Decimal;         // signed cash effect of this fill as reported by the broker
  commission: Decimal;        // >= 0
}

// Trade as held by the trade store.
export interface StoredTrade extends TradeRecord {
  id: string;                 // internal UUID
  source?: string;            // import file name, if imported
  createdAt: Date;
}

/**
 * Identity used for deduplication: symbol, side, quantity, fill price, timestamp.
 * Net amount and commission are deliberately left out.
 */
export function tradeIdentityKey(trade: TradeRecord): string {
  return [
    trade.symbol,
    trade.side,
    trade.quantity.toString(),
    trade.fillPrice.toString(),
    trade.executionTimestamp.getTime(),
  ].join('|');
}

/** Signed cash result of the fill before commission: buys pay, sells receive. */
export function tradeGrossPnl(trade: TradeRecord): Decimal {
  return trade.side === TradeSide.BUY ? trade.netAmount.negated() : trade.netAmount;
}

/** Gross cash result net of the fill's own commission. */
export function tradeNetPnl(trade: TradeRecord): Decimal {
  return tradeGrossPnl(trade).minus(trade.commission);
}
