import Decimal from 'decimal.js';

// Named wall-clock window, end hour exclusive.
export interface TradingWindow {
  name: string;
  startHour: number;
  endHour: number;
}

export interface TradingPeriod extends TradingWindow {
  totalTrades: number;
  totalPnl: Decimal;
  winRate: number;
  avgPnlPerTrade: Decimal;
}
