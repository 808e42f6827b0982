import Decimal from 'decimal.js';

// Activity of one hour-of-day bucket within a day.
export interface TimeSlotPerformance {
  hour: number;           // 0-23 UTC
  trades: number;         // fills in the hour, matched or not
  pnl: Decimal;           // round-trips closed in the hour, each net of its closing commission
  winRate: number;        // wins / (wins + losses) x 100
}

// Performance of one UTC calendar day.
// grossPnl == realizedPnl + totalCommission
// totalTrades == winningTrades + losingTrades (flat round-trips count toward neither)
export interface DailySummary {
  date: Date;                     // UTC midnight
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  realizedPnl: Decimal;           // net of every commission paid that day
  grossPnl: Decimal;
  totalCommission: Decimal;
  totalVolume: Decimal;           // sum of quantity x fill price, both legs
  winRate: number;
  avgWin: Decimal;
  avgLoss: Decimal;               // negative or 0
  largestWin: Decimal;
  largestLoss: Decimal;           // most negative round-trip, or 0
  symbolsTraded: string[];        // sorted
  timeSlotPerformance: TimeSlotPerformance[];
}
