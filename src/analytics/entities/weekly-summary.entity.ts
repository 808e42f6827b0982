import Decimal from 'decimal.js';
import { DailySummary } from './daily-summary.entity';

export interface DayResult {
  date: Date;
  pnl: Decimal;
}

// Daily summaries of one ISO week folded together.
// Every aggregate is reproducible from dailySummaries.
export interface WeeklySummary {
  weekNumber: number;
  year: number;                   // ISO week-numbering year
  startDate: Date;                // Monday 00:00:00 UTC
  endDate: Date;                  // Sunday 23:59:59 UTC
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  realizedPnl: Decimal;
  grossPnl: Decimal;
  totalCommission: Decimal;
  totalVolume: Decimal;
  winRate: number;
  avgWin: Decimal;                // weighted by each day's winning trade count
  avgLoss: Decimal;               // weighted by each day's losing trade count
  largestWin: Decimal;
  largestLoss: Decimal;
  bestDay: DayResult | null;
  worstDay: DayResult | null;
  tradingDays: number;
  profitableDays: number;
  avgDailyPnl: Decimal;
  symbolsTraded: string[];
  dailySummaries: DailySummary[];
}
