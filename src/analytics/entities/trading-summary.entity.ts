import Decimal from 'decimal.js';
import { DailySummary } from './daily-summary.entity';
import { DayResult, WeeklySummary } from './weekly-summary.entity';

export interface WeekResult {
  year: number;
  weekNumber: number;
  pnl: Decimal;
}

export interface HourResult {
  hour: number;
  pnl: Decimal;           // summed across every day
}

// Full analysis of a trade set.
export interface TradingSummary {
  startDate: Date;
  endDate: Date;
  dailySummaries: DailySummary[];     // date ascending
  weeklySummaries: WeeklySummary[];   // week start ascending
  totalPnl: Decimal;
  totalVolume: Decimal;
  totalTrades: number;
  overallWinRate: number;
  bestDay: DayResult | null;
  worstDay: DayResult | null;
  bestWeek: WeekResult | null;
  worstWeek: WeekResult | null;
  mostProfitableHour: HourResult | null;
  leastProfitableHour: HourResult | null;
}
