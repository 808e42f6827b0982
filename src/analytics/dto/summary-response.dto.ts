// Hour-of-day bucket of a day
export interface TimeSlotDto {
  hour: number;
  trades: number;
  pnl: number;
  winRate: number;
}

// One UTC trading day
export interface DailySummaryDto {
  date: string;                    // yyyy-MM-dd
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  realizedPnl: number;             // net of commission
  grossPnl: number;
  totalCommission: number;
  totalVolume: number;
  winRate: number;
  avgWin: number;
  avgLoss: number;
  largestWin: number;
  largestLoss: number;
  profitFactor: number | null;     // null when nothing was lost
  symbolsTraded: string[];
  timeSlotPerformance: TimeSlotDto[];
}

export interface DayResultDto {
  date: string;
  pnl: number;
}

// One ISO week, Monday to Sunday
export interface WeeklySummaryDto {
  year: number;
  weekNumber: number;
  startDate: string;               // ISO timestamps
  endDate: string;
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  realizedPnl: number;
  grossPnl: number;
  totalCommission: number;
  totalVolume: number;
  winRate: number;
  avgWin: number;
  avgLoss: number;
  largestWin: number;
  largestLoss: number;
  profitFactor: number | null;
  bestDay: DayResultDto | null;
  worstDay: DayResultDto | null;
  tradingDays: number;
  profitableDays: number;
  avgDailyPnl: number;
  symbolsTraded: string[];
  days: string[];                  // dates of the contained daily summaries
}

// Whole analyzed period
export interface TradingSummaryDto {
  startDate: string;
  endDate: string;
  totalPnl: number;
  totalVolume: number;
  totalTrades: number;
  overallWinRate: number;
  bestDay: DayResultDto | null;
  worstDay: DayResultDto | null;
  bestWeek: { year: number; weekNumber: number; pnl: number } | null;
  worstWeek: { year: number; weekNumber: number; pnl: number } | null;
  mostProfitableHour: { hour: number; pnl: number } | null;
  leastProfitableHour: { hour: number; pnl: number } | null;
  dailySummaries: DailySummaryDto[];
  weeklySummaries: WeeklySummaryDto[];
}

// Named time-of-day window, ranked by P&L
export interface TradingPeriodDto {
  rank: number;                    // 1 = best
  name: string;
  startHour: number;
  endHour: number;
  totalTrades: number;
  totalPnl: number;
  winRate: number;
  avgPnlPerTrade: number;
}

// Snapshot metadata
export interface SnapshotInfoDto {
  id: string;
  analyzedAt: string;
  tradeCount: number;
  sources: string[];
  totalPnl: number;
}

export interface SnapshotResponseDto extends SnapshotInfoDto {
  summary: TradingSummaryDto;
}
