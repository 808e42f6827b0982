import { DailySummary, TimeSlotPerformance } from './entities/daily-summary.entity';
import { DayResult, WeeklySummary } from './entities/weekly-summary.entity';
import { TradingSummary } from './entities/trading-summary.entity';
import { TradingPeriod } from './entities/trading-period.entity';
import { AnalysisSnapshot } from './entities/analysis-snapshot.entity';
import {
  DailySummaryDto,
  DayResultDto,
  SnapshotInfoDto,
  SnapshotResponseDto,
  TimeSlotDto,
  TradingPeriodDto,
  TradingSummaryDto,
  WeeklySummaryDto,
} from './dto/summary-response.dto';
import { profitFactor } from './summary-metrics';
import { roundRatio, toNumber } from '../common/utils/decimal.util';
import { utcDateKey } from '../common/utils/date.util';

// Decimal -> number (8 places) and Date -> string for JSON responses.

function toDayResultDto(result: DayResult | null): DayResultDto | null {
  return result ? { date: utcDateKey(result.date), pnl: toNumber(result.pnl) } : null;
}

export function toTimeSlotDto(slot: TimeSlotPerformance): TimeSlotDto {
  return {
    hour: slot.hour,
    trades: slot.trades,
    pnl: toNumber(slot.pnl),
    winRate: roundRatio(slot.winRate),
  };
}

export function toDailySummaryDto(daily: DailySummary): DailySummaryDto {
  const factor = profitFactor(daily);
  return {
    date: utcDateKey(daily.date),
    totalTrades: daily.totalTrades,
    winningTrades: daily.winningTrades,
    losingTrades: daily.losingTrades,
    realizedPnl: toNumber(daily.realizedPnl),
    grossPnl: toNumber(daily.grossPnl),
    totalCommission: toNumber(daily.totalCommission),
    totalVolume: toNumber(daily.totalVolume),
    winRate: roundRatio(daily.winRate),
    avgWin: toNumber(daily.avgWin),
    avgLoss: toNumber(daily.avgLoss),
    largestWin: toNumber(daily.largestWin),
    largestLoss: toNumber(daily.largestLoss),
    profitFactor: factor ? toNumber(factor) : null,
    symbolsTraded: daily.symbolsTraded,
    timeSlotPerformance: daily.timeSlotPerformance.map(toTimeSlotDto),
  };
}

export function toWeeklySummaryDto(weekly: WeeklySummary): WeeklySummaryDto {
  const factor = profitFactor(weekly);
  return {
    year: weekly.year,
    weekNumber: weekly.weekNumber,
    startDate: weekly.startDate.toISOString(),
    endDate: weekly.endDate.toISOString(),
    totalTrades: weekly.totalTrades,
    winningTrades: weekly.winningTrades,
    losingTrades: weekly.losingTrades,
    realizedPnl: toNumber(weekly.realizedPnl),
    grossPnl: toNumber(weekly.grossPnl),
    totalCommission: toNumber(weekly.totalCommission),
    totalVolume: toNumber(weekly.totalVolume),
    winRate: roundRatio(weekly.winRate),
    avgWin: toNumber(weekly.avgWin),
    avgLoss: toNumber(weekly.avgLoss),
    largestWin: toNumber(weekly.largestWin),
    largestLoss: toNumber(weekly.largestLoss),
    profitFactor: factor ? toNumber(factor) : null,
    bestDay: toDayResultDto(weekly.bestDay),
    worstDay: toDayResultDto(weekly.worstDay),
    tradingDays: weekly.tradingDays,
    profitableDays: weekly.profitableDays,
    avgDailyPnl: toNumber(weekly.avgDailyPnl),
    symbolsTraded: weekly.symbolsTraded,
    days: weekly.dailySummaries.map((daily) => utcDateKey(daily.date)),
  };
}

export function toTradingSummaryDto(summary: TradingSummary): TradingSummaryDto {
  const { bestWeek, worstWeek, mostProfitableHour, leastProfitableHour } = summary;
  return {
    startDate: summary.startDate.toISOString(),
    endDate: summary.endDate.toISOString(),
    totalPnl: toNumber(summary.totalPnl),
    totalVolume: toNumber(summary.totalVolume),
    totalTrades: summary.totalTrades,
    overallWinRate: roundRatio(summary.overallWinRate),
    bestDay: toDayResultDto(summary.bestDay),
    worstDay: toDayResultDto(summary.worstDay),
    bestWeek: bestWeek ? { ...bestWeek, pnl: toNumber(bestWeek.pnl) } : null,
    worstWeek: worstWeek ? { ...worstWeek, pnl: toNumber(worstWeek.pnl) } : null,
    mostProfitableHour: mostProfitableHour
      ? { hour: mostProfitableHour.hour, pnl: toNumber(mostProfitableHour.pnl) }
      : null,
    leastProfitableHour: leastProfitableHour
      ? { hour: leastProfitableHour.hour, pnl: toNumber(leastProfitableHour.pnl) }
      : null,
    dailySummaries: summary.dailySummaries.map(toDailySummaryDto),
    weeklySummaries: summary.weeklySummaries.map(toWeeklySummaryDto),
  };
}

export function toTradingPeriodDto(period: TradingPeriod, index: number): TradingPeriodDto {
  return {
    rank: index + 1,
    name: period.name,
    startHour: period.startHour,
    endHour: period.endHour,
    totalTrades: period.totalTrades,
    totalPnl: toNumber(period.totalPnl),
    winRate: roundRatio(period.winRate),
    avgPnlPerTrade: toNumber(period.avgPnlPerTrade),
  };
}

export function toSnapshotInfoDto(snapshot: AnalysisSnapshot): SnapshotInfoDto {
  return {
    id: snapshot.id,
    analyzedAt: snapshot.analyzedAt.toISOString(),
    tradeCount: snapshot.tradeCount,
    sources: snapshot.sources,
    totalPnl: toNumber(snapshot.summary.totalPnl),
  };
}

export function toSnapshotResponseDto(snapshot: AnalysisSnapshot): SnapshotResponseDto {
  return {
    ...toSnapshotInfoDto(snapshot),
    summary: toTradingSummaryDto(snapshot.summary),
  };
}
