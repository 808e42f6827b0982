import { Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { TradeRecord } from '../trades/entities/trade-record.entity';
import { DailySummary } from './entities/daily-summary.entity';
import { HourResult, TradingSummary } from './entities/trading-summary.entity';
import { DailyAggregatorService } from './daily-aggregator.service';
import { WeeklyAggregatorService } from './weekly-aggregator.service';
import { assertValidTrade } from './trade-preconditions';
import { pickExtreme, winRate } from './summary-metrics';
import { groupBy } from '../common/utils/group-by';
import { utcDateKey } from '../common/utils/date.util';
import { ZERO, sum, toUSD } from '../common/utils/decimal.util';

// Entry point of the analytics engine: full trade set in, TradingSummary out.
// Recomputes everything on each call; holds no state between calls.
@Injectable()
export class TradingAnalyticsService {
  private readonly logger = new Logger(TradingAnalyticsService.name);

  constructor(
    private readonly dailyAggregator: DailyAggregatorService,
    private readonly weeklyAggregator: WeeklyAggregatorService,
  ) {}

  /**
   * Daily and weekly summaries plus overall totals and extremes.
   * Ties pick the earliest day, the earliest week and the lowest hour.
   * An empty trade set yields empty lists with start/end set to now.
   *
   * @throws BadRequestException if any trade fails the input preconditions
   */
  analyzeTrades(trades: readonly TradeRecord[]): TradingSummary {
    trades.forEach(assertValidTrade);

    const dailySummaries = Array.from(
      groupBy(trades, (trade) => utcDateKey(trade.executionTimestamp)).values(),
      (dayTrades) => this.dailyAggregator.summarizeDay(dayTrades[0].executionTimestamp, dayTrades),
    ).sort((a, b) => a.date.getTime() - b.date.getTime());

    const weeklySummaries = this.weeklyAggregator.summarizeWeeks(dailySummaries);

    const totalPnl = sum(dailySummaries.map((daily) => daily.realizedPnl));
    const totalVolume = sum(dailySummaries.map((daily) => daily.totalVolume));
    const totalTrades = dailySummaries.reduce((count, daily) => count + daily.totalTrades, 0);
    const totalWins = dailySummaries.reduce((count, daily) => count + daily.winningTrades, 0);

    const bestDay = pickExtreme(dailySummaries, (daily) => daily.realizedPnl, 'max');
    const worstDay = pickExtreme(dailySummaries, (daily) => daily.realizedPnl, 'min');
    const bestWeek = pickExtreme(weeklySummaries, (weekly) => weekly.realizedPnl, 'max');
    const worstWeek = pickExtreme(weeklySummaries, (weekly) => weekly.realizedPnl, 'min');

    const hourTotals = this.sumHourlyPnl(dailySummaries);
    const now = new Date();

    this.logger.debug(
      `Analyzed ${trades.length} trades over ${dailySummaries.length} days: $${toUSD(totalPnl)} realized`,
    );

    return {
      startDate: dailySummaries.length > 0 ? dailySummaries[0].date : now,
      endDate: dailySummaries.length > 0 ? dailySummaries[dailySummaries.length - 1].date : now,
      dailySummaries,
      weeklySummaries,
      totalPnl,
      totalVolume,
      totalTrades,
      overallWinRate: winRate(totalWins, totalTrades),
      bestDay: bestDay ? { date: bestDay.date, pnl: bestDay.realizedPnl } : null,
      worstDay: worstDay ? { date: worstDay.date, pnl: worstDay.realizedPnl } : null,
      bestWeek: bestWeek
        ? { year: bestWeek.year, weekNumber: bestWeek.weekNumber, pnl: bestWeek.realizedPnl }
        : null,
      worstWeek: worstWeek
        ? { year: worstWeek.year, weekNumber: worstWeek.weekNumber, pnl: worstWeek.realizedPnl }
        : null,
      mostProfitableHour: pickExtreme(hourTotals, (slot) => slot.pnl, 'max'),
      leastProfitableHour: pickExtreme(hourTotals, (slot) => slot.pnl, 'min'),
    };
  }

  // Each hour's P&L summed across every day, ascending by hour.
  private sumHourlyPnl(dailySummaries: readonly DailySummary[]): HourResult[] {
    const totals = new Map<number, Decimal>();
    for (const daily of dailySummaries) {
      for (const slot of daily.timeSlotPerformance) {
        totals.set(slot.hour, (totals.get(slot.hour) ?? ZERO).plus(slot.pnl));
      }
    }
    return Array.from(totals, ([hour, pnl]) => ({ hour, pnl })).sort((a, b) => a.hour - b.hour);
  }
}
