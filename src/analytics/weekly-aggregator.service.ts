import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { DailySummary } from './entities/daily-summary.entity';
import { WeeklySummary } from './entities/weekly-summary.entity';
import { pickExtreme, winRate } from './summary-metrics';
import { groupBy } from '../common/utils/group-by';
import { IsoWeek, isoWeekOf } from '../common/utils/date.util';
import { ZERO, divideOrZero } from '../common/utils/decimal.util';

// Rolls daily summaries up into ISO weeks. Pure arithmetic over the daily
// figures; trades are never re-matched.
@Injectable()
export class WeeklyAggregatorService {
  /** One summary per ISO week present, ascending by week start. */
  summarizeWeeks(dailySummaries: readonly DailySummary[]): WeeklySummary[] {
    const byWeek = groupBy(dailySummaries, (daily) => {
      const { weekYear, weekNumber } = isoWeekOf(daily.date);
      return `${weekYear}-W${weekNumber}`;
    });

    return Array.from(byWeek.values())
      .map((days) => this.foldWeek(isoWeekOf(days[0].date), days))
      .sort((a, b) => a.startDate.getTime() - b.startDate.getTime());
  }

  /**
   * Folds the days of one week.
   * avgWin/avgLoss are weighted by each day's win/loss count, not a plain
   * mean of the daily averages.
   */
  foldWeek(week: IsoWeek, dailySummaries: readonly DailySummary[]): WeeklySummary {
    const days = [...dailySummaries].sort((a, b) => a.date.getTime() - b.date.getTime());

    let totalTrades = 0;
    let winningTrades = 0;
    let losingTrades = 0;
    let realizedPnl: Decimal = ZERO;
    let grossPnl: Decimal = ZERO;
    let totalCommission: Decimal = ZERO;
    let totalVolume: Decimal = ZERO;
    let totalWinsAmount: Decimal = ZERO;
    let totalLossesAmount: Decimal = ZERO;
    let largestWin: Decimal = ZERO;
    let largestLoss: Decimal = ZERO;
    const symbols = new Set<string>();

    for (const daily of days) {
      totalTrades += daily.totalTrades;
      winningTrades += daily.winningTrades;
      losingTrades += daily.losingTrades;
      realizedPnl = realizedPnl.plus(daily.realizedPnl);
      grossPnl = grossPnl.plus(daily.grossPnl);
      totalCommission = totalCommission.plus(daily.totalCommission);
      totalVolume = totalVolume.plus(daily.totalVolume);

      totalWinsAmount = totalWinsAmount.plus(daily.avgWin.times(daily.winningTrades));
      totalLossesAmount = totalLossesAmount.plus(daily.avgLoss.times(daily.losingTrades));

      largestWin = Decimal.max(largestWin, daily.largestWin);
      largestLoss = Decimal.min(largestLoss, daily.largestLoss);
      daily.symbolsTraded.forEach((symbol) => symbols.add(symbol));
    }

    const best = pickExtreme(days, (daily) => daily.realizedPnl, 'max');
    const worst = pickExtreme(days, (daily) => daily.realizedPnl, 'min');

    return {
      weekNumber: week.weekNumber,
      year: week.weekYear,
      startDate: week.start,
      endDate: week.end,
      totalTrades,
      winningTrades,
      losingTrades,
      realizedPnl,
      grossPnl,
      totalCommission,
      totalVolume,
      winRate: winRate(winningTrades, totalTrades),
      avgWin: divideOrZero(totalWinsAmount, new Decimal(winningTrades)),
      avgLoss: divideOrZero(totalLossesAmount, new Decimal(losingTrades)),
      largestWin,
      largestLoss,
      bestDay: best ? { date: best.date, pnl: best.realizedPnl } : null,
      worstDay: worst ? { date: worst.date, pnl: worst.realizedPnl } : null,
      tradingDays: days.length,
      profitableDays: days.filter((daily) => daily.realizedPnl.greaterThan(0)).length,
      avgDailyPnl: divideOrZero(realizedPnl, new Decimal(days.length)),
      symbolsTraded: Array.from(symbols).sort(),
      dailySummaries: days,
    };
  }
}
