import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { TradeRecord, tradeNetPnl } from '../trades/entities/trade-record.entity';
import { TradingPeriod, TradingWindow } from './entities/trading-period.entity';
import { assertValidTrade } from './trade-preconditions';
import { winRate } from './summary-metrics';
import { utcHour } from '../common/utils/date.util';
import { ZERO, divideOrZero } from '../common/utils/decimal.util';

// Session windows by UTC hour of the fill, end exclusive.
// Gaps are allowed; a fill outside every window belongs to no period.
export const DEFAULT_TRADING_WINDOWS: readonly TradingWindow[] = [
  { name: 'Pre-Market', startHour: 4, endHour: 9 },
  { name: 'Market Open', startHour: 9, endHour: 10 },
  { name: 'Morning', startHour: 10, endHour: 12 },
  { name: 'Lunch', startHour: 12, endHour: 13 },
  { name: 'Afternoon', startHour: 13, endHour: 15 },
  { name: 'Power Hour', startHour: 15, endHour: 16 },
  { name: 'After-Hours', startHour: 16, endHour: 20 },
];

// Time-of-day ranking across all dates. Uses each fill's own net P&L
// (signed cash effect minus its commission), no position matching.
@Injectable()
export class TradingPeriodService {
  /**
   * Metrics per window, best total P&L first.
   * Windows with equal totals keep their table order.
   */
  identifyBestTradingPeriods(
    trades: readonly TradeRecord[],
    windows: readonly TradingWindow[] = DEFAULT_TRADING_WINDOWS,
  ): TradingPeriod[] {
    trades.forEach(assertValidTrade);

    return windows
      .map((window) => this.calculateMetrics(window, trades))
      .sort((a, b) => b.totalPnl.comparedTo(a.totalPnl));
  }

  private calculateMetrics(window: TradingWindow, trades: readonly TradeRecord[]): TradingPeriod {
    const periodTrades = trades.filter((trade) => {
      const hour = utcHour(trade.executionTimestamp);
      return hour >= window.startHour && hour < window.endHour;
    });

    let totalPnl: Decimal = ZERO;
    let wins = 0;
    let losses = 0;

    for (const trade of periodTrades) {
      const pnl = tradeNetPnl(trade);
      totalPnl = totalPnl.plus(pnl);
      if (pnl.greaterThan(0)) {
        wins++;
      } else if (pnl.lessThan(0)) {
        losses++;
      }
    }

    return {
      name: window.name,
      startHour: window.startHour,
      endHour: window.endHour,
      totalTrades: periodTrades.length,
      totalPnl,
      winRate: winRate(wins, wins + losses),
      avgPnlPerTrade: divideOrZero(totalPnl, new Decimal(periodTrades.length)),
    };
  }
}
