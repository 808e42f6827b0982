import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { TradeRecord } from '../trades/entities/trade-record.entity';
import { TimeSlotPerformance } from './entities/daily-summary.entity';
import { PositionMatcherService } from './position-matcher.service';
import { winRate } from './summary-metrics';
import { groupBy } from '../common/utils/group-by';
import { utcHour } from '../common/utils/date.util';
import { ZERO } from '../common/utils/decimal.util';

// Hour-of-day breakdown of a single day.
// Each (hour, symbol) bucket is matched on its own, so a round-trip that
// spans two hours realizes nothing in either of them.
@Injectable()
export class HourlyAggregatorService {
  constructor(private readonly matcher: PositionMatcherService) {}

  /**
   * Per-hour trade count, P&L and win rate, ascending by hour.
   * Hours without fills are omitted. Each round-trip is net of its closing
   * fill's commission, unlike the daily figure.
   */
  summarizeHours(trades: readonly TradeRecord[]): TimeSlotPerformance[] {
    const byHour = groupBy(trades, (trade) => utcHour(trade.executionTimestamp));
    const slots: TimeSlotPerformance[] = [];

    for (const [hour, hourTrades] of byHour) {
      let pnl: Decimal = ZERO;
      let wins = 0;
      let losses = 0;

      for (const [symbol, symbolTrades] of groupBy(hourTrades, (trade) => trade.symbol)) {
        // single fills count toward the hour's activity only
        if (symbolTrades.length < 2) {
          continue;
        }

        // hour-scope diagnostics repeat what the day scope already reported
        const { realized } = this.matcher.matchPositions(symbol, symbolTrades);
        for (const roundTrip of realized) {
          const net = roundTrip.pnl.minus(roundTrip.commission);
          pnl = pnl.plus(net);
          if (net.greaterThan(0)) {
            wins++;
          } else if (net.lessThan(0)) {
            losses++;
          }
        }
      }

      slots.push({
        hour,
        trades: hourTrades.length,
        pnl,
        winRate: winRate(wins, wins + losses),
      });
    }

    return slots.sort((a, b) => a.hour - b.hour);
  }
}
