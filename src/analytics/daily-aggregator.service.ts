import { Inject, Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { TradeRecord } from '../trades/entities/trade-record.entity';
import { DailySummary } from './entities/daily-summary.entity';
import { PositionMatcherService } from './position-matcher.service';
import { HourlyAggregatorService } from './hourly-aggregator.service';
import { DIAGNOSTIC_SINK, DiagnosticSink } from './diagnostics/diagnostic-sink';
import { winRate } from './summary-metrics';
import { groupBy } from '../common/utils/group-by';
import { utcDayStart } from '../common/utils/date.util';
import { ZERO, divideOrZero, sum } from '../common/utils/decimal.util';

// Folds one day's fills into a DailySummary.
// Commission is taken off once, in aggregate, over every fill of the day.
@Injectable()
export class DailyAggregatorService {
  constructor(
    private readonly matcher: PositionMatcherService,
    private readonly hourly: HourlyAggregatorService,
    @Inject(DIAGNOSTIC_SINK) private readonly diagnostics: DiagnosticSink,
  ) {}

  /**
   * Builds the summary for `date` from that day's fills.
   * Matching diagnostics are emitted to the sink tagged with the day.
   *
   * @param trades - every fill whose UTC date is `date`
   */
  summarizeDay(date: Date, trades: readonly TradeRecord[]): DailySummary {
    const day = utcDayStart(date);

    let totalCommission: Decimal = ZERO;
    let totalVolume: Decimal = ZERO;
    const realizedPnls: Decimal[] = [];
    const symbols = new Set<string>();

    for (const [symbol, symbolTrades] of groupBy(trades, (trade) => trade.symbol)) {
      // volume and commission count every fill, matched or not
      for (const trade of symbolTrades) {
        totalCommission = totalCommission.plus(trade.commission);
        totalVolume = totalVolume.plus(trade.quantity.times(trade.fillPrice));
      }

      const result = this.matcher.matchPositions(symbol, symbolTrades);
      for (const diagnostic of result.diagnostics) {
        this.diagnostics.emit({ ...diagnostic, date: day });
      }

      if (symbolTrades.length >= 2) {
        symbols.add(symbol);
      }
      realizedPnls.push(...result.realized.map((roundTrip) => roundTrip.pnl));
    }

    const wins = realizedPnls.filter((pnl) => pnl.greaterThan(0));
    const losses = realizedPnls.filter((pnl) => pnl.lessThan(0));
    const realizedPnl = sum(realizedPnls).minus(totalCommission);
    const totalTrades = wins.length + losses.length;

    return {
      date: day,
      totalTrades,
      winningTrades: wins.length,
      losingTrades: losses.length,
      realizedPnl,
      grossPnl: realizedPnl.plus(totalCommission),
      totalCommission,
      totalVolume,
      winRate: winRate(wins.length, totalTrades),
      avgWin: divideOrZero(sum(wins), new Decimal(wins.length)),
      avgLoss: divideOrZero(sum(losses), new Decimal(losses.length)),
      largestWin: wins.reduce((max, pnl) => Decimal.max(max, pnl), ZERO),
      largestLoss: losses.reduce((min, pnl) => Decimal.min(min, pnl), ZERO),
      symbolsTraded: Array.from(symbols).sort(),
      timeSlotPerformance: this.hourly.summarizeHours(trades),
    };
  }
}
