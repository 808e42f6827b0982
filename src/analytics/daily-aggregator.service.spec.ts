import { Test, TestingModule } from '@nestjs/testing';
import { DailyAggregatorService } from './daily-aggregator.service';
import { HourlyAggregatorService } from './hourly-aggregator.service';
import { PositionMatcherService } from './position-matcher.service';
import { DIAGNOSTIC_SINK, InMemoryDiagnosticSink } from './diagnostics/diagnostic-sink';
import { TradeRecord, TradeSide } from '../trades/entities/trade-record.entity';
import { ZERO, toDecimal } from '../common/utils/decimal.util';

describe('DailyAggregatorService', () => {
  let service: DailyAggregatorService;
  let sink: InMemoryDiagnosticSink;

  const day = new Date('2024-03-04T00:00:00Z');
  const at = (time: string) => new Date(`2024-03-04T${time}Z`);

  const createTestTrade = (
    symbol: string,
    side: TradeSide,
    quantity: number,
    price: number,
    time: string,
    commission = 0,
  ): TradeRecord => ({
    symbol,
    side,
    quantity: toDecimal(quantity),
    fillPrice: toDecimal(price),
    executionTimestamp: at(time),
    netAmount: ZERO,
    commission: toDecimal(commission),
  });

  const slotsOf = (trades: TradeRecord[]) =>
    service.summarizeDay(day, trades).timeSlotPerformance.map((slot) => ({
      hour: slot.hour,
      trades: slot.trades,
      pnl: slot.pnl.toString(),
      winRate: slot.winRate,
    }));

  beforeEach(async () => {
    sink = new InMemoryDiagnosticSink();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PositionMatcherService,
        HourlyAggregatorService,
        DailyAggregatorService,
        { provide: DIAGNOSTIC_SINK, useValue: sink },
      ],
    }).compile();

    service = module.get<DailyAggregatorService>(DailyAggregatorService);
  });

  describe('single round-trip', () => {
    it('should net both commissions out of the realized P&L', () => {
      const summary = service.summarizeDay(day, [
        createTestTrade('AAPL', TradeSide.BUY, 100, 10, '10:00:00', 1),
        createTestTrade('AAPL', TradeSide.SELL, 100, 12, '10:30:00', 1),
      ]);

      expect(summary.date).toEqual(day);
      expect(summary.realizedPnl.toString()).toBe('198');
      expect(summary.grossPnl.toString()).toBe('200');
      expect(summary.totalCommission.toString()).toBe('2');
      expect(summary.totalVolume.toString()).toBe('2200');
      expect(summary.totalTrades).toBe(1);
      expect(summary.winningTrades).toBe(1);
      expect(summary.losingTrades).toBe(0);
      expect(summary.winRate).toBe(100);
      expect(summary.avgWin.toString()).toBe('200');
      expect(summary.largestWin.toString()).toBe('200');
      expect(summary.avgLoss.isZero()).toBe(true);
      expect(summary.largestLoss.isZero()).toBe(true);
      expect(summary.symbolsTraded).toEqual(['AAPL']);
      expect(sink.events).toHaveLength(0);
    });

    it('should normalize the summary date to UTC midnight', () => {
      const summary = service.summarizeDay(at('15:45:10'), [
        createTestTrade('AAPL', TradeSide.BUY, 1, 10, '15:45:10'),
      ]);

      expect(summary.date.toISOString()).toBe('2024-03-04T00:00:00.000Z');
    });
  });

  describe('unmatched fills', () => {
    it('should count a lone fill toward volume and commission only', () => {
      const summary = service.summarizeDay(day, [
        createTestTrade('AAPL', TradeSide.BUY, 100, 10, '09:45:00', 1),
      ]);

      expect(summary.totalVolume.toString()).toBe('1000');
      expect(summary.totalCommission.toString()).toBe('1');
      expect(summary.totalTrades).toBe(0);
      expect(summary.realizedPnl.toString()).toBe('-1');
      expect(summary.grossPnl.isZero()).toBe(true);
      expect(summary.winRate).toBe(0);
      expect(summary.symbolsTraded).toEqual([]);
    });

    it('should emit an unmatched diagnostic tagged with the day', () => {
      service.summarizeDay(day, [createTestTrade('AAPL', TradeSide.BUY, 100, 10, '09:45:00', 1)]);

      expect(sink.events).toHaveLength(1);
      expect(sink.events[0].kind).toBe('unmatched');
      expect(sink.events[0].symbol).toBe('AAPL');
      expect(sink.events[0].date).toEqual(day);
    });
  });

  describe('multiple symbols', () => {
    const trades = () => [
      createTestTrade('AAPL', TradeSide.BUY, 100, 10, '10:00:00', 1),
      createTestTrade('AAPL', TradeSide.SELL, 100, 12, '10:30:00', 1),
      createTestTrade('TSLA', TradeSide.BUY, 10, 200, '11:00:00', 0.5),
      createTestTrade('TSLA', TradeSide.SELL, 10, 190, '11:15:00', 0.5),
      createTestTrade('NVDA', TradeSide.BUY, 10, 50, '14:00:00'),
      createTestTrade('NVDA', TradeSide.SELL, 10, 50, '14:10:00'),
      createTestTrade('MSFT', TradeSide.SELL, 5, 300, '15:00:00', 1),
    ];

    it('should classify wins and losses and leave flat round-trips out', () => {
      const summary = service.summarizeDay(day, trades());

      expect(summary.totalTrades).toBe(2);
      expect(summary.winningTrades).toBe(1);
      expect(summary.losingTrades).toBe(1);
      expect(summary.winRate).toBe(50);
      expect(summary.avgWin.toString()).toBe('200');
      expect(summary.avgLoss.toString()).toBe('-100');
      expect(summary.largestWin.toString()).toBe('200');
      expect(summary.largestLoss.toString()).toBe('-100');
    });

    it('should subtract every commission of the day once', () => {
      const summary = service.summarizeDay(day, trades());

      expect(summary.totalCommission.toString()).toBe('4');
      expect(summary.realizedPnl.toString()).toBe('96');
      expect(summary.grossPnl.toString()).toBe('100');
      expect(summary.grossPnl.minus(summary.realizedPnl).equals(summary.totalCommission)).toBe(true);
    });

    it('should count the notional of every fill, matched or not', () => {
      const summary = service.summarizeDay(day, trades());

      expect(summary.totalVolume.toString()).toBe('8600');
    });

    it('should list matched symbols sorted', () => {
      const summary = service.summarizeDay(day, trades());

      expect(summary.symbolsTraded).toEqual(['AAPL', 'NVDA', 'TSLA']);
    });

    it('should break the day down by hour', () => {
      expect(slotsOf(trades())).toEqual([
        { hour: 10, trades: 2, pnl: '199', winRate: 100 },
        { hour: 11, trades: 2, pnl: '-100.5', winRate: 0 },
        { hour: 14, trades: 2, pnl: '0', winRate: 0 },
        { hour: 15, trades: 1, pnl: '0', winRate: 0 },
      ]);
    });

    it('should give the same figures for shuffled input', () => {
      const ordered = service.summarizeDay(day, trades());
      const shuffled = service.summarizeDay(day, [...trades()].reverse());

      expect(shuffled.realizedPnl.equals(ordered.realizedPnl)).toBe(true);
      expect(shuffled.totalVolume.equals(ordered.totalVolume)).toBe(true);
      expect(shuffled.winningTrades).toBe(ordered.winningTrades);
      expect(shuffled.losingTrades).toBe(ordered.losingTrades);
      expect(shuffled.symbolsTraded).toEqual(ordered.symbolsTraded);
      expect(shuffled.timeSlotPerformance.map((slot) => slot.hour)).toEqual([10, 11, 14, 15]);
    });
  });

  describe('round-trips spanning hours', () => {
    it('should realize the day P&L but nothing in either hour', () => {
      const trades = [
        createTestTrade('AAPL', TradeSide.BUY, 10, 5, '09:30:00'),
        createTestTrade('AAPL', TradeSide.SELL, 10, 6, '10:15:00'),
      ];

      const summary = service.summarizeDay(day, trades);

      expect(summary.realizedPnl.toString()).toBe('10');
      expect(slotsOf(trades)).toEqual([
        { hour: 9, trades: 1, pnl: '0', winRate: 0 },
        { hour: 10, trades: 1, pnl: '0', winRate: 0 },
      ]);
    });
  });

  describe('overselling', () => {
    it('should realize the closed part and report the excess', () => {
      const summary = service.summarizeDay(day, [
        createTestTrade('AAPL', TradeSide.BUY, 50, 10, '10:00:00'),
        createTestTrade('AAPL', TradeSide.SELL, 80, 11, '10:30:00'),
      ]);

      expect(summary.realizedPnl.toString()).toBe('50');
      expect(sink.ofKind('overselling')).toHaveLength(1);
      expect(sink.ofKind('overselling')[0].excessQuantity.toString()).toBe('30');
      expect(sink.ofKind('unclosed')).toHaveLength(0);
    });
  });

  describe('large days', () => {
    it('should track extremes over more round-trips than fit in an argument list', () => {
      const roundTrips = 200000;
      const time = (millis: number) => new Date(Date.UTC(2024, 2, 4, 0, 0, 0, millis)).toISOString().slice(11, 23);
      const trades: TradeRecord[] = [];
      for (let i = 0; i < roundTrips; i++) {
        trades.push(createTestTrade('AAPL', TradeSide.BUY, 1, 10, time(i * 2)));
        trades.push(createTestTrade('AAPL', TradeSide.SELL, 1, i === 7 ? 15 : 11, time(i * 2 + 1)));
      }

      const summary = service.summarizeDay(day, trades);

      expect(summary.winningTrades).toBe(roundTrips);
      expect(summary.largestWin.toString()).toBe('5');
      expect(summary.largestLoss.isZero()).toBe(true);
    }, 60000);
  });
});
