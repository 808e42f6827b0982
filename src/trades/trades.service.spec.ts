import { BadRequestException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { TradesService } from './trades.service';
import { TradeStorageService } from './trade-storage.service';
import { TradeCsvParser } from './trade-csv.parser';
import { TradeSide } from './entities/trade-record.entity';
import { CreateTradeDto } from './dto/create-trade.dto';

describe('TradesService', () => {
  let service: TradesService;
  let storage: TradeStorageService;

  const HEADER = 'Symbol,Side,Qty,Fill Price,Time,Net Amount,Commission';

  const createTestTradeDto = (overrides: Partial<CreateTradeDto> = {}): CreateTradeDto => ({
    symbol: 'AAPL',
    side: TradeSide.BUY,
    quantity: '100',
    fillPrice: '10',
    executionTimestamp: '2024-03-04T10:00:00Z',
    netAmount: '1000',
    commission: '1',
    ...overrides,
  });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [TradeStorageService, TradeCsvParser, TradesService],
    }).compile();

    service = module.get<TradesService>(TradesService);
    storage = module.get<TradeStorageService>(TradeStorageService);
  });

  afterEach(() => {
    service.clearAll();
  });

  describe('addTrade', () => {
    it('should store a fill with Decimal amounts', () => {
      const { trade, duplicate } = service.addTrade(createTestTradeDto());

      expect(duplicate).toBe(false);
      expect(trade.id).toBeDefined();
      expect(trade.source).toBeUndefined();
      expect(trade.quantity.toString()).toBe('100');
      expect(trade.commission.toString()).toBe('1');
      expect(trade.executionTimestamp.toISOString()).toBe('2024-03-04T10:00:00.000Z');
      expect(storage.getAllTrades()).toHaveLength(1);
    });

    it('should default a missing commission to zero', () => {
      const { trade } = service.addTrade(createTestTradeDto({ commission: undefined }));

      expect(trade.commission.isZero()).toBe(true);
    });

    it('should return the stored fill for an identical one', () => {
      const first = service.addTrade(createTestTradeDto());
      const second = service.addTrade(createTestTradeDto({ netAmount: '999', commission: '2' }));

      expect(second.duplicate).toBe(true);
      expect(second.trade.id).toBe(first.trade.id);
      expect(second.trade.commission.toString()).toBe('1');
      expect(storage.getAllTrades()).toHaveLength(1);
    });

    it('should treat equal values written differently as the same fill', () => {
      service.addTrade(createTestTradeDto({ fillPrice: '10.00' }));
      const second = service.addTrade(createTestTradeDto({ fillPrice: '10' }));

      expect(second.duplicate).toBe(true);
    });

    it('should keep fills that differ in time', () => {
      service.addTrade(createTestTradeDto());
      const second = service.addTrade(createTestTradeDto({ executionTimestamp: '2024-03-04T10:00:01Z' }));

      expect(second.duplicate).toBe(false);
      expect(storage.getAllTrades()).toHaveLength(2);
    });

    it('should read a timestamp without an offset as UTC', () => {
      const serverZone = process.env.TZ;
      process.env.TZ = 'America/New_York';
      try {
        const { trade } = service.addTrade(createTestTradeDto({ executionTimestamp: '2024-03-04T23:30:00' }));

        expect(trade.executionTimestamp.toISOString()).toBe('2024-03-04T23:30:00.000Z');
      } finally {
        if (serverZone === undefined) {
          delete process.env.TZ;
        } else {
          process.env.TZ = serverZone;
        }
      }
    });

    it('should honour an explicit offset', () => {
      const { trade } = service.addTrade(createTestTradeDto({ executionTimestamp: '2024-03-04T18:30:00-05:00' }));

      expect(trade.executionTimestamp.toISOString()).toBe('2024-03-04T23:30:00.000Z');
    });

    it('should reject an impossible timestamp', () => {
      expect(() => service.addTrade(createTestTradeDto({ executionTimestamp: '2024-02-30T10:00:00Z' }))).toThrow(
        new BadRequestException('Invalid execution timestamp: 2024-02-30T10:00:00Z'),
      );
      expect(storage.getAllTrades()).toHaveLength(0);
    });

    it('should reject a zero quantity', () => {
      expect(() => service.addTrade(createTestTradeDto({ quantity: '0' }))).toThrow(BadRequestException);
      expect(storage.getAllTrades()).toHaveLength(0);
    });
  });

  describe('importCsv', () => {
    const csv = [
      HEADER,
      'AAPL,Buy,100,10,2024-03-04 10:00:00,1000,1',
      'AAPL,Sell,100,12,2024-03-04 10:30:00,1200,1',
      'AAPL,Sell,100,12,2024-03-04 10:30:00,1200,1',
    ].join('\n');

    it('should store new fills and count duplicates within the file', () => {
      const result = service.importCsv({ source: 'trades-2024-03-04.csv', csv });

      expect(result).toEqual({
        source: 'trades-2024-03-04.csv',
        format: 'trades',
        parsed: 3,
        recorded: 2,
        duplicates: 1,
        skipped: false,
      });
      expect(service.getTrades().map((trade) => trade.source)).toEqual([
        'trades-2024-03-04.csv',
        'trades-2024-03-04.csv',
      ]);
      expect(storage.isSourceProcessed('trades-2024-03-04.csv')).toBe(true);
    });

    it('should count fills already stored under another source as duplicates', () => {
      service.addTrade(
        createTestTradeDto({ quantity: '100', fillPrice: '10', executionTimestamp: '2024-03-04T10:00:00Z' }),
      );

      const result = service.importCsv({ source: 'a.csv', csv });

      expect(result.recorded).toBe(1);
      expect(result.duplicates).toBe(2);
    });

    it('should skip a source that was already processed', () => {
      service.importCsv({ source: 'a.csv', csv });
      const again = service.importCsv({ source: 'a.csv', csv });

      expect(again).toEqual({ source: 'a.csv', format: null, parsed: 0, recorded: 0, duplicates: 0, skipped: true });
      expect(storage.getAllTrades()).toHaveLength(2);
    });

    it('should skip a positions export without marking it processed', () => {
      const result = service.importCsv({
        source: 'positions.csv',
        csv: 'Symbol,Qty,Avg Price,Last Price,Unrealized P&L\nAAPL,10,150,155,50',
      });

      expect(result.format).toBe('positions');
      expect(result.skipped).toBe(true);
      expect(storage.isSourceProcessed('positions.csv')).toBe(false);
    });

    it('should store nothing when any row is invalid', () => {
      const bad = [HEADER, 'AAPL,Buy,100,10,2024-03-04 10:00:00,1000,1', 'AAPL,Sell,0,12,2024-03-04 10:30:00,0,1'].join(
        '\n',
      );

      expect(() => service.importCsv({ source: 'bad.csv', csv: bad })).toThrow(
        'AAPL trade quantity must be positive, got 0',
      );
      expect(storage.getAllTrades()).toHaveLength(0);
      expect(storage.isSourceProcessed('bad.csv')).toBe(false);
    });
  });

  describe('getTrades', () => {
    it('should filter by symbol', () => {
      service.addTrade(createTestTradeDto({ symbol: 'AAPL' }));
      service.addTrade(createTestTradeDto({ symbol: 'TSLA' }));

      expect(service.getTrades('TSLA').map((trade) => trade.symbol)).toEqual(['TSLA']);
      expect(service.getTrades()).toHaveLength(2);
    });
  });

  describe('clearAll', () => {
    it('should forget trades and processed sources', () => {
      service.importCsv({
        source: 'a.csv',
        csv: `${HEADER}\nAAPL,Buy,1,10,2024-03-04 10:00:00,10,0`,
      });

      service.clearAll();

      expect(storage.getAllTrades()).toHaveLength(0);
      expect(storage.getProcessedSources()).toEqual([]);
    });
  });
});
