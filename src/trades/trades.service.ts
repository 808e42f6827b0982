import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { StoredTrade, TradeRecord } from './entities/trade-record.entity';
import { CreateTradeDto } from './dto/create-trade.dto';
import { ImportTradesDto } from './dto/import-trades.dto';
import { TradeStorageService } from './trade-storage.service';
import { CsvFormat, TradeCsvParser } from './trade-csv.parser';
import { assertValidTrade } from '../analytics/trade-preconditions';
import { ZERO, toDecimal } from '../common/utils/decimal.util';
import { parseUtcIso } from '../common/utils/date.util';

export interface RecordTradeResult {
  trade: StoredTrade;
  duplicate: boolean;
}

export interface ImportResult {
  source: string;
  format: CsvFormat | null;   // null when the source was skipped unread
  parsed: number;
  recorded: number;
  duplicates: number;
  skipped: boolean;
}

// Trade ingestion: single fills and broker CSV exports.
// Every fill is checked before it is stored, duplicates are dropped.
@Injectable()
export class TradesService {
  private readonly logger = new Logger(TradesService.name);

  constructor(
    private readonly storage: TradeStorageService,
    private readonly csvParser: TradeCsvParser,
  ) {}

  /**
   * Records a fill.
   * Idempotent - an identical fill returns the stored record with duplicate=true.
   */
  addTrade(createTradeDto: CreateTradeDto): RecordTradeResult {
    const executionTimestamp = parseUtcIso(createTradeDto.executionTimestamp);
    if (!executionTimestamp) {
      throw new BadRequestException(`Invalid execution timestamp: ${createTradeDto.executionTimestamp}`);
    }

    const trade: TradeRecord = {
      symbol: createTradeDto.symbol,
      side: createTradeDto.side,
      quantity: toDecimal(createTradeDto.quantity),
      fillPrice: toDecimal(createTradeDto.fillPrice),
      executionTimestamp,
      netAmount: toDecimal(createTradeDto.netAmount),
      commission: createTradeDto.commission !== undefined ? toDecimal(createTradeDto.commission) : ZERO,
    };

    return this.record(trade);
  }

  /**
   * Imports a broker CSV export.
   * Already processed sources and non-trade files are skipped without parsing rows.
   */
  importCsv(importTradesDto: ImportTradesDto): ImportResult {
    const { source, csv } = importTradesDto;

    if (this.storage.isSourceProcessed(source)) {
      this.logger.log(`Skipping ${source}: already processed`);
      return { source, format: null, parsed: 0, recorded: 0, duplicates: 0, skipped: true };
    }

    const { format, trades } = this.csvParser.parse(csv);
    if (format !== 'trades') {
      this.logger.warn(`Skipping ${source}: not a trades file (${format})`);
      return { source, format, parsed: 0, recorded: 0, duplicates: 0, skipped: true };
    }

    // validate the whole file before storing any of it
    trades.forEach(assertValidTrade);

    let recorded = 0;
    let duplicates = 0;
    for (const trade of trades) {
      const result = this.record(trade, source);
      if (result.duplicate) {
        duplicates++;
      } else {
        recorded++;
      }
    }

    this.storage.markSourceProcessed(source);
    if (duplicates > 0) {
      this.logger.warn(`${source}: filtered ${duplicates} duplicate trade(s)`);
    }
    this.logger.log(`Imported ${source}: ${recorded} new trade(s) of ${trades.length}`);

    return { source, format, parsed: trades.length, recorded, duplicates, skipped: false };
  }

  /** Returns stored trades, optionally filtered by symbol */
  getTrades(symbol?: string): StoredTrade[] {
    const trades = this.storage.getAllTrades();
    return symbol ? trades.filter((trade) => trade.symbol === symbol) : trades;
  }

  /** Clears trades and import history */
  clearAll(): void {
    this.storage.clearAllData();
  }

  private record(trade: TradeRecord, source?: string): RecordTradeResult {
    assertValidTrade(trade);

    const existingTrade = this.storage.findByIdentity(trade);
    if (existingTrade) {
      return { trade: existingTrade, duplicate: true };
    }

    const stored: StoredTrade = {
      ...trade,
      id: uuidv4(),
      source,
      createdAt: new Date(),
    };
    this.storage.saveTrade(stored);
    return { trade: stored, duplicate: false };
  }
}
