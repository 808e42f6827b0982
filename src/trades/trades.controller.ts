import { Body, Controller, Get, HttpCode, HttpStatus, Post, Query } from '@nestjs/common';
import { TradesService } from './trades.service';
import { CreateTradeDto } from './dto/create-trade.dto';
import { ImportTradesDto } from './dto/import-trades.dto';
import { ImportResponseDto, TradeDto, TradeResponseDto } from './dto/trade-response.dto';
import { StoredTrade } from './entities/trade-record.entity';
import { toNumber } from '../common/utils/decimal.util';

function toTradeDto(trade: StoredTrade): TradeDto {
  return {
    id: trade.id,
    symbol: trade.symbol,
    side: trade.side,
    quantity: toNumber(trade.quantity),
    fillPrice: toNumber(trade.fillPrice),
    executionTimestamp: trade.executionTimestamp.toISOString(),
    netAmount: toNumber(trade.netAmount),
    commission: toNumber(trade.commission),
    source: trade.source,
    createdAt: trade.createdAt.toISOString(),
  };
}

@Controller('trades')
export class TradesController {
  constructor(private readonly tradesService: TradesService) {}

  /**
   * Records an executed fill.
   * Idempotent - an identical fill returns 201 with the existing record.
   *
   * POST /trades
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  addTrade(@Body() createTradeDto: CreateTradeDto): TradeResponseDto {
    const { trade, duplicate } = this.tradesService.addTrade(createTradeDto);

    return {
      ...toTradeDto(trade),
      message: duplicate ? 'Trade already recorded (idempotent)' : 'Trade recorded successfully',
      duplicate,
    };
  }

  /**
   * Imports a broker CSV export.
   *
   * POST /trades/import
   */
  @Post('import')
  @HttpCode(HttpStatus.OK)
  importTrades(@Body() importTradesDto: ImportTradesDto): ImportResponseDto {
    const result = this.tradesService.importCsv(importTradesDto);

    let message: string;
    if (result.format === null) {
      message = `${result.source} was already processed`;
    } else if (result.skipped) {
      message = `${result.source} is not a trades file (${result.format})`;
    } else {
      message = `Processed ${result.parsed} trades (filtered ${result.duplicates} duplicates)`;
    }

    return { ...result, message };
  }

  /**
   * Returns stored trades, optionally filtered by symbol.
   *
   * GET /trades?symbol=AAPL
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  getTrades(@Query('symbol') symbol?: string): TradeDto[] {
    return this.tradesService.getTrades(symbol).map(toTradeDto);
  }

  /**
   * Clears trades and import history.
   *
   * POST /trades/reset
   */
  @Post('reset')
  @HttpCode(HttpStatus.OK)
  reset() {
    this.tradesService.clearAll();
    return { message: 'Trades reset successfully' };
  }
}
