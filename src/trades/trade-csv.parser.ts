import { BadRequestException, Injectable } from '@nestjs/common';
import { parse as csvParse } from 'csv-parse/sync';
import Decimal from 'decimal.js';
import { TradeRecord, TradeSide } from './entities/trade-record.entity';
import { ZERO, toDecimal } from '../common/utils/decimal.util';
import { parseUtcTimestamp } from '../common/utils/date.util';

export type CsvFormat = 'trades' | 'positions' | 'unknown';

export interface CsvParseResult {
  format: CsvFormat;
  trades: TradeRecord[];
}

// Symbol, Side, Qty, Fill Price, Time, Net Amount, Commission
const TRADE_FIELD_COUNT = 7;

const POSITION_HEADER_MARKERS = ['unrealized', 'avg price', 'last price', 'position id'];

function isStringRows(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'))
  );
}

/**
 * Reads broker trade exports.
 * Positions exports and unrecognized files are detected from the header and
 * yield no trades; a malformed trade row rejects the whole file.
 */
@Injectable()
export class TradeCsvParser {
  detectFormat(header: readonly string[]): CsvFormat {
    const headerLower = header.join(',').toLowerCase();

    if (POSITION_HEADER_MARKERS.some((marker) => headerLower.includes(marker))) {
      return 'positions';
    }

    if (
      headerLower.includes('symbol') &&
      headerLower.includes('side') &&
      (headerLower.includes('qty') || headerLower.includes('quantity')) &&
      headerLower.includes('fill price')
    ) {
      return 'trades';
    }

    return 'unknown';
  }

  parse(content: string): CsvParseResult {
    const rows = this.readRows(content);
    if (rows.length === 0) {
      return { format: 'unknown', trades: [] };
    }

    const [header, ...dataRows] = rows;
    const format = this.detectFormat(header);
    if (format !== 'trades') {
      return { format, trades: [] };
    }

    const trades = dataRows.map((row, index) => this.parseRow(row, index + 1));
    return { format, trades };
  }

  private readRows(content: string): string[][] {
    let records: unknown;
    try {
      records = csvParse(content, {
        bom: true,
        trim: true,
        skip_empty_lines: true,
        relax_column_count: true,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new BadRequestException(`Unreadable CSV: ${reason}`);
    }

    if (!isStringRows(records)) {
      throw new BadRequestException('Unreadable CSV: unexpected record shape');
    }
    return records;
  }

  // rowNumber is 1-based and excludes the header
  private parseRow(row: string[], rowNumber: number): TradeRecord {
    if (row.length < TRADE_FIELD_COUNT) {
      throw new BadRequestException(
        `Invalid trade row ${rowNumber}: expected ${TRADE_FIELD_COUNT} fields, got ${row.length}`,
      );
    }

    const [symbol, side, quantity, fillPrice, time, netAmount, commission] = row;
    if (symbol === '') {
      throw new BadRequestException(`Invalid trade row ${rowNumber}: missing symbol`);
    }

    const executionTimestamp = parseUtcTimestamp(time);
    if (!executionTimestamp) {
      throw new BadRequestException(`Invalid trade row ${rowNumber}: invalid time: ${time}`);
    }

    return {
      symbol,
      side: this.parseSide(side, rowNumber),
      quantity: this.parseDecimal(quantity, 'quantity', rowNumber),
      fillPrice: this.parseDecimal(fillPrice, 'fill price', rowNumber),
      executionTimestamp,
      netAmount: this.parseDecimal(netAmount, 'net amount', rowNumber),
      commission: commission === '' ? ZERO : this.parseDecimal(commission, 'commission', rowNumber),
    };
  }

  private parseSide(value: string, rowNumber: number): TradeSide {
    switch (value.toLowerCase()) {
      case 'buy':
      case 'long':
        return TradeSide.BUY;
      case 'sell':
      case 'short':
        return TradeSide.SELL;
      default:
        throw new BadRequestException(`Invalid trade row ${rowNumber}: invalid side: ${value}`);
    }
  }

  private parseDecimal(value: string, field: string, rowNumber: number): Decimal {
    let parsed: Decimal;
    try {
      parsed = toDecimal(value);
    } catch {
      throw new BadRequestException(`Invalid trade row ${rowNumber}: invalid ${field}: ${value}`);
    }
    if (!parsed.isFinite()) {
      throw new BadRequestException(`Invalid trade row ${rowNumber}: invalid ${field}: ${value}`);
    }
    return parsed;
  }
}
