import { CsvFormat } from '../trade-csv.parser';

// Stored trade as returned by the API
export interface TradeDto {
  id: string;
  symbol: string;
  side: string;
  quantity: number;
  fillPrice: number;
  executionTimestamp: string;
  netAmount: number;
  commission: number;
  source?: string;
  createdAt: string;
}

// Response after recording a trade
export interface TradeResponseDto extends TradeDto {
  message: string;
  duplicate: boolean;             // true if an identical fill was already recorded
}

// Response after importing a CSV export
export interface ImportResponseDto {
  source: string;
  format: CsvFormat | null;       // null when the source was skipped unread
  parsed: number;                 // rows read from the file
  recorded: number;               // new trades stored
  duplicates: number;             // rows matching an already stored fill
  skipped: boolean;               // source already processed or not a trades file
  message: string;
}
