import Decimal from 'decimal.js';
import { TradeSide } from '../../trades/entities/trade-record.entity';

// Single fill in its scope, nothing to match it against.
export interface UnmatchedDiagnostic {
  kind: 'unmatched';
  symbol: string;
  side: TradeSide;
  quantity: Decimal;
  fillPrice: Decimal;
}

// Sell larger than the long position. The excess is dropped, no short is opened.
export interface OversellingDiagnostic {
  kind: 'overselling';
  symbol: string;
  closedQuantity: Decimal;
  excessQuantity: Decimal;
  executionTimestamp: Date;
}

// Position still open once the scope's fills are exhausted.
export interface UnclosedDiagnostic {
  kind: 'unclosed';
  symbol: string;
  direction: 'long' | 'short';
  quantity: Decimal;        // absolute size
}

export type MatchDiagnostic = UnmatchedDiagnostic | OversellingDiagnostic | UnclosedDiagnostic;

// Diagnostic tagged with the trading day it was raised for.
export type DiagnosticEvent = MatchDiagnostic & { date: Date };
