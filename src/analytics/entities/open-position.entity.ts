import Decimal from 'decimal.js';

// Position left after matching a scope. Never persisted.
export interface OpenPosition {
  symbol: string;
  quantity: Decimal;        // signed: positive long, negative short
  averagePrice: Decimal;    // volume-weighted entry, 0 when flat
}
