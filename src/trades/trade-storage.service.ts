import { Injectable } from '@nestjs/common';
import { StoredTrade, TradeRecord, tradeIdentityKey } from './entities/trade-record.entity';

// In-memory trade store with O(1) duplicate lookups.
// Fills are deduplicated by identity (symbol, side, qty, price, time).
// Import sources are tracked so a file is only ever processed once.
@Injectable()
export class TradeStorageService {
  private trades: StoredTrade[] = [];
  private identityIndex: Map<string, StoredTrade> = new Map();
  private processedSources: Set<string> = new Set();

  /** Persists trade and indexes it by identity */
  saveTrade(trade: StoredTrade): StoredTrade {
    this.trades.push(trade);
    this.identityIndex.set(tradeIdentityKey(trade), trade);
    return trade;
  }

  /** O(1) lookup of an already stored fill with the same identity */
  findByIdentity(trade: TradeRecord): StoredTrade | undefined {
    return this.identityIndex.get(tradeIdentityKey(trade));
  }

  /** Returns a copy so callers can't reorder the store */
  getAllTrades(): StoredTrade[] {
    return [...this.trades];
  }

  markSourceProcessed(source: string): void {
    this.processedSources.add(source);
  }

  isSourceProcessed(source: string): boolean {
    return this.processedSources.has(source);
  }

  /** Processed sources in the order they were imported */
  getProcessedSources(): string[] {
    return Array.from(this.processedSources);
  }

  /** Clears trades and import history */
  clearAllData(): void {
    this.trades = [];
    this.identityIndex.clear();
    this.processedSources.clear();
  }
}
