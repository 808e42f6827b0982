import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { TradeStorageService } from '../trades/trade-storage.service';
import { AnalysisSnapshot } from './entities/analysis-snapshot.entity';
import { SummaryStorageService } from './summary-storage.service';
import { TradingAnalyticsService } from './trading-analytics.service';

// Runs the engine over the stored trade set and keeps the result.
// Queries live in AnalyticsQueryService.
@Injectable()
export class AnalyticsService {
  private readonly logger = new Logger(AnalyticsService.name);

  constructor(
    private readonly tradeStorage: TradeStorageService,
    private readonly summaryStorage: SummaryStorageService,
    private readonly tradingAnalytics: TradingAnalyticsService,
  ) {}

  /** Recomputes every summary from all stored trades and saves a snapshot */
  runAnalysis(): AnalysisSnapshot {
    const trades = this.tradeStorage.getAllTrades();
    const summary = this.tradingAnalytics.analyzeTrades(trades);

    const snapshot = this.summaryStorage.saveSnapshot({
      id: uuidv4(),
      analyzedAt: new Date(),
      tradeCount: trades.length,
      sources: this.tradeStorage.getProcessedSources(),
      summary,
    });

    this.logger.log(
      `Snapshot ${snapshot.id}: ${trades.length} trades, ${summary.dailySummaries.length} days, ${summary.weeklySummaries.length} weeks`,
    );
    return snapshot;
  }

  /** Drops all stored snapshots */
  clearSnapshots(): void {
    this.summaryStorage.clearAllData();
  }
}
