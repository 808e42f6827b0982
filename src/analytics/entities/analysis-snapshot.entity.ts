import { TradingSummary } from './trading-summary.entity';

// Stored result of one analysis run over the full trade set.
export interface AnalysisSnapshot {
  id: string;                 // UUID
  analyzedAt: Date;
  tradeCount: number;         // trades fed into the run
  sources: string[];          // import sources processed at the time
  summary: TradingSummary;
}
