import { Module } from '@nestjs/common';
import { AnalyticsController } from './analytics.controller';
import { AnalyticsService } from './analytics.service';
import { AnalyticsQueryService } from './analytics-query.service';
import { SummaryStorageService } from './summary-storage.service';
import { PositionMatcherService } from './position-matcher.service';
import { HourlyAggregatorService } from './hourly-aggregator.service';
import { DailyAggregatorService } from './daily-aggregator.service';
import { WeeklyAggregatorService } from './weekly-aggregator.service';
import { TradingPeriodService } from './trading-period.service';
import { TradingAnalyticsService } from './trading-analytics.service';
import { DIAGNOSTIC_SINK, LoggerDiagnosticSink } from './diagnostics/diagnostic-sink';
import { TradesModule } from '../trades/trades.module';
import { APP_CONFIG, AppConfig } from '../config/app.config';

@Module({
  imports: [TradesModule], // Import to read the stored trade set
  controllers: [AnalyticsController],
  providers: [
    PositionMatcherService,
    HourlyAggregatorService,
    DailyAggregatorService,
    WeeklyAggregatorService,
    TradingPeriodService,
    TradingAnalyticsService, // Engine entry point: analyzeTrades
    SummaryStorageService,
    AnalyticsService,        // Mutations: runAnalysis, clearSnapshots
    AnalyticsQueryService,   // Queries: snapshots, daily, weekly, periods
    {
      provide: DIAGNOSTIC_SINK,
      useFactory: (config: AppConfig) => new LoggerDiagnosticSink(config.diagnosticsLevel),
      inject: [APP_CONFIG],
    },
  ],
  exports: [TradingAnalyticsService, TradingPeriodService],
})
export class AnalyticsModule {}
