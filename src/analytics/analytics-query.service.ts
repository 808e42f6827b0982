import { BadRequestException, Injectable, NotFoundException } from '@nestjs/common';
import { TradeStorageService } from '../trades/trade-storage.service';
import { AnalysisSnapshot } from './entities/analysis-snapshot.entity';
import { SummaryStorageService } from './summary-storage.service';
import { TradingPeriodService } from './trading-period.service';
import {
  DailySummaryDto,
  SnapshotInfoDto,
  SnapshotResponseDto,
  TradingPeriodDto,
  WeeklySummaryDto,
} from './dto/summary-response.dto';
import {
  toDailySummaryDto,
  toSnapshotInfoDto,
  toSnapshotResponseDto,
  toTradingPeriodDto,
  toWeeklySummaryDto,
} from './summary.mapper';
import { parseUtcDate, utcDateKey } from '../common/utils/date.util';

// Read-only operations over analysis results.
// Summaries come from the latest stored snapshot; trading periods are
// computed on demand from the stored trades.
@Injectable()
export class AnalyticsQueryService {
  constructor(
    private readonly summaryStorage: SummaryStorageService,
    private readonly tradeStorage: TradeStorageService,
    private readonly tradingPeriods: TradingPeriodService,
  ) {}

  /**
   * Latest snapshot with its full summary.
   * @throws NotFoundException if no analysis has run yet
   */
  getLatestSnapshot(): SnapshotResponseDto {
    return toSnapshotResponseDto(this.requireLatestSnapshot());
  }

  /**
   * Daily summaries of the latest snapshot.
   *
   * @param date - Optional yyyy-MM-dd filter
   * @throws NotFoundException if the date has no summary
   */
  getDailySummaries(date?: string): DailySummaryDto[] {
    const { summary } = this.requireLatestSnapshot();
    if (date === undefined) {
      return summary.dailySummaries.map(toDailySummaryDto);
    }

    const day = parseUtcDate(date);
    if (!day) {
      throw new BadRequestException(`Invalid date: ${date}. Expected yyyy-MM-dd`);
    }
    const key = utcDateKey(day);
    const daily = summary.dailySummaries.find((candidate) => utcDateKey(candidate.date) === key);
    if (!daily) {
      throw new NotFoundException(`No trading activity on ${key}`);
    }
    return [toDailySummaryDto(daily)];
  }

  /** Weekly summaries of the latest snapshot */
  getWeeklySummaries(): WeeklySummaryDto[] {
    return this.requireLatestSnapshot().summary.weeklySummaries.map(toWeeklySummaryDto);
  }

  /**
   * Time-of-day windows ranked by P&L over every stored trade.
   *
   * @param top - Optional limit, e.g. 3 for a podium
   */
  getBestTradingPeriods(top?: number): TradingPeriodDto[] {
    if (top !== undefined && top < 1) {
      throw new BadRequestException(`top must be at least 1, got ${top}`);
    }
    const periods = this.tradingPeriods
      .identifyBestTradingPeriods(this.tradeStorage.getAllTrades())
      .map(toTradingPeriodDto);
    return top !== undefined ? periods.slice(0, top) : periods;
  }

  /** Metadata of every stored run, oldest first */
  getSnapshotHistory(): SnapshotInfoDto[] {
    return this.summaryStorage.getSnapshots().map(toSnapshotInfoDto);
  }

  private requireLatestSnapshot(): AnalysisSnapshot {
    const snapshot = this.summaryStorage.getLatestSnapshot();
    if (!snapshot) {
      throw new NotFoundException('No analysis has been run yet');
    }
    return snapshot;
  }
}
