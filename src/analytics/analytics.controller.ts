import { Controller, Get, HttpCode, HttpStatus, ParseIntPipe, Post, Query } from '@nestjs/common';
import { AnalyticsService } from './analytics.service';
import { AnalyticsQueryService } from './analytics-query.service';
import {
  DailySummaryDto,
  SnapshotInfoDto,
  SnapshotResponseDto,
  TradingPeriodDto,
  WeeklySummaryDto,
} from './dto/summary-response.dto';
import { toSnapshotResponseDto } from './summary.mapper';

@Controller('analytics')
export class AnalyticsController {
  constructor(
    private readonly analyticsService: AnalyticsService,
    private readonly queryService: AnalyticsQueryService,
  ) {}

  /**
   * Recomputes all summaries from the stored trades and stores a snapshot.
   *
   * POST /analytics/run
   */
  @Post('run')
  @HttpCode(HttpStatus.CREATED)
  run(): SnapshotResponseDto {
    return toSnapshotResponseDto(this.analyticsService.runAnalysis());
  }

  /**
   * Latest snapshot with daily, weekly and overall figures.
   *
   * GET /analytics/summary
   */
  @Get('summary')
  @HttpCode(HttpStatus.OK)
  getSummary(): SnapshotResponseDto {
    return this.queryService.getLatestSnapshot();
  }

  /**
   * Daily summaries, optionally a single day.
   *
   * GET /analytics/daily?date=2024-03-04
   */
  @Get('daily')
  @HttpCode(HttpStatus.OK)
  getDaily(@Query('date') date?: string): DailySummaryDto[] {
    return this.queryService.getDailySummaries(date);
  }

  /**
   * Weekly summaries, Monday to Sunday.
   *
   * GET /analytics/weekly
   */
  @Get('weekly')
  @HttpCode(HttpStatus.OK)
  getWeekly(): WeeklySummaryDto[] {
    return this.queryService.getWeeklySummaries();
  }

  /**
   * Time-of-day windows ranked by P&L.
   *
   * GET /analytics/periods?top=3
   */
  @Get('periods')
  @HttpCode(HttpStatus.OK)
  getPeriods(@Query('top', new ParseIntPipe({ optional: true })) top?: number): TradingPeriodDto[] {
    return this.queryService.getBestTradingPeriods(top);
  }

  /**
   * Metadata of every analysis run.
   *
   * GET /analytics/snapshots
   */
  @Get('snapshots')
  @HttpCode(HttpStatus.OK)
  getSnapshots(): SnapshotInfoDto[] {
    return this.queryService.getSnapshotHistory();
  }

  /**
   * Drops stored snapshots.
   *
   * POST /analytics/reset
   */
  @Post('reset')
  @HttpCode(HttpStatus.OK)
  reset() {
    this.analyticsService.clearSnapshots();
    return { message: 'Analytics reset successfully' };
  }
}
