import { Controller, Get } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';

@Controller()
export class AppController {
  /**
   * Health check for load balancers and monitoring.
   *
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'trade-performance-analytics',
    };
  }

  /**
   * API root - returns service info and available endpoints.
   *
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'Trade Performance Analytics API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        trades: '/trades',
        import: '/trades/import',
        run: '/analytics/run',
        summary: '/analytics/summary',
        daily: '/analytics/daily',
        weekly: '/analytics/weekly',
        periods: '/analytics/periods',
        snapshots: '/analytics/snapshots',
      },
    };
  }
}
