import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { AppConfigModule } from './config/app-config.module';
import { TradesModule } from './trades/trades.module';
import { AnalyticsModule } from './analytics/analytics.module';

@Module({
  imports: [AppConfigModule, TradesModule, AnalyticsModule],
  controllers: [AppController],
})
export class AppModule {}
