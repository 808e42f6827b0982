import { Module } from '@nestjs/common';
import { TradesController } from './trades.controller';
import { TradesService } from './trades.service';
import { TradeStorageService } from './trade-storage.service';
import { TradeCsvParser } from './trade-csv.parser';

@Module({
  controllers: [TradesController],
  providers: [
    TradeStorageService,
    TradeCsvParser,
    TradesService,       // Ingestion: addTrade, importCsv, clearAll
  ],
  exports: [TradeStorageService], // Analytics reads the stored trade set
})
export class TradesModule {}
