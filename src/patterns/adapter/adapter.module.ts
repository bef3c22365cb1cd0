import { Module } from '@nestjs/common';
import { AdapterController } from './adapter.controller';
import { AdapterScenario } from './adapter.scenario';
import { MarketDataAdapter } from './market-data.adapter';
import { LEGACY_MARKET_DATA_PROVIDER, LegacyMarketDataProvider } from './legacy-market-data.provider';

@Module({
  controllers: [AdapterController],
  providers: [
    { provide: LEGACY_MARKET_DATA_PROVIDER, useFactory: () => new LegacyMarketDataProvider() },
    MarketDataAdapter,
    AdapterScenario,
  ],
})
export class AdapterModule {}
