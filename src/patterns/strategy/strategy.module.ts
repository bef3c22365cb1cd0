import { Module } from '@nestjs/common';
import { StrategyController } from './strategy.controller';
import { StrategyScenario } from './strategy.scenario';
import { PricingStrategySelector } from './pricing-strategy.selector';
import { PRICING_STRATEGIES } from './pricing-strategy.interface';
import { createPricingStrategies } from './pricing.strategies';

@Module({
  controllers: [StrategyController],
  providers: [
    { provide: PRICING_STRATEGIES, useFactory: createPricingStrategies },
    PricingStrategySelector,
    StrategyScenario,
  ],
})
export class StrategyModule {}
