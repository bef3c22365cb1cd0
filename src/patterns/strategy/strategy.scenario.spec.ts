import { Test, TestingModule } from '@nestjs/testing';
import { StrategyScenario } from './strategy.scenario';
import { PricingStrategySelector } from './pricing-strategy.selector';
import { PRICING_STRATEGIES } from './pricing-strategy.interface';
import { createPricingStrategies } from './pricing.strategies';

describe('StrategyScenario', () => {
  let scenario: StrategyScenario;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        { provide: PRICING_STRATEGIES, useFactory: createPricingStrategies },
        PricingStrategySelector,
        StrategyScenario,
      ],
    }).compile();

    scenario = module.get<StrategyScenario>(StrategyScenario);
  });

  it('should price the demo order with every strategy', async () => {
    const { result, metadata } = await scenario.runDemo();

    const priced = (strategy: string, calculatedPrice: number) => ({
      strategy,
      orderValue: 15000,
      calculatedPrice,
      marketBid: 150,
      marketAsk: 150.5,
    });

    expect(result.slice(0, 4)).toEqual([
      priced('MarketPrice', 150.5),
      priced('LimitPrice', 150.5),
      priced('VWAP', 150.3),
      priced('RiskAdjusted', 153.51),
    ]);
    expect(metadata.strategyCount).toBe(4);
  });

  it('should select RiskAdjusted for the large order', async () => {
    const { result } = await scenario.runDemo();

    expect(result).toHaveLength(5);
    expect(result[4]).toEqual({
      selection: 'Strategy Selection',
      orderValue: 3000000,
      selectedStrategy: 'RiskAdjusted',
    });
  });

  it('should pass all checks', async () => {
    const test = await scenario.runTest();

    expect(test.status).toBe('PASS');
    expect(test.checks).toHaveLength(6);
  });
});
