import { Test, TestingModule } from '@nestjs/testing';
import { PricingStrategySelector } from './pricing-strategy.selector';
import { PRICING_STRATEGIES } from './pricing-strategy.interface';
import { MarketPriceStrategy, createPricingStrategies } from './pricing.strategies';
import { OrderSide } from '../../domain/entities/order.entity';
import { NewOrderFields, createOrder } from '../../domain/order.util';

describe('PricingStrategySelector', () => {
  let selector: PricingStrategySelector;

  const order = (overrides: Partial<NewOrderFields> = {}) =>
    createOrder({
      accountId: 'ACC-001',
      symbol: 'AAPL',
      side: OrderSide.BUY,
      quantity: 100,
      price: 150,
      ...overrides,
    });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [{ provide: PRICING_STRATEGIES, useFactory: createPricingStrategies }, PricingStrategySelector],
    }).compile();

    selector = module.get<PricingStrategySelector>(PricingStrategySelector);
  });

  it('should pick RiskAdjusted above 500,000', () => {
    expect(selector.selectStrategy(order({ quantity: 10000, price: 300 })).strategyName).toBe('RiskAdjusted');
  });

  it('should prefer RiskAdjusted over a limit price', () => {
    expect(selector.selectStrategy(order({ quantity: 5000, price: 101, limitPrice: 100 })).strategyName)
      .toBe('RiskAdjusted');
  });

  it('should not pick RiskAdjusted at exactly 500,000', () => {
    expect(selector.selectStrategy(order({ quantity: 5000, price: 100 })).strategyName).toBe('VWAP');
  });

  it('should pick LimitPrice when a limit is set', () => {
    expect(selector.selectStrategy(order({ quantity: 2000, limitPrice: 149 })).strategyName).toBe('LimitPrice');
  });

  it('should pick VWAP above 1000 shares', () => {
    expect(selector.selectStrategy(order({ quantity: 1001, price: 10 })).strategyName).toBe('VWAP');
  });

  it('should default to MarketPrice', () => {
    expect(selector.selectStrategy(order()).strategyName).toBe('MarketPrice');
  });

  it('should fail loudly when a needed strategy is missing', () => {
    const partial = new PricingStrategySelector([new MarketPriceStrategy()]);

    expect(() => partial.selectStrategy(order({ limitPrice: 1 }))).toThrow('Pricing strategy LimitPrice is not registered');
  });
});
