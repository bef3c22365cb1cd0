import {
  LimitPriceStrategy,
  MarketPriceStrategy,
  RiskAdjustedPricingStrategy,
  VwapPricingStrategy,
} from './pricing.strategies';
import { OrderSide } from '../../domain/entities/order.entity';
import { Quote } from '../../domain/entities/quote.entity';
import { NewOrderFields, createOrder } from '../../domain/order.util';

describe('Pricing strategies', () => {
  const quote: Quote = { symbol: 'AAPL', bid: 150, ask: 150.5, last: 150.25, timestamp: new Date() };

  const order = (overrides: Partial<NewOrderFields> = {}) =>
    createOrder({
      accountId: 'ACC-001',
      symbol: 'AAPL',
      side: OrderSide.BUY,
      quantity: 100,
      price: 150,
      ...overrides,
    });

  describe('MarketPriceStrategy', () => {
    const strategy = new MarketPriceStrategy();

    it('should buy at the ask', () => {
      expect(strategy.calculatePrice(order(), quote).toNumber()).toBe(150.5);
    });

    it('should sell at the bid', () => {
      expect(strategy.calculatePrice(order({ side: OrderSide.SELL }), quote).toNumber()).toBe(150);
    });
  });

  describe('LimitPriceStrategy', () => {
    const strategy = new LimitPriceStrategy();

    it('should use the limit price when set', () => {
      expect(strategy.calculatePrice(order({ limitPrice: 149.75 }), quote).toNumber()).toBe(149.75);
    });

    it('should fall back to the market price', () => {
      expect(strategy.calculatePrice(order({ side: OrderSide.SELL }), quote).toNumber()).toBe(150);
    });
  });

  describe('VwapPricingStrategy', () => {
    const strategy = new VwapPricingStrategy();

    it('should price at mid plus a tenth of the spread', () => {
      expect(strategy.calculatePrice(order(), quote).toString()).toBe('150.3');
    });

    it('should knock 0.001 off above 1000 shares', () => {
      expect(strategy.calculatePrice(order({ quantity: 1001 }), quote).toString()).toBe('150.299');
    });

    it('should not adjust at exactly 1000 shares', () => {
      expect(strategy.calculatePrice(order({ quantity: 1000 }), quote).toString()).toBe('150.3');
    });
  });

  describe('RiskAdjustedPricingStrategy', () => {
    const strategy = new RiskAdjustedPricingStrategy();

    it('should add the base premium for small positions', () => {
      expect(strategy.calculatePrice(order(), quote).toString()).toBe('153.51');
    });

    it('should add 1.5x the premium above 100,000', () => {
      // 1000 x 150.5 = 150,500 -> 150.5 x 1.03
      expect(strategy.calculatePrice(order({ quantity: 1000 }), quote).toString()).toBe('155.015');
    });

    it('should accept a custom premium', () => {
      expect(new RiskAdjustedPricingStrategy(0.1).calculatePrice(order({ side: OrderSide.SELL }), quote).toString())
        .toBe('165');
    });
  });
});
