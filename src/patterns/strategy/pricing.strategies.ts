import Decimal from 'decimal.js';
import { PricingStrategy, PricingStrategyName } from './pricing-strategy.interface';
import { Order, OrderSide } from '../../domain/entities/order.entity';
import { Quote } from '../../domain/entities/quote.entity';
import { midpoint, multiply, toDecimal } from '../../common/utils/decimal.util';

// Buyers lift the ask, sellers hit the bid.
function marketPrice(order: Order, quote: Quote): Decimal {
  return toDecimal(order.side === OrderSide.BUY ? quote.ask : quote.bid);
}

export class MarketPriceStrategy implements PricingStrategy {
  readonly strategyName: PricingStrategyName = 'MarketPrice';

  calculatePrice(order: Order, quote: Quote): Decimal {
    return marketPrice(order, quote);
  }
}

export class LimitPriceStrategy implements PricingStrategy {
  readonly strategyName: PricingStrategyName = 'LimitPrice';

  calculatePrice(order: Order, quote: Quote): Decimal {
    return order.limitPrice === undefined ? marketPrice(order, quote) : toDecimal(order.limitPrice);
  }
}

/** Simplified VWAP: mid plus a tenth of the spread, one tenth of a cent better above 1000 shares. */
export class VwapPricingStrategy implements PricingStrategy {
  readonly strategyName: PricingStrategyName = 'VWAP';

  calculatePrice(order: Order, quote: Quote): Decimal {
    const spread = toDecimal(quote.ask).minus(quote.bid);
    const sizeAdjustment = order.quantity > 1000 ? -0.001 : 0;
    return midpoint(quote.bid, quote.ask).plus(spread.times(0.1)).plus(sizeAdjustment);
  }
}

export class RiskAdjustedPricingStrategy implements PricingStrategy {
  readonly strategyName: PricingStrategyName = 'RiskAdjusted';

  constructor(private readonly riskPremium = 0.02) {}

  calculatePrice(order: Order, quote: Quote): Decimal {
    const base = marketPrice(order, quote);
    // premium x 1.5 once the position is worth more than 100,000
    const multiplier = multiply(order.quantity, base).greaterThan(100000) ? 1.5 : 1;
    return base.times(toDecimal(this.riskPremium).times(multiplier).plus(1));
  }
}

export function createPricingStrategies(): PricingStrategy[] {
  return [
    new MarketPriceStrategy(),
    new LimitPriceStrategy(),
    new VwapPricingStrategy(),
    new RiskAdjustedPricingStrategy(),
  ];
}
