import { Inject, Injectable } from '@nestjs/common';
import { PRICING_STRATEGIES, PricingStrategy, PricingStrategyName } from './pricing-strategy.interface';
import { Order } from '../../domain/entities/order.entity';
import { isGreaterThan } from '../../common/utils/decimal.util';
import { orderValue } from '../../domain/order.util';

const RISK_ADJUSTED_ABOVE = 500000;
const VWAP_ABOVE_QUANTITY = 1000;

@Injectable()
export class PricingStrategySelector {
  private readonly byName: Map<PricingStrategyName, PricingStrategy>;

  constructor(@Inject(PRICING_STRATEGIES) strategies: PricingStrategy[]) {
    this.byName = new Map(strategies.map(s => [s.strategyName, s]));
  }

  /**
   * First match wins: value above 500,000, then a limit price,
   * then more than 1000 shares, otherwise market price.
   */
  selectStrategy(order: Order): PricingStrategy {
    if (isGreaterThan(orderValue(order), RISK_ADJUSTED_ABOVE)) {
      return this.get('RiskAdjusted');
    }
    if (order.limitPrice !== undefined) {
      return this.get('LimitPrice');
    }
    if (order.quantity > VWAP_ABOVE_QUANTITY) {
      return this.get('VWAP');
    }
    return this.get('MarketPrice');
  }

  private get(name: PricingStrategyName): PricingStrategy {
    const strategy = this.byName.get(name);
    if (!strategy) {
      throw new Error(`Pricing strategy ${name} is not registered`);
    }
    return strategy;
  }
}
