import Decimal from 'decimal.js';
import { Order } from '../../domain/entities/order.entity';
import { Quote } from '../../domain/entities/quote.entity';

export type PricingStrategyName = 'MarketPrice' | 'LimitPrice' | 'VWAP' | 'RiskAdjusted';

export interface PricingStrategy {
  readonly strategyName: PricingStrategyName;
  calculatePrice(order: Order, quote: Quote): Decimal;
}

/** Every registered strategy, in registration order. */
export const PRICING_STRATEGIES = 'PRICING_STRATEGIES';
