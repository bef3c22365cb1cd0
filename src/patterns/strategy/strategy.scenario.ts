import { Inject, Injectable } from '@nestjs/common';
import { PRICING_STRATEGIES, PricingStrategy, PricingStrategyName } from './pricing-strategy.interface';
import { PricingStrategySelector } from './pricing-strategy.selector';
import { OrderSide } from '../../domain/entities/order.entity';
import { Quote } from '../../domain/entities/quote.entity';
import { createOrder, orderValue } from '../../domain/order.util';
import { toNumber } from '../../common/utils/decimal.util';
import {
  PatternDemoResponse,
  PatternScenario,
  PatternTestResponse,
} from '../../common/interfaces/pattern-response.interface';
import { check, toTestResponse } from '../../common/utils/pattern-response.util';

const PATTERN = 'Strategy';

export interface PricedResult {
  strategy: PricingStrategyName;
  orderValue: number;
  calculatedPrice: number;
  marketBid: number;
  marketAsk: number;
}

export interface StrategySelection {
  selection: 'Strategy Selection';
  orderValue: number;
  selectedStrategy: PricingStrategyName;
}

// One entry per strategy, then the selection made for a large order.
export type StrategyDemoResult = Array<PricedResult | StrategySelection>;

@Injectable()
export class StrategyScenario implements PatternScenario {
  constructor(
    @Inject(PRICING_STRATEGIES) private readonly strategies: PricingStrategy[],
    private readonly selector: PricingStrategySelector,
  ) {}

  async runDemo(): Promise<PatternDemoResponse<StrategyDemoResult>> {
    const quote: Quote = { symbol: 'AAPL', bid: 150, ask: 150.5, last: 150.25, timestamp: new Date() };

    const prices = this.strategies.map((strategy): PricedResult => {
      const order = createOrder(
        { accountId: 'ACC-001', symbol: 'AAPL', side: OrderSide.BUY, quantity: 100, price: 150 },
        `ORD-${strategy.strategyName}`,
      );
      return {
        strategy: strategy.strategyName,
        orderValue: toNumber(orderValue(order)),
        calculatedPrice: toNumber(strategy.calculatePrice(order, quote)),
        marketBid: quote.bid,
        marketAsk: quote.ask,
      };
    });

    const largeOrder = createOrder(
      { accountId: 'ACC-001', symbol: 'MSFT', side: OrderSide.BUY, quantity: 10000, price: 300 },
      'ORD-LARGE',
    );

    return {
      pattern: PATTERN,
      description:
        'Demonstrates strategy pattern: different pricing algorithms selected at runtime based on order characteristics.',
      result: [
        ...prices,
        {
          selection: 'Strategy Selection',
          orderValue: toNumber(orderValue(largeOrder)),
          selectedStrategy: this.selector.selectStrategy(largeOrder).strategyName,
        },
      ],
      metadata: {
        strategyCount: this.strategies.length,
        runtimeSelection: true,
      },
    };
  }

  async runTest(): Promise<PatternTestResponse> {
    const quote: Quote = { symbol: 'TEST', bid: 100, ask: 100.5, last: 100.25, timestamp: new Date() };
    const order = createOrder(
      { accountId: 'ACC-TEST', symbol: 'TEST', side: OrderSide.BUY, quantity: 10, price: 100 },
      'ORD-TEST',
    );

    const checks = this.strategies.map(strategy => {
      const price = strategy.calculatePrice(order, quote);
      return check(
        `${strategy.strategyName} Calculates Price`,
        price.greaterThan(0),
        `${strategy.strategyName} calculated price: ${toNumber(price)}`,
      );
    });

    const bigOrder = createOrder(
      { accountId: 'ACC-TEST', symbol: 'TEST', side: OrderSide.BUY, quantity: 10000, price: 100 },
      'ORD-TEST-LARGE',
    );
    const selected = this.selector.selectStrategy(order).strategyName;
    const selectedForLarge = this.selector.selectStrategy(bigOrder).strategyName;

    checks.push(check('Strategy Selection', selected === 'MarketPrice', `Selected strategy: ${selected}`));
    checks.push(
      check(
        'Large Order Selects RiskAdjusted',
        selectedForLarge === 'RiskAdjusted',
        `Order value ${toNumber(orderValue(bigOrder))} selected ${selectedForLarge}`,
      ),
    );

    return toTestResponse(PATTERN, checks);
  }
}
