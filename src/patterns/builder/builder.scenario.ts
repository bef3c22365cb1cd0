import { BadRequestException, Injectable } from '@nestjs/common';
import { OrderBuilder } from './order.builder';
import { Order, OrderSide } from '../../domain/entities/order.entity';
import {
  PatternDemoResponse,
  PatternScenario,
  PatternTestResponse,
} from '../../common/interfaces/pattern-response.interface';
import { check, errorMessage, toTestResponse } from '../../common/utils/pattern-response.util';

const PATTERN = 'Builder';

export interface BuiltOrder {
  type: string;
  order: Order;
}

@Injectable()
export class BuilderScenario implements PatternScenario {
  constructor(private readonly builder: OrderBuilder) {}

  async runDemo(): Promise<PatternDemoResponse<BuiltOrder[]>> {
    const simpleOrder = this.builder
      .reset()
      .withAccount('ACC-001')
      .withSymbol('AAPL')
      .withSide(OrderSide.BUY)
      .withQuantity(100)
      .withPrice(150)
      .build();

    const complexOrder = this.builder
      .reset()
      .withAccount('ACC-002')
      .withSymbol('MSFT')
      .withSide(OrderSide.SELL)
      .withQuantity(500)
      .withPrice(300)
      .withLimitPrice(305)
      .build();

    return {
      pattern: PATTERN,
      description:
        'Demonstrates builder pattern: fluent interface for constructing complex Order objects step-by-step.',
      result: [
        { type: 'Simple Order', order: simpleOrder },
        { type: 'Complex Order', order: complexOrder },
      ],
      metadata: {
        fluentInterface: true,
        validation: 'Builder validates required fields before building',
      },
    };
  }

  async runTest(): Promise<PatternTestResponse> {
    const order = this.builder
      .reset()
      .withAccount('ACC-TEST')
      .withSymbol('TEST')
      .withSide(OrderSide.BUY)
      .withQuantity(10)
      .withPrice(100)
      .build();

    const checks = [
      check('Builder Creates Valid Order', order.orderId.startsWith('ORD-'), `Created order ${order.orderId}`),
      check(
        'Order Values Correct',
        order.accountId === 'ACC-TEST' && order.symbol === 'TEST' && order.quantity === 10,
        `Order values match: Account=${order.accountId}, Symbol=${order.symbol}, Quantity=${order.quantity}`,
      ),
    ];

    try {
      this.builder.reset().withAccount('ACC-TEST').build();
      checks.push(check('Builder Validation', false, 'Builder should throw on missing required fields'));
    } catch (error) {
      checks.push(
        check(
          'Builder Validation',
          error instanceof BadRequestException,
          `Builder rejected incomplete order: ${errorMessage(error)}`,
        ),
      );
    }

    return toTestResponse(PATTERN, checks);
  }
}
