import { Injectable } from '@nestjs/common';
import { Mediator } from './mediator';
import { CreateOrderRequest, GetOrderRequest } from './mediator.interface';
import { Order, OrderSide } from '../../domain/entities/order.entity';
import {
  PatternDemoResponse,
  PatternScenario,
  PatternTestResponse,
} from '../../common/interfaces/pattern-response.interface';
import { check, toTestResponse } from '../../common/utils/pattern-response.util';

const PATTERN = 'Mediator';

export type MediatorStep =
  | { action: 'Create Order via Mediator'; request: CreateOrderRequest; order: Order }
  | { action: 'Get Order via Mediator'; request: GetOrderRequest; order?: Order };

@Injectable()
export class MediatorScenario implements PatternScenario {
  constructor(private readonly mediator: Mediator) {}

  async runDemo(): Promise<PatternDemoResponse<MediatorStep[]>> {
    const createRequest: CreateOrderRequest = {
      accountId: 'ACC-001',
      symbol: 'AAPL',
      side: OrderSide.BUY,
      quantity: 100,
      price: 150,
    };
    const order = await this.mediator.send('CreateOrder', createRequest);

    const getRequest: GetOrderRequest = { orderId: order.orderId };
    const retrieved = await this.mediator.send('GetOrder', getRequest);

    return {
      pattern: PATTERN,
      description:
        'Demonstrates mediator pattern: routes requests to handlers, reducing many-to-many dependencies ' +
        'between components.',
      result: [
        { action: 'Create Order via Mediator', request: createRequest, order },
        { action: 'Get Order via Mediator', request: getRequest, order: retrieved },
      ],
      metadata: {
        decoupling: "Components don't know about each other, only the mediator",
        requestRouting: 'Mediator routes requests to appropriate handlers',
        requestTypes: ['GetOrder', 'CreateOrder'],
      },
    };
  }

  async runTest(): Promise<PatternTestResponse> {
    const order = await this.mediator.send('CreateOrder', {
      accountId: 'ACC-TEST',
      symbol: 'TEST',
      side: OrderSide.BUY,
      quantity: 10,
      price: 100,
    });
    const retrieved = await this.mediator.send('GetOrder', { orderId: order.orderId });
    const missing = await this.mediator.send('GetOrder', { orderId: 'NONEXISTENT' });

    return toTestResponse(PATTERN, [
      check(
        'Mediator Routes Create Request',
        order.orderId.startsWith('ORD-'),
        `Created order ${order.orderId} via mediator`,
      ),
      check(
        'Mediator Routes Get Request',
        retrieved?.orderId === order.orderId,
        `Retrieved order ${retrieved?.orderId} via mediator`,
      ),
      check('Mediator Handles Missing Order', missing === undefined, 'Mediator returns nothing for a missing order'),
    ]);
  }
}
