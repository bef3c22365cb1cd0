import { Injectable } from '@nestjs/common';
import { CancelOrderResult, PlaceOrderResult, TradingFacade } from './trading.facade';
import { CancelOrderRequest, OrderSide, PlaceOrderRequest } from '../../domain/entities/order.entity';
import {
  PatternDemoResponse,
  PatternScenario,
  PatternTestResponse,
} from '../../common/interfaces/pattern-response.interface';
import { check, toTestResponse } from '../../common/utils/pattern-response.util';

const PATTERN = 'Facade';

export type FacadeStep =
  | { action: 'Place Order'; request: PlaceOrderRequest; result: PlaceOrderResult }
  | { action: 'Cancel Order'; request: CancelOrderRequest; result: CancelOrderResult };

@Injectable()
export class FacadeScenario implements PatternScenario {
  constructor(private readonly facade: TradingFacade) {}

  async runDemo(): Promise<PatternDemoResponse<FacadeStep[]>> {
    const steps: FacadeStep[] = [];

    const placeRequest: PlaceOrderRequest = {
      accountId: 'ACC-001',
      symbol: 'AAPL',
      side: OrderSide.BUY,
      quantity: 100,
      limitPrice: 150,
    };
    const placeResult = await this.facade.placeOrder(placeRequest);
    steps.push({ action: 'Place Order', request: placeRequest, result: placeResult });

    if (placeResult.success && placeResult.order) {
      const cancelRequest: CancelOrderRequest = { orderId: placeResult.order.orderId, accountId: 'ACC-001' };
      steps.push({
        action: 'Cancel Order',
        request: cancelRequest,
        result: await this.facade.cancelOrder(cancelRequest),
      });
    }

    return {
      pattern: PATTERN,
      description:
        'Demonstrates facade pattern: simplifies the trading subsystem (validation, persistence, events) ' +
        'behind a simple interface.',
      result: steps,
      metadata: {
        subsystemComponents: ['Validator', 'Repository', 'CommandHandler', 'EventBus'],
        simplifiedInterface: true,
      },
    };
  }

  async runTest(): Promise<PatternTestResponse> {
    const placed = await this.facade.placeOrder({
      accountId: 'ACC-TEST',
      symbol: 'TEST',
      side: OrderSide.BUY,
      quantity: 10,
      limitPrice: 100,
    });
    const invalid = await this.facade.placeOrder({
      accountId: 'ACC-TEST',
      symbol: '',
      side: OrderSide.BUY,
      quantity: -10,
      limitPrice: 100,
    });
    const invalidErrors = invalid.errors ?? [];

    const checks = [
      check('Facade Places Order', placed.success && placed.order !== undefined, `Order placed: ${placed.order?.orderId}`),
      check(
        'Facade Validates Orders',
        !invalid.success && invalidErrors.length > 0,
        `Validation errors: ${invalidErrors.join(', ')}`,
      ),
    ];

    if (placed.success && placed.order) {
      const cancelled = await this.facade.cancelOrder({ orderId: placed.order.orderId, accountId: 'ACC-TEST' });
      checks.push(check('Facade Cancels Orders', cancelled.success, `Order cancelled: ${cancelled.success}`));
    }

    return toTestResponse(PATTERN, checks);
  }
}
