import { Injectable, Logger } from '@nestjs/common';
import { TERMINAL_STATUSES, createOrderState } from './order-states';
import { InvalidOrderTransitionException } from './invalid-order-transition.exception';
import { Order, OrderSide, OrderStatus } from '../../domain/entities/order.entity';
import { createOrder } from '../../domain/order.util';
import {
  PatternDemoResponse,
  PatternScenario,
  PatternTestResponse,
} from '../../common/interfaces/pattern-response.interface';
import { check, toTestResponse } from '../../common/utils/pattern-response.util';

const PATTERN = 'State';

export type StateStep =
  | { step: 'Initial' | 'Place' | 'Fill'; state: OrderStatus; order: Order }
  | { step: 'Invalid Cancel'; success: boolean; message: string };

@Injectable()
export class StateScenario implements PatternScenario {
  private readonly logger = new Logger(StateScenario.name);

  async runDemo(): Promise<PatternDemoResponse<StateStep[]>> {
    const steps: StateStep[] = [];

    let order = createOrder(
      { accountId: 'ACC-001', symbol: 'AAPL', side: OrderSide.BUY, quantity: 100, price: 150 },
      'ORD-STATE-001',
    );
    steps.push({ step: 'Initial', state: order.status, order });

    order = createOrderState(order.status).place(order);
    steps.push({ step: 'Place', state: order.status, order });

    order = createOrderState(order.status).fill(order, 100);
    steps.push({ step: 'Fill', state: order.status, order });

    steps.push(this.attemptCancel(order));

    return {
      pattern: PATTERN,
      description: 'Demonstrates state pattern: encapsulates order lifecycle state transitions with validation.',
      result: steps,
      metadata: {
        stateTransitions: 'Pending -> Placed -> PartiallyFilled -> Filled, or Cancelled/Rejected',
        terminalStates: TERMINAL_STATUSES,
        validation: 'Invalid transitions are refused with HTTP 409',
      },
    };
  }

  async runTest(): Promise<PatternTestResponse> {
    const pending = createOrder(
      { accountId: 'ACC-TEST', symbol: 'TEST', side: OrderSide.BUY, quantity: 10, price: 100 },
      'ORD-TEST',
    );
    const placed = createOrderState(pending.status).place(pending);
    const partial = createOrderState(placed.status).fill(placed, 4);
    const filled = createOrderState(partial.status).fill(partial, 10);
    const refused = this.attemptCancel(filled);

    return toTestResponse(PATTERN, [
      check('Pending to Placed Transition', placed.status === OrderStatus.PLACED, `Order status: ${placed.status}`),
      check(
        'Partial Fill Transition',
        partial.status === OrderStatus.PARTIALLY_FILLED,
        `Order status: ${partial.status}`,
      ),
      check('Placed to Filled Transition', filled.status === OrderStatus.FILLED, `Order status: ${filled.status}`),
      check(
        'Invalid Transition Prevention',
        refused.step === 'Invalid Cancel' && refused.success,
        refused.step === 'Invalid Cancel' ? refused.message : 'Cancel was not attempted',
      ),
    ]);
  }

  // Cancelling a terminal order must be refused; success means it was.
  private attemptCancel(order: Order): StateStep {
    try {
      createOrderState(order.status).cancel(order, 'Test');
      return { step: 'Invalid Cancel', success: false, message: 'Should have thrown exception' };
    } catch (error) {
      if (!(error instanceof InvalidOrderTransitionException)) {
        throw error;
      }
      this.logger.debug(`Transition refused: ${error.message}`);
      return { step: 'Invalid Cancel', success: true, message: error.message };
    }
  }
}
