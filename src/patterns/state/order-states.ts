import { InvalidOrderTransitionException } from './invalid-order-transition.exception';
import { Order, OrderStatus } from '../../domain/entities/order.entity';
import { withStatus } from '../../domain/order.util';

/**
 * Behaviour of an order in one lifecycle status. Transitions return a new
 * order (row version bumped) or throw InvalidOrderTransitionException.
 */
export interface OrderState {
  readonly status: OrderStatus;
  place(order: Order): Order;
  /** filledQuantity is cumulative. */
  fill(order: Order, filledQuantity: number): Order;
  cancel(order: Order, reason: string): Order;
  reject(order: Order, reason: string): Order;
}

function fillTo(order: Order, filledQuantity: number): Order {
  return withStatus(order, filledQuantity >= order.quantity ? OrderStatus.FILLED : OrderStatus.PARTIALLY_FILLED);
}

export class PendingOrderState implements OrderState {
  readonly status = OrderStatus.PENDING;

  place(order: Order): Order {
    return withStatus(order, OrderStatus.PLACED);
  }

  fill(): Order {
    throw new InvalidOrderTransitionException(
      this.status,
      'fill',
      'Cannot fill order in Pending state. Must place order first.',
    );
  }

  cancel(order: Order): Order {
    return withStatus(order, OrderStatus.CANCELLED);
  }

  reject(order: Order): Order {
    return withStatus(order, OrderStatus.REJECTED);
  }
}

// Placed and PartiallyFilled behave alike: fills advance, cancel is allowed, reject is not.
abstract class WorkingOrderState implements OrderState {
  abstract readonly status: OrderStatus;

  place(): Order {
    throw new InvalidOrderTransitionException(this.status, 'place', 'Order is already placed.');
  }

  fill(order: Order, filledQuantity: number): Order {
    return fillTo(order, filledQuantity);
  }

  cancel(order: Order): Order {
    return withStatus(order, OrderStatus.CANCELLED);
  }

  reject(): Order {
    throw new InvalidOrderTransitionException(
      this.status,
      'reject',
      `Cannot reject order in ${this.status} state. Use Cancel instead.`,
    );
  }
}

export class PlacedOrderState extends WorkingOrderState {
  readonly status = OrderStatus.PLACED;
}

export class PartiallyFilledOrderState extends WorkingOrderState {
  readonly status = OrderStatus.PARTIALLY_FILLED;
}

abstract class TerminalOrderState implements OrderState {
  abstract readonly status: OrderStatus;

  /** The transition that would lead back into this same status. */
  protected abstract readonly repeated: 'fill' | 'cancel' | 'reject';

  place(): Order {
    return this.refuse('place');
  }

  fill(): Order {
    return this.refuse('fill');
  }

  cancel(): Order {
    return this.refuse('cancel');
  }

  reject(): Order {
    return this.refuse('reject');
  }

  private refuse(transition: 'place' | 'fill' | 'cancel' | 'reject'): never {
    const message =
      transition === this.repeated
        ? `Order is already ${this.status.toLowerCase()}.`
        : `Cannot ${transition} order in ${this.status} state (terminal).`;
    throw new InvalidOrderTransitionException(this.status, transition, message);
  }
}

export class FilledOrderState extends TerminalOrderState {
  readonly status = OrderStatus.FILLED;
  protected readonly repeated = 'fill';
}

export class CancelledOrderState extends TerminalOrderState {
  readonly status = OrderStatus.CANCELLED;
  protected readonly repeated = 'cancel';
}

export class RejectedOrderState extends TerminalOrderState {
  readonly status = OrderStatus.REJECTED;
  protected readonly repeated = 'reject';
}

export function createOrderState(status: OrderStatus): OrderState {
  switch (status) {
    case OrderStatus.PENDING:
      return new PendingOrderState();
    case OrderStatus.PLACED:
      return new PlacedOrderState();
    case OrderStatus.PARTIALLY_FILLED:
      return new PartiallyFilledOrderState();
    case OrderStatus.FILLED:
      return new FilledOrderState();
    case OrderStatus.CANCELLED:
      return new CancelledOrderState();
    case OrderStatus.REJECTED:
      return new RejectedOrderState();
  }
}

export const TERMINAL_STATUSES: readonly OrderStatus[] = [
  OrderStatus.FILLED,
  OrderStatus.CANCELLED,
  OrderStatus.REJECTED,
];
