import Decimal from 'decimal.js';
import { Order, OrderSide, OrderStatus } from './entities/order.entity';
import { multiply } from '../common/utils/decimal.util';
import { prefixedId } from '../common/utils/id.util';

export interface NewOrderFields {
  accountId: string;
  symbol: string;
  side: OrderSide;
  quantity: number;
  price: number;
  limitPrice?: number;
}

export function newOrderId(): string {
  return prefixedId('ORD-');
}

/** Fresh Pending order at row version 0. */
export function createOrder(fields: NewOrderFields, orderId: string = newOrderId()): Order {
  const order: Order = {
    orderId,
    accountId: fields.accountId,
    symbol: fields.symbol,
    side: fields.side,
    quantity: fields.quantity,
    price: fields.price,
    status: OrderStatus.PENDING,
    createdAt: new Date(),
    rowVersion: 0,
  };
  return fields.limitPrice === undefined ? order : { ...order, limitPrice: fields.limitPrice };
}

export function withStatus(order: Order, status: OrderStatus): Order {
  return {
    ...order,
    status,
    updatedAt: new Date(),
    rowVersion: order.rowVersion + 1,
  };
}

export function orderValue(order: Pick<Order, 'quantity' | 'price'>): Decimal {
  return multiply(order.quantity, order.price);
}
