export enum OrderSide {
  BUY = 'Buy',
  SELL = 'Sell',
}

export enum OrderStatus {
  PENDING = 'Pending',
  PLACED = 'Placed',
  PARTIALLY_FILLED = 'PartiallyFilled',
  FILLED = 'Filled',
  CANCELLED = 'Cancelled',
  REJECTED = 'Rejected',
}

// Orders are never mutated in place; transitions produce a new copy
// with updatedAt set and rowVersion bumped.
export interface Order {
  readonly orderId: string;       // ORD-<hex>
  readonly accountId: string;
  readonly symbol: string;
  readonly side: OrderSide;
  readonly quantity: number;
  readonly price: number;
  readonly limitPrice?: number;
  readonly status: OrderStatus;
  readonly createdAt: Date;
  readonly updatedAt?: Date;
  readonly rowVersion: number;
}

export interface PlaceOrderRequest {
  accountId: string;
  symbol: string;
  side: OrderSide;
  quantity: number;
  limitPrice?: number;
}

export interface CancelOrderRequest {
  orderId: string;
  accountId: string;
}
