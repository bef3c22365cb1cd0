import { BadRequestException, Injectable, Scope } from '@nestjs/common';
import { Order, OrderSide } from '../../domain/entities/order.entity';
import { createOrder } from '../../domain/order.util';

interface OrderDraft {
  accountId?: string;
  symbol?: string;
  side?: OrderSide;
  quantity?: number;
  price?: number;
  limitPrice?: number;
}

/**
 * Fluent, step-by-step Order construction.
 * Transient: every consumer gets its own builder, so drafts are never shared.
 */
@Injectable({ scope: Scope.TRANSIENT })
export class OrderBuilder {
  private draft: OrderDraft = {};

  withAccount(accountId: string): this {
    this.draft.accountId = accountId;
    return this;
  }

  withSymbol(symbol: string): this {
    this.draft.symbol = symbol;
    return this;
  }

  withSide(side: OrderSide): this {
    this.draft.side = side;
    return this;
  }

  withQuantity(quantity: number): this {
    this.draft.quantity = quantity;
    return this;
  }

  withPrice(price: number): this {
    this.draft.price = price;
    return this;
  }

  withLimitPrice(limitPrice: number): this {
    this.draft.limitPrice = limitPrice;
    return this;
  }

  reset(): this {
    this.draft = {};
    return this;
  }

  /**
   * Produces a Pending order with a fresh id.
   * @throws BadRequestException naming the first missing or invalid field
   */
  build(): Order {
    const { accountId, symbol, side, quantity, price, limitPrice } = this.draft;

    if (!accountId) {
      throw new BadRequestException('Account ID is required');
    }
    if (!symbol) {
      throw new BadRequestException('Symbol is required');
    }
    if (side === undefined) {
      throw new BadRequestException('Side is required');
    }
    if (quantity === undefined || quantity <= 0) {
      throw new BadRequestException('Quantity must be greater than zero');
    }
    if (price === undefined || price <= 0) {
      throw new BadRequestException('Price must be greater than zero');
    }

    return createOrder({ accountId, symbol, side, quantity, price, limitPrice });
  }
}
