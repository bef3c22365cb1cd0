import { Injectable } from '@nestjs/common';
import { Order } from '../../domain/entities/order.entity';

// Order persistence used by commands and the trading facade.
@Injectable()
export class InMemoryOrderStore {
  private readonly orders = new Map<string, Order>();

  async get(orderId: string): Promise<Order | undefined> {
    return this.orders.get(orderId);
  }

  async add(order: Order): Promise<void> {
    this.orders.set(order.orderId, order);
  }

  async update(order: Order): Promise<void> {
    this.orders.set(order.orderId, order);
  }

  async delete(orderId: string): Promise<void> {
    this.orders.delete(orderId);
  }
}
