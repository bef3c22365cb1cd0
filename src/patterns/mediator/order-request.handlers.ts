import { Inject, Injectable, Logger } from '@nestjs/common';
import { RequestHandler, RequestOf, ResponseOf } from './mediator.interface';
import { ORDER_REPOSITORY, OrderRepository } from '../repository/repository.interface';
import { createOrder } from '../../domain/order.util';

@Injectable()
export class GetOrderHandler implements RequestHandler<'GetOrder'> {
  private readonly logger = new Logger(GetOrderHandler.name);

  constructor(@Inject(ORDER_REPOSITORY) private readonly orders: OrderRepository) {}

  async handle(request: RequestOf<'GetOrder'>): Promise<ResponseOf<'GetOrder'>> {
    this.logger.log(`Handling GetOrder for ${request.orderId}`);
    return this.orders.getById(request.orderId);
  }
}

@Injectable()
export class CreateOrderHandler implements RequestHandler<'CreateOrder'> {
  private readonly logger = new Logger(CreateOrderHandler.name);

  constructor(@Inject(ORDER_REPOSITORY) private readonly orders: OrderRepository) {}

  async handle(request: RequestOf<'CreateOrder'>): Promise<ResponseOf<'CreateOrder'>> {
    const order = createOrder(request);
    await this.orders.add(order);
    this.logger.log(`Created order ${order.orderId} via mediator`);
    return order;
  }
}
