import { Module } from '@nestjs/common';
import { MediatorController } from './mediator.controller';
import { MediatorScenario } from './mediator.scenario';
import { Mediator } from './mediator';
import { HandlerRegistry, MEDIATOR_HANDLERS } from './mediator.interface';
import { CreateOrderHandler, GetOrderHandler } from './order-request.handlers';
import { InMemoryRepository } from '../repository/in-memory.repository';
import { ORDER_REPOSITORY } from '../repository/repository.interface';
import { Order } from '../../domain/entities/order.entity';

@Module({
  controllers: [MediatorController],
  providers: [
    {
      provide: ORDER_REPOSITORY,
      useFactory: () => new InMemoryRepository<Order, string>(order => order.orderId),
    },
    GetOrderHandler,
    CreateOrderHandler,
    {
      provide: MEDIATOR_HANDLERS,
      useFactory: (getOrder: GetOrderHandler, createOrder: CreateOrderHandler): HandlerRegistry => ({
        GetOrder: getOrder,
        CreateOrder: createOrder,
      }),
      inject: [GetOrderHandler, CreateOrderHandler],
    },
    Mediator,
    MediatorScenario,
  ],
})
export class MediatorModule {}
