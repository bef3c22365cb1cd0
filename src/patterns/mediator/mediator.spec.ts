import { Test, TestingModule } from '@nestjs/testing';
import { Mediator } from './mediator';
import { MediatorScenario } from './mediator.scenario';
import { HandlerRegistry, MEDIATOR_HANDLERS } from './mediator.interface';
import { CreateOrderHandler, GetOrderHandler } from './order-request.handlers';
import { InMemoryRepository } from '../repository/in-memory.repository';
import { ORDER_REPOSITORY } from '../repository/repository.interface';
import { Order, OrderSide, OrderStatus } from '../../domain/entities/order.entity';

describe('Mediator', () => {
  let mediator: Mediator;
  let repository: InMemoryRepository<Order, string>;
  let scenario: MediatorScenario;

  beforeEach(async () => {
    repository = new InMemoryRepository<Order, string>(order => order.orderId);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        { provide: ORDER_REPOSITORY, useValue: repository },
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
    }).compile();

    mediator = module.get<Mediator>(Mediator);
    scenario = module.get<MediatorScenario>(MediatorScenario);
  });

  it('should route CreateOrder to its handler and persist a Pending order', async () => {
    const order = await mediator.send('CreateOrder', {
      accountId: 'ACC-001',
      symbol: 'AAPL',
      side: OrderSide.BUY,
      quantity: 100,
      price: 150,
    });

    expect(order.orderId).toMatch(/^ORD-/);
    expect(order.status).toBe(OrderStatus.PENDING);
    expect(await repository.getById(order.orderId)).toEqual(order);
  });

  it('should route GetOrder to its handler', async () => {
    const created = await mediator.send('CreateOrder', {
      accountId: 'ACC-001',
      symbol: 'MSFT',
      side: OrderSide.SELL,
      quantity: 5,
      price: 300,
    });

    expect(await mediator.send('GetOrder', { orderId: created.orderId })).toEqual(created);
    expect(await mediator.send('GetOrder', { orderId: 'NONEXISTENT' })).toBeUndefined();
  });

  it('should return the created order from the demo read-back', async () => {
    const { result } = await scenario.runDemo();
    const [created, fetched] = result;

    expect(created.order?.symbol).toBe('AAPL');
    expect(fetched.order).toEqual(created.order);
  });

  it('should pass all checks', async () => {
    expect((await scenario.runTest()).status).toBe('PASS');
  });
});
