import { Inject, Injectable } from '@nestjs/common';
import { ORDER_REPOSITORY, OrderRepository } from './repository.interface';
import { InMemoryUnitOfWork } from './in-memory.unit-of-work';
import { Order, OrderSide, OrderStatus } from '../../domain/entities/order.entity';
import { createOrder, withStatus } from '../../domain/order.util';
import {
  PatternDemoResponse,
  PatternScenario,
  PatternTestResponse,
} from '../../common/interfaces/pattern-response.interface';
import { check, toTestResponse } from '../../common/utils/pattern-response.util';

const PATTERN = 'Repository';

export type RepositoryStep =
  | { action: 'Add Order'; order: Order }
  | { action: 'Retrieve Order'; found: boolean; orderId?: string }
  | { action: 'Update Order'; orderId: string; newStatus: OrderStatus }
  | { action: 'Unit of Work'; description: string; orderId: string; changesSaved: number }
  | { action: 'Rollback'; orderId: string; persisted: boolean };

@Injectable()
export class RepositoryScenario implements PatternScenario {
  constructor(
    @Inject(ORDER_REPOSITORY) private readonly orders: OrderRepository,
    private readonly unitOfWork: InMemoryUnitOfWork,
  ) {}

  async runDemo(): Promise<PatternDemoResponse<RepositoryStep[]>> {
    const steps: RepositoryStep[] = [];

    const order = createOrder(
      { accountId: 'ACC-001', symbol: 'AAPL', side: OrderSide.BUY, quantity: 100, price: 150 },
      'ORD-REPO-001',
    );
    await this.orders.add(order);
    steps.push({ action: 'Add Order', order });

    const retrieved = await this.orders.getById(order.orderId);
    steps.push({ action: 'Retrieve Order', found: retrieved !== undefined, orderId: retrieved?.orderId });

    if (retrieved) {
      const updated = withStatus(retrieved, OrderStatus.PLACED);
      await this.orders.update(updated);
      steps.push({ action: 'Update Order', orderId: updated.orderId, newStatus: updated.status });
    }

    const second = createOrder(
      { accountId: 'ACC-001', symbol: 'MSFT', side: OrderSide.SELL, quantity: 50, price: 300 },
      'ORD-REPO-002',
    );
    await this.unitOfWork.beginTransaction();
    await this.unitOfWork.registerChange(() => this.orders.add(second));
    const changesSaved = await this.unitOfWork.saveChanges();
    await this.unitOfWork.commit();
    steps.push({
      action: 'Unit of Work',
      description: 'Multiple operations in transaction',
      orderId: second.orderId,
      changesSaved,
    });

    const discarded = createOrder(
      { accountId: 'ACC-001', symbol: 'GOOGL', side: OrderSide.BUY, quantity: 5, price: 140 },
      'ORD-REPO-003',
    );
    await this.unitOfWork.beginTransaction();
    await this.unitOfWork.registerChange(() => this.orders.add(discarded));
    await this.unitOfWork.rollback();
    steps.push({
      action: 'Rollback',
      orderId: discarded.orderId,
      persisted: await this.orders.exists(discarded.orderId),
    });

    return {
      pattern: PATTERN,
      description:
        'Demonstrates repository pattern: abstracts data access, enables testing. ' +
        'Includes Unit of Work for transaction coordination.',
      result: steps,
      metadata: {
        abstraction: 'Data access abstracted from business logic',
        testability: 'Easy to mock or use in-memory implementation',
        unitOfWork: 'Coordinates multiple repository operations in transactions',
      },
    };
  }

  async runTest(): Promise<PatternTestResponse> {
    const order = createOrder(
      { accountId: 'ACC-TEST', symbol: 'TEST', side: OrderSide.BUY, quantity: 10, price: 100 },
      'ORD-TEST-001',
    );
    await this.orders.add(order);
    const retrieved = await this.orders.getById(order.orderId);

    await this.orders.update(withStatus(order, OrderStatus.PLACED));
    const updated = await this.orders.getById(order.orderId);

    await this.orders.delete(order.orderId);
    const deleted = await this.orders.getById(order.orderId);

    // Fresh id so a repeated run still sees the change deferred.
    const saved = createOrder({
      accountId: 'ACC-TEST',
      symbol: 'TEST',
      side: OrderSide.BUY,
      quantity: 10,
      price: 100,
    });
    await this.unitOfWork.beginTransaction();
    await this.unitOfWork.registerChange(() => this.orders.add(saved));
    const deferred = !(await this.orders.exists(saved.orderId));
    const changesSaved = await this.unitOfWork.saveChanges();
    await this.unitOfWork.commit();
    const uowRetrieved = await this.orders.getById(saved.orderId);

    return toTestResponse(PATTERN, [
      check(
        'Repository Add and Retrieve',
        retrieved?.orderId === order.orderId,
        `Retrieved order ${retrieved?.orderId}`,
      ),
      check(
        'Repository Update',
        updated?.status === OrderStatus.PLACED,
        `Updated order status to ${updated?.status}`,
      ),
      check('Repository Delete', deleted === undefined, 'Order was deleted'),
      check(
        'Unit of Work',
        deferred && changesSaved === 1 && uowRetrieved !== undefined,
        `Unit of Work saved order ${uowRetrieved?.orderId} (${changesSaved} change(s))`,
      ),
    ]);
  }
}
