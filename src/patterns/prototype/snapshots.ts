import { Order } from '../../domain/entities/order.entity';

export interface Prototype<T> {
  /** Deep copy; nothing reachable from the clone is shared with the original. */
  clone(): T;
}

export type SnapshotMetadata = Record<string, unknown>;

// Point-in-time copy of an order, e.g. as the starting state of a backtest.
export class OrderSnapshot implements Prototype<OrderSnapshot> {
  constructor(
    readonly order: Order,
    readonly metadata: SnapshotMetadata = {},
    readonly snapshotTimestamp: Date = new Date(),
  ) {}

  clone(): OrderSnapshot {
    const { createdAt, updatedAt } = this.order;
    return new OrderSnapshot(
      {
        ...this.order,
        createdAt: new Date(createdAt.getTime()),
        updatedAt: updatedAt === undefined ? undefined : new Date(updatedAt.getTime()),
      },
      structuredClone(this.metadata),
      new Date(this.snapshotTimestamp.getTime()),
    );
  }
}

export class PortfolioSnapshot implements Prototype<PortfolioSnapshot> {
  constructor(
    readonly orders: OrderSnapshot[],
    /** Quantity held per symbol. */
    readonly positions: Record<string, number>,
    readonly cashBalance: number,
    readonly snapshotTimestamp: Date = new Date(),
  ) {}

  clone(): PortfolioSnapshot {
    return new PortfolioSnapshot(
      this.orders.map(o => o.clone()),
      { ...this.positions },
      this.cashBalance,
      new Date(this.snapshotTimestamp.getTime()),
    );
  }
}
