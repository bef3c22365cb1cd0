import { Injectable } from '@nestjs/common';
import { OrderSnapshot, PortfolioSnapshot, SnapshotMetadata } from './snapshots';
import { OrderSide } from '../../domain/entities/order.entity';
import { createOrder } from '../../domain/order.util';
import {
  PatternDemoResponse,
  PatternScenario,
  PatternTestResponse,
} from '../../common/interfaces/pattern-response.interface';
import { check, toTestResponse } from '../../common/utils/pattern-response.util';

const PATTERN = 'Prototype';

export type PrototypeStep =
  | {
      action: 'Original Snapshot' | 'Cloned Snapshot';
      orderId: string;
      snapshotTimestamp: Date;
      metadata: SnapshotMetadata;
      note?: string;
    }
  | {
      action: 'Portfolio Clone';
      originalPositions: Record<string, number>;
      clonedPositions: Record<string, number>;
      note: string;
    };

@Injectable()
export class PrototypeScenario implements PatternScenario {
  async runDemo(): Promise<PatternDemoResponse<PrototypeStep[]>> {
    const order = createOrder(
      { accountId: 'ACC-001', symbol: 'AAPL', side: OrderSide.BUY, quantity: 100, price: 150 },
      'ORD-PROTO-001',
    );
    const original = new OrderSnapshot(order, { backtestId: 'BT-001', strategy: 'Momentum' });

    const cloned = original.clone();
    cloned.metadata.backtestId = 'BT-002';

    const portfolio = new PortfolioSnapshot([original, cloned], { AAPL: 200 }, 10000);
    const clonedPortfolio = portfolio.clone();
    clonedPortfolio.positions.AAPL = 300;

    return {
      pattern: PATTERN,
      description:
        'Demonstrates prototype pattern: creates deep copies of objects for snapshots, backtests, ' +
        'and cloning scenarios.',
      result: [
        {
          action: 'Original Snapshot',
          orderId: original.order.orderId,
          snapshotTimestamp: original.snapshotTimestamp,
          metadata: original.metadata,
        },
        {
          action: 'Cloned Snapshot',
          orderId: cloned.order.orderId,
          snapshotTimestamp: cloned.snapshotTimestamp,
          metadata: cloned.metadata,
          note: "Clone is independent - modifying clone doesn't affect original",
        },
        {
          action: 'Portfolio Clone',
          originalPositions: portfolio.positions,
          clonedPositions: clonedPortfolio.positions,
          note: 'Portfolio clone is independent',
        },
      ],
      metadata: {
        useCase: 'Backtesting, snapshots, cloning',
        deepCopy: true,
        independence: 'Clones are independent of originals',
      },
    };
  }

  async runTest(): Promise<PatternTestResponse> {
    const order = createOrder(
      { accountId: 'ACC-TEST', symbol: 'TEST', side: OrderSide.BUY, quantity: 10, price: 100 },
      'ORD-TEST',
    );
    const original = new OrderSnapshot(order);
    const cloned = original.clone();
    cloned.metadata.test = 'Modified';

    const portfolio = new PortfolioSnapshot([original], { TEST: 10 }, 1000);
    const clonedPortfolio = portfolio.clone();
    clonedPortfolio.positions.TEST = 20;

    return toTestResponse(PATTERN, [
      check(
        'Clone Creates Copy',
        cloned !== original && cloned.order !== original.order && cloned.order.orderId === original.order.orderId,
        `Cloned snapshot with order ${cloned.order.orderId}`,
      ),
      check('Clone Independence', !('test' in original.metadata), "Modifying clone doesn't affect original"),
      check(
        'Portfolio Clone',
        portfolio.positions.TEST === 10 &&
          clonedPortfolio.positions.TEST === 20 &&
          clonedPortfolio.orders[0] !== portfolio.orders[0],
        'Portfolio clone is independent',
      ),
    ]);
  }
}
