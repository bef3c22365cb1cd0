import { Injectable } from '@nestjs/common';
import { CommandHandler } from './command.handler';
import { CommandAuditEntry, CommandResult } from './command.interface';
import { InMemoryOrderStore } from './order.store';
import { PlaceOrderCommand } from './place-order.command';
import { OrderSide } from '../../domain/entities/order.entity';
import { createOrder } from '../../domain/order.util';
import {
  PatternDemoResponse,
  PatternScenario,
  PatternTestResponse,
} from '../../common/interfaces/pattern-response.interface';
import { check, toTestResponse } from '../../common/utils/pattern-response.util';

const PATTERN = 'Command';

export interface CommandDemoResult {
  executed: { commandId: string; result: CommandResult };
  queued: { commandId: string; queueCount: number };
  auditLog: CommandAuditEntry[];
}

@Injectable()
export class CommandScenario implements PatternScenario {
  constructor(
    private readonly handler: CommandHandler,
    private readonly store: InMemoryOrderStore,
  ) {}

  async runDemo(): Promise<PatternDemoResponse<CommandDemoResult>> {
    const order = createOrder(
      { accountId: 'ACC-001', symbol: 'AAPL', side: OrderSide.BUY, quantity: 100, price: 150 },
      'ORD-CMD-001',
    );
    const command = new PlaceOrderCommand(order, this.store);
    const result = await this.handler.execute(command);

    const queuedOrder = createOrder(
      { accountId: 'ACC-001', symbol: 'MSFT', side: OrderSide.SELL, quantity: 50, price: 300 },
      'ORD-CMD-002',
    );
    const queuedCommand = new PlaceOrderCommand(queuedOrder, this.store);
    await this.handler.queue(queuedCommand);

    return {
      pattern: PATTERN,
      description:
        'Demonstrates command pattern: encapsulates requests as objects with retry, queue, and audit support.',
      result: {
        executed: { commandId: command.commandId, result },
        queued: { commandId: queuedCommand.commandId, queueCount: this.handler.getQueueCount() },
        auditLog: this.handler.getAuditLog().slice(0, 5),
      },
      metadata: {
        retrySupport: true,
        queueSupport: true,
        auditSupport: true,
        undoSupport: true,
      },
    };
  }

  async runTest(): Promise<PatternTestResponse> {
    const order = createOrder(
      { accountId: 'ACC-TEST', symbol: 'TEST', side: OrderSide.BUY, quantity: 10, price: 100 },
      'ORD-TEST-001',
    );
    const command = new PlaceOrderCommand(order, this.store);
    const result = await this.handler.execute(command);
    const persisted = await this.store.get(order.orderId);

    const checks = [
      check('Command Execution', result.success, `Command ${command.commandId} executed: ${result.success}`),
      check('Order Persisted', persisted?.orderId === order.orderId, `Order ${order.orderId} was persisted`),
    ];

    if (command.supportsUndo) {
      const undone = await command.undo();
      const afterUndo = await this.store.get(order.orderId);
      checks.push(
        check('Command Undo', undone.success && afterUndo === undefined, `Command undo: ${undone.success}`),
      );
    }

    await this.handler.queue(new PlaceOrderCommand(order, this.store));
    const queueCount = this.handler.getQueueCount();
    checks.push(check('Command Queue', queueCount > 0, `Commands in queue: ${queueCount}`));

    return toTestResponse(PATTERN, checks);
  }
}
