import { Logger } from '@nestjs/common';
import { Command, CommandResult } from './command.interface';
import { InMemoryOrderStore } from './order.store';
import { Order } from '../../domain/entities/order.entity';
import { prefixedId } from '../../common/utils/id.util';
import { errorMessage } from '../../common/utils/pattern-response.util';

export class PlaceOrderCommand implements Command {
  readonly commandId = prefixedId('CMD-');
  readonly supportsUndo = true;

  private readonly logger = new Logger(PlaceOrderCommand.name);
  // What the store held under this order id before execute; restored by undo.
  private previous?: Order;

  constructor(
    private readonly order: Order,
    private readonly store: InMemoryOrderStore,
  ) {}

  async execute(signal?: AbortSignal): Promise<CommandResult> {
    try {
      signal?.throwIfAborted();
      this.logger.log(`Executing PlaceOrderCommand ${this.commandId} for order ${this.order.orderId}`);

      this.previous = await this.store.get(this.order.orderId);
      await this.store.add(this.order);

      return { success: true, data: { orderId: this.order.orderId } };
    } catch (error) {
      this.logger.error(`Failed to execute PlaceOrderCommand ${this.commandId}`, errorMessage(error));
      return { success: false, errorMessage: errorMessage(error) };
    }
  }

  async undo(signal?: AbortSignal): Promise<CommandResult> {
    try {
      signal?.throwIfAborted();
      if (this.previous) {
        await this.store.update(this.previous);
      } else {
        await this.store.delete(this.order.orderId);
      }

      this.logger.log(`Undone PlaceOrderCommand ${this.commandId}`);
      return { success: true };
    } catch (error) {
      this.logger.error(`Failed to undo PlaceOrderCommand ${this.commandId}`, errorMessage(error));
      return { success: false, errorMessage: errorMessage(error) };
    }
  }
}
