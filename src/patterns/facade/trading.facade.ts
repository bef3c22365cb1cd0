import { Injectable, Logger } from '@nestjs/common';
import { CancelOrderRequest, Order, OrderStatus, PlaceOrderRequest } from '../../domain/entities/order.entity';
import { createOrder, withStatus } from '../../domain/order.util';
import { OrderValidatorFactory } from '../factory-method/order-validator.factory';
import { CommandHandler } from '../command/command.handler';
import { InMemoryOrderStore } from '../command/order.store';
import { PlaceOrderCommand } from '../command/place-order.command';
import { InMemoryEventBus } from '../observer/event-bus';
import { orderCancelled, orderPlaced } from '../observer/domain-events';
import { errorMessage } from '../../common/utils/pattern-response.util';

export interface PlaceOrderResult {
  success: boolean;
  order?: Order;
  errors?: string[];
}

export interface CancelOrderResult {
  success: boolean;
  errorMessage?: string;
}

/**
 * Single entry point for order placement and cancellation.
 *
 * Callers never touch the validator factory, the command handler, the order store
 * or the event bus directly. Neither method throws; failures come back as results.
 */
@Injectable()
export class TradingFacade {
  private readonly logger = new Logger(TradingFacade.name);

  constructor(
    private readonly validatorFactory: OrderValidatorFactory,
    private readonly commandHandler: CommandHandler,
    private readonly store: InMemoryOrderStore,
    private readonly eventBus: InMemoryEventBus,
  ) {}

  async placeOrder(request: PlaceOrderRequest, signal?: AbortSignal): Promise<PlaceOrderResult> {
    try {
      const order = createOrder({
        accountId: request.accountId,
        symbol: request.symbol,
        side: request.side,
        quantity: request.quantity,
        price: request.limitPrice ?? 0,
      });

      const validation = this.validatorFactory.createValidator(order).validate(order);
      if (!validation.isValid) {
        return { success: false, errors: validation.errors };
      }

      const commandResult = await this.commandHandler.execute(new PlaceOrderCommand(order, this.store), signal);
      if (!commandResult.success) {
        return { success: false, errors: [commandResult.errorMessage ?? 'Command failed'] };
      }

      await this.eventBus.publish(
        orderPlaced({
          orderId: order.orderId,
          accountId: order.accountId,
          symbol: order.symbol,
          quantity: order.quantity,
          price: order.price,
        }),
        signal,
      );

      this.logger.log(`Order placed via facade: ${order.orderId}`);
      return { success: true, order };
    } catch (error) {
      this.logger.error('Error placing order via facade', error instanceof Error ? error.stack : undefined);
      return { success: false, errors: [errorMessage(error)] };
    }
  }

  async cancelOrder(request: CancelOrderRequest, signal?: AbortSignal): Promise<CancelOrderResult> {
    try {
      const order = await this.store.get(request.orderId);
      if (!order) {
        return { success: false, errorMessage: 'Order not found' };
      }
      if (order.accountId !== request.accountId) {
        return { success: false, errorMessage: 'Unauthorized' };
      }

      await this.store.update(withStatus(order, OrderStatus.CANCELLED));
      await this.eventBus.publish(
        orderCancelled({ orderId: order.orderId, accountId: order.accountId, reason: 'User request' }),
        signal,
      );

      this.logger.log(`Order cancelled via facade: ${order.orderId}`);
      return { success: true };
    } catch (error) {
      this.logger.error('Error cancelling order via facade', error instanceof Error ? error.stack : undefined);
      return { success: false, errorMessage: errorMessage(error) };
    }
  }
}
