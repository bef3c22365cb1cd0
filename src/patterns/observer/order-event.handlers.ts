import { Injectable, Logger } from '@nestjs/common';
import { EventHandler } from './event-bus';
import { DomainEvent, OrderCancelledEvent, OrderFilledEvent, OrderPlacedEvent } from './domain-events';

// Remembers which events reached it, for the scenario checks.
abstract class RecordingHandler<E extends DomainEvent> implements EventHandler<E> {
  protected readonly logger: Logger;
  private readonly handled: string[] = [];

  constructor(readonly handlerName: string) {
    this.logger = new Logger(handlerName);
  }

  async handle(event: E): Promise<void> {
    this.describe(event);
    this.handled.push(event.eventId);
  }

  handledEventIds(): string[] {
    return [...this.handled];
  }

  protected abstract describe(event: E): void;
}

@Injectable()
export class OrderPlacedEventHandler extends RecordingHandler<OrderPlacedEvent> {
  constructor() {
    super(OrderPlacedEventHandler.name);
  }

  protected describe(event: OrderPlacedEvent): void {
    this.logger.log(
      `Order placed event handled: OrderId=${event.orderId}, Symbol=${event.symbol}, Quantity=${event.quantity}`,
    );
  }
}

@Injectable()
export class OrderFilledEventHandler extends RecordingHandler<OrderFilledEvent> {
  constructor() {
    super(OrderFilledEventHandler.name);
  }

  protected describe(event: OrderFilledEvent): void {
    this.logger.log(
      `Order filled event handled: OrderId=${event.orderId}, FilledQuantity=${event.filledQuantity}, FillPrice=${event.fillPrice}`,
    );
  }
}

@Injectable()
export class OrderCancelledEventHandler extends RecordingHandler<OrderCancelledEvent> {
  constructor() {
    super(OrderCancelledEventHandler.name);
  }

  protected describe(event: OrderCancelledEvent): void {
    this.logger.log(`Order cancelled event handled: OrderId=${event.orderId}, Reason=${event.reason}`);
  }
}
