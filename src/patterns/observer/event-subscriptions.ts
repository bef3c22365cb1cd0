import { Injectable, OnModuleInit } from '@nestjs/common';
import { InMemoryEventBus } from './event-bus';
import { OrderCancelledEventHandler, OrderFilledEventHandler, OrderPlacedEventHandler } from './order-event.handlers';

// Wires the order event handlers onto the bus once the module has started.
@Injectable()
export class EventSubscriptions implements OnModuleInit {
  constructor(
    private readonly eventBus: InMemoryEventBus,
    private readonly placedHandler: OrderPlacedEventHandler,
    private readonly filledHandler: OrderFilledEventHandler,
    private readonly cancelledHandler: OrderCancelledEventHandler,
  ) {}

  onModuleInit(): void {
    this.eventBus.subscribe('OrderPlaced', this.placedHandler);
    this.eventBus.subscribe('OrderFilled', this.filledHandler);
    this.eventBus.subscribe('OrderCancelled', this.cancelledHandler);
  }
}
