import { Module } from '@nestjs/common';
import { ObserverController } from './observer.controller';
import { ObserverScenario } from './observer.scenario';
import { InMemoryEventBus } from './event-bus';
import { EventSubscriptions } from './event-subscriptions';
import { OrderCancelledEventHandler, OrderFilledEventHandler, OrderPlacedEventHandler } from './order-event.handlers';

@Module({
  controllers: [ObserverController],
  providers: [
    InMemoryEventBus,
    OrderPlacedEventHandler,
    OrderFilledEventHandler,
    OrderCancelledEventHandler,
    EventSubscriptions,
    ObserverScenario,
  ],
  exports: [InMemoryEventBus],
})
export class ObserverModule {}
