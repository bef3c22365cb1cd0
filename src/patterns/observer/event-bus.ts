import { Injectable, Logger } from '@nestjs/common';
import { DomainEvent, DomainEventType, EventOfType, topicFor } from './domain-events';
import { EventProducerService } from '../../infrastructure/messaging/event-producer.service';
import { errorMessage } from '../../common/utils/pattern-response.util';

export interface EventHandler<E extends DomainEvent> {
  readonly handlerName: string;
  handle(event: E, signal?: AbortSignal): Promise<void>;
}

/**
 * In-process pub/sub. Handlers run in subscription order; a failing handler
 * is logged and does not stop the others. Every event is then forwarded to the broker.
 */
@Injectable()
export class InMemoryEventBus {
  private readonly logger = new Logger(InMemoryEventBus.name);
  private readonly handlers = new Map<DomainEventType, EventHandler<DomainEvent>[]>();

  constructor(private readonly producer: EventProducerService) {}

  subscribe<T extends DomainEventType>(eventType: T, handler: EventHandler<EventOfType<T>>): void {
    const existing = this.handlers.get(eventType) ?? [];
    this.handlers.set(eventType, [...existing, handler]);
    this.logger.log(`Subscribed handler ${handler.handlerName} to event ${eventType}`);
  }

  async publish(event: DomainEvent, signal?: AbortSignal): Promise<void> {
    this.logger.log(`Publishing event ${event.eventType} ${event.eventId}`);

    for (const handler of this.handlers.get(event.eventType) ?? []) {
      try {
        await handler.handle(event, signal);
      } catch (error) {
        this.logger.error(
          `Error handling event ${event.eventId} with handler ${handler.handlerName}: ${errorMessage(error)}`,
        );
      }
    }

    try {
      await this.producer.publish(topicFor(event.eventType), event);
    } catch (error) {
      // TODO: park undelivered events in an outbox and retry them from a background job
      this.logger.warn(`Failed to forward event ${event.eventId} to the broker: ${errorMessage(error)}`);
    }
  }

  subscriberCount(eventType: DomainEventType): number {
    return this.handlers.get(eventType)?.length ?? 0;
  }
}
