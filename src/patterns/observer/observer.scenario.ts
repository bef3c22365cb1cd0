import { Injectable } from '@nestjs/common';
import { InMemoryEventBus } from './event-bus';
import {
  DOMAIN_EVENT_TYPES,
  OrderFilledEvent,
  OrderPlacedEvent,
  orderFilled,
  orderPlaced,
  topicFor,
} from './domain-events';
import { OrderFilledEventHandler, OrderPlacedEventHandler } from './order-event.handlers';
import { EventProducerService } from '../../infrastructure/messaging/event-producer.service';
import {
  PatternDemoResponse,
  PatternScenario,
  PatternTestResponse,
} from '../../common/interfaces/pattern-response.interface';
import { check, toTestResponse } from '../../common/utils/pattern-response.util';

const PATTERN = 'Observer / Pub-Sub';

export interface ObserverDemoResult {
  events: [OrderPlacedEvent, OrderFilledEvent];
  handledBy: Record<string, string[]>;
  topics: string[];
}

@Injectable()
export class ObserverScenario implements PatternScenario {
  constructor(
    private readonly eventBus: InMemoryEventBus,
    private readonly producer: EventProducerService,
    private readonly placedHandler: OrderPlacedEventHandler,
    private readonly filledHandler: OrderFilledEventHandler,
  ) {}

  async runDemo(): Promise<PatternDemoResponse<ObserverDemoResult>> {
    const placed = orderPlaced({
      orderId: 'ORD-OBS-001',
      accountId: 'ACC-001',
      symbol: 'AAPL',
      quantity: 100,
      price: 150.25,
    });
    const filled = orderFilled({
      orderId: 'ORD-OBS-001',
      accountId: 'ACC-001',
      filledQuantity: 100,
      fillPrice: 150.25,
    });

    await this.eventBus.publish(placed);
    await this.eventBus.publish(filled);

    return {
      pattern: PATTERN,
      description:
        'Demonstrates observer pattern: subscribers react to domain events without the publisher knowing them.',
      result: {
        events: [placed, filled],
        handledBy: {
          [this.placedHandler.handlerName]: this.placedHandler.handledEventIds(),
          [this.filledHandler.handlerName]: this.filledHandler.handledEventIds(),
        },
        topics: [topicFor(placed.eventType), topicFor(filled.eventType)],
      },
      metadata: {
        eventTypes: DOMAIN_EVENT_TYPES,
        brokerForwarding: true,
        looseCoupling: true,
      },
    };
  }

  async runTest(): Promise<PatternTestResponse> {
    const placed = orderPlaced({
      orderId: 'ORD-OBS-TEST',
      accountId: 'ACC-TEST',
      symbol: 'TEST',
      quantity: 10,
      price: 100,
    });
    const filled = orderFilled({
      orderId: 'ORD-OBS-TEST',
      accountId: 'ACC-TEST',
      filledQuantity: 10,
      fillPrice: 100,
    });

    await this.eventBus.publish(placed);
    await this.eventBus.publish(filled);

    const forwarded = this.producer
      .getPublishedMessages()
      .filter(m => m.topic === topicFor('OrderPlaced') && m.message === placed);
    const handledBoth =
      this.placedHandler.handledEventIds().includes(placed.eventId) &&
      this.filledHandler.handledEventIds().includes(filled.eventId);

    return toTestResponse(PATTERN, [
      check(
        'Event Publishing',
        forwarded.length === 1,
        `Event ${placed.eventId} forwarded to ${topicFor('OrderPlaced')}`,
      ),
      check(
        'Event Properties',
        placed.eventId.startsWith('EVT-') && placed.eventType === 'OrderPlaced' && placed.timestamp instanceof Date,
        `EventId=${placed.eventId}, EventType=${placed.eventType}`,
      ),
      check('Multiple Event Types', handledBoth, 'OrderPlaced and OrderFilled reached their subscribers'),
    ]);
  }
}
