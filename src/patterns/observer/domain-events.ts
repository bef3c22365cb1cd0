import { prefixedId } from '../../common/utils/id.util';

interface EventEnvelope {
  eventId: string;        // EVT-<hex>
  timestamp: Date;
}

export interface OrderPlacedEvent extends EventEnvelope {
  eventType: 'OrderPlaced';
  orderId: string;
  accountId: string;
  symbol: string;
  quantity: number;
  price: number;
}

export interface OrderFilledEvent extends EventEnvelope {
  eventType: 'OrderFilled';
  orderId: string;
  accountId: string;
  filledQuantity: number;
  fillPrice: number;
}

export interface OrderCancelledEvent extends EventEnvelope {
  eventType: 'OrderCancelled';
  orderId: string;
  accountId: string;
  reason: string;
}

export type DomainEvent = OrderPlacedEvent | OrderFilledEvent | OrderCancelledEvent;
export type DomainEventType = DomainEvent['eventType'];
export type EventOfType<T extends DomainEventType> = Extract<DomainEvent, { eventType: T }>;

export const DOMAIN_EVENT_TYPES: readonly DomainEventType[] = ['OrderPlaced', 'OrderFilled', 'OrderCancelled'];

type EventFields<E extends DomainEvent> = Omit<E, 'eventId' | 'timestamp' | 'eventType'>;

function envelope(): EventEnvelope {
  return { eventId: prefixedId('EVT-'), timestamp: new Date() };
}

export function orderPlaced(fields: EventFields<OrderPlacedEvent>): OrderPlacedEvent {
  return { ...envelope(), eventType: 'OrderPlaced', ...fields };
}

export function orderFilled(fields: EventFields<OrderFilledEvent>): OrderFilledEvent {
  return { ...envelope(), eventType: 'OrderFilled', ...fields };
}

export function orderCancelled(fields: EventFields<OrderCancelledEvent>): OrderCancelledEvent {
  return { ...envelope(), eventType: 'OrderCancelled', ...fields };
}

/** Broker topic for an event type, e.g. domain-events.orderplaced */
export function topicFor(eventType: DomainEventType): string {
  return `domain-events.${eventType.toLowerCase()}`;
}
