import { Test, TestingModule } from '@nestjs/testing';
import { ObserverScenario } from './observer.scenario';
import { InMemoryEventBus } from './event-bus';
import { EventSubscriptions } from './event-subscriptions';
import { OrderCancelledEventHandler, OrderFilledEventHandler, OrderPlacedEventHandler } from './order-event.handlers';
import { EventProducerService } from '../../infrastructure/messaging/event-producer.service';

describe('ObserverScenario', () => {
  let module: TestingModule;
  let scenario: ObserverScenario;

  beforeEach(async () => {
    module = await Test.createTestingModule({
      providers: [
        EventProducerService,
        InMemoryEventBus,
        OrderPlacedEventHandler,
        OrderFilledEventHandler,
        OrderCancelledEventHandler,
        EventSubscriptions,
        ObserverScenario,
      ],
    }).compile();
    await module.init();

    scenario = module.get<ObserverScenario>(ObserverScenario);
  });

  it('should subscribe one handler per event type on start-up', () => {
    const bus = module.get<InMemoryEventBus>(InMemoryEventBus);

    expect(bus.subscriberCount('OrderPlaced')).toBe(1);
    expect(bus.subscriberCount('OrderFilled')).toBe(1);
    expect(bus.subscriberCount('OrderCancelled')).toBe(1);
  });

  it('should report which handlers saw the demo events', async () => {
    const { result } = await scenario.runDemo();
    const [placed, filled] = result.events;

    expect(placed.orderId).toBe('ORD-OBS-001');
    expect(filled.fillPrice).toBe(150.25);
    expect(result.handledBy.OrderPlacedEventHandler).toEqual([placed.eventId]);
    expect(result.handledBy.OrderFilledEventHandler).toEqual([filled.eventId]);
    expect(result.topics).toEqual(['domain-events.orderplaced', 'domain-events.orderfilled']);
  });

  it('should pass all checks', async () => {
    const response = await scenario.runTest();

    expect(response.pattern).toBe('Observer / Pub-Sub');
    expect(response.checks.map(c => c.name)).toEqual([
      'Event Publishing',
      'Event Properties',
      'Multiple Event Types',
    ]);
    expect(response.status).toBe('PASS');
  });
});
