import { Test, TestingModule } from '@nestjs/testing';
import { TradingFacade } from './trading.facade';
import { FacadeScenario } from './facade.scenario';
import { OrderValidatorFactory } from '../factory-method/order-validator.factory';
import { CommandHandler } from '../command/command.handler';
import { InMemoryOrderStore } from '../command/order.store';
import { InMemoryEventBus } from '../observer/event-bus';
import { MetricsService } from '../../infrastructure/metrics/metrics.service';
import { EventProducerService } from '../../infrastructure/messaging/event-producer.service';
import { OrderSide, OrderStatus, PlaceOrderRequest } from '../../domain/entities/order.entity';

describe('TradingFacade', () => {
  let facade: TradingFacade;
  let store: InMemoryOrderStore;
  let producer: EventProducerService;
  let scenario: FacadeScenario;

  const request: PlaceOrderRequest = {
    accountId: 'ACC-001',
    symbol: 'AAPL',
    side: OrderSide.BUY,
    quantity: 100,
    limitPrice: 150,
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MetricsService,
        EventProducerService,
        OrderValidatorFactory,
        CommandHandler,
        InMemoryOrderStore,
        InMemoryEventBus,
        TradingFacade,
        FacadeScenario,
      ],
    }).compile();

    facade = module.get<TradingFacade>(TradingFacade);
    store = module.get<InMemoryOrderStore>(InMemoryOrderStore);
    producer = module.get<EventProducerService>(EventProducerService);
    scenario = module.get<FacadeScenario>(FacadeScenario);
  });

  describe('placeOrder', () => {
    it('should persist a Pending order priced at the limit price and publish OrderPlaced', async () => {
      const result = await facade.placeOrder(request);

      expect(result.success).toBe(true);
      expect(result.order?.status).toBe(OrderStatus.PENDING);
      expect(result.order?.price).toBe(150);
      expect(result.order?.orderId).toMatch(/^ORD-/);

      const stored = await store.get(result.order?.orderId ?? '');
      expect(stored).toEqual(result.order);
      expect(producer.getPublishedMessages().map(m => m.topic)).toEqual(['domain-events.orderplaced']);
    });

    it('should return validation errors without persisting or publishing', async () => {
      const result = await facade.placeOrder({ ...request, symbol: '', quantity: -10 });

      expect(result).toEqual({
        success: false,
        errors: ['Quantity must be greater than zero', 'Symbol is required'],
      });
      expect(producer.getPublishedMessages()).toEqual([]);
    });

    it('should reject a market order because it is priced at zero', async () => {
      const result = await facade.placeOrder({
        accountId: 'ACC-001',
        symbol: 'AAPL',
        side: OrderSide.BUY,
        quantity: 100,
      });

      expect(result.errors).toEqual(['Price must be greater than zero']);
    });

    it('should report the command error once every retry has failed', async () => {
      jest.spyOn(store, 'add').mockRejectedValue(new Error('store offline'));

      const result = await facade.placeOrder(request);

      expect(result).toEqual({ success: false, errors: ['store offline'] });
    });
  });

  describe('cancelOrder', () => {
    it('should cancel the stored order and publish OrderCancelled', async () => {
      const placed = await facade.placeOrder(request);
      const orderId = placed.order?.orderId ?? '';

      const result = await facade.cancelOrder({ orderId, accountId: 'ACC-001' });

      expect(result).toEqual({ success: true });
      const stored = await store.get(orderId);
      expect(stored?.status).toBe(OrderStatus.CANCELLED);
      expect(stored?.rowVersion).toBe(1);
      expect(producer.getPublishedMessages().map(m => m.topic)).toEqual([
        'domain-events.orderplaced',
        'domain-events.ordercancelled',
      ]);
    });

    it('should report a missing order', async () => {
      expect(await facade.cancelOrder({ orderId: 'ORD-NONE', accountId: 'ACC-001' })).toEqual({
        success: false,
        errorMessage: 'Order not found',
      });
    });

    it('should refuse to cancel another account\'s order', async () => {
      const placed = await facade.placeOrder(request);

      const result = await facade.cancelOrder({ orderId: placed.order?.orderId ?? '', accountId: 'ACC-OTHER' });

      expect(result).toEqual({ success: false, errorMessage: 'Unauthorized' });
    });
  });

  describe('FacadeScenario', () => {
    it('should place then cancel in the demo', async () => {
      const { result } = await scenario.runDemo();

      expect(result.map(step => step.action)).toEqual(['Place Order', 'Cancel Order']);
      expect(result.every(step => step.result.success)).toBe(true);
    });

    it('should pass all checks', async () => {
      const response = await scenario.runTest();

      expect(response.checks).toHaveLength(3);
      expect(response.status).toBe('PASS');
    });
  });
});
