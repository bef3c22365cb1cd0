import { Test, TestingModule } from '@nestjs/testing';
import { DecoratorScenario } from './decorator.scenario';
import { PAYMENT_PROCESSOR } from './payment-processor.interface';
import { decoratePaymentProcessor } from './payment-processors';
import { MetricsService } from '../../infrastructure/metrics/metrics.service';
import { FakeStripeGateway } from '../../infrastructure/payment-gateway/fake-payment-gateways';
import { fixedRandom } from '../../common/utils/random.util';

describe('DecoratorScenario', () => {
  let scenario: DecoratorScenario;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MetricsService,
        {
          provide: PAYMENT_PROCESSOR,
          useFactory: (metrics: MetricsService) =>
            decoratePaymentProcessor(new FakeStripeGateway(fixedRandom(0.5), 0), metrics),
          inject: [MetricsService],
        },
        DecoratorScenario,
      ],
    }).compile();

    scenario = module.get<DecoratorScenario>(DecoratorScenario);
  });

  it('should process the demo payment and expose the recorded metrics', async () => {
    const { result, metadata } = await scenario.runDemo();

    expect(result.paymentResult.success).toBe(true);
    expect(result.paymentResult.transactionId).toBe('TXN-DEC-001');
    expect(result.metrics.counters['payment.process.count[success=true]']).toBe(1);
    expect(metadata.decoratorStack).toBe('Retry -> Metrics -> Logging -> Core');
  });

  it('should pass all checks', async () => {
    expect((await scenario.runTest()).status).toBe('PASS');
  });
});
