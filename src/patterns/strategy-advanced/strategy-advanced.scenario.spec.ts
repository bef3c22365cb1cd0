import { Test, TestingModule } from '@nestjs/testing';
import { StrategyAdvancedScenario } from './strategy-advanced.scenario';
import { PaymentService } from './payment.service';
import { PaymentProviderResolver } from './payment-provider.resolver';
import { PAYMENT_PROVIDERS } from './payment-provider.interface';
import { createPaymentProviders } from './payment.providers';
import { fixedRandom } from '../../common/utils/random.util';

describe('StrategyAdvancedScenario', () => {
  let scenario: StrategyAdvancedScenario;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        {
          provide: PAYMENT_PROVIDERS,
          useFactory: () => createPaymentProviders({ random: fixedRandom(0.5), latencyMs: 0 }),
        },
        PaymentProviderResolver,
        PaymentService,
        StrategyAdvancedScenario,
      ],
    }).compile();

    scenario = module.get<StrategyAdvancedScenario>(StrategyAdvancedScenario);
  });

  it('should pay through each provider and capture the failures', async () => {
    const { result } = await scenario.runDemo();

    expect(result.providers.map(p => p.key)).toEqual(['stripe', 'paypal', 'crypto']);
    expect(result.payments.map(p => p.result?.providerUsed ?? p.error?.statusCode)).toEqual([
      'stripe',
      'paypal',
      'crypto',
      400,
      404,
    ]);
  });

  it('should pass all checks', async () => {
    const test = await scenario.runTest();

    expect(test.status).toBe('PASS');
    expect(test.checks[2].details).toBe(
      "Payment provider 'venmo' not found. Available providers: stripe, paypal, crypto",
    );
  });
});
