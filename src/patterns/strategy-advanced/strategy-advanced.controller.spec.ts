import { NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { StrategyAdvancedController } from './strategy-advanced.controller';
import { PaymentService } from './payment.service';
import { PaymentProviderResolver } from './payment-provider.resolver';
import { PAYMENT_PROVIDERS } from './payment-provider.interface';
import { createPaymentProviders } from './payment.providers';
import { fixedRandom } from '../../common/utils/random.util';

describe('StrategyAdvancedController', () => {
  let controller: StrategyAdvancedController;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [StrategyAdvancedController],
      providers: [
        {
          provide: PAYMENT_PROVIDERS,
          useFactory: () => createPaymentProviders({ random: fixedRandom(0.99), latencyMs: 0 }),
        },
        PaymentProviderResolver,
        PaymentService,
      ],
    }).compile();

    controller = module.get<StrategyAdvancedController>(StrategyAdvancedController);
  });

  it('should return the provider result', async () => {
    const result = await controller.processPayment({
      amount: 0.75,
      currency: 'EUR',
      providerKey: 'paypal',
      customerEmail: 'customer@example.com',
    });

    expect(result.status).toBe('Success');
    expect(result.message).toBe('Payment processed successfully via PayPal');
  });

  it('should surface unknown providers as NotFoundException', async () => {
    await expect(
      controller.processPayment({ amount: 1, currency: 'USD', providerKey: 'bank', customerEmail: 'a@example.com' }),
    ).rejects.toBeInstanceOf(NotFoundException);
  });

  it('should list providers', () => {
    expect(controller.getProviders().map(p => p.key)).toEqual(['stripe', 'paypal', 'crypto']);
  });
});
