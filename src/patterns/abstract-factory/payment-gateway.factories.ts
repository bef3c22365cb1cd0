import { GatewayConfig, PaymentGatewayFactory } from './payment-gateway-factory.interface';
import { PaymentGateway } from '../../infrastructure/payment-gateway/payment-gateway.interface';
import { FakePayPalGateway, FakeStripeGateway } from '../../infrastructure/payment-gateway/fake-payment-gateways';
import { RandomSource, createSeededRandom } from '../../common/utils/random.util';

// Gateways made by one factory share its random source, so repeated
// creations continue one seeded sequence instead of restarting it.

export class StripeGatewayFactory implements PaymentGatewayFactory {
  readonly factoryType = 'Stripe';

  constructor(
    private readonly random: RandomSource = createSeededRandom(42),
    private readonly latencyMs = 50,
  ) {}

  createPaymentGateway(): PaymentGateway {
    return new FakeStripeGateway(this.random, this.latencyMs);
  }

  createConfiguration(): GatewayConfig {
    return {
      providerName: 'Stripe',
      settings: {
        ApiKey: 'test-api-key',
        WebhookSecret: 'test-webhook-secret',
        Timeout: '30s',
        RetryPolicy: 'exponential-backoff',
      },
    };
  }
}

export class PayPalGatewayFactory implements PaymentGatewayFactory {
  readonly factoryType = 'PayPal';

  constructor(
    private readonly random: RandomSource = createSeededRandom(43),
    private readonly latencyMs = 80,
  ) {}

  createPaymentGateway(): PaymentGateway {
    return new FakePayPalGateway(this.random, this.latencyMs);
  }

  createConfiguration(): GatewayConfig {
    return {
      providerName: 'PayPal',
      settings: {
        ClientId: 'test-client-id',
        ClientSecret: 'test-secret',
        Mode: 'sandbox',
        Timeout: '45s',
        RetryPolicy: 'linear',
      },
    };
  }
}
