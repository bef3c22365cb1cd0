import { PayPalGatewayFactory, StripeGatewayFactory } from './payment-gateway.factories';
import { fixedRandom } from '../../common/utils/random.util';

describe('Payment gateway factories', () => {
  describe('StripeGatewayFactory', () => {
    const factory = new StripeGatewayFactory(fixedRandom(0.5), 0);

    it('should create a Stripe gateway and matching config', () => {
      expect(factory.factoryType).toBe('Stripe');
      expect(factory.createPaymentGateway().providerName).toBe('Stripe');
      expect(factory.createConfiguration()).toEqual({
        providerName: 'Stripe',
        settings: {
          ApiKey: 'test-api-key',
          WebhookSecret: 'test-webhook-secret',
          Timeout: '30s',
          RetryPolicy: 'exponential-backoff',
        },
      });
    });

    it('should produce gateways that process payments', async () => {
      const result = await factory.createPaymentGateway().processPayment({
        transactionId: 'TXN-1',
        amount: 10,
        currency: 'USD',
        accountId: 'ACC-001',
      });

      expect(result.success).toBe(true);
      expect(result.transactionId).toBe('TXN-1');
    });
  });

  describe('PayPalGatewayFactory', () => {
    const factory = new PayPalGatewayFactory(fixedRandom(0.5), 0);

    it('should create a PayPal gateway and sandbox config', () => {
      const config = factory.createConfiguration();

      expect(factory.createPaymentGateway().providerName).toBe('PayPal');
      expect(config.providerName).toBe('PayPal');
      expect(config.settings.Mode).toBe('sandbox');
      expect(config.settings.Timeout).toBe('45s');
      expect(config.settings.RetryPolicy).toBe('linear');
    });
  });

  it('should continue one random sequence across created gateways', async () => {
    const draws = [0.9, 0.01];
    let index = 0;
    const factory = new StripeGatewayFactory(() => draws[index++], 0);
    const request = { transactionId: 'TXN-2', amount: 5, currency: 'USD', accountId: 'ACC-001' };

    const first = await factory.createPaymentGateway().processPayment(request);
    const second = await factory.createPaymentGateway().processPayment(request);

    expect(first.success).toBe(true);
    expect(second.success).toBe(false);
  });
});
