import { PaymentGateway } from '../../infrastructure/payment-gateway/payment-gateway.interface';

export interface GatewayConfig {
  providerName: string;
  settings: Record<string, string>;
}

/** Creates a gateway together with the configuration that belongs to it. */
export interface PaymentGatewayFactory {
  readonly factoryType: string;
  createPaymentGateway(): PaymentGateway;
  createConfiguration(): GatewayConfig;
}

export const STRIPE_GATEWAY_FACTORY = 'STRIPE_GATEWAY_FACTORY';
export const PAYPAL_GATEWAY_FACTORY = 'PAYPAL_GATEWAY_FACTORY';
