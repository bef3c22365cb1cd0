import { Inject, Injectable } from '@nestjs/common';
import {
  GatewayConfig,
  PAYPAL_GATEWAY_FACTORY,
  PaymentGatewayFactory,
  STRIPE_GATEWAY_FACTORY,
} from './payment-gateway-factory.interface';
import { PaymentResult } from '../../infrastructure/payment-gateway/payment-gateway.interface';
import {
  PatternDemoResponse,
  PatternScenario,
  PatternTestResponse,
} from '../../common/interfaces/pattern-response.interface';
import { check, toTestResponse } from '../../common/utils/pattern-response.util';

const PATTERN = 'Abstract Factory';

export interface GatewayFamily {
  factory: string;
  gateway: string;
  config: GatewayConfig;
}

export interface AbstractFactoryDemoResult {
  families: GatewayFamily[];
  payment: PaymentResult;
}

@Injectable()
export class AbstractFactoryScenario implements PatternScenario {
  constructor(
    @Inject(STRIPE_GATEWAY_FACTORY) private readonly stripeFactory: PaymentGatewayFactory,
    @Inject(PAYPAL_GATEWAY_FACTORY) private readonly payPalFactory: PaymentGatewayFactory,
  ) {}

  async runDemo(): Promise<PatternDemoResponse<AbstractFactoryDemoResult>> {
    const families = [this.stripeFactory, this.payPalFactory].map((factory): GatewayFamily => ({
      factory: factory.factoryType,
      gateway: factory.createPaymentGateway().providerName,
      config: factory.createConfiguration(),
    }));

    const payment = await this.stripeFactory.createPaymentGateway().processPayment({
      transactionId: 'TXN-STRIPE-001',
      amount: 100.5,
      currency: 'USD',
      accountId: 'ACC-001',
    });

    return {
      pattern: PATTERN,
      description:
        'Demonstrates abstract factory pattern: creates families of related objects (gateway + config).',
      result: { families, payment },
      metadata: {
        factoryCount: families.length,
        extensibility: 'New gateway families are added without modifying existing code',
      },
    };
  }

  async runTest(): Promise<PatternTestResponse> {
    const stripeGateway = this.stripeFactory.createPaymentGateway();
    const payPalGateway = this.payPalFactory.createPaymentGateway();
    const stripeConfig = this.stripeFactory.createConfiguration();
    const payPalConfig = this.payPalFactory.createConfiguration();

    return toTestResponse(PATTERN, [
      check(
        'Stripe Factory Creates Stripe Gateway',
        stripeGateway.providerName === 'Stripe',
        `Created ${stripeGateway.providerName} gateway`,
      ),
      check(
        'PayPal Factory Creates PayPal Gateway',
        payPalGateway.providerName === 'PayPal',
        `Created ${payPalGateway.providerName} gateway`,
      ),
      check(
        'Stripe Config Matches Gateway',
        stripeConfig.providerName === stripeGateway.providerName,
        `Config provider ${stripeConfig.providerName} matches gateway ${stripeGateway.providerName}`,
      ),
      check(
        'PayPal Config Matches Gateway',
        payPalConfig.providerName === payPalGateway.providerName,
        `Config provider ${payPalConfig.providerName} matches gateway ${payPalGateway.providerName}`,
      ),
    ]);
  }
}
