import { Logger } from '@nestjs/common';
import { PaymentProvider, ProviderPaymentResult } from './payment-provider.interface';
import { RandomSource, createSeededRandom } from '../../common/utils/random.util';
import { delay } from '../../common/utils/delay.util';
import { prefixedId } from '../../common/utils/id.util';
import { toDecimal } from '../../common/utils/decimal.util';

interface ProviderProfile {
  providerKey: string;
  displayName: string;
  minimumAmount: number;
  supportedCurrencies: readonly string[];
  latencyMs: number;
  failureRate: number;    // a draw at or below this fails
}

export interface SimulationOptions {
  random?: RandomSource;
  latencyMs?: number;
}

abstract class SimulatedPaymentProvider implements PaymentProvider {
  private readonly logger: Logger;
  private readonly random: RandomSource;
  private readonly latencyMs: number;

  protected constructor(
    private readonly profile: ProviderProfile,
    seed: number,
    options: SimulationOptions,
  ) {
    this.logger = new Logger(`${profile.displayName}PaymentProvider`);
    this.random = options.random ?? createSeededRandom(seed);
    this.latencyMs = options.latencyMs ?? profile.latencyMs;
  }

  get providerKey(): string {
    return this.profile.providerKey;
  }

  get minimumAmount(): number {
    return this.profile.minimumAmount;
  }

  get supportedCurrencies(): readonly string[] {
    return this.profile.supportedCurrencies;
  }

  validatePayment(amount: number, currency: string): boolean {
    if (toDecimal(amount).lessThan(this.minimumAmount)) {
      this.logger.warn(
        `Payment amount ${amount} is below minimum ${this.minimumAmount} for provider ${this.providerKey}`,
      );
      return false;
    }

    const wanted = currency.toUpperCase();
    if (!this.supportedCurrencies.some(c => c.toUpperCase() === wanted)) {
      this.logger.warn(`Currency ${currency} is not supported by provider ${this.providerKey}`);
      return false;
    }

    return true;
  }

  async processPayment(
    amount: number,
    currency: string,
    customerEmail: string,
    signal?: AbortSignal,
  ): Promise<ProviderPaymentResult> {
    const { displayName } = this.profile;
    this.logger.log(
      `Processing payment via ${displayName}: Amount=${amount}, Currency=${currency}, Email=${customerEmail}`,
    );

    await delay(this.latencyMs, signal);

    const success = this.random() > this.profile.failureRate;
    const transactionId = prefixedId(`${this.providerKey}_txn_`);

    if (success) {
      this.logger.log(`${displayName} payment successful: TransactionId=${transactionId}`);
    } else {
      this.logger.warn(`${displayName} payment failed: TransactionId=${transactionId}`);
    }

    return {
      transactionId,
      status: success ? 'Success' : 'Failed',
      providerUsed: this.providerKey,
      processedAt: new Date(),
      message: success ? `Payment processed successfully via ${displayName}` : 'Payment processing failed',
    };
  }
}

export class StripePaymentProvider extends SimulatedPaymentProvider {
  constructor(options: SimulationOptions = {}) {
    super(
      {
        providerKey: 'stripe',
        displayName: 'Stripe',
        minimumAmount: 1,
        supportedCurrencies: ['USD', 'EUR', 'GBP'],
        latencyMs: 50,
        failureRate: 0.05,
      },
      42,
      options,
    );
  }
}

export class PayPalPaymentProvider extends SimulatedPaymentProvider {
  constructor(options: SimulationOptions = {}) {
    super(
      {
        providerKey: 'paypal',
        displayName: 'PayPal',
        minimumAmount: 0.5,
        supportedCurrencies: ['USD', 'EUR', 'CAD'],
        latencyMs: 80,
        failureRate: 0.1,
      },
      43,
      options,
    );
  }
}

export class CryptoPaymentProvider extends SimulatedPaymentProvider {
  constructor(options: SimulationOptions = {}) {
    super(
      {
        providerKey: 'crypto',
        displayName: 'Cryptocurrency',
        minimumAmount: 10,
        supportedCurrencies: ['BTC', 'ETH', 'USDT'],
        latencyMs: 200,
        failureRate: 0.15,
      },
      44,
      options,
    );
  }
}

export function createPaymentProviders(options: SimulationOptions = {}): PaymentProvider[] {
  return [
    new StripePaymentProvider(options),
    new PayPalPaymentProvider(options),
    new CryptoPaymentProvider(options),
  ];
}
