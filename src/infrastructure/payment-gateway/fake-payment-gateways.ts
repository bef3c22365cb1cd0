import { Logger } from '@nestjs/common';
import { PaymentGateway, PaymentRequest, PaymentResult } from './payment-gateway.interface';
import { RandomSource, createSeededRandom } from '../../common/utils/random.util';
import { delay } from '../../common/utils/delay.util';

interface FakeGatewayProfile {
  providerName: string;
  latencyMs: number;
  failureRate: number;      // a draw at or below this fails
  failureMessage: string;
}

// Simulated processor: waits, then succeeds or fails on a seeded draw.
abstract class FakePaymentGateway implements PaymentGateway {
  private readonly logger: Logger;

  protected constructor(
    private readonly profile: FakeGatewayProfile,
    private readonly random: RandomSource,
  ) {
    this.logger = new Logger(`Fake${profile.providerName}Gateway`);
  }

  get providerName(): string {
    return this.profile.providerName;
  }

  async processPayment(request: PaymentRequest, signal?: AbortSignal): Promise<PaymentResult> {
    await delay(this.profile.latencyMs, signal);

    if (this.random() > this.profile.failureRate) {
      this.logger.log(
        `${this.providerName} payment processed: ${request.transactionId}, Amount: ${request.amount} ${request.currency}`,
      );
      return { success: true, transactionId: request.transactionId, processedAt: new Date() };
    }

    this.logger.warn(`${this.providerName} payment failed: ${request.transactionId}`);
    return {
      success: false,
      transactionId: request.transactionId,
      errorMessage: this.profile.failureMessage,
      processedAt: new Date(),
    };
  }
}

export class FakeStripeGateway extends FakePaymentGateway {
  constructor(random: RandomSource = createSeededRandom(42), latencyMs = 50) {
    super(
      { providerName: 'Stripe', latencyMs, failureRate: 0.05, failureMessage: 'Insufficient funds' },
      random,
    );
  }
}

export class FakePayPalGateway extends FakePaymentGateway {
  constructor(random: RandomSource = createSeededRandom(43), latencyMs = 80) {
    super(
      { providerName: 'PayPal', latencyMs, failureRate: 0.1, failureMessage: 'Payment declined' },
      random,
    );
  }
}
