import { Inject, Injectable } from '@nestjs/common';
import { PAYMENT_PROCESSOR, PaymentProcessor } from './payment-processor.interface';
import { MetricsService, MetricsSnapshot } from '../../infrastructure/metrics/metrics.service';
import { PaymentRequest, PaymentResult } from '../../infrastructure/payment-gateway/payment-gateway.interface';
import {
  PatternDemoResponse,
  PatternScenario,
  PatternTestResponse,
} from '../../common/interfaces/pattern-response.interface';
import { check, toTestResponse } from '../../common/utils/pattern-response.util';

const PATTERN = 'Decorator';

export interface DecoratorDemoResult {
  paymentRequest: PaymentRequest;
  paymentResult: PaymentResult;
  decorators: string[];
  metrics: MetricsSnapshot;
}

@Injectable()
export class DecoratorScenario implements PatternScenario {
  constructor(
    @Inject(PAYMENT_PROCESSOR) private readonly paymentProcessor: PaymentProcessor,
    private readonly metrics: MetricsService,
  ) {}

  async runDemo(): Promise<PatternDemoResponse<DecoratorDemoResult>> {
    const paymentRequest: PaymentRequest = {
      transactionId: 'TXN-DEC-001',
      amount: 250.75,
      currency: 'USD',
      accountId: 'ACC-001',
    };
    const paymentResult = await this.paymentProcessor.processPayment(paymentRequest);

    return {
      pattern: PATTERN,
      description:
        'Demonstrates decorator pattern: adds cross-cutting concerns (logging, metrics, retries) ' +
        'dynamically without modifying core service.',
      result: {
        paymentRequest,
        paymentResult,
        decorators: ['Logging', 'Metrics', 'Retry'],
        metrics: this.metrics.getSnapshot(),
      },
      metadata: {
        decoratorStack: 'Retry -> Metrics -> Logging -> Core',
        separationOfConcerns: true,
      },
    };
  }

  async runTest(): Promise<PatternTestResponse> {
    const paymentRequest: PaymentRequest = {
      transactionId: 'TXN-TEST-001',
      amount: 100,
      currency: 'USD',
      accountId: 'ACC-TEST',
    };
    const result = await this.paymentProcessor.processPayment(paymentRequest);
    const counters = Object.keys(this.metrics.getSnapshot().counters);
    const recorded = counters.some(key => key.startsWith('payment.process.count'));

    return toTestResponse(PATTERN, [
      check('Payment Processing', typeof result.success === 'boolean', `Payment processed: Success=${result.success}`),
      check('Metrics Recording', recorded, 'Metrics were recorded by decorator'),
      check(
        'Decorator Chain',
        result.transactionId === paymentRequest.transactionId,
        'Decorator chain preserved request/response flow',
      ),
    ]);
  }
}
