import { Logger } from '@nestjs/common';
import { PaymentProcessor } from './payment-processor.interface';
import {
  PaymentGateway,
  PaymentRequest,
  PaymentResult,
} from '../../infrastructure/payment-gateway/payment-gateway.interface';
import { MetricsService } from '../../infrastructure/metrics/metrics.service';
import { delay } from '../../common/utils/delay.util';
import { errorMessage } from '../../common/utils/pattern-response.util';

export class CorePaymentProcessor implements PaymentProcessor {
  private readonly logger = new Logger(CorePaymentProcessor.name);

  constructor(private readonly gateway: PaymentGateway) {}

  processPayment(request: PaymentRequest, signal?: AbortSignal): Promise<PaymentResult> {
    this.logger.log(`Processing payment ${request.transactionId}`);
    return this.gateway.processPayment(request, signal);
  }
}

export class LoggingPaymentProcessor implements PaymentProcessor {
  private readonly logger = new Logger(LoggingPaymentProcessor.name);

  constructor(private readonly inner: PaymentProcessor) {}

  async processPayment(request: PaymentRequest, signal?: AbortSignal): Promise<PaymentResult> {
    this.logger.log(
      `Payment request started: ${request.transactionId}, Amount: ${request.amount} ${request.currency}`,
    );
    const result = await this.inner.processPayment(request, signal);
    this.logger.log(`Payment request completed: ${request.transactionId}, Success: ${result.success}`);
    return result;
  }
}

export class MetricsPaymentProcessor implements PaymentProcessor {
  constructor(
    private readonly inner: PaymentProcessor,
    private readonly metrics: MetricsService,
  ) {}

  async processPayment(request: PaymentRequest, signal?: AbortSignal): Promise<PaymentResult> {
    const startedAt = Date.now();
    try {
      const result = await this.inner.processPayment(request, signal);
      const success = String(result.success);
      this.metrics.recordDuration('payment.process.duration', Date.now() - startedAt, {
        success,
        currency: request.currency,
      });
      this.metrics.incrementCounter('payment.process.count', { success });
      return result;
    } catch (error) {
      this.metrics.recordDuration('payment.process.duration', Date.now() - startedAt, {
        success: 'false',
        error: 'exception',
      });
      this.metrics.incrementCounter('payment.process.count', { success: 'false' });
      throw error;
    }
  }
}

// Retries reported failures and thrown errors with a linear backoff (attempt x 100ms).
// The final attempt's failure is returned, never thrown.
export class RetryPaymentProcessor implements PaymentProcessor {
  private readonly logger = new Logger(RetryPaymentProcessor.name);

  constructor(
    private readonly inner: PaymentProcessor,
    private readonly maxAttempts = 3,
    private readonly backoffStepMs = 100,
  ) {}

  async processPayment(request: PaymentRequest, signal?: AbortSignal): Promise<PaymentResult> {
    for (let attempt = 1; ; attempt++) {
      try {
        const result = await this.inner.processPayment(request, signal);
        if (result.success || attempt >= this.maxAttempts) {
          return result;
        }
        this.logger.warn(
          `Payment failed, retrying (${attempt}/${this.maxAttempts}): ${request.transactionId}`,
        );
      } catch (error) {
        if (attempt >= this.maxAttempts) {
          this.logger.error(
            `Payment failed after ${this.maxAttempts} attempts: ${request.transactionId}: ${errorMessage(error)}`,
          );
          return {
            success: false,
            transactionId: request.transactionId,
            errorMessage: errorMessage(error),
            processedAt: new Date(),
          };
        }
      }
      await delay(this.backoffStepMs * attempt, signal);
    }
  }
}

/** Retry -> Metrics -> Logging -> Core */
export function decoratePaymentProcessor(gateway: PaymentGateway, metrics: MetricsService): PaymentProcessor {
  const core = new CorePaymentProcessor(gateway);
  const withLogging = new LoggingPaymentProcessor(core);
  const withMetrics = new MetricsPaymentProcessor(withLogging, metrics);
  return new RetryPaymentProcessor(withMetrics);
}
