import { HttpException, Injectable } from '@nestjs/common';
import { PaymentService } from './payment.service';
import { PaymentProviderResolver } from './payment-provider.resolver';
import { ProviderPaymentResult } from './payment-provider.interface';
import { ProcessPaymentDto } from './dto/process-payment.dto';
import { ProviderInfoDto } from './dto/provider-info.dto';
import {
  PatternDemoResponse,
  PatternScenario,
  PatternTestResponse,
} from '../../common/interfaces/pattern-response.interface';
import { check, errorMessage, toTestResponse } from '../../common/utils/pattern-response.util';

const PATTERN = 'Strategy (Resolver)';

export interface PaymentAttempt {
  request: ProcessPaymentDto;
  result?: ProviderPaymentResult;
  error?: { statusCode: number; message: string };
}

export interface StrategyAdvancedDemoResult {
  providers: ProviderInfoDto[];
  payments: PaymentAttempt[];
}

const DEMO_REQUESTS: ProcessPaymentDto[] = [
  { amount: 100, currency: 'USD', providerKey: 'stripe', customerEmail: 'customer@example.com' },
  { amount: 50, currency: 'eur', providerKey: 'PayPal', customerEmail: 'customer@example.com' },
  { amount: 25, currency: 'USDT', providerKey: 'crypto', customerEmail: 'customer@example.com' },
  { amount: 5, currency: 'USDT', providerKey: 'crypto', customerEmail: 'customer@example.com' },
  { amount: 10, currency: 'USD', providerKey: 'venmo', customerEmail: 'customer@example.com' },
];

@Injectable()
export class StrategyAdvancedScenario implements PatternScenario {
  constructor(
    private readonly paymentService: PaymentService,
    private readonly resolver: PaymentProviderResolver,
  ) {}

  async runDemo(): Promise<PatternDemoResponse<StrategyAdvancedDemoResult>> {
    const payments: PaymentAttempt[] = [];
    for (const request of DEMO_REQUESTS) {
      payments.push(await this.attempt(request));
    }

    return {
      pattern: PATTERN,
      description:
        'Demonstrates strategy pattern with a resolver: payment providers chosen at runtime by key, ' +
        'each applying its own validation and processing rules.',
      result: {
        providers: this.paymentService.getAvailableProviders(),
        payments,
      },
      metadata: {
        lookup: 'case-insensitive, built once at startup',
        providerCount: this.resolver.getAvailableProviders().length,
      },
    };
  }

  async runTest(): Promise<PatternTestResponse> {
    const upper = this.resolver.resolveProvider('STRIPE');
    const lower = this.resolver.resolveProvider('stripe');
    const unknown = this.resolver.resolveProvider('venmo');
    const blank = this.resolver.resolveProvider('  ');
    const keys = this.resolver.getAvailableProviders().map(p => p.providerKey);

    const notFound = await this.attempt({
      amount: 10,
      currency: 'USD',
      providerKey: 'venmo',
      customerEmail: 'test@example.com',
    });
    const listsAllKeys = keys.every(k => notFound.error?.message.includes(k) ?? false);

    const belowMinimum = lower?.validatePayment(0.5, 'USD');
    const wrongCurrency = lower?.validatePayment(100, 'BTC');
    const lowercaseCurrency = lower?.validatePayment(100, 'usd');

    const processed = await this.attempt({
      amount: 20,
      currency: 'EUR',
      providerKey: 'paypal',
      customerEmail: 'test@example.com',
    });
    const transactionId = processed.result?.transactionId ?? '';

    return toTestResponse(PATTERN, [
      check(
        'Case-Insensitive Resolution',
        upper !== undefined && upper === lower,
        `STRIPE and stripe resolve to ${upper?.providerKey ?? 'nothing'}`,
      ),
      check(
        'Unknown Provider',
        unknown === undefined && blank === undefined,
        'Unknown and blank keys resolve to no provider',
      ),
      check(
        'Not Found Lists Providers',
        notFound.error?.statusCode === 404 && listsAllKeys,
        notFound.error?.message ?? 'No error raised',
      ),
      check(
        'Provider Validation',
        belowMinimum === false && wrongCurrency === false && lowercaseCurrency === true,
        'Minimum amount and currency rules enforced per provider',
      ),
      check(
        'Provider Processing',
        transactionId.startsWith('paypal_txn_') && processed.result?.providerUsed === 'paypal',
        `Processed as ${transactionId} with status ${processed.result?.status ?? 'none'}`,
      ),
    ]);
  }

  private async attempt(request: ProcessPaymentDto): Promise<PaymentAttempt> {
    try {
      return { request, result: await this.paymentService.processPayment(request) };
    } catch (error) {
      if (error instanceof HttpException) {
        return { request, error: { statusCode: error.getStatus(), message: errorMessage(error) } };
      }
      throw error;
    }
  }
}
