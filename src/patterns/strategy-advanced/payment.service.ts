import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { PaymentProviderResolver } from './payment-provider.resolver';
import { ProviderPaymentResult } from './payment-provider.interface';
import { ProcessPaymentDto } from './dto/process-payment.dto';
import { ProviderInfoDto } from './dto/provider-info.dto';

// Resolves the requested provider, lets it validate, then lets it process.
@Injectable()
export class PaymentService {
  private readonly logger = new Logger(PaymentService.name);

  constructor(private readonly resolver: PaymentProviderResolver) {}

  /**
   * @throws NotFoundException for an unknown provider key, listing the registered keys
   * @throws BadRequestException when the provider rejects the amount or currency
   */
  async processPayment(request: ProcessPaymentDto, signal?: AbortSignal): Promise<ProviderPaymentResult> {
    this.logger.log(
      `Processing payment request: Provider=${request.providerKey}, Amount=${request.amount}, Currency=${request.currency}`,
    );

    const provider = this.resolver.resolveProvider(request.providerKey);
    if (!provider) {
      const available = this.resolver.getAvailableProviders().map(p => p.providerKey).join(', ');
      throw new NotFoundException(
        `Payment provider '${request.providerKey}' not found. Available providers: ${available}`,
      );
    }

    if (!provider.validatePayment(request.amount, request.currency)) {
      this.logger.warn(`Payment validation failed for provider '${request.providerKey}'`);
      throw new BadRequestException(`Payment validation failed for provider '${request.providerKey}'`);
    }

    const result = await provider.processPayment(request.amount, request.currency, request.customerEmail, signal);
    this.logger.log(`Payment processed: TransactionId=${result.transactionId}, Status=${result.status}`);
    return result;
  }

  getAvailableProviders(): ProviderInfoDto[] {
    return this.resolver.getAvailableProviders().map(p => ({
      key: p.providerKey,
      minimumAmount: p.minimumAmount,
      supportedCurrencies: p.supportedCurrencies,
    }));
  }
}
