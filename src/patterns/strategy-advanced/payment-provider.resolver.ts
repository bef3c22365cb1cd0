import { Inject, Injectable, Logger } from '@nestjs/common';
import { PAYMENT_PROVIDERS, PaymentProvider } from './payment-provider.interface';

/**
 * Case-insensitive lookup from provider key to provider.
 * The table is built once here and never changes afterwards.
 */
@Injectable()
export class PaymentProviderResolver {
  private readonly logger = new Logger(PaymentProviderResolver.name);
  private readonly providers: ReadonlyMap<string, PaymentProvider>;

  constructor(@Inject(PAYMENT_PROVIDERS) providers: PaymentProvider[]) {
    const table = new Map<string, PaymentProvider>();
    for (const provider of providers) {
      const key = provider.providerKey.toLowerCase();
      if (table.has(key)) {
        throw new Error(`Duplicate payment provider key '${provider.providerKey}'`);
      }
      table.set(key, provider);
    }
    this.providers = table;

    this.logger.log(
      `PaymentProviderResolver initialized with ${table.size} providers: ${this.availableKeys().join(', ')}`,
    );
  }

  /** undefined for blank or unknown keys */
  resolveProvider(providerKey: string): PaymentProvider | undefined {
    if (providerKey.trim() === '') {
      this.logger.warn('Attempted to resolve provider with null or empty key');
      return undefined;
    }

    const provider = this.providers.get(providerKey.toLowerCase());
    if (!provider) {
      this.logger.warn(
        `Payment provider '${providerKey}' not found. Available providers: ${this.availableKeys().join(', ')}`,
      );
    }
    return provider;
  }

  getAvailableProviders(): PaymentProvider[] {
    return [...this.providers.values()];
  }

  private availableKeys(): string[] {
    return this.getAvailableProviders().map(p => p.providerKey);
  }
}
