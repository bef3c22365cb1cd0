export type PaymentStatus = 'Success' | 'Failed';

export interface ProviderPaymentResult {
  transactionId: string;     // <providerKey>_txn_<hex>
  status: PaymentStatus;
  providerUsed: string;
  processedAt: Date;
  message: string;
}

/** One interchangeable way to take a payment. Looked up by providerKey at run time. */
export interface PaymentProvider {
  readonly providerKey: string;
  readonly minimumAmount: number;
  readonly supportedCurrencies: readonly string[];
  validatePayment(amount: number, currency: string): boolean;
  processPayment(
    amount: number,
    currency: string,
    customerEmail: string,
    signal?: AbortSignal,
  ): Promise<ProviderPaymentResult>;
}

export const PAYMENT_PROVIDERS = 'PAYMENT_PROVIDERS';
