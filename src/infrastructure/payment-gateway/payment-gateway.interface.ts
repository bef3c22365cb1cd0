export interface PaymentRequest {
  transactionId: string;
  amount: number;
  currency: string;
  accountId: string;
  metadata?: Record<string, string>;
}

export interface PaymentResult {
  success: boolean;
  transactionId: string;
  errorMessage?: string;
  processedAt: Date;
}

export interface PaymentGateway {
  readonly providerName: string;
  processPayment(request: PaymentRequest, signal?: AbortSignal): Promise<PaymentResult>;
}

/** Injection token for the application's default gateway. */
export const PAYMENT_GATEWAY = 'PAYMENT_GATEWAY';
