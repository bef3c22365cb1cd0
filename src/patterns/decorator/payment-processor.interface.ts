import { PaymentRequest, PaymentResult } from '../../infrastructure/payment-gateway/payment-gateway.interface';

/** Implemented by the core processor and by every decorator wrapping it. */
export interface PaymentProcessor {
  processPayment(request: PaymentRequest, signal?: AbortSignal): Promise<PaymentResult>;
}

/** The fully decorated processor: Retry -> Metrics -> Logging -> Core. */
export const PAYMENT_PROCESSOR = 'PAYMENT_PROCESSOR';
