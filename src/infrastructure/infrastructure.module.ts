import { Global, Module } from '@nestjs/common';
import { MetricsService } from './metrics/metrics.service';
import { EventProducerService } from './messaging/event-producer.service';
import { FakeStripeGateway } from './payment-gateway/fake-payment-gateways';
import { PAYMENT_GATEWAY } from './payment-gateway/payment-gateway.interface';

// Shared fakes for metrics, messaging and payments. Global so pattern modules
// can inject them without importing this module.
@Global()
@Module({
  providers: [
    MetricsService,
    EventProducerService,
    { provide: PAYMENT_GATEWAY, useFactory: () => new FakeStripeGateway() },
  ],
  exports: [MetricsService, EventProducerService, PAYMENT_GATEWAY],
})
export class InfrastructureModule {}
