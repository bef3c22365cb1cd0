import { Module } from '@nestjs/common';
import { DecoratorController } from './decorator.controller';
import { DecoratorScenario } from './decorator.scenario';
import { PAYMENT_PROCESSOR } from './payment-processor.interface';
import { decoratePaymentProcessor } from './payment-processors';
import { MetricsService } from '../../infrastructure/metrics/metrics.service';
import {
  PAYMENT_GATEWAY,
  PaymentGateway,
} from '../../infrastructure/payment-gateway/payment-gateway.interface';

@Module({
  controllers: [DecoratorController],
  providers: [
    {
      provide: PAYMENT_PROCESSOR,
      useFactory: (gateway: PaymentGateway, metrics: MetricsService) => decoratePaymentProcessor(gateway, metrics),
      inject: [PAYMENT_GATEWAY, MetricsService],
    },
    DecoratorScenario,
  ],
})
export class DecoratorModule {}
