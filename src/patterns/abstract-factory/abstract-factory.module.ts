import { Module } from '@nestjs/common';
import { AbstractFactoryController } from './abstract-factory.controller';
import { AbstractFactoryScenario } from './abstract-factory.scenario';
import { PayPalGatewayFactory, StripeGatewayFactory } from './payment-gateway.factories';
import { PAYPAL_GATEWAY_FACTORY, STRIPE_GATEWAY_FACTORY } from './payment-gateway-factory.interface';

@Module({
  controllers: [AbstractFactoryController],
  providers: [
    { provide: STRIPE_GATEWAY_FACTORY, useFactory: () => new StripeGatewayFactory() },
    { provide: PAYPAL_GATEWAY_FACTORY, useFactory: () => new PayPalGatewayFactory() },
    AbstractFactoryScenario,
  ],
})
export class AbstractFactoryModule {}
