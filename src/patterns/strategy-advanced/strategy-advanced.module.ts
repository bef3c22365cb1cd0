import { Module } from '@nestjs/common';
import { StrategyAdvancedController } from './strategy-advanced.controller';
import { StrategyAdvancedPatternController } from './strategy-advanced-pattern.controller';
import { PaymentProviderResolver } from './payment-provider.resolver';
import { PaymentService } from './payment.service';
import { StrategyAdvancedScenario } from './strategy-advanced.scenario';
import { PAYMENT_PROVIDERS } from './payment-provider.interface';
import { createPaymentProviders } from './payment.providers';

@Module({
  controllers: [StrategyAdvancedController, StrategyAdvancedPatternController],
  providers: [
    { provide: PAYMENT_PROVIDERS, useFactory: () => createPaymentProviders() },
    PaymentProviderResolver,
    PaymentService,
    StrategyAdvancedScenario,
  ],
})
export class StrategyAdvancedModule {}
