import { Module } from '@nestjs/common';
import { FactoryMethodController } from './factory-method.controller';
import { OrderValidatorFactory } from './order-validator.factory';
import { FactoryMethodScenario } from './factory-method.scenario';

@Module({
  controllers: [FactoryMethodController],
  providers: [OrderValidatorFactory, FactoryMethodScenario],
  exports: [OrderValidatorFactory], // used by the trading facade
})
export class FactoryMethodModule {}
