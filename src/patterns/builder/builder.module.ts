import { Module } from '@nestjs/common';
import { BuilderController } from './builder.controller';
import { OrderBuilder } from './order.builder';
import { BuilderScenario } from './builder.scenario';

@Module({
  controllers: [BuilderController],
  providers: [OrderBuilder, BuilderScenario],
})
export class BuilderModule {}
