import { Module } from '@nestjs/common';
import { PrototypeController } from './prototype.controller';
import { PrototypeScenario } from './prototype.scenario';

@Module({
  controllers: [PrototypeController],
  providers: [PrototypeScenario],
})
export class PrototypeModule {}
