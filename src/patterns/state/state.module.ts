import { Module } from '@nestjs/common';
import { StateController } from './state.controller';
import { StateScenario } from './state.scenario';

@Module({
  controllers: [StateController],
  providers: [StateScenario],
})
export class StateModule {}
