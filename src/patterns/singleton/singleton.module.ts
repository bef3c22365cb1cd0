import { Module } from '@nestjs/common';
import { SingletonController } from './singleton.controller';
import { ConfigurationService } from './configuration.service';
import { SingletonScenario } from './singleton.scenario';

@Module({
  controllers: [SingletonController],
  providers: [ConfigurationService, SingletonScenario],
  exports: [ConfigurationService],
})
export class SingletonModule {}
