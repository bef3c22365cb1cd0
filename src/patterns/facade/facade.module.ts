import { Module } from '@nestjs/common';
import { FacadeController } from './facade.controller';
import { FacadeScenario } from './facade.scenario';
import { TradingFacade } from './trading.facade';
import { FactoryMethodModule } from '../factory-method/factory-method.module';
import { CommandModule } from '../command/command.module';
import { ObserverModule } from '../observer/observer.module';

@Module({
  imports: [FactoryMethodModule, CommandModule, ObserverModule],
  controllers: [FacadeController],
  providers: [TradingFacade, FacadeScenario],
})
export class FacadeModule {}
