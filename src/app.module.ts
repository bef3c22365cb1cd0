import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { InfrastructureModule } from './infrastructure/infrastructure.module';
import { SingletonModule } from './patterns/singleton/singleton.module';
import { FactoryMethodModule } from './patterns/factory-method/factory-method.module';
import { AbstractFactoryModule } from './patterns/abstract-factory/abstract-factory.module';
import { BuilderModule } from './patterns/builder/builder.module';
import { AdapterModule } from './patterns/adapter/adapter.module';
import { CommandModule } from './patterns/command/command.module';
import { DecoratorModule } from './patterns/decorator/decorator.module';
import { StrategyModule } from './patterns/strategy/strategy.module';
import { StrategyAdvancedModule } from './patterns/strategy-advanced/strategy-advanced.module';
import { ObserverModule } from './patterns/observer/observer.module';
import { FacadeModule } from './patterns/facade/facade.module';
import { RepositoryModule } from './patterns/repository/repository.module';
import { MediatorModule } from './patterns/mediator/mediator.module';
import { StateModule } from './patterns/state/state.module';
import { PrototypeModule } from './patterns/prototype/prototype.module';
import { ChainOfResponsibilityModule } from './patterns/chain-of-responsibility/chain-of-responsibility.module';

@Module({
  imports: [
    InfrastructureModule, // metrics, event producer, payment gateway
    SingletonModule,
    FactoryMethodModule,
    AbstractFactoryModule,
    BuilderModule,
    AdapterModule,
    CommandModule,
    DecoratorModule,
    StrategyModule,
    StrategyAdvancedModule,
    ObserverModule,
    FacadeModule,
    RepositoryModule,
    MediatorModule,
    StateModule,
    PrototypeModule,
    ChainOfResponsibilityModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
