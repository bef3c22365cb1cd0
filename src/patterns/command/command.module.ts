import { Module } from '@nestjs/common';
import { CommandController } from './command.controller';
import { CommandHandler } from './command.handler';
import { InMemoryOrderStore } from './order.store';
import { CommandScenario } from './command.scenario';

@Module({
  controllers: [CommandController],
  providers: [CommandHandler, InMemoryOrderStore, CommandScenario],
  exports: [CommandHandler, InMemoryOrderStore], // used by the trading facade
})
export class CommandModule {}
