import { Module } from '@nestjs/common';
import { ChainOfResponsibilityController } from './chain-of-responsibility.controller';
import { ChainOfResponsibilityScenario } from './chain-of-responsibility.scenario';
import { InMemoryAccountRepository } from './account.repository';
import { VALIDATION_CHAIN, buildValidationChain } from './validation.handlers';

@Module({
  controllers: [ChainOfResponsibilityController],
  providers: [
    InMemoryAccountRepository,
    {
      provide: VALIDATION_CHAIN,
      useFactory: (accounts: InMemoryAccountRepository) => buildValidationChain(accounts),
      inject: [InMemoryAccountRepository],
    },
    ChainOfResponsibilityScenario,
  ],
})
export class ChainOfResponsibilityModule {}
