import { Module } from '@nestjs/common';
import { RepositoryController } from './repository.controller';
import { RepositoryScenario } from './repository.scenario';
import { InMemoryRepository } from './in-memory.repository';
import { InMemoryUnitOfWork } from './in-memory.unit-of-work';
import { ORDER_REPOSITORY } from './repository.interface';
import { Order } from '../../domain/entities/order.entity';

@Module({
  controllers: [RepositoryController],
  providers: [
    {
      provide: ORDER_REPOSITORY,
      useFactory: () => new InMemoryRepository<Order, string>(order => order.orderId),
    },
    InMemoryUnitOfWork,
    RepositoryScenario,
  ],
})
export class RepositoryModule {}
