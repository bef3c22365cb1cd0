import { Logger, NotFoundException } from '@nestjs/common';
import { Repository } from './repository.interface';

export class InMemoryRepository<TEntity, TKey> implements Repository<TEntity, TKey> {
  private readonly logger = new Logger(InMemoryRepository.name);
  private readonly entities = new Map<TKey, TEntity>();

  constructor(private readonly keySelector: (entity: TEntity) => TKey) {}

  async getById(id: TKey): Promise<TEntity | undefined> {
    return this.entities.get(id);
  }

  async getAll(): Promise<TEntity[]> {
    return [...this.entities.values()];
  }

  async add(entity: TEntity): Promise<void> {
    const key = this.keySelector(entity);
    this.entities.set(key, entity);
    this.logger.debug(`Added entity ${String(key)} to repository`);
  }

  async update(entity: TEntity): Promise<void> {
    const key = this.keySelector(entity);
    if (!this.entities.has(key)) {
      throw new NotFoundException(`Entity with key ${String(key)} not found`);
    }
    this.entities.set(key, entity);
    this.logger.debug(`Updated entity ${String(key)} in repository`);
  }

  async delete(id: TKey): Promise<void> {
    this.entities.delete(id);
    this.logger.debug(`Deleted entity ${String(id)} from repository`);
  }

  async exists(id: TKey): Promise<boolean> {
    return this.entities.has(id);
  }
}
