import { Order } from '../../domain/entities/order.entity';

export interface Repository<TEntity, TKey> {
  getById(id: TKey): Promise<TEntity | undefined>;
  getAll(): Promise<TEntity[]>;
  /** Insert or replace. */
  add(entity: TEntity): Promise<void>;
  /** Replace an existing entity. Rejects with NotFoundException when the key is unknown. */
  update(entity: TEntity): Promise<void>;
  delete(id: TKey): Promise<void>;
  exists(id: TKey): Promise<boolean>;
}

export type PendingChange = () => void | Promise<void>;

export interface UnitOfWork {
  beginTransaction(): Promise<void>;
  /** Runs the change now, or defers it until saveChanges when a transaction is open. */
  registerChange(change: PendingChange): Promise<void>;
  saveChanges(): Promise<number>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export type OrderRepository = Repository<Order, string>;

export const ORDER_REPOSITORY = 'ORDER_REPOSITORY';
