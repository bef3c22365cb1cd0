import { Injectable, Logger } from '@nestjs/common';
import { PendingChange, UnitOfWork } from './repository.interface';

/**
 * Outside a transaction changes apply immediately. Inside one they are held
 * until saveChanges, which applies them in registration order.
 */
@Injectable()
export class InMemoryUnitOfWork implements UnitOfWork {
  private readonly logger = new Logger(InMemoryUnitOfWork.name);
  private inTransaction = false;
  private pendingChanges: PendingChange[] = [];

  get isInTransaction(): boolean {
    return this.inTransaction;
  }

  get pendingCount(): number {
    return this.pendingChanges.length;
  }

  async beginTransaction(): Promise<void> {
    this.inTransaction = true;
    this.pendingChanges = [];
    this.logger.debug('Transaction begun');
  }

  async registerChange(change: PendingChange): Promise<void> {
    if (this.inTransaction) {
      this.pendingChanges.push(change);
      return;
    }
    await change();
  }

  async saveChanges(): Promise<number> {
    // A failing change leaves the transaction open with every change still pending.
    const changes = [...this.pendingChanges];
    for (const change of changes) {
      await change();
    }

    this.pendingChanges = [];
    this.inTransaction = false;
    this.logger.debug(`Changes saved (${changes.length})`);
    return changes.length;
  }

  async commit(): Promise<void> {
    this.inTransaction = false;
    this.pendingChanges = [];
    this.logger.debug('Transaction committed');
  }

  async rollback(): Promise<void> {
    const discarded = this.pendingChanges.length;
    this.inTransaction = false;
    this.pendingChanges = [];
    this.logger.debug(`Transaction rolled back (${discarded} change(s) discarded)`);
  }
}
