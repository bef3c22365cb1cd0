import { Injectable } from '@nestjs/common';
import { Account } from '../../domain/entities/account.entity';

export interface AccountRepository {
  getById(accountId: string): Promise<Account | undefined>;
}

@Injectable()
export class InMemoryAccountRepository implements AccountRepository {
  private readonly accounts = new Map<string, Account>([
    [
      'ACC-001',
      { accountId: 'ACC-001', accountName: 'Test Account', balance: 100000, currency: 'USD', createdAt: new Date() },
    ],
  ]);

  async getById(accountId: string): Promise<Account | undefined> {
    return this.accounts.get(accountId);
  }
}
