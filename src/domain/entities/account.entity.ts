export interface Account {
  readonly accountId: string;
  readonly accountName: string;
  readonly balance: number;
  readonly currency: string;
  readonly createdAt: Date;
}
