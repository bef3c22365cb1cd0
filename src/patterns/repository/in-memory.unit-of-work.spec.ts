import { InMemoryUnitOfWork } from './in-memory.unit-of-work';

describe('InMemoryUnitOfWork', () => {
  let unitOfWork: InMemoryUnitOfWork;
  let applied: string[];

  beforeEach(() => {
    unitOfWork = new InMemoryUnitOfWork();
    applied = [];
  });

  it('should apply a change immediately outside a transaction', async () => {
    await unitOfWork.registerChange(() => {
      applied.push('a');
    });

    expect(applied).toEqual(['a']);
    expect(unitOfWork.pendingCount).toBe(0);
  });

  it('should defer changes inside a transaction until saveChanges', async () => {
    await unitOfWork.beginTransaction();
    await unitOfWork.registerChange(() => {
      applied.push('a');
    });
    await unitOfWork.registerChange(async () => {
      applied.push('b');
    });

    expect(applied).toEqual([]);
    expect(unitOfWork.pendingCount).toBe(2);

    expect(await unitOfWork.saveChanges()).toBe(2);
    expect(applied).toEqual(['a', 'b']);
    expect(unitOfWork.isInTransaction).toBe(false);
  });

  it('should keep the transaction and its changes when a deferred change throws', async () => {
    await unitOfWork.beginTransaction();
    await unitOfWork.registerChange(() => {
      throw new Error('write failed');
    });
    await unitOfWork.registerChange(() => {
      applied.push('b');
    });

    await expect(unitOfWork.saveChanges()).rejects.toThrow('write failed');

    expect(applied).toEqual([]);
    expect(unitOfWork.isInTransaction).toBe(true);
    expect(unitOfWork.pendingCount).toBe(2);

    await unitOfWork.rollback();
    expect(unitOfWork.isInTransaction).toBe(false);
    expect(unitOfWork.pendingCount).toBe(0);
  });

  it('should discard deferred changes on rollback', async () => {
    await unitOfWork.beginTransaction();
    await unitOfWork.registerChange(() => {
      applied.push('a');
    });
    await unitOfWork.rollback();

    expect(await unitOfWork.saveChanges()).toBe(0);
    expect(applied).toEqual([]);
  });

  it('should close the transaction on commit', async () => {
    await unitOfWork.beginTransaction();
    await unitOfWork.commit();
    await unitOfWork.registerChange(() => {
      applied.push('after-commit');
    });

    expect(unitOfWork.isInTransaction).toBe(false);
    expect(applied).toEqual(['after-commit']);
  });
});
