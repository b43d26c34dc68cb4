/**
 * MongoDB Ledger Store Unit Tests
 *
 * Tests that every write in a unit of work rides the same ClientSession and
 * that failures surface through runInTransaction.
 */

import type { ClientSession, Connection } from 'mongoose';

interface MockQuery<T> {
  session: jest.Mock;
  sort: jest.Mock;
  limit: jest.Mock;
  lean: jest.Mock<Promise<T>>;
}

const mockQuery = <T>(result: T): MockQuery<T> => {
  const query: MockQuery<T> = {
    session: jest.fn(() => query),
    sort: jest.fn(() => query),
    limit: jest.fn(() => query),
    lean: jest.fn(() => Promise.resolve(result)),
  };
  return query;
};

const mockFindOne = jest.fn();
const mockUpdateOne = jest.fn();
const mockCreate = jest.fn();
const mockFind = jest.fn();

jest.mock('../../../src/models/Account', () => ({
  Account: { findOne: mockFindOne, updateOne: mockUpdateOne },
}));

jest.mock('../../../src/models/LedgerEntry', () => ({
  LedgerEntry: { create: mockCreate, find: mockFind },
}));

import { MongoLedgerStore } from '../../../src/services/ledger/ledger.mongo-store';

const CREATED_AT = new Date('2024-01-01T12:00:00.000Z');

describe('MongoLedgerStore', () => {
  const session = { id: 'client-session' } as unknown as ClientSession;
  let outcome: 'committed' | 'aborted' | null;
  let connection: { readyState: number; transaction: jest.Mock };
  let store: MongoLedgerStore;

  beforeEach(() => {
    jest.clearAllMocks();
    outcome = null;
    connection = {
      readyState: 1,
      transaction: jest.fn(async (fn: (s: ClientSession) => Promise<unknown>) => {
        try {
          const result = await fn(session);
          outcome = 'committed';
          return result;
        } catch (error) {
          outcome = 'aborted';
          throw error;
        }
      }),
    };
    store = new MongoLedgerStore(connection as unknown as Connection);
  });

  describe('runInTransaction', () => {
    it('should run reads and both writes on the same session', async () => {
      const balanceQuery = mockQuery({ balance: 50 });
      mockFindOne.mockReturnValue(balanceQuery);
      mockUpdateOne.mockResolvedValue({ matchedCount: 1, modifiedCount: 1 });
      mockCreate.mockImplementation(async ([entry]: Array<Record<string, unknown>>) => [
        { ...entry, createdAt: CREATED_AT },
      ]);

      const entry = await store.runInTransaction(async (tx) => {
        const balance = await tx.getBalance(1001);
        await tx.setBalance(1001, (balance ?? 0) + 100);
        return tx.appendEntry({
          entryId: 'entry-1',
          accountId: 1001,
          kind: 'DEPOSIT',
          amount: 100,
          balanceAfter: 150,
        });
      });

      expect(connection.transaction).toHaveBeenCalledTimes(1);
      expect(balanceQuery.session).toHaveBeenCalledWith(session);
      expect(mockUpdateOne).toHaveBeenCalledWith(
        { accountId: 1001 },
        { $set: { balance: 150 } },
        { session, runValidators: true }
      );
      expect(mockCreate).toHaveBeenCalledWith([expect.objectContaining({ entryId: 'entry-1' })], {
        session,
      });
      expect(entry).toEqual({
        entryId: 'entry-1',
        accountId: 1001,
        kind: 'DEPOSIT',
        amount: 100,
        balanceAfter: 150,
        createdAt: CREATED_AT,
      });
      expect(outcome).toBe('committed');
    });

    it('should pass an append failure out and abort the unit', async () => {
      mockUpdateOne.mockResolvedValue({ matchedCount: 1, modifiedCount: 1 });
      mockCreate.mockRejectedValue(new Error('WriteConflict'));

      const run = store.runInTransaction(async (tx) => {
        await tx.setBalance(1001, 150);
        return tx.appendEntry({
          entryId: 'entry-2',
          accountId: 1001,
          kind: 'DEPOSIT',
          amount: 100,
          balanceAfter: 150,
        });
      });

      await expect(run).rejects.toThrow('WriteConflict');
      expect(outcome).toBe('aborted');
    });

    it('should throw when the balance update matches no account', async () => {
      mockUpdateOne.mockResolvedValue({ matchedCount: 0, modifiedCount: 0 });

      await expect(store.runInTransaction((tx) => tx.setBalance(4040, 10))).rejects.toThrow(
        'Balance update matched 0 accounts for 4040'
      );
      expect(outcome).toBe('aborted');
    });

    it('should report a missing account as a null balance', async () => {
      mockFindOne.mockReturnValue(mockQuery(null));

      await expect(store.runInTransaction((tx) => tx.getBalance(4040))).resolves.toBeNull();
    });
  });

  describe('reads outside a transaction', () => {
    it('should resolve an account by its credential digest', async () => {
      mockFindOne.mockReturnValue(mockQuery({ accountId: 1002 }));

      await expect(store.findAccountByCredential('digest')).resolves.toBe(1002);
      expect(mockFindOne).toHaveBeenCalledWith({ credentialDigest: 'digest' }, { accountId: 1 });
    });

    it('should list entries newest first up to the limit', async () => {
      const stored = {
        _id: 'object-id',
        entryId: 'entry-3',
        accountId: 1001,
        kind: 'WITHDRAWAL',
        amount: -20,
        balanceAfter: 30,
        createdAt: CREATED_AT,
      };
      const query = mockQuery([stored]);
      mockFind.mockReturnValue(query);

      const entries = await store.listEntries(1001, 5);

      expect(query.sort).toHaveBeenCalledWith({ createdAt: -1, _id: -1 });
      expect(query.limit).toHaveBeenCalledWith(5);
      expect(entries).toEqual([
        {
          entryId: 'entry-3',
          accountId: 1001,
          kind: 'WITHDRAWAL',
          amount: -20,
          balanceAfter: 30,
          createdAt: CREATED_AT,
        },
      ]);
    });
  });

  describe('isHealthy', () => {
    it('should follow the connection state', async () => {
      await expect(store.isHealthy()).resolves.toBe(true);

      connection.readyState = 0;

      await expect(store.isHealthy()).resolves.toBe(false);
    });
  });
});
