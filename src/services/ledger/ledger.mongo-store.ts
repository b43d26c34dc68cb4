/**
 * MongoDB-backed ledger store.
 *
 * Balance updates and entry appends run inside a multi-document transaction
 * on one ClientSession (requires a replica set). A concurrent writer on the
 * same account document causes a write conflict; the driver aborts and
 * retries the whole unit, so the balance never loses an update.
 */

import mongoose, { ClientSession, Connection } from 'mongoose';

import { Account } from '../../models/Account';
import { LedgerEntry as LedgerEntryModel } from '../../models/LedgerEntry';
import {
  AccountId,
  LedgerEntry,
  LedgerStore,
  LedgerStoreTransaction,
  NewLedgerEntry,
} from './ledger.types';

interface StoredEntry {
  entryId: string;
  accountId: number;
  kind: LedgerEntry['kind'];
  amount: number;
  balanceAfter: number;
  createdAt: Date;
}

const toEntry = (doc: StoredEntry): LedgerEntry => ({
  entryId: doc.entryId,
  accountId: doc.accountId,
  kind: doc.kind,
  amount: doc.amount,
  balanceAfter: doc.balanceAfter,
  createdAt: doc.createdAt,
});

class MongoLedgerTransaction implements LedgerStoreTransaction {
  constructor(private readonly session: ClientSession) {}

  async getBalance(accountId: AccountId): Promise<number | null> {
    const account = await Account.findOne({ accountId }, { balance: 1 })
      .session(this.session)
      .lean();
    return account ? account.balance : null;
  }

  async setBalance(accountId: AccountId, balance: number): Promise<void> {
    const result = await Account.updateOne(
      { accountId },
      { $set: { balance } },
      { session: this.session, runValidators: true }
    );
    if (result.matchedCount !== 1) {
      throw new Error(`Balance update matched ${result.matchedCount} accounts for ${accountId}`);
    }
  }

  async appendEntry(entry: NewLedgerEntry): Promise<LedgerEntry> {
    const [created] = await LedgerEntryModel.create([entry], { session: this.session });
    if (!created) {
      throw new Error(`Ledger entry ${entry.entryId} was not written`);
    }
    return toEntry(created);
  }
}

export class MongoLedgerStore implements LedgerStore {
  constructor(private readonly connection: Connection = mongoose.connection) {}

  async findAccountByCredential(credentialDigest: string): Promise<AccountId | null> {
    const account = await Account.findOne({ credentialDigest }, { accountId: 1 }).lean();
    return account ? account.accountId : null;
  }

  async getBalance(accountId: AccountId): Promise<number | null> {
    const account = await Account.findOne({ accountId }, { balance: 1 }).lean();
    return account ? account.balance : null;
  }

  async listEntries(accountId: AccountId, limit: number): Promise<LedgerEntry[]> {
    const entries = await LedgerEntryModel.find({ accountId })
      .sort({ createdAt: -1, _id: -1 })
      .limit(limit)
      .lean();
    return entries.map(toEntry);
  }

  async runInTransaction<T>(work: (tx: LedgerStoreTransaction) => Promise<T>): Promise<T> {
    return this.connection.transaction((session) => work(new MongoLedgerTransaction(session)));
  }

  async isHealthy(): Promise<boolean> {
    return this.connection.readyState === 1;
  }
}
