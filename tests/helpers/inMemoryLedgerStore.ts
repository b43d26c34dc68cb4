import {
  AccountId,
  LedgerEntry,
  LedgerStore,
  LedgerStoreTransaction,
  NewLedgerEntry,
} from '../../src/services/ledger/ledger.types';

export type FaultPoint = 'getBalance' | 'setBalance' | 'appendEntry' | 'read';

export interface SeedAccount {
  accountId: AccountId;
  credentialDigest: string;
  balance: number;
}

/**
 * Yield to the event loop so concurrent callers genuinely interleave
 */
const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

/**
 * In-process ledger store for tests.
 *
 * Writes made inside runInTransaction are buffered and applied together
 * when the work resolves, so a rejected unit leaves nothing behind.
 * failNext() arms a one-shot fault at a given step.
 */
export class InMemoryLedgerStore implements LedgerStore {
  private readonly balances = new Map<AccountId, number>();
  private readonly credentials = new Map<string, AccountId>();
  private readonly entries: LedgerEntry[] = [];
  private readonly armedFaults = new Set<FaultPoint>();
  private clock = 0;

  healthy = true;
  commits = 0;
  rollbacks = 0;

  constructor(accounts: SeedAccount[] = []) {
    accounts.forEach((account) => this.addAccount(account));
  }

  addAccount({ accountId, credentialDigest, balance }: SeedAccount): void {
    this.balances.set(accountId, balance);
    this.credentials.set(credentialDigest, accountId);
  }

  failNext(point: FaultPoint): void {
    this.armedFaults.add(point);
  }

  /** Committed balance, bypassing the store contract */
  balanceOf(accountId: AccountId): number | undefined {
    return this.balances.get(accountId);
  }

  /** Committed entries for an account, oldest first */
  entriesOf(accountId: AccountId): LedgerEntry[] {
    return this.entries.filter((entry) => entry.accountId === accountId);
  }

  async findAccountByCredential(credentialDigest: string): Promise<AccountId | null> {
    await tick();
    this.trip('read');
    return this.credentials.get(credentialDigest) ?? null;
  }

  async getBalance(accountId: AccountId): Promise<number | null> {
    await tick();
    this.trip('read');
    return this.balances.get(accountId) ?? null;
  }

  async listEntries(accountId: AccountId, limit: number): Promise<LedgerEntry[]> {
    await tick();
    this.trip('read');
    return this.entriesOf(accountId).reverse().slice(0, limit);
  }

  async runInTransaction<T>(work: (tx: LedgerStoreTransaction) => Promise<T>): Promise<T> {
    const pendingBalances = new Map<AccountId, number>();
    const pendingEntries: LedgerEntry[] = [];

    const tx: LedgerStoreTransaction = {
      getBalance: async (accountId) => {
        await tick();
        this.trip('getBalance');
        return pendingBalances.get(accountId) ?? this.balances.get(accountId) ?? null;
      },
      setBalance: async (accountId, balance) => {
        await tick();
        this.trip('setBalance');
        if (!this.balances.has(accountId)) {
          throw new Error(`No account ${accountId}`);
        }
        pendingBalances.set(accountId, balance);
      },
      appendEntry: async (entry: NewLedgerEntry) => {
        await tick();
        this.trip('appendEntry');
        const committed: LedgerEntry = { ...entry, createdAt: new Date(++this.clock) };
        pendingEntries.push(committed);
        return committed;
      },
    };

    try {
      const result = await work(tx);
      pendingBalances.forEach((balance, accountId) => this.balances.set(accountId, balance));
      this.entries.push(...pendingEntries);
      this.commits++;
      return result;
    } catch (error) {
      this.rollbacks++;
      throw error;
    }
  }

  async isHealthy(): Promise<boolean> {
    return this.healthy;
  }

  private trip(point: FaultPoint): void {
    if (this.armedFaults.delete(point)) {
      throw new Error(`Injected ${point} failure`);
    }
  }
}
