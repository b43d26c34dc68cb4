/**
 * Integer handle naming one balance-holding account
 */
export type AccountId = number;

export type TransactionKind = 'DEPOSIT' | 'WITHDRAWAL';

export const TRANSACTION_KINDS: readonly TransactionKind[] = ['DEPOSIT', 'WITHDRAWAL'];

export interface TransactionRequest {
  kind: TransactionKind;
  /** Non-negative magnitude; the kind decides the sign */
  amount: number;
}

/**
 * One immutable line of an account's log. amount is signed.
 */
export interface LedgerEntry {
  entryId: string;
  accountId: AccountId;
  kind: TransactionKind;
  amount: number;
  balanceAfter: number;
  createdAt: Date;
}

export type NewLedgerEntry = Omit<LedgerEntry, 'createdAt'>;

export type LedgerFailureReason =
  | 'ACCOUNT_NOT_FOUND'
  | 'INVALID_AMOUNT'
  | 'INSUFFICIENT_FUNDS'
  | 'STORAGE_FAILURE';

export interface LedgerFailure {
  success: false;
  reason: LedgerFailureReason;
  error: string;
}

/**
 * Ledger operations report outcomes as values; only programming errors throw
 */
export type LedgerResult<T> = ({ success: true } & T) | LedgerFailure;

export type ResolveAccountResult = LedgerResult<{ accountId: AccountId }>;

export type BalanceResult = LedgerResult<{ accountId: AccountId; balance: number }>;

export type ApplyTransactionResult = LedgerResult<{
  accountId: AccountId;
  entry: LedgerEntry;
  newBalance: number;
}>;

export type HistoryResult = LedgerResult<{ accountId: AccountId; entries: LedgerEntry[] }>;

export interface LedgerServiceOptions {
  store: LedgerStore;
  /** Hashes a presented PIN into the stored credential digest */
  digestCredential: (pin: string) => string;
  allowOverdraft?: boolean;
  defaultHistoryLimit?: number;
  maxHistoryLimit?: number;
  generateEntryId?: () => string;
}

/**
 * Persistence contract for the ledger.
 *
 * runInTransaction groups every write made through the handle it passes to
 * work: they all commit when work resolves, and none are visible when it
 * rejects (the rejection is passed on to the caller).
 */
export interface LedgerStore {
  findAccountByCredential(credentialDigest: string): Promise<AccountId | null>;
  getBalance(accountId: AccountId): Promise<number | null>;
  listEntries(accountId: AccountId, limit: number): Promise<LedgerEntry[]>;
  runInTransaction<T>(work: (tx: LedgerStoreTransaction) => Promise<T>): Promise<T>;
  isHealthy(): Promise<boolean>;
}

export interface LedgerStoreTransaction {
  getBalance(accountId: AccountId): Promise<number | null>;
  setBalance(accountId: AccountId, balance: number): Promise<void>;
  appendEntry(entry: NewLedgerEntry): Promise<LedgerEntry>;
}

/**
 * Signed delta a transaction applies to the balance
 */
export const signedAmount = ({ kind, amount }: TransactionRequest): number => {
  switch (kind) {
    case 'DEPOSIT':
      return amount;
    case 'WITHDRAWAL':
      return -amount;
  }
};

export const isTransactionKind = (value: unknown): value is TransactionKind =>
  value === 'DEPOSIT' || value === 'WITHDRAWAL';
