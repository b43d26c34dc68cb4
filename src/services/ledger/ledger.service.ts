/**
 * Ledger Service
 *
 * Owns each account's balance and its append-only transaction log.
 *
 * Every mutation runs under the account's lock and inside one store
 * transaction covering both the balance write and the log append, so a
 * failure at any step leaves both exactly as they were. Reads of the
 * balance queue behind in-flight mutations on the same account.
 */

import { v4 as uuidv4 } from 'uuid';

import {
  createServiceLogger,
  ledgerTransactionsTotal,
  transactionAmount,
  traceLedgerOperation,
} from '../../observability';
import { AccountLock } from './account.lock';
import {
  AccountId,
  ApplyTransactionResult,
  BalanceResult,
  HistoryResult,
  LedgerFailure,
  LedgerFailureReason,
  LedgerStore,
  LedgerServiceOptions,
  ResolveAccountResult,
  TransactionKind,
  isTransactionKind,
  signedAmount,
} from './ledger.types';

const log = createServiceLogger('ledger');

/**
 * Thrown inside a store transaction to abort it with a business outcome
 * rather than a storage fault
 */
class LedgerRejection extends Error {
  constructor(
    readonly reason: Exclude<LedgerFailureReason, 'STORAGE_FAILURE'>,
    message: string
  ) {
    super(message);
    this.name = 'LedgerRejection';
  }
}

const failure = (reason: LedgerFailureReason, error: string): LedgerFailure => ({
  success: false,
  reason,
  error,
});

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown storage error';

export class LedgerService {
  private readonly store: LedgerStore;
  private readonly digestCredential: (pin: string) => string;
  private readonly allowOverdraft: boolean;
  private readonly defaultHistoryLimit: number;
  private readonly maxHistoryLimit: number;
  private readonly generateEntryId: () => string;
  private readonly locks = new AccountLock<AccountId>();

  constructor(options: LedgerServiceOptions) {
    this.store = options.store;
    this.digestCredential = options.digestCredential;
    this.allowOverdraft = options.allowOverdraft ?? false;
    this.defaultHistoryLimit = options.defaultHistoryLimit ?? 20;
    this.maxHistoryLimit = options.maxHistoryLimit ?? 100;
    this.generateEntryId = options.generateEntryId ?? uuidv4;
  }

  /**
   * Find the account a PIN belongs to
   */
  async resolveAccount(pin: string): Promise<ResolveAccountResult> {
    try {
      const accountId = await this.store.findAccountByCredential(this.digestCredential(pin));
      if (accountId === null) {
        return failure('ACCOUNT_NOT_FOUND', 'No account matches the presented credential');
      }
      return { success: true, accountId };
    } catch (error) {
      log.error({ err: error }, 'Credential lookup failed');
      return failure('STORAGE_FAILURE', errorMessage(error));
    }
  }

  async getBalance(accountId: AccountId): Promise<BalanceResult> {
    try {
      const balance = await this.locks.runExclusive(accountId, () =>
        this.store.getBalance(accountId)
      );
      if (balance === null) {
        return failure('ACCOUNT_NOT_FOUND', `Account ${accountId} not found`);
      }
      return { success: true, accountId, balance };
    } catch (error) {
      log.error({ err: error, accountId }, 'Balance read failed');
      return failure('STORAGE_FAILURE', errorMessage(error));
    }
  }

  /**
   * Apply a deposit or withdrawal as one all-or-nothing unit:
   * read balance, compute the new balance, persist it, append the entry.
   */
  async applyTransaction(
    accountId: AccountId,
    kind: TransactionKind,
    amount: number
  ): Promise<ApplyTransactionResult> {
    if (!isTransactionKind(kind)) {
      return this.reject(accountId, kind, failure('INVALID_AMOUNT', `Unknown transaction kind: ${String(kind)}`));
    }
    if (!Number.isSafeInteger(amount) || amount < 0) {
      return this.reject(
        accountId,
        kind,
        failure('INVALID_AMOUNT', 'Amount must be a non-negative integer')
      );
    }

    const delta = signedAmount({ kind, amount });

    try {
      const result = await traceLedgerOperation(accountId, kind.toLowerCase(), () =>
        this.locks.runExclusive(accountId, () =>
          this.store.runInTransaction(async (tx) => {
            const current = await tx.getBalance(accountId);
            if (current === null) {
              throw new LedgerRejection('ACCOUNT_NOT_FOUND', `Account ${accountId} not found`);
            }

            const newBalance = current + delta;
            if (!Number.isSafeInteger(newBalance)) {
              throw new LedgerRejection('INVALID_AMOUNT', 'Resulting balance is out of range');
            }
            if (newBalance < 0 && !this.allowOverdraft) {
              throw new LedgerRejection(
                'INSUFFICIENT_FUNDS',
                `Withdrawal of ${amount} exceeds balance of ${current}`
              );
            }

            await tx.setBalance(accountId, newBalance);
            const entry = await tx.appendEntry({
              entryId: this.generateEntryId(),
              accountId,
              kind,
              amount: delta,
              balanceAfter: newBalance,
            });

            return { entry, newBalance };
          })
        )
      );

      ledgerTransactionsTotal.inc({ kind, status: 'committed' });
      transactionAmount.observe({ kind }, amount);
      log.info(
        { accountId, kind, amount, newBalance: result.newBalance, entryId: result.entry.entryId },
        'Transaction committed'
      );

      return { success: true, accountId, ...result };
    } catch (error) {
      if (error instanceof LedgerRejection) {
        return this.reject(accountId, kind, failure(error.reason, error.message));
      }

      log.error({ err: error, accountId, kind, amount }, 'Transaction rolled back');
      return this.reject(accountId, kind, failure('STORAGE_FAILURE', errorMessage(error)));
    }
  }

  /**
   * Most recent entries first. A limit that is not a finite number falls
   * back to the default; anything else is clamped to [1, maxHistoryLimit].
   */
  async getHistory(accountId: AccountId, limit?: number): Promise<HistoryResult> {
    const requested =
      limit !== undefined && Number.isFinite(limit) ? Math.trunc(limit) : this.defaultHistoryLimit;
    const boundedLimit = Math.min(Math.max(requested, 1), this.maxHistoryLimit);

    try {
      const entries = await this.locks.runExclusive(accountId, async () => {
        const balance = await this.store.getBalance(accountId);
        if (balance === null) {
          return null;
        }
        return this.store.listEntries(accountId, boundedLimit);
      });

      if (entries === null) {
        return failure('ACCOUNT_NOT_FOUND', `Account ${accountId} not found`);
      }
      return { success: true, accountId, entries };
    } catch (error) {
      log.error({ err: error, accountId }, 'History read failed');
      return failure('STORAGE_FAILURE', errorMessage(error));
    }
  }

  async isHealthy(): Promise<boolean> {
    try {
      return await this.store.isHealthy();
    } catch (error) {
      log.warn({ err: error }, 'Ledger store health check failed');
      return false;
    }
  }

  private reject(accountId: AccountId, kind: string, result: LedgerFailure): LedgerFailure {
    ledgerTransactionsTotal.inc({ kind, status: result.reason.toLowerCase() });
    if (result.reason !== 'STORAGE_FAILURE') {
      log.warn({ accountId, kind, reason: result.reason }, result.error);
    }
    return result;
  }
}
