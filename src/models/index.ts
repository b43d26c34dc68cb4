export { Account, IAccount } from './Account';
export { LedgerEntry, ILedgerEntry } from './LedgerEntry';
