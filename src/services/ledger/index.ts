export { LedgerService } from './ledger.service';
export { LedgerController } from './ledger.controller';
export { MongoLedgerStore } from './ledger.mongo-store';
export { AccountLock } from './account.lock';
export * from './ledger.types';
export { createLedgerRoutes, LedgerRouteDeps } from './ledger.routes';
