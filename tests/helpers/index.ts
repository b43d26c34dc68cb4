export * from './inMemoryLedgerStore';
export * from './manualClock';
export * from './testApp';
