export { LedgerStore, type LedgerStoreOptions, type LedgerTransaction } from './ledger.js';
export {
  serializeLedger,
  deserializeLedger,
  createEmptyLedger,
  LedgerCorruptionError,
  type PersistedLedger,
  type PersistedMod
} from './ledger-schema.js';
