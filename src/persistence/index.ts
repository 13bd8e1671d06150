// Canonical serialization
export { canonicalStringify, computeHash } from './canonicalSerialize';

// Event types
export {
  LedgerEvent,
  LedgerEventType,
  LEDGER_EVENT_TYPES,
  ChainHead,
  GENESIS_HASH,
  GENESIS_HEAD,
  isLedgerEventType,
} from './eventTypes';

// Storage interfaces
export {
  BlockRange,
  IEventStore,
  ILedgerStore,
  LedgerCommit,
  StoredLedger,
} from './interfaces';

// Event builder
export { buildLedgerEvent, computeEventHash, verifyHashChain, EventDraft } from './eventBuilder';

// Ledger serializer
export { serializeLedgerGlobals, deserializeLedgerGlobals } from './ledgerSerializer';

// In-memory stores
export {
  InMemoryEventStore,
  InMemoryLedgerStore,
  createInMemoryStores,
} from './inMemoryStores';

// Persist / restore
export { persistLedger } from './persistLedger';
export { restoreLedger, RestoreOptions, RestoredLedger } from './restore';
