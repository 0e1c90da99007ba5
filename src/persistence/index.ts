// Canonical serialization
export { canonicalStringify, computeHash } from './canonicalSerialize';

// Event types
export {
  DistributorEvent,
  DistributorEventType,
  DISTRIBUTOR_EVENT_TYPES,
  GENESIS_HASH,
  isDistributorEventType,
} from './eventTypes';

// Storage interfaces
export { IDistributorStore, EventFilter } from './interfaces';

// Event builder
export { buildEvent, computeEventHash, verifyEventChain, EventDraft } from './eventBuilder';

// In-memory store
export { InMemoryDistributorStore, createInMemoryStore } from './inMemoryStores';

// SQLite store
export { createSqliteStores, openDatabase, SqliteDistributorStore } from './sqlite';
export type { SqliteStores } from './sqlite';
