/**
 * Record persistence module
 * @module store
 */

// Errors
export {
  StoreError,
  RecordCodecError,
  UnsupportedSchemaVersionError,
  RecordNotFoundError,
} from './store-error.js'

// Codec
export type { StoredCatalogRecord, StoredCatalogRecordData } from './record-codec.js'
export {
  RECORD_SCHEMA_NAME,
  RECORD_SCHEMA_VERSION,
  LEGACY_RECORD_SCHEMA_VERSION,
  encodeCatalogRecord,
  decodeCatalogRecord,
  serializeCatalogRecord,
  deserializeCatalogRecord,
} from './record-codec.js'

// Store
export type { RecordStore, RecordQueryOptions } from './record-store.js'
export { InMemoryRecordStore, createInMemoryRecordStore } from './record-store.js'

// Ledger
export type { RecordLedgerOptions, LedgerIngestResult } from './record-ledger.js'
export { RecordLedger, createRecordLedger } from './record-ledger.js'
