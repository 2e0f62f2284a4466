// Main entry point
export { Reconciler } from './reconcile/reconciler.js'
export { ReconcilerBuilder, createReconciler } from './builder/reconciler-builder.js'

// Types - Records
export type {
  Category,
  Language,
  TagGroups,
  RecordIdentity,
  CatalogRecord,
  CatalogRecordFields,
  RecordField,
} from './types/index.js'

export { CATEGORIES, LANGUAGES } from './types/index.js'

// Records
export {
  createCatalogRecord,
  cloneCatalogRecord,
  copyTagGroups,
  identityOf,
  sameIdentity,
  identityKey,
} from './record/index.js'

// Reconciliation
export type {
  IdentityMode,
  FieldRuleKind,
  FieldChange,
  ReconcilerConfig,
  ReconcileReport,
  ScalarField,
  FieldsWithRule,
} from './reconcile/index.js'

export {
  IDENTITY_MODES,
  DEFAULT_RECONCILER_CONFIG,
  ReconcileError,
  PreconditionError,
  IdentityMismatchError,
  validateReconcilerConfig,
  FIELD_RULES,
  SCALAR_FIELDS,
  RECORD_FIELDS,
  EMPTY_IS_UNKNOWN_FIELDS,
  fieldRuleOf,
  isKnownValue,
  isKnownScalarValue,
  isKnownField,
  applyFieldRule,
} from './reconcile/index.js'

// Validation
export type { RecordIssue } from './validation/index.js'
export {
  validateCatalogRecord,
  assertValidCatalogRecord,
  RecordValidationError,
  MIN_RATING,
  MAX_RATING,
  MAX_FAVORITE_SLOT,
} from './validation/index.js'

// Persistence
export type {
  StoredCatalogRecord,
  StoredCatalogRecordData,
  RecordStore,
  RecordQueryOptions,
  RecordLedgerOptions,
  LedgerIngestResult,
} from './store/index.js'

export {
  StoreError,
  RecordCodecError,
  UnsupportedSchemaVersionError,
  RecordNotFoundError,
  RECORD_SCHEMA_NAME,
  RECORD_SCHEMA_VERSION,
  LEGACY_RECORD_SCHEMA_VERSION,
  encodeCatalogRecord,
  decodeCatalogRecord,
  serializeCatalogRecord,
  deserializeCatalogRecord,
  InMemoryRecordStore,
  createInMemoryRecordStore,
  RecordLedger,
  createRecordLedger,
} from './store/index.js'

// Logging
export type { Logger } from './utils/logger.js'
export {
  defaultLogger,
  createSilentLogger,
  createPrefixedLogger,
  isLogger,
} from './utils/logger.js'

// Errors
export {
  CatalogMergeError,
  MissingParameterError,
  InvalidParameterError,
  ConfigurationError,
  isCatalogMergeError,
} from './utils/errors.js'
