export type { RecordIssue } from './record-validation.js'
export {
  validateCatalogRecord,
  assertValidCatalogRecord,
  RecordValidationError,
  MIN_RATING,
  MAX_RATING,
  MAX_FAVORITE_SLOT,
} from './record-validation.js'
