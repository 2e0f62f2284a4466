export type {
  Category,
  Language,
  TagGroups,
  RecordIdentity,
  CatalogRecord,
  CatalogRecordFields,
  RecordField,
} from './record.js'

export { CATEGORIES, LANGUAGES } from './record.js'
