/**
 * Catalog record module
 * @module record
 */

export {
  createCatalogRecord,
  cloneCatalogRecord,
  copyTagGroups,
  identityOf,
  sameIdentity,
  identityKey,
} from './catalog-record.js'
