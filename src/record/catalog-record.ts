/**
 * Construction, copying and identity helpers for catalog records
 * @module record/catalog-record
 */

import type {
  CatalogRecord,
  CatalogRecordFields,
  RecordIdentity,
  TagGroups,
} from '../types/record.js'
import { requireNonNull, requireSafeInteger, InvalidParameterError } from '../utils/errors.js'

/**
 * Copies a tag mapping, including each tag list, preserving group order
 */
export function copyTagGroups(tags: ReadonlyMap<string, readonly string[]>): TagGroups {
  const copy: TagGroups = new Map()
  for (const [group, values] of tags) {
    copy.set(group, [...values])
  }
  return copy
}

/**
 * Creates a record for the given identity with every other field unknown.
 *
 * @param id - Numeric item id
 * @param token - Access token
 * @param fields - Fields already observed by the producer
 * @returns A new record
 * @throws {MissingParameterError} If id or token is absent
 * @throws {InvalidParameterError} If id is not a safe integer or token is not a string
 *
 * @example
 * ```typescript
 * const record = createCatalogRecord(1024, 'c219d2cf41', {
 *   primaryTitle: 'Sample Title',
 *   pageCount: 32,
 * })
 * ```
 */
export function createCatalogRecord(
  id: number,
  token: string,
  fields: CatalogRecordFields = {}
): CatalogRecord {
  requireSafeInteger(requireNonNull(id, 'id'), 'id')
  if (typeof requireNonNull(token, 'token') !== 'string') {
    throw new InvalidParameterError('token', token, 'must be a string')
  }

  return {
    ...fields,
    id,
    token,
    invalidFlag: fields.invalidFlag ?? false,
    tagGroups: fields.tagGroups ? copyTagGroups(fields.tagGroups) : new Map(),
  }
}

/**
 * Deep copies a record; the copy shares no mutable state with the original
 */
export function cloneCatalogRecord(record: CatalogRecord): CatalogRecord {
  return {
    ...record,
    tagGroups: copyTagGroups(record.tagGroups),
  }
}

/**
 * Extracts the identity pair of a record
 */
export function identityOf(record: RecordIdentity): RecordIdentity {
  return { id: record.id, token: record.token }
}

/**
 * Two records describe the same entity iff both id and token are equal.
 * Token comparison is exact and case-sensitive.
 */
export function sameIdentity(a: RecordIdentity, b: RecordIdentity): boolean {
  return a.id === b.id && a.token === b.token
}

/**
 * Stable string key for an identity, e.g. `1024:c219d2cf41`
 */
export function identityKey(identity: RecordIdentity): string {
  return `${identity.id}:${identity.token}`
}
