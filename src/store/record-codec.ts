/**
 * Versioned encoding of catalog records for durable storage
 * @module store/record-codec
 */

import type {
  CatalogRecord,
  CatalogRecordFields,
  Category,
  Language,
  TagGroups,
} from '../types/record.js'
import { CATEGORIES, LANGUAGES } from '../types/record.js'
import { createCatalogRecord } from '../record/catalog-record.js'
import type { ScalarField } from '../reconcile/field-rules.js'
import { isKnownScalarValue } from '../reconcile/field-rules.js'
import { RecordCodecError, UnsupportedSchemaVersionError } from './store-error.js'

/**
 * Schema name written into every stored payload
 */
export const RECORD_SCHEMA_NAME = 'catalog-merge:CatalogRecord'

/**
 * Version written by {@link encodeCatalogRecord}. Unknown fields are omitted.
 */
export const RECORD_SCHEMA_VERSION = 2

/**
 * This package's earlier sentinel-encoded layout, under the same schema name
 * and field names as the current one: `null` for unknown strings, `NaN` or
 * `null` for unknown floats, `-1` for unknown counts, slots and enum codes, `0`
 * for unknown timestamp and torrent count, tag groups as a plain object.
 */
export const LEGACY_RECORD_SCHEMA_VERSION = 1

const SUPPORTED_VERSIONS = [LEGACY_RECORD_SCHEMA_VERSION, RECORD_SCHEMA_VERSION] as const

/**
 * Record data as written at the current schema version
 */
export interface StoredCatalogRecordData {
  id: number
  token: string
  primaryTitle?: string
  secondaryTitle?: string
  coverFingerprint?: string
  coverUrl?: string
  coverAspectRatio?: number
  category?: Category
  postedTimestamp?: number
  uploaderName?: string
  rating?: number
  language?: Language
  favoriteSlot?: number
  invalidFlag: boolean
  archiveKey?: string
  pageCount?: number
  byteSize?: number
  torrentCount?: number
  /** Ordered `[group, tags]` pairs */
  tagGroups: Array<[string, string[]]>
}

/**
 * Stored payload envelope
 */
export interface StoredCatalogRecord {
  schema: typeof RECORD_SCHEMA_NAME
  version: number
  data: StoredCatalogRecordData
}

type PayloadObject = Record<string, unknown>

function isPayloadObject(value: unknown): value is PayloadObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function known<F extends ScalarField>(
  record: CatalogRecord,
  field: F
): CatalogRecord[F] | undefined {
  const value = record[field]
  return isKnownScalarValue(field, value) ? value : undefined
}

/**
 * Encodes a record at the current schema version
 */
export function encodeCatalogRecord(record: CatalogRecord): StoredCatalogRecord {
  return {
    schema: RECORD_SCHEMA_NAME,
    version: RECORD_SCHEMA_VERSION,
    data: {
      id: record.id,
      token: record.token,
      primaryTitle: known(record, 'primaryTitle'),
      secondaryTitle: known(record, 'secondaryTitle'),
      coverFingerprint: known(record, 'coverFingerprint'),
      coverUrl: known(record, 'coverUrl'),
      coverAspectRatio: known(record, 'coverAspectRatio'),
      category: known(record, 'category'),
      postedTimestamp: known(record, 'postedTimestamp'),
      uploaderName: known(record, 'uploaderName'),
      rating: known(record, 'rating'),
      language: known(record, 'language'),
      favoriteSlot: known(record, 'favoriteSlot'),
      invalidFlag: record.invalidFlag,
      archiveKey: known(record, 'archiveKey'),
      pageCount: known(record, 'pageCount'),
      byteSize: known(record, 'byteSize'),
      torrentCount: known(record, 'torrentCount'),
      tagGroups: Array.from(record.tagGroups, ([group, tags]): [string, string[]] => [
        group,
        [...tags],
      ]),
    },
  }
}

// ==================== FIELD READERS ====================

function readString(
  data: PayloadObject,
  field: string,
  options: { emptyIsUnknown?: boolean } = {}
): string | undefined {
  const value = data[field]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'string') {
    throw new RecordCodecError(field, 'expected a string', { value })
  }
  return options.emptyIsUnknown && value === '' ? undefined : value
}

function readTitle(data: PayloadObject, field: string): string | undefined {
  return readString(data, field, { emptyIsUnknown: true })
}

function readNumber(
  data: PayloadObject,
  field: string,
  options: { integer?: boolean; sentinel?: number; nanIsUnknown?: boolean } = {}
): number | undefined {
  const value = data[field]
  if (value === undefined || value === null) return undefined
  if (options.nanIsUnknown && Number.isNaN(value)) return undefined
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new RecordCodecError(field, 'expected a number', { value })
  }
  if (options.sentinel !== undefined && value === options.sentinel) return undefined
  if (options.integer && !Number.isSafeInteger(value)) {
    throw new RecordCodecError(field, 'expected an integer', { value })
  }
  return value
}

function readBoolean(data: PayloadObject, field: string): boolean {
  const value = data[field]
  if (value === undefined || value === null) return false
  if (typeof value !== 'boolean') {
    throw new RecordCodecError(field, 'expected a boolean', { value })
  }
  return value
}

function readName<T extends string>(
  data: PayloadObject,
  field: string,
  names: readonly T[]
): T | undefined {
  const value = readString(data, field)
  if (value === undefined) return undefined
  const name = names.find((candidate) => candidate === value)
  if (name === undefined) {
    throw new RecordCodecError(field, `unknown value '${value}'`, { value })
  }
  return name
}

function readCode<T extends string>(
  data: PayloadObject,
  field: string,
  names: readonly T[]
): T | undefined {
  const code = readNumber(data, field, { integer: true, sentinel: -1 })
  if (code === undefined) return undefined
  if (code < 0 || code >= names.length) {
    throw new RecordCodecError(field, `unknown code ${code}`, { value: code })
  }
  return names[code]
}

function readTagList(group: string, value: unknown): string[] {
  if (!Array.isArray(value) || !value.every((tag) => typeof tag === 'string')) {
    throw new RecordCodecError('tagGroups', `group '${group}' must be a list of strings`)
  }
  return value.map((tag) => String(tag))
}

function readTagPairs(data: PayloadObject): TagGroups {
  const value = data.tagGroups
  const tags: TagGroups = new Map()
  if (value === undefined || value === null) return tags
  if (!Array.isArray(value)) {
    throw new RecordCodecError('tagGroups', 'expected a list of [group, tags] pairs')
  }
  for (const entry of value) {
    if (!Array.isArray(entry) || entry.length !== 2 || typeof entry[0] !== 'string') {
      throw new RecordCodecError('tagGroups', 'expected a list of [group, tags] pairs')
    }
    const group: string = entry[0]
    tags.set(group, readTagList(group, entry[1]))
  }
  return tags
}

function readTagObject(data: PayloadObject): TagGroups {
  const value = data.tagGroups
  const tags: TagGroups = new Map()
  if (value === undefined || value === null) return tags
  if (!isPayloadObject(value)) {
    throw new RecordCodecError('tagGroups', 'expected an object of tag lists')
  }
  for (const [group, list] of Object.entries(value)) {
    tags.set(group, readTagList(group, list))
  }
  return tags
}

function readIdentity(data: PayloadObject): { id: number; token: string } {
  const id = readNumber(data, 'id', { integer: true })
  if (id === undefined) {
    throw new RecordCodecError('id', 'is required')
  }
  const token = readString(data, 'token', { emptyIsUnknown: true })
  if (token === undefined) {
    throw new RecordCodecError('token', 'is required')
  }
  return { id, token }
}

// ==================== DECODERS ====================

function decodeCurrent(data: PayloadObject): CatalogRecord {
  const { id, token } = readIdentity(data)
  const fields: CatalogRecordFields = {
    primaryTitle: readTitle(data, 'primaryTitle'),
    secondaryTitle: readTitle(data, 'secondaryTitle'),
    coverFingerprint: readString(data, 'coverFingerprint'),
    coverUrl: readString(data, 'coverUrl'),
    coverAspectRatio: readNumber(data, 'coverAspectRatio'),
    category: readName(data, 'category', CATEGORIES),
    postedTimestamp: readNumber(data, 'postedTimestamp', { integer: true }),
    uploaderName: readString(data, 'uploaderName'),
    rating: readNumber(data, 'rating'),
    language: readName(data, 'language', LANGUAGES),
    favoriteSlot: readNumber(data, 'favoriteSlot', { integer: true }),
    invalidFlag: readBoolean(data, 'invalidFlag'),
    archiveKey: readString(data, 'archiveKey'),
    pageCount: readNumber(data, 'pageCount', { integer: true }),
    byteSize: readNumber(data, 'byteSize', { integer: true }),
    torrentCount: readNumber(data, 'torrentCount', { integer: true }),
    tagGroups: readTagPairs(data),
  }
  return createCatalogRecord(id, token, fields)
}

function decodeLegacy(data: PayloadObject): CatalogRecord {
  const { id, token } = readIdentity(data)
  const fields: CatalogRecordFields = {
    primaryTitle: readTitle(data, 'primaryTitle'),
    secondaryTitle: readTitle(data, 'secondaryTitle'),
    coverFingerprint: readString(data, 'coverFingerprint'),
    coverUrl: readString(data, 'coverUrl'),
    coverAspectRatio: readNumber(data, 'coverAspectRatio', { nanIsUnknown: true }),
    category: readCode(data, 'category', CATEGORIES),
    postedTimestamp: readNumber(data, 'postedTimestamp', { integer: true, sentinel: 0 }),
    uploaderName: readString(data, 'uploaderName'),
    rating: readNumber(data, 'rating', { nanIsUnknown: true }),
    language: readCode(data, 'language', LANGUAGES),
    favoriteSlot: readNumber(data, 'favoriteSlot', { integer: true, sentinel: -1 }),
    invalidFlag: readBoolean(data, 'invalidFlag'),
    archiveKey: readString(data, 'archiveKey'),
    pageCount: readNumber(data, 'pageCount', { integer: true, sentinel: -1 }),
    byteSize: readNumber(data, 'byteSize', { integer: true, sentinel: -1 }),
    torrentCount: readNumber(data, 'torrentCount', { integer: true, sentinel: 0 }),
    tagGroups: readTagObject(data),
  }
  return createCatalogRecord(id, token, fields)
}

/**
 * Decodes a stored payload written at the current or the legacy schema version
 *
 * @param payload - Parsed payload envelope
 * @returns The decoded record
 * @throws {RecordCodecError} If the payload is malformed
 * @throws {UnsupportedSchemaVersionError} If the version cannot be read
 */
export function decodeCatalogRecord(payload: unknown): CatalogRecord {
  if (!isPayloadObject(payload)) {
    throw new RecordCodecError('payload', 'expected an object')
  }
  if (payload.schema !== RECORD_SCHEMA_NAME) {
    throw new RecordCodecError('schema', `expected '${RECORD_SCHEMA_NAME}'`, {
      value: payload.schema,
    })
  }
  if (!isPayloadObject(payload.data)) {
    throw new RecordCodecError('data', 'expected an object')
  }

  switch (payload.version) {
    case RECORD_SCHEMA_VERSION:
      return decodeCurrent(payload.data)
    case LEGACY_RECORD_SCHEMA_VERSION:
      return decodeLegacy(payload.data)
    default:
      throw new UnsupportedSchemaVersionError(payload.version, SUPPORTED_VERSIONS)
  }
}

/**
 * Encodes a record to JSON text
 */
export function serializeCatalogRecord(record: CatalogRecord): string {
  return JSON.stringify(encodeCatalogRecord(record))
}

/**
 * Decodes a record from JSON text
 *
 * @throws {RecordCodecError} If the text is not valid JSON or the payload is malformed
 * @throws {UnsupportedSchemaVersionError} If the version cannot be read
 */
export function deserializeCatalogRecord(text: string): CatalogRecord {
  let payload: unknown
  try {
    payload = JSON.parse(text)
  } catch (error) {
    throw new RecordCodecError('payload', 'invalid JSON', {
      error: error instanceof Error ? error.message : String(error),
    })
  }
  return decodeCatalogRecord(payload)
}
