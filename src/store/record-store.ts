/**
 * Record store interface and in-memory implementation
 * @module store/record-store
 */

import type { CatalogRecord, RecordIdentity } from '../types/record.js'
import { identityKey } from '../record/catalog-record.js'
import { serializeCatalogRecord, deserializeCatalogRecord } from './record-codec.js'

/**
 * Query options for listing records
 */
export interface RecordQueryOptions {
  /** Limit number of results */
  limit?: number
  /** Offset for pagination */
  offset?: number
  /** Sort order by id */
  sortOrder?: 'asc' | 'desc'
  /** Include records flagged invalid (default: true) */
  includeInvalid?: boolean
}

/**
 * Interface for persisting catalog records, keyed by identity.
 *
 * Implementations can use different storage backends (database, file, etc.),
 * and must round-trip every field, unknown fields included.
 */
export interface RecordStore {
  /**
   * Retrieves the record for an identity
   *
   * @returns The record or null if not found
   */
  get(identity: RecordIdentity): Promise<CatalogRecord | null>

  /**
   * Saves a record, replacing any record with the same identity
   */
  save(record: CatalogRecord): Promise<void>

  /**
   * Deletes the record for an identity
   *
   * @returns True if deleted, false if not found
   */
  delete(identity: RecordIdentity): Promise<boolean>

  /**
   * Checks if a record exists for an identity
   */
  exists(identity: RecordIdentity): Promise<boolean>

  /**
   * Lists stored records
   */
  list(options?: RecordQueryOptions): Promise<CatalogRecord[]>

  /**
   * Counts stored records
   */
  count(): Promise<number>

  /**
   * Clears all records (use with caution)
   */
  clear(): Promise<void>
}

/**
 * In-memory implementation of RecordStore for testing and simple use cases.
 *
 * Records are kept as serialized payloads, so callers never share state with
 * the store and every save exercises the codec.
 */
export class InMemoryRecordStore implements RecordStore {
  private readonly store = new Map<string, string>()

  async get(identity: RecordIdentity): Promise<CatalogRecord | null> {
    const payload = this.store.get(identityKey(identity))
    return payload === undefined ? null : deserializeCatalogRecord(payload)
  }

  async save(record: CatalogRecord): Promise<void> {
    this.store.set(identityKey(record), serializeCatalogRecord(record))
  }

  async delete(identity: RecordIdentity): Promise<boolean> {
    return this.store.delete(identityKey(identity))
  }

  async exists(identity: RecordIdentity): Promise<boolean> {
    return this.store.has(identityKey(identity))
  }

  async list(options?: RecordQueryOptions): Promise<CatalogRecord[]> {
    let results = this.getAll()

    if (options?.includeInvalid === false) {
      results = results.filter((record) => !record.invalidFlag)
    }

    const sortOrder = options?.sortOrder ?? 'asc'
    results.sort((a, b) => {
      const comparison = a.id - b.id || a.token.localeCompare(b.token)
      return sortOrder === 'asc' ? comparison : -comparison
    })

    const offset = options?.offset ?? 0
    const limit = options?.limit ?? results.length
    return results.slice(offset, offset + limit)
  }

  async count(): Promise<number> {
    return this.store.size
  }

  async clear(): Promise<void> {
    this.store.clear()
  }

  /**
   * Gets all records (for testing/debugging)
   */
  getAll(): CatalogRecord[] {
    return Array.from(this.store.values(), (payload) => deserializeCatalogRecord(payload))
  }
}

/**
 * Creates a new in-memory record store
 */
export function createInMemoryRecordStore(): InMemoryRecordStore {
  return new InMemoryRecordStore()
}
