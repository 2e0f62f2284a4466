/**
 * Store and codec error classes
 * @module store/store-error
 */

import type { RecordIdentity } from '../types/record.js'
import { CatalogMergeError } from '../utils/errors.js'

/**
 * Base error class for all store errors
 */
export class StoreError extends CatalogMergeError {
  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message, code, context)
    this.name = 'StoreError'
  }
}

/**
 * Error thrown when a stored payload cannot be decoded
 *
 * @example
 * ```typescript
 * throw new RecordCodecError('rating', 'expected a number', { value: 'high' })
 * ```
 */
export class RecordCodecError extends StoreError {
  /** The payload field that failed to decode */
  public readonly field: string

  constructor(
    field: string,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Cannot decode '${field}': ${reason}`,
      'RECORD_CODEC_ERROR',
      { field, reason, ...context }
    )
    this.name = 'RecordCodecError'
    this.field = field
  }
}

/**
 * Error thrown when a payload carries a schema version this codec cannot read
 */
export class UnsupportedSchemaVersionError extends StoreError {
  public readonly version: unknown

  constructor(version: unknown, supported: readonly number[]) {
    super(
      `Unsupported record schema version ${String(version)}, expected one of: ${supported.join(', ')}`,
      'UNSUPPORTED_SCHEMA_VERSION',
      { version, supported }
    )
    this.name = 'UnsupportedSchemaVersionError'
    this.version = version
  }
}

/**
 * Error thrown when a record is not in the store
 */
export class RecordNotFoundError extends StoreError {
  public readonly identity: RecordIdentity

  constructor(identity: RecordIdentity) {
    super(
      `Record not found: ${identity.id}/${identity.token}`,
      'RECORD_NOT_FOUND',
      { id: identity.id, token: identity.token }
    )
    this.name = 'RecordNotFoundError'
    this.identity = { id: identity.id, token: identity.token }
  }
}
