/**
 * Validation of catalog record field values
 * @module validation/record-validation
 */

import type { CatalogRecord, RecordField } from '../types/record.js'
import { CATEGORIES, LANGUAGES } from '../types/record.js'
import { CatalogMergeError } from '../utils/errors.js'

const TOKEN_PATTERN = /^[0-9a-f]{10}$/
const COVER_FINGERPRINT_PATTERN = /^[0-9a-f]{40}-\d+-\d+-\d+-[0-9a-z]+$/

export const MIN_RATING = 0.5
export const MAX_RATING = 5
export const MAX_FAVORITE_SLOT = 9

/**
 * A single problem found in a record
 */
export interface RecordIssue {
  field: RecordField | 'id' | 'token'
  reason: string
}

/**
 * Error thrown when a record fails validation
 */
export class RecordValidationError extends CatalogMergeError {
  public readonly issues: RecordIssue[]

  constructor(id: number, token: string, issues: RecordIssue[]) {
    super(
      `Record ${id}/${token} is invalid: ${issues.map((i) => `${i.field} ${i.reason}`).join('; ')}`,
      'RECORD_VALIDATION_ERROR',
      { id, token, issues }
    )
    this.name = 'RecordValidationError'
    this.issues = issues
  }
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0
}

/**
 * Checks every known field of a record against its value space.
 * Unknown fields are never reported, except that at least one title must be known.
 *
 * @returns The issues found, empty when the record is valid
 */
export function validateCatalogRecord(record: CatalogRecord): RecordIssue[] {
  const issues: RecordIssue[] = []

  if (!Number.isSafeInteger(record.id) || record.id <= 0) {
    issues.push({ field: 'id', reason: 'must be a positive integer' })
  }
  if (!TOKEN_PATTERN.test(record.token)) {
    issues.push({ field: 'token', reason: 'must be 10 lowercase hex digits' })
  }
  if (!record.primaryTitle && !record.secondaryTitle) {
    issues.push({ field: 'primaryTitle', reason: 'or secondaryTitle must be known' })
  }
  if (
    record.coverFingerprint !== undefined &&
    !COVER_FINGERPRINT_PATTERN.test(record.coverFingerprint)
  ) {
    issues.push({
      field: 'coverFingerprint',
      reason: 'must match sha1-size-width-height-format',
    })
  }
  if (
    record.coverAspectRatio !== undefined &&
    !(Number.isFinite(record.coverAspectRatio) && record.coverAspectRatio > 0)
  ) {
    issues.push({ field: 'coverAspectRatio', reason: 'must be a positive number' })
  }
  if (record.category !== undefined && !CATEGORIES.includes(record.category)) {
    issues.push({ field: 'category', reason: `'${record.category}' is not a category` })
  }
  if (
    record.postedTimestamp !== undefined &&
    !(Number.isSafeInteger(record.postedTimestamp) && record.postedTimestamp > 0)
  ) {
    issues.push({ field: 'postedTimestamp', reason: 'must be a positive integer' })
  }
  if (
    record.rating !== undefined &&
    !(record.rating >= MIN_RATING && record.rating <= MAX_RATING)
  ) {
    issues.push({
      field: 'rating',
      reason: `must be between ${MIN_RATING} and ${MAX_RATING}`,
    })
  }
  if (record.language !== undefined && !LANGUAGES.includes(record.language)) {
    issues.push({ field: 'language', reason: `'${record.language}' is not a language` })
  }
  if (
    record.favoriteSlot !== undefined &&
    !(isNonNegativeInteger(record.favoriteSlot) && record.favoriteSlot <= MAX_FAVORITE_SLOT)
  ) {
    issues.push({
      field: 'favoriteSlot',
      reason: `must be an integer between 0 and ${MAX_FAVORITE_SLOT}`,
    })
  }

  const counts = ['pageCount', 'byteSize', 'torrentCount'] as const
  for (const field of counts) {
    const value = record[field]
    if (value !== undefined && !isNonNegativeInteger(value)) {
      issues.push({ field, reason: 'must be a non-negative integer' })
    }
  }

  for (const [group, tags] of record.tagGroups) {
    if (group.trim() === '') {
      issues.push({ field: 'tagGroups', reason: 'group names must not be empty' })
    }
    if (!tags.every((tag) => typeof tag === 'string' && tag.length > 0)) {
      issues.push({ field: 'tagGroups', reason: `group '${group}' has an empty tag` })
    }
  }

  return issues
}

/**
 * Validates a record and throws if any issue is found
 *
 * @throws {RecordValidationError} If the record is invalid
 */
export function assertValidCatalogRecord(record: CatalogRecord): CatalogRecord {
  const issues = validateCatalogRecord(record)
  if (issues.length > 0) {
    throw new RecordValidationError(record.id, record.token, issues)
  }
  return record
}
