/**
 * Per-field known tests and merge rules
 * @module reconcile/field-rules
 */

import type { CatalogRecord, RecordField, TagGroups } from '../types/record.js'
import type { FieldChange, FieldRuleKind } from './types.js'
import { copyTagGroups } from '../record/catalog-record.js'

/**
 * The merge rule of every field
 */
export const FIELD_RULES = {
  primaryTitle: 'replaceIfKnown',
  secondaryTitle: 'replaceIfKnown',
  coverFingerprint: 'replaceIfKnown',
  coverUrl: 'replaceIfKnown',
  coverAspectRatio: 'replaceIfKnown',
  category: 'replaceIfKnown',
  postedTimestamp: 'replaceIfKnown',
  uploaderName: 'replaceIfKnown',
  rating: 'replaceIfKnown',
  language: 'replaceIfKnown',
  favoriteSlot: 'replaceIfKnown',
  invalidFlag: 'stickyTrue',
  archiveKey: 'replaceIfKnown',
  pageCount: 'replaceIfKnown',
  byteSize: 'replaceIfKnown',
  torrentCount: 'replaceIfKnown',
  tagGroups: 'replaceIfNonEmpty',
} as const satisfies Record<RecordField, FieldRuleKind>

/**
 * Fields merged with the given rule
 */
export type FieldsWithRule<K extends FieldRuleKind> = {
  [F in RecordField]: (typeof FIELD_RULES)[F] extends K ? F : never
}[RecordField]

/**
 * Fields merged with the `replaceIfKnown` rule
 */
export type ScalarField = FieldsWithRule<'replaceIfKnown'>

/**
 * Scalar fields, in merge order
 */
export const SCALAR_FIELDS: readonly ScalarField[] = [
  'primaryTitle',
  'secondaryTitle',
  'coverFingerprint',
  'coverUrl',
  'coverAspectRatio',
  'category',
  'postedTimestamp',
  'uploaderName',
  'rating',
  'language',
  'favoriteSlot',
  'archiveKey',
  'pageCount',
  'byteSize',
  'torrentCount',
]

/**
 * Every mergeable field, in merge order
 */
export const RECORD_FIELDS: readonly RecordField[] = [...SCALAR_FIELDS, 'invalidFlag', 'tagGroups']

/**
 * Scalar fields for which the empty string also means unknown
 */
export const EMPTY_IS_UNKNOWN_FIELDS: readonly ScalarField[] = ['primaryTitle', 'secondaryTitle']

/**
 * Returns the rule a merge applies to a field
 */
export function fieldRuleOf(field: RecordField): FieldRuleKind {
  return FIELD_RULES[field]
}

function hasRule<K extends FieldRuleKind>(
  field: RecordField,
  kind: K
): field is FieldsWithRule<K> {
  return FIELD_RULES[field] === kind
}

/**
 * Known test for a scalar value: absent and NaN are unknown
 */
export function isKnownValue(value: unknown): boolean {
  if (value === undefined || value === null) return false
  if (typeof value === 'number') return !Number.isNaN(value)
  return true
}

/**
 * Known test for the value of a scalar field. Titles also treat `''` as unknown.
 */
export function isKnownScalarValue(field: ScalarField, value: unknown): boolean {
  if (!isKnownValue(value)) return false
  return !(value === '' && EMPTY_IS_UNKNOWN_FIELDS.includes(field))
}

/**
 * Whether a record currently holds real data for a field
 *
 * @example
 * ```typescript
 * isKnownField(createCatalogRecord(1, 'c219d2cf41'), 'rating') // false
 * isKnownField(createCatalogRecord(1, 'c219d2cf41', { rating: 4.5 }), 'rating') // true
 * ```
 */
export function isKnownField(record: CatalogRecord, field: RecordField): boolean {
  if (hasRule(field, 'stickyTrue')) return record[field]
  if (hasRule(field, 'replaceIfNonEmpty')) return record[field].size > 0
  return isKnownScalarValue(field, record[field])
}

function tagGroupsEqual(a: TagGroups, b: TagGroups): boolean {
  if (a.size !== b.size) return false
  const aEntries = Array.from(a)
  const bEntries = Array.from(b)
  return aEntries.every(([group, tags], index) => {
    const [otherGroup, otherTags] = bEntries[index]
    return (
      group === otherGroup &&
      tags.length === otherTags.length &&
      tags.every((tag, tagIndex) => tag === otherTags[tagIndex])
    )
  })
}

function replaceIfKnown<F extends ScalarField>(
  target: CatalogRecord,
  incoming: CatalogRecord,
  field: F
): FieldChange {
  const value = incoming[field]
  if (!isKnownScalarValue(field, value)) return 'unchanged'

  const previous = target[field]
  target[field] = value
  if (!isKnownScalarValue(field, previous)) return 'filled'
  return previous === value ? 'unchanged' : 'overwritten'
}

function stickyTrue(
  target: CatalogRecord,
  incoming: CatalogRecord,
  field: FieldsWithRule<'stickyTrue'>
): FieldChange {
  if (!incoming[field] || target[field]) return 'unchanged'
  target[field] = true
  return 'filled'
}

function replaceIfNonEmpty(
  target: CatalogRecord,
  incoming: CatalogRecord,
  field: FieldsWithRule<'replaceIfNonEmpty'>
): FieldChange {
  const tags = incoming[field]
  if (tags.size === 0) return 'unchanged'
  const previous = target[field]
  target[field] = copyTagGroups(tags)
  if (previous.size === 0) return 'filled'
  return tagGroupsEqual(previous, tags) ? 'unchanged' : 'overwritten'
}

/**
 * Applies the rule for one field, copying from incoming into target.
 * Never mutates incoming, and never leaves target sharing incoming's tag lists.
 */
export function applyFieldRule(
  target: CatalogRecord,
  incoming: CatalogRecord,
  field: RecordField
): FieldChange {
  if (hasRule(field, 'stickyTrue')) return stickyTrue(target, incoming, field)
  if (hasRule(field, 'replaceIfNonEmpty')) return replaceIfNonEmpty(target, incoming, field)
  return replaceIfKnown(target, incoming, field)
}
