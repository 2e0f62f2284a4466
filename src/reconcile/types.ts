/**
 * Reconciliation type definitions
 * @module reconcile/types
 */

import type { RecordField } from '../types/record.js'
import type { Logger } from '../utils/logger.js'
import { defaultLogger } from '../utils/logger.js'

/**
 * How a merge treats records whose identities differ.
 *
 * - `permissive` - Log a warning and merge anyway
 * - `strict` - Throw an IdentityMismatchError before touching the target
 */
export type IdentityMode = 'permissive' | 'strict'

/**
 * All identity modes
 */
export const IDENTITY_MODES: readonly IdentityMode[] = ['permissive', 'strict']

/**
 * How a merge rule decides whether the incoming value is taken.
 *
 * - `replaceIfKnown` - Incoming value wins whenever it is known
 * - `stickyTrue` - Logical OR; once true, stays true
 * - `replaceIfNonEmpty` - Whole collection replaced when incoming is non-empty
 */
export type FieldRuleKind = 'replaceIfKnown' | 'stickyTrue' | 'replaceIfNonEmpty'

/**
 * What a merge did to a single target field.
 *
 * - `unchanged` - Incoming value unknown, or equal to the target's
 * - `filled` - Target was unknown and is now known
 * - `overwritten` - Target was known and now holds a different value
 */
export type FieldChange = 'unchanged' | 'filled' | 'overwritten'

/**
 * Reconciler configuration
 */
export interface ReconcilerConfig {
  /** Behaviour on identity mismatch (default: 'permissive') */
  identityMode: IdentityMode

  /** Diagnostic sink for identity mismatch warnings */
  logger: Logger
}

/**
 * Default reconciler configuration
 */
export const DEFAULT_RECONCILER_CONFIG: ReconcilerConfig = {
  identityMode: 'permissive',
  logger: defaultLogger,
}

/**
 * Outcome of a single merge
 */
export interface ReconcileReport {
  /** Fields whose value changed, in rule order */
  updatedFields: RecordField[]

  /** Fields that went from unknown to known */
  filledFields: RecordField[]

  /** Fields whose known value was replaced by a different known value */
  overwrittenFields: RecordField[]

  /** Whether target and incoming had different identities */
  identityMismatch: boolean

  /** Whether the incoming record was absent, making the merge a no-op */
  skipped: boolean
}
