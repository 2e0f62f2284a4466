/**
 * Record reconciliation module
 * @module reconcile
 */

// Types
export type {
  IdentityMode,
  FieldRuleKind,
  FieldChange,
  ReconcilerConfig,
  ReconcileReport,
} from './types.js'

export { IDENTITY_MODES, DEFAULT_RECONCILER_CONFIG } from './types.js'

// Errors
export { ReconcileError, PreconditionError, IdentityMismatchError } from './reconcile-error.js'

// Validation
export { validateReconcilerConfig } from './validation.js'

// Field rules
export type { ScalarField, FieldsWithRule } from './field-rules.js'
export {
  FIELD_RULES,
  SCALAR_FIELDS,
  RECORD_FIELDS,
  EMPTY_IS_UNKNOWN_FIELDS,
  fieldRuleOf,
  isKnownValue,
  isKnownScalarValue,
  isKnownField,
  applyFieldRule,
} from './field-rules.js'

// Reconciler
export { Reconciler } from './reconciler.js'
