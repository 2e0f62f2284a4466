/**
 * Reconcile-specific error classes
 * @module reconcile/reconcile-error
 */

import type { RecordIdentity } from '../types/record.js'
import { CatalogMergeError } from '../utils/errors.js'

/**
 * Base error class for all reconcile errors
 */
export class ReconcileError extends CatalogMergeError {
  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message, code, context)
    this.name = 'ReconcileError'
  }
}

/**
 * Error thrown when a caller breaks the merge contract, such as passing no target
 */
export class PreconditionError extends ReconcileError {
  /** The argument that violated the contract */
  public readonly parameterName: string

  constructor(
    parameterName: string,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Precondition failed for '${parameterName}': ${reason}`,
      'PRECONDITION_FAILED',
      { parameterName, reason, ...context }
    )
    this.name = 'PreconditionError'
    this.parameterName = parameterName
  }
}

/**
 * Error thrown in strict identity mode when target and incoming describe
 * different entities
 */
export class IdentityMismatchError extends ReconcileError {
  public readonly target: RecordIdentity
  public readonly incoming: RecordIdentity

  constructor(target: RecordIdentity, incoming: RecordIdentity) {
    super(
      `Cannot merge record ${incoming.id}/${incoming.token} into ${target.id}/${target.token}: identities differ`,
      'IDENTITY_MISMATCH',
      {
        targetId: target.id,
        targetToken: target.token,
        incomingId: incoming.id,
        incomingToken: incoming.token,
      }
    )
    this.name = 'IdentityMismatchError'
    this.target = { id: target.id, token: target.token }
    this.incoming = { id: incoming.id, token: incoming.token }
  }
}
