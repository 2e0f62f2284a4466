/**
 * Reconciler for merging partial catalog records
 * @module reconcile/reconciler
 */

import type { CatalogRecord } from '../types/record.js'
import type { ReconcilerConfig, ReconcileReport } from './types.js'
import { DEFAULT_RECONCILER_CONFIG } from './types.js'
import { RECORD_FIELDS, applyFieldRule } from './field-rules.js'
import { IdentityMismatchError, PreconditionError } from './reconcile-error.js'
import { validateReconcilerConfig } from './validation.js'
import { cloneCatalogRecord, sameIdentity } from '../record/catalog-record.js'
import type { Logger } from '../utils/logger.js'
import { createPrefixedLogger } from '../utils/logger.js'

function emptyReport(skipped: boolean): ReconcileReport {
  return {
    updatedFields: [],
    filledFields: [],
    overwrittenFields: [],
    identityMismatch: false,
    skipped,
  }
}

/**
 * Reconciler - merges what one source knows about a catalog item into what
 * another source knew.
 *
 * For every field, a known incoming value replaces the target's value and an
 * unknown incoming value leaves the target alone. `invalidFlag` is OR-ed and
 * `tagGroups` is replaced as a whole when the incoming mapping is non-empty.
 *
 * Merges are synchronous and mutate the target in place; callers sharing a
 * target across asynchronous work must serialize merges for that identity
 * (RecordLedger does this).
 *
 * @example
 * ```typescript
 * const reconciler = new Reconciler({ identityMode: 'strict' })
 *
 * const fromListing = createCatalogRecord(1024, 'c219d2cf41', { primaryTitle: 'Title' })
 * const fromApi = createCatalogRecord(1024, 'c219d2cf41', { rating: 4.5, pageCount: 32 })
 *
 * reconciler.merge(fromListing, fromApi)
 * // fromListing now has primaryTitle, rating and pageCount
 * ```
 */
export class Reconciler {
  private readonly config: ReconcilerConfig
  private readonly logger: Logger

  /**
   * Creates a new Reconciler
   *
   * @param config - Partial configuration, merged with the defaults
   * @throws {ConfigurationError} If the configuration is invalid
   */
  constructor(config: Partial<ReconcilerConfig> = {}) {
    this.config = {
      ...DEFAULT_RECONCILER_CONFIG,
      ...config,
    }

    validateReconcilerConfig(this.config)

    this.logger = createPrefixedLogger('Reconciler', this.config.logger)
  }

  /**
   * Merges the data known by `incoming` into `target`.
   *
   * An absent `incoming` is a no-op. `incoming` is never modified.
   *
   * @throws {PreconditionError} If target is absent
   * @throws {IdentityMismatchError} If identities differ in strict mode
   */
  merge(target: CatalogRecord, incoming: CatalogRecord | null | undefined): void {
    this.mergeWithReport(target, incoming)
  }

  /**
   * Same as {@link merge}, returning which fields changed
   */
  mergeWithReport(
    target: CatalogRecord,
    incoming: CatalogRecord | null | undefined
  ): ReconcileReport {
    this.requireTarget(target)

    if (incoming === null || incoming === undefined) {
      return emptyReport(true)
    }

    const report = emptyReport(false)

    if (!sameIdentity(target, incoming)) {
      if (this.config.identityMode === 'strict') {
        throw new IdentityMismatchError(target, incoming)
      }
      report.identityMismatch = true
      this.logger.warn("Can't merge different records, merging anyway", {
        targetId: target.id,
        targetToken: target.token,
        incomingId: incoming.id,
        incomingToken: incoming.token,
      })
    }

    for (const field of RECORD_FIELDS) {
      const change = applyFieldRule(target, incoming, field)
      if (change === 'unchanged') continue

      report.updatedFields.push(field)
      if (change === 'filled') {
        report.filledFields.push(field)
      } else {
        report.overwrittenFields.push(field)
      }
    }

    if (report.updatedFields.length > 0) {
      this.logger.debug(`Merged ${report.updatedFields.length} field(s)`, {
        id: target.id,
        token: target.token,
        fields: report.updatedFields,
      })
    }

    return report
  }

  /**
   * Merges the first candidate sharing the target's identity.
   *
   * Absent candidates are skipped. At most one merge happens; later matches
   * are ignored.
   *
   * @returns True if a candidate was merged
   * @throws {PreconditionError} If target is absent
   */
  mergeFromCollection(
    target: CatalogRecord,
    candidates: ReadonlyArray<CatalogRecord | null | undefined> | null | undefined
  ): boolean {
    this.requireTarget(target)

    if (candidates === null || candidates === undefined) {
      return false
    }

    for (const candidate of candidates) {
      if (candidate && sameIdentity(candidate, target)) {
        this.merge(target, candidate)
        return true
      }
    }

    return false
  }

  /**
   * Returns a new record holding target merged with incoming, leaving both
   * arguments untouched
   *
   * @throws {PreconditionError} If target is absent
   * @throws {IdentityMismatchError} If identities differ in strict mode
   */
  reconciled(target: CatalogRecord, incoming: CatalogRecord | null | undefined): CatalogRecord {
    this.requireTarget(target)
    const result = cloneCatalogRecord(target)
    this.merge(result, incoming)
    return result
  }

  /**
   * Gets the current reconciler configuration
   */
  getConfig(): ReconcilerConfig {
    return { ...this.config }
  }

  private requireTarget(target: CatalogRecord | null | undefined): asserts target is CatalogRecord {
    if (target === null || target === undefined) {
      throw new PreconditionError('target', 'a target record is required')
    }
  }
}

