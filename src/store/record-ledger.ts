/**
 * Ledger that folds partial records from independent sources into a store
 * @module store/record-ledger
 */

import type { CatalogRecord, RecordIdentity } from '../types/record.js'
import type { ReconcileReport } from '../reconcile/types.js'
import type { RecordStore } from './record-store.js'
import { RecordNotFoundError } from './store-error.js'
import { Reconciler } from '../reconcile/reconciler.js'
import { cloneCatalogRecord, identityKey } from '../record/catalog-record.js'
import { assertValidCatalogRecord } from '../validation/record-validation.js'
import { requireNonNull } from '../utils/errors.js'
import type { Logger } from '../utils/logger.js'
import { createPrefixedLogger, defaultLogger } from '../utils/logger.js'

/**
 * Options for configuring a RecordLedger
 */
export interface RecordLedgerOptions {
  /** Store holding the reconciled records */
  store: RecordStore

  /** Reconciler used to merge into stored records (default: permissive, shares the logger) */
  reconciler?: Reconciler

  /** Diagnostic sink (default: console) */
  logger?: Logger

  /** Reject incoming records that fail validation before merging (default: false) */
  validateIncoming?: boolean
}

/**
 * Result of ingesting one partial record
 */
export interface LedgerIngestResult {
  /** The stored record after the ingest */
  record: CatalogRecord

  /** Whether the identity was seen for the first time */
  created: boolean

  /** Merge report, or null when the record was created */
  report: ReconcileReport | null
}

/**
 * RecordLedger - owns the stored copy of every catalog record.
 *
 * Each ingest loads the stored record for the incoming identity, merges the
 * incoming record into it and saves the result. Ingests of one identity run
 * one at a time, in call order; ingests of different identities run freely.
 *
 * @example
 * ```typescript
 * const ledger = new RecordLedger({ store: createInMemoryRecordStore() })
 *
 * await ledger.ingest(fromListingPage)
 * const { record } = await ledger.ingest(fromMetadataApi)
 * ```
 */
export class RecordLedger {
  private readonly store: RecordStore
  private readonly reconciler: Reconciler
  private readonly logger: Logger
  private readonly validateIncoming: boolean
  private readonly pending = new Map<string, Promise<void>>()

  constructor(options: RecordLedgerOptions) {
    this.store = requireNonNull(options.store, 'store')
    const logger = options.logger ?? defaultLogger
    this.reconciler = options.reconciler ?? new Reconciler({ logger })
    this.logger = createPrefixedLogger('RecordLedger', logger)
    this.validateIncoming = options.validateIncoming ?? false
  }

  /**
   * Merges a partial record into the stored record for its identity
   *
   * @throws {MissingParameterError} If incoming is absent
   * @throws {RecordValidationError} If validation is enabled and incoming is invalid
   */
  async ingest(incoming: CatalogRecord): Promise<LedgerIngestResult> {
    requireNonNull(incoming, 'incoming')
    if (this.validateIncoming) {
      assertValidCatalogRecord(incoming)
    }

    return this.runExclusive(identityKey(incoming), () => this.apply(incoming))
  }

  /**
   * Ingests records in order
   */
  async ingestAll(records: readonly CatalogRecord[]): Promise<LedgerIngestResult[]> {
    const results: LedgerIngestResult[] = []
    for (const record of records) {
      results.push(await this.ingest(record))
    }
    return results
  }

  /**
   * Gets the stored record for an identity
   */
  async get(identity: RecordIdentity): Promise<CatalogRecord | null> {
    return this.store.get(identity)
  }

  /**
   * Gets the stored record for an identity, failing when there is none
   *
   * @throws {RecordNotFoundError} If the identity was never ingested
   */
  async require(identity: RecordIdentity): Promise<CatalogRecord> {
    const record = await this.store.get(identity)
    if (!record) {
      throw new RecordNotFoundError(identity)
    }
    return record
  }

  private async apply(incoming: CatalogRecord): Promise<LedgerIngestResult> {
    const existing = await this.store.get(incoming)

    if (!existing) {
      const record = cloneCatalogRecord(incoming)
      await this.store.save(record)
      this.logger.debug('Stored new record', { id: record.id, token: record.token })
      return { record, created: true, report: null }
    }

    const report = this.reconciler.mergeWithReport(existing, incoming)
    if (report.updatedFields.length > 0) {
      await this.store.save(existing)
      this.logger.debug('Updated record', {
        id: existing.id,
        token: existing.token,
        fields: report.updatedFields,
      })
    }

    return { record: existing, created: false, report }
  }

  private runExclusive<R>(key: string, task: () => Promise<R>): Promise<R> {
    const previous = this.pending.get(key) ?? Promise.resolve()
    const run = previous.then(task)
    const settled = run.then(
      () => undefined,
      () => undefined
    )
    this.pending.set(key, settled)

    return run.finally(() => {
      if (this.pending.get(key) === settled) {
        this.pending.delete(key)
      }
    })
  }
}

/**
 * Creates a new RecordLedger
 */
export function createRecordLedger(options: RecordLedgerOptions): RecordLedger {
  return new RecordLedger(options)
}
