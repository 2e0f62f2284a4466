import { describe, it, expect } from 'vitest'
import { ReconcilerBuilder, createReconciler } from '../../../src/builder/reconciler-builder.js'
import { Reconciler } from '../../../src/reconcile/reconciler.js'
import { IdentityMismatchError } from '../../../src/reconcile/reconcile-error.js'
import type { IdentityMode } from '../../../src/reconcile/types.js'
import { InvalidParameterError, MissingParameterError } from '../../../src/utils/errors.js'
import { defaultLogger } from '../../../src/utils/logger.js'
import type { Logger } from '../../../src/utils/logger.js'
import { OTHER_TOKEN, TEST_ID, createTestRecord, createRecordingLogger } from '../../fixtures/records.js'
import { createCatalogRecord } from '../../../src/record/catalog-record.js'

describe('ReconcilerBuilder', () => {
  it('starts from the default configuration', () => {
    const config = new ReconcilerBuilder().getConfig()

    expect(config.identityMode).toBe('permissive')
    expect(config.logger).toBe(defaultLogger)
  })

  it('builds a strict reconciler', () => {
    const reconciler = createReconciler().strict().silent().build()

    expect(reconciler).toBeInstanceOf(Reconciler)
    expect(reconciler.getConfig().identityMode).toBe('strict')
    expect(() =>
      reconciler.merge(createTestRecord(), createCatalogRecord(TEST_ID, OTHER_TOKEN))
    ).toThrow(IdentityMismatchError)
  })

  it('lets the last mode call win', () => {
    const config = createReconciler().strict().permissive().getConfig()

    expect(config.identityMode).toBe('permissive')
  })

  it('routes diagnostics to the configured logger', () => {
    const logger = createRecordingLogger()
    const reconciler = createReconciler().logger(logger).build()

    reconciler.merge(createTestRecord(), createCatalogRecord(TEST_ID, OTHER_TOKEN))

    expect(logger.entries).toHaveLength(1)
    expect(logger.entries[0].level).toBe('warn')
    expect(logger.entries[0].message).toBe(
      "[Reconciler] Can't merge different records, merging anyway"
    )
  })

  it('rejects an unknown identity mode', () => {
    const mode = 'lenient' as unknown as IdentityMode

    expect(() => createReconciler().identityMode(mode)).toThrow(InvalidParameterError)
  })

  it('rejects a missing logger', () => {
    const missing = undefined as unknown as Logger

    expect(() => createReconciler().logger(missing)).toThrow(MissingParameterError)
  })
})
