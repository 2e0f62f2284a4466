/**
 * Fluent builder for configuring a Reconciler
 * @module builder/reconciler-builder
 */

import type { IdentityMode, ReconcilerConfig } from '../reconcile/types.js'
import { DEFAULT_RECONCILER_CONFIG, IDENTITY_MODES } from '../reconcile/types.js'
import { Reconciler } from '../reconcile/reconciler.js'
import type { Logger } from '../utils/logger.js'
import { createSilentLogger } from '../utils/logger.js'
import { requireNonNull, requireOneOf } from '../utils/errors.js'

/**
 * Fluent builder for a Reconciler.
 *
 * @example
 * ```typescript
 * const reconciler = new ReconcilerBuilder()
 *   .strict()
 *   .logger(appLogger)
 *   .build()
 * ```
 */
export class ReconcilerBuilder {
  private mode: IdentityMode = DEFAULT_RECONCILER_CONFIG.identityMode
  private sink: Logger = DEFAULT_RECONCILER_CONFIG.logger

  /**
   * Set how identity mismatches are handled.
   *
   * @param mode - 'permissive' logs and merges, 'strict' throws
   * @returns This builder for chaining
   * @throws {InvalidParameterError} If mode is not a known identity mode
   */
  identityMode(mode: IdentityMode): this {
    this.mode = requireOneOf(mode, IDENTITY_MODES, 'identityMode')
    return this
  }

  /**
   * Reject merges of records with different identities
   */
  strict(): this {
    return this.identityMode('strict')
  }

  /**
   * Log identity mismatches and merge anyway
   */
  permissive(): this {
    return this.identityMode('permissive')
  }

  /**
   * Set the diagnostic sink.
   *
   * @param logger - Receives identity mismatch warnings and merge summaries
   * @returns This builder for chaining
   */
  logger(logger: Logger): this {
    this.sink = requireNonNull(logger, 'logger')
    return this
  }

  /**
   * Discard all diagnostics
   */
  silent(): this {
    return this.logger(createSilentLogger())
  }

  /**
   * Get the configuration collected so far
   */
  getConfig(): ReconcilerConfig {
    return { identityMode: this.mode, logger: this.sink }
  }

  /**
   * Build the Reconciler.
   *
   * @throws {ConfigurationError} If the collected configuration is invalid
   */
  build(): Reconciler {
    return new Reconciler(this.getConfig())
  }
}

/**
 * Creates a new ReconcilerBuilder
 */
export function createReconciler(): ReconcilerBuilder {
  return new ReconcilerBuilder()
}
