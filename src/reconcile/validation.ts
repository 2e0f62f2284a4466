/**
 * Validation functions for reconciler configuration
 * @module reconcile/validation
 */

import type { ReconcilerConfig } from './types.js'
import { IDENTITY_MODES } from './types.js'
import { ConfigurationError } from '../utils/errors.js'
import { isLogger } from '../utils/logger.js'

/**
 * Validates a complete reconciler configuration
 * @param config - The configuration to validate
 * @throws {ConfigurationError} If configuration is invalid
 */
export function validateReconcilerConfig(config: ReconcilerConfig): void {
  if (!IDENTITY_MODES.includes(config.identityMode)) {
    throw new ConfigurationError(
      `invalid identityMode '${String(config.identityMode)}', must be one of: ${IDENTITY_MODES.join(', ')}`,
      'identityMode'
    )
  }

  if (!isLogger(config.logger)) {
    throw new ConfigurationError(
      'logger must implement debug, info, warn and error',
      'logger'
    )
  }
}
