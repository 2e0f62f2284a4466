import { describe, it, expect } from 'vitest'
import {
  CatalogMergeError,
  MissingParameterError,
  InvalidParameterError,
  ConfigurationError,
  requireNonNull,
  requireSafeInteger,
  requireOneOf,
  isCatalogMergeError,
} from '../../../src/utils/errors.js'
import { IdentityMismatchError, PreconditionError } from '../../../src/reconcile/reconcile-error.js'
import { RecordNotFoundError } from '../../../src/store/store-error.js'

describe('error classes', () => {
  it('carries code and context', () => {
    const error = new CatalogMergeError('boom', 'TEST_CODE', { key: 'value' })

    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe('CatalogMergeError')
    expect(error.code).toBe('TEST_CODE')
    expect(error.context).toEqual({ key: 'value' })
  })

  it('formats parameter errors', () => {
    const missing = new MissingParameterError('target')
    const invalid = new InvalidParameterError('id', 1.5, 'must be a safe integer')

    expect(missing.message).toBe("Missing required parameter: 'target'")
    expect(missing.code).toBe('MISSING_PARAMETER')
    expect(invalid.message).toBe("Invalid parameter 'id': must be a safe integer")
    expect(invalid.context).toEqual({ parameterName: 'id', value: 1.5, reason: 'must be a safe integer' })
  })

  it('records the configuration field', () => {
    const error = new ConfigurationError('bad mode', 'identityMode')

    expect(error.field).toBe('identityMode')
    expect(error.code).toBe('CONFIGURATION_ERROR')
  })

  it('describes both identities on a mismatch', () => {
    const error = new IdentityMismatchError({ id: 1, token: 'aaa' }, { id: 2, token: 'bbb' })

    expect(error.code).toBe('IDENTITY_MISMATCH')
    expect(error.target).toEqual({ id: 1, token: 'aaa' })
    expect(error.incoming).toEqual({ id: 2, token: 'bbb' })
    expect(error.context).toEqual({
      targetId: 1,
      targetToken: 'aaa',
      incomingId: 2,
      incomingToken: 'bbb',
    })
  })

  it('recognizes every library error', () => {
    expect(isCatalogMergeError(new PreconditionError('target', 'required'))).toBe(true)
    expect(isCatalogMergeError(new RecordNotFoundError({ id: 1, token: 'abc' }))).toBe(true)
    expect(isCatalogMergeError(new Error('plain'))).toBe(false)
  })
})

describe('parameter checks', () => {
  it('requireNonNull returns present values', () => {
    expect(requireNonNull(0, 'count')).toBe(0)
    expect(() => requireNonNull(null, 'count')).toThrow(MissingParameterError)
  })

  it('requireSafeInteger rejects fractions', () => {
    expect(requireSafeInteger(42, 'id')).toBe(42)
    expect(() => requireSafeInteger(0.5, 'id')).toThrow(InvalidParameterError)
  })

  it('requireOneOf lists the allowed values', () => {
    expect(() => requireOneOf('c', ['a', 'b'], 'mode')).toThrow(
      "Invalid parameter 'mode': must be one of: a, b"
    )
  })
})
