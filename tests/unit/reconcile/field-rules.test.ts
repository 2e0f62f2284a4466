import { describe, it, expect } from 'vitest'
import {
  FIELD_RULES,
  SCALAR_FIELDS,
  RECORD_FIELDS,
  fieldRuleOf,
  isKnownValue,
  isKnownScalarValue,
  isKnownField,
  applyFieldRule,
} from '../../../src/reconcile/field-rules.js'
import { createTestRecord } from '../../fixtures/records.js'

describe('field rules', () => {
  it('covers every mergeable field exactly once', () => {
    expect(RECORD_FIELDS).toHaveLength(17)
    expect(new Set(RECORD_FIELDS).size).toBe(17)
    expect(RECORD_FIELDS.slice(-2)).toEqual(['invalidFlag', 'tagGroups'])
    expect(SCALAR_FIELDS).toHaveLength(15)
  })

  it('assigns a rule kind per field', () => {
    expect(fieldRuleOf('rating')).toBe('replaceIfKnown')
    expect(fieldRuleOf('torrentCount')).toBe('replaceIfKnown')
    expect(fieldRuleOf('invalidFlag')).toBe('stickyTrue')
    expect(fieldRuleOf('tagGroups')).toBe('replaceIfNonEmpty')
  })

  it('merges every scalar field with replaceIfKnown', () => {
    expect(SCALAR_FIELDS.map(fieldRuleOf)).toEqual(SCALAR_FIELDS.map(() => 'replaceIfKnown'))
    expect(Object.keys(FIELD_RULES).sort()).toEqual([...RECORD_FIELDS].sort())
  })

  describe('isKnownValue', () => {
    it.each([
      [undefined, false],
      [null, false],
      [Number.NaN, false],
      ['', true],
      [0, true],
      [-1, true],
      ['x', true],
      ['manga', true],
    ])('isKnownValue(%s) is %s', (value, expected) => {
      expect(isKnownValue(value)).toBe(expected)
    })
  })

  describe('isKnownScalarValue', () => {
    it('treats an empty title as unknown', () => {
      expect(isKnownScalarValue('primaryTitle', '')).toBe(false)
      expect(isKnownScalarValue('secondaryTitle', '')).toBe(false)
    })

    it('treats an empty string in other fields as known', () => {
      expect(isKnownScalarValue('uploaderName', '')).toBe(true)
      expect(isKnownScalarValue('coverUrl', '')).toBe(true)
      expect(isKnownScalarValue('archiveKey', '')).toBe(true)
    })
  })

  describe('isKnownField', () => {
    it('reports a default record as entirely unknown', () => {
      const record = createTestRecord()

      expect(RECORD_FIELDS.filter((field) => isKnownField(record, field))).toEqual([])
    })

    it('treats a known zero torrent count as known', () => {
      expect(isKnownField(createTestRecord({ torrentCount: 0 }), 'torrentCount')).toBe(true)
    })

    it('uses the flag and the map size for the special fields', () => {
      const record = createTestRecord({
        invalidFlag: true,
        tagGroups: new Map([['artist', ['a']]]),
      })

      expect(isKnownField(record, 'invalidFlag')).toBe(true)
      expect(isKnownField(record, 'tagGroups')).toBe(true)
    })
  })

  describe('applyFieldRule', () => {
    it('fills an unknown scalar', () => {
      const target = createTestRecord()

      expect(applyFieldRule(target, createTestRecord({ pageCount: 12 }), 'pageCount')).toBe(
        'filled'
      )
      expect(target.pageCount).toBe(12)
    })

    it('overwrites a different known scalar', () => {
      const target = createTestRecord({ uploaderName: 'first' })

      expect(
        applyFieldRule(target, createTestRecord({ uploaderName: 'second' }), 'uploaderName')
      ).toBe('overwritten')
      expect(target.uploaderName).toBe('second')
    })

    it('takes a known empty uploader name over a known one', () => {
      const target = createTestRecord({ uploaderName: 'uploader-one' })

      expect(applyFieldRule(target, createTestRecord({ uploaderName: '' }), 'uploaderName')).toBe(
        'overwritten'
      )
      expect(target.uploaderName).toBe('')
    })

    it('ignores an empty incoming title', () => {
      const target = createTestRecord({ primaryTitle: 'Kept' })

      expect(applyFieldRule(target, createTestRecord({ primaryTitle: '' }), 'primaryTitle')).toBe(
        'unchanged'
      )
      expect(target.primaryTitle).toBe('Kept')
    })

    it('leaves the target alone for an unknown incoming scalar', () => {
      const target = createTestRecord({ byteSize: 100 })

      expect(applyFieldRule(target, createTestRecord(), 'byteSize')).toBe('unchanged')
      expect(target.byteSize).toBe(100)
    })

    it('takes a known zero torrent count over a nonzero one', () => {
      const target = createTestRecord({ torrentCount: 3 })

      expect(
        applyFieldRule(target, createTestRecord({ torrentCount: 0 }), 'torrentCount')
      ).toBe('overwritten')
      expect(target.torrentCount).toBe(0)
    })

    it('never resets invalidFlag', () => {
      const target = createTestRecord({ invalidFlag: true })

      expect(applyFieldRule(target, createTestRecord(), 'invalidFlag')).toBe('unchanged')
      expect(target.invalidFlag).toBe(true)
    })

    it('replaces tag groups with a deep copy', () => {
      const target = createTestRecord({ tagGroups: new Map([['artist', ['a']]]) })
      const incoming = createTestRecord({ tagGroups: new Map([['artist', ['b']]]) })

      expect(applyFieldRule(target, incoming, 'tagGroups')).toBe('overwritten')
      expect(target.tagGroups).not.toBe(incoming.tagGroups)
      expect(target.tagGroups.get('artist')).not.toBe(incoming.tagGroups.get('artist'))
      expect(target.tagGroups.get('artist')).toEqual(['b'])
    })
  })
})
