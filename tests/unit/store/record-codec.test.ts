import { describe, it, expect } from 'vitest'
import {
  RECORD_SCHEMA_NAME,
  RECORD_SCHEMA_VERSION,
  encodeCatalogRecord,
  decodeCatalogRecord,
  serializeCatalogRecord,
  deserializeCatalogRecord,
} from '../../../src/store/record-codec.js'
import { RecordCodecError, UnsupportedSchemaVersionError } from '../../../src/store/store-error.js'
import { isKnownField, RECORD_FIELDS } from '../../../src/reconcile/field-rules.js'
import { createCompleteRecord, createTestRecord } from '../../fixtures/records.js'

function legacy(data: Record<string, unknown>): unknown {
  return { schema: RECORD_SCHEMA_NAME, version: 1, data }
}

describe('encodeCatalogRecord', () => {
  it('writes the current schema envelope', () => {
    const payload = encodeCatalogRecord(createTestRecord())

    expect(payload.schema).toBe('catalog-merge:CatalogRecord')
    expect(payload.version).toBe(RECORD_SCHEMA_VERSION)
  })

  it('omits unknown fields from the serialized form', () => {
    const text = serializeCatalogRecord(createTestRecord({ rating: 4.5, coverAspectRatio: Number.NaN }))

    expect(JSON.parse(text)).toEqual({
      schema: 'catalog-merge:CatalogRecord',
      version: 2,
      data: { id: 1024, token: 'c219d2cf41', rating: 4.5, invalidFlag: false, tagGroups: [] },
    })
  })

  it('writes tag groups as ordered pairs', () => {
    const record = createTestRecord({
      tagGroups: new Map([
        ['parody', ['original']],
        ['artist', ['a', 'b']],
      ]),
    })

    expect(encodeCatalogRecord(record).data.tagGroups).toEqual([
      ['parody', ['original']],
      ['artist', ['a', 'b']],
    ])
  })
})

describe('decodeCatalogRecord', () => {
  it('round-trips a complete record', () => {
    const record = createCompleteRecord()

    expect(deserializeCatalogRecord(serializeCatalogRecord(record))).toEqual(record)
  })

  it('round-trips unknown fields as unknown', () => {
    const decoded = deserializeCatalogRecord(serializeCatalogRecord(createTestRecord()))

    expect(RECORD_FIELDS.filter((field) => isKnownField(decoded, field))).toEqual([])
  })

  it('keeps a known zero torrent count at the current version', () => {
    const decoded = deserializeCatalogRecord(
      serializeCatalogRecord(createTestRecord({ torrentCount: 0 }))
    )

    expect(decoded.torrentCount).toBe(0)
  })

  it('reads legacy sentinel payloads', () => {
    const decoded = decodeCatalogRecord(
      legacy({
        id: 1024,
        token: 'c219d2cf41',
        primaryTitle: 'Sample Title',
        secondaryTitle: null,
        coverAspectRatio: null,
        category: 2,
        postedTimestamp: 0,
        rating: 3.5,
        language: -1,
        favoriteSlot: -1,
        invalidFlag: true,
        pageCount: -1,
        byteSize: 2048,
        torrentCount: 0,
        tagGroups: { artist: ['a'], parody: ['original'] },
      })
    )

    expect(decoded).toEqual(
      createTestRecord({
        primaryTitle: 'Sample Title',
        category: 'manga',
        rating: 3.5,
        invalidFlag: true,
        byteSize: 2048,
        tagGroups: new Map([
          ['artist', ['a']],
          ['parody', ['original']],
        ]),
      })
    )
    expect(decoded.torrentCount).toBeUndefined()
    expect(decoded.favoriteSlot).toBeUndefined()
  })

  it('reads NaN floats in legacy payloads as unknown', () => {
    const decoded = decodeCatalogRecord(
      legacy({ id: 1, token: 'abc', rating: Number.NaN, coverAspectRatio: Number.NaN })
    )

    expect(decoded.rating).toBeUndefined()
    expect(decoded.coverAspectRatio).toBeUndefined()
  })

  it('rejects NaN at the current version', () => {
    const payload = {
      schema: RECORD_SCHEMA_NAME,
      version: 2,
      data: { id: 1, token: 'abc', rating: Number.NaN },
    }

    expect(() => decodeCatalogRecord(payload)).toThrow("Cannot decode 'rating': expected a number")
  })

  it('keeps empty strings outside the titles', () => {
    const decoded = deserializeCatalogRecord(
      serializeCatalogRecord(createTestRecord({ uploaderName: '', archiveKey: '' }))
    )

    expect(decoded.uploaderName).toBe('')
    expect(decoded.archiveKey).toBe('')
  })

  it('reads empty titles as unknown', () => {
    const payload = {
      schema: RECORD_SCHEMA_NAME,
      version: 2,
      data: { id: 1, token: 'abc', primaryTitle: '', secondaryTitle: '' },
    }

    const decoded = decodeCatalogRecord(payload)

    expect(decoded.primaryTitle).toBeUndefined()
    expect(decoded.secondaryTitle).toBeUndefined()
  })

  it('maps legacy language codes', () => {
    const decoded = decodeCatalogRecord(legacy({ id: 1, token: 'abc', language: 1 }))

    expect(decoded.language).toBe('english')
  })

  it('rejects unsupported versions', () => {
    const payload = { schema: RECORD_SCHEMA_NAME, version: 3, data: { id: 1, token: 'abc' } }

    expect(() => decodeCatalogRecord(payload)).toThrow(UnsupportedSchemaVersionError)
  })

  it('rejects a foreign schema', () => {
    expect(() => decodeCatalogRecord({ schema: 'other', version: 2, data: {} })).toThrow(
      RecordCodecError
    )
  })

  it('rejects a missing identity', () => {
    const payload = { schema: RECORD_SCHEMA_NAME, version: 2, data: { token: 'abc' } }

    expect(() => decodeCatalogRecord(payload)).toThrow("Cannot decode 'id': is required")
  })

  it('rejects mistyped fields', () => {
    const payload = {
      schema: RECORD_SCHEMA_NAME,
      version: 2,
      data: { id: 1, token: 'abc', rating: 'high' },
    }

    expect(() => decodeCatalogRecord(payload)).toThrow("Cannot decode 'rating': expected a number")
  })

  it('rejects unknown category names', () => {
    const payload = {
      schema: RECORD_SCHEMA_NAME,
      version: 2,
      data: { id: 1, token: 'abc', category: 'poetry' },
    }

    expect(() => decodeCatalogRecord(payload)).toThrow(
      "Cannot decode 'category': unknown value 'poetry'"
    )
  })

  it('rejects out-of-range legacy codes', () => {
    expect(() => decodeCatalogRecord(legacy({ id: 1, token: 'abc', category: 42 }))).toThrow(
      "Cannot decode 'category': unknown code 42"
    )
  })

  it('rejects malformed tag groups', () => {
    const payload = {
      schema: RECORD_SCHEMA_NAME,
      version: 2,
      data: { id: 1, token: 'abc', tagGroups: [['artist', 'a']] },
    }

    expect(() => decodeCatalogRecord(payload)).toThrow(
      "Cannot decode 'tagGroups': group 'artist' must be a list of strings"
    )
  })

  it('rejects invalid JSON text', () => {
    expect(() => deserializeCatalogRecord('{not json')).toThrow(RecordCodecError)
  })
})
