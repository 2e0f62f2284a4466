/**
 * Catalog record type definitions
 * @module types/record
 */

/**
 * Catalog categories an item can be filed under
 */
export type Category =
  | 'misc'
  | 'doujinshi'
  | 'manga'
  | 'artistCg'
  | 'gameCg'
  | 'imageSet'
  | 'cosplay'
  | 'asianPorn'
  | 'nonH'
  | 'western'

/**
 * All categories, in code order
 */
export const CATEGORIES: readonly Category[] = [
  'misc',
  'doujinshi',
  'manga',
  'artistCg',
  'gameCg',
  'imageSet',
  'cosplay',
  'asianPorn',
  'nonH',
  'western',
]

/**
 * Languages an item can be published in
 */
export type Language =
  | 'japanese'
  | 'english'
  | 'chinese'
  | 'dutch'
  | 'french'
  | 'german'
  | 'hungarian'
  | 'italian'
  | 'korean'
  | 'polish'
  | 'portuguese'
  | 'russian'
  | 'spanish'
  | 'thai'
  | 'vietnamese'
  | 'other'

/**
 * All languages, in code order
 */
export const LANGUAGES: readonly Language[] = [
  'japanese',
  'english',
  'chinese',
  'dutch',
  'french',
  'german',
  'hungarian',
  'italian',
  'korean',
  'polish',
  'portuguese',
  'russian',
  'spanish',
  'thai',
  'vietnamese',
  'other',
]

/**
 * Tag lists keyed by group name (e.g. `artist`, `parody`), in insertion order
 */
export type TagGroups = Map<string, string[]>

/**
 * The pair that determines whether two records describe the same entity
 */
export interface RecordIdentity {
  /**
   * Numeric item id. Catalog ids are 64-bit, but only values up to
   * `Number.MAX_SAFE_INTEGER` are accepted; larger ids are rejected at
   * construction.
   */
  readonly id: number

  /**
   * Access token, ten lowercase hex digits.
   *
   * Example: `c219d2cf41`
   */
  readonly token: string
}

/**
 * One catalog item as currently known.
 *
 * A record can come from a listing page, a detail page or a metadata API, and
 * none of those fill every field. An optional field left `undefined` is
 * unknown; `invalidFlag` is unknown when `false` and `tagGroups` when empty.
 */
export interface CatalogRecord extends RecordIdentity {
  /**
   * Main title. One of `primaryTitle` and `secondaryTitle` should be known.
   */
  primaryTitle?: string

  /** Title in the original script */
  secondaryTitle?: string

  /**
   * Fingerprint of the first image: `[sha1]-[size]-[width]-[height]-[format]`.
   *
   * Example: `7dd3e4a62807a6938910a14407d9867b18a58a9f-2333088-2831-4015-jpg`
   */
  coverFingerprint?: string

  coverUrl?: string

  /** Cover width / cover height */
  coverAspectRatio?: number

  category?: Category

  /** Posted time, epoch milliseconds */
  postedTimestamp?: number

  uploaderName?: string

  /** Range: [0.5, 5] */
  rating?: number

  language?: Language

  /** Range: [0, 9]; `undefined` when the item is not favorited */
  favoriteSlot?: number

  /** Expunged, deleted or replaced. Never reverts to `false` through a merge. */
  invalidFlag: boolean

  /** Key used to download the archive */
  archiveKey?: string

  pageCount?: number

  /** Size in bytes, at most `Number.MAX_SAFE_INTEGER` */
  byteSize?: number

  torrentCount?: number

  tagGroups: TagGroups
}

/**
 * Fields that can be populated when constructing a record
 */
export type CatalogRecordFields = Partial<Omit<CatalogRecord, keyof RecordIdentity>>

/**
 * Names of every field that a merge can update
 */
export type RecordField = keyof Omit<CatalogRecord, keyof RecordIdentity>
