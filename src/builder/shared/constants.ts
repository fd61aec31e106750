export const SQL_SEPARATORS = Object.freeze({
  FIELD_LIST: ', ',
  CONDITION_AND: ' AND ',
  CLAUSE: ' ',
} as const)

/** Lookups with more accessions than this go through a staging table. */
export const STAGING_THRESHOLD = 100

export const CURSOR_BATCH_SIZE = 100

export const ACCESSION_COLUMN = 'accession'

export const BINARY_PLACEHOLDER = 'binary'

export const DEFAULT_CODEC_TAG = 'default'

export const STAGING_TABLE_PREFIX = 'tmp_accessions'

export const MAX_IDENTIFIER_LENGTH = 63

export const SQL_KEYWORDS = new Set([
  'select',
  'from',
  'where',
  'having',
  'order',
  'group',
  'limit',
  'offset',
  'join',
  'inner',
  'left',
  'right',
  'outer',
  'cross',
  'full',
  'and',
  'or',
  'not',
  'by',
  'as',
  'on',
  'union',
  'intersect',
  'except',
  'case',
  'when',
  'then',
  'else',
  'end',
  'user',
  'table',
  'column',
  'index',
  'values',
  'in',
  'like',
  'between',
  'is',
  'exists',
  'null',
  'true',
  'false',
  'all',
  'any',
  'some',
  'update',
  'insert',
  'delete',
  'create',
  'drop',
  'alter',
  'grant',
  'default',
  'primary',
  'key',
  'references',
])

export const REGEX_CACHE = {
  VALID_IDENTIFIER: /^[a-z_][a-z0-9_]*$/,
} as const
