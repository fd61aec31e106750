import { createError, errorMessage } from '../builder/shared/errors'
import {
  ACCESSION_COLUMN,
  DEFAULT_CODEC_TAG,
} from '../builder/shared/constants'
import { isSequenceRecord } from '../builder/shared/validators/type-guards'
import type { EncodedRow, Row, SequenceRecord } from '../types'
import type { SequenceCodec } from './types'

const CTX = { tag: DEFAULT_CODEC_TAG }

function serialize(record: SequenceRecord): string {
  try {
    return JSON.stringify(record)
  } catch (error) {
    throw createError(
      `Cannot serialize record '${record.accession}': ${errorMessage(error)}`,
      CTX,
      'ENCODE_ERROR',
      error,
    )
  }
}

function deserialize(src: string): unknown {
  try {
    return JSON.parse(src)
  } catch (error) {
    throw createError(
      `Column 'src' is not valid JSON: ${errorMessage(error)}`,
      CTX,
      'DECODE_ERROR',
      error,
    )
  }
}

export function requireAccession(record: unknown, tag: string): string {
  if (!isSequenceRecord(record) || record.accession.length === 0) {
    throw createError(
      `Record has no string '${ACCESSION_COLUMN}' field`,
      { tag },
      'ENCODE_ERROR',
    )
  }
  return record.accession
}

/**
 * Fallback codec: the whole record is kept as JSON text in `src`, next to
 * its accession.
 */
export const defaultCodec: SequenceCodec = {
  schema: () => [
    { name: ACCESSION_COLUMN, type: 'text', constraints: 'PRIMARY KEY' },
    { name: 'src', type: 'text', constraints: 'NOT NULL' },
  ],

  *encode(records: Iterable<SequenceRecord>): Iterable<EncodedRow> {
    for (const record of records) {
      const accession = requireAccession(record, DEFAULT_CODEC_TAG)
      yield { [ACCESSION_COLUMN]: accession, src: serialize(record) }
    }
  },

  decode(row: Row): SequenceRecord {
    const src = row.src
    if (typeof src !== 'string') {
      const got = src === null ? 'null' : typeof src
      throw createError(
        `Row is missing text column 'src' (got ${got})`,
        CTX,
        'DECODE_ERROR',
      )
    }

    const value = deserialize(src)
    if (!isSequenceRecord(value)) {
      throw createError(
        `Column 'src' does not hold a record with a string '${ACCESSION_COLUMN}'`,
        CTX,
        'DECODE_ERROR',
      )
    }
    return value
  },
}
