import { Buffer } from 'node:buffer'
import { createError } from '../builder/shared/errors'
import {
  ACCESSION_COLUMN,
  BINARY_PLACEHOLDER,
} from '../builder/shared/constants'
import { isBytes } from '../builder/shared/validators/type-guards'
import type { EncodedRow, Row, SequenceRecord } from '../types'
import { requireAccession } from './default-codec'
import type { SequenceCodec } from './types'

export const FASTA_CODEC_TAG = 'fasta'

const CTX = { tag: FASTA_CODEC_TAG }

export interface FastaRecord extends SequenceRecord {
  description: string | null
  sequence: string
}

function encodeFasta(record: SequenceRecord): EncodedRow {
  const accession = requireAccession(record, FASTA_CODEC_TAG)
  const sequence = record.sequence
  const description = record.description ?? null

  if (typeof sequence !== 'string') {
    throw createError(
      `Record '${accession}' has no string 'sequence' field`,
      CTX,
      'ENCODE_ERROR',
    )
  }

  if (description !== null && typeof description !== 'string') {
    throw createError(
      `Record '${accession}' has a non-string 'description'`,
      CTX,
      'ENCODE_ERROR',
    )
  }

  return {
    [ACCESSION_COLUMN]: accession,
    description,
    sequence: Buffer.from(sequence, 'utf8'),
  }
}

function decodeFasta(row: Row): FastaRecord {
  const { accession, sequence } = row
  const description = row.description ?? null

  if (typeof accession !== 'string') {
    throw createError(
      `Row has no text '${ACCESSION_COLUMN}'`,
      CTX,
      'DECODE_ERROR',
    )
  }

  if (!isBytes(sequence)) {
    throw createError(
      `Row '${accession}' has no binary 'sequence'`,
      CTX,
      'DECODE_ERROR',
    )
  }

  if (description !== null && typeof description !== 'string') {
    throw createError(
      `Row '${accession}' has a malformed 'description'`,
      CTX,
      'DECODE_ERROR',
    )
  }

  return {
    accession,
    description,
    sequence: Buffer.from(sequence).toString('utf8'),
  }
}

/** FASTA entries: header description as text, residues as bytes. */
export const fastaCodec: SequenceCodec = {
  schema: () => [
    { name: ACCESSION_COLUMN, type: 'text', constraints: 'PRIMARY KEY' },
    { name: 'description', type: 'text' },
    { name: 'sequence', type: BINARY_PLACEHOLDER, constraints: 'NOT NULL' },
  ],

  *encode(records: Iterable<SequenceRecord>): Iterable<EncodedRow> {
    for (const record of records) {
      yield encodeFasta(record)
    }
  },

  decode: decodeFasta,
}
