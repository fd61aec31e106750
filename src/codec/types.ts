import type { EncodedRow, Row, SequenceRecord } from '../types'

export interface ColumnSpec {
  readonly name: string
  /** Column type, or `'binary'` for the backend's binary type. */
  readonly type: string
  readonly constraints?: string
}

export type SchemaDescriptor = readonly ColumnSpec[]

/**
 * Everything the store knows about one record type: the table layout, how
 * records become rows, and how rows become records again.
 */
export interface SequenceCodec {
  schema(): SchemaDescriptor
  /** Row order does not have to follow record order. */
  encode(records: Iterable<SequenceRecord>): Iterable<EncodedRow>
  /** Throws `DecodeError` when required columns are missing or malformed. */
  decode(row: Row): SequenceRecord
}
