import { ACCESSION_COLUMN } from './builder/shared/constants'
import { createError, wrapError } from './builder/shared/errors'
import type { ErrorContext } from './builder/shared/types'
import type { CodecRegistry } from './codec/registry'
import { executeWithTiming, type QueryLogger } from './query-log'
import type { Session } from './session/types'
import type {
  EncodedRow,
  InsertOptions,
  Row,
  SequenceRecord,
} from './types'

export interface WriterDeps {
  session: Session
  registry: CodecRegistry
  logger: QueryLogger
}

export interface InsertedKey {
  accession: string
}

function encodeAll(
  deps: WriterDeps,
  tag: string,
  records: Iterable<SequenceRecord>,
  ctx: ErrorContext,
): EncodedRow[] {
  const codec = deps.registry.resolve(tag, ctx)
  try {
    return [...codec.encode(records)]
  } catch (error) {
    throw wrapError(error, ctx, 'ENCODE_ERROR')
  }
}

function toInsertedKey(row: Row, ctx: ErrorContext): InsertedKey {
  const accession = row[ACCESSION_COLUMN]
  if (typeof accession !== 'string') {
    throw createError(
      `RETURNING gave no text '${ACCESSION_COLUMN}'`,
      ctx,
      'WRITE_ERROR',
    )
  }
  return { accession }
}

/**
 * Encodes `records` with the codec of `tag` and writes every row in one
 * transaction. Resolves to the number of rows written, or with
 * `returning: true` to the accession of each inserted row.
 */
export function insertAll(
  deps: WriterDeps,
  table: string,
  tag: string,
  records: Iterable<SequenceRecord>,
  options: InsertOptions & { returning: true },
): Promise<InsertedKey[]>
export function insertAll(
  deps: WriterDeps,
  table: string,
  tag: string,
  records: Iterable<SequenceRecord>,
  options?: InsertOptions,
): Promise<number>
export async function insertAll(
  deps: WriterDeps,
  table: string,
  tag: string,
  records: Iterable<SequenceRecord>,
  options: InsertOptions = {},
): Promise<number | InsertedKey[]> {
  const ctx = { operation: 'insert', table, tag }
  const { logger } = deps
  const returning = options.returning === true

  const rows = encodeAll(deps, tag, records, ctx)
  if (rows.length === 0) return returning ? [] : 0

  try {
    return await deps.session.withTransaction(async (tx) => {
      const written = await tx.insertMulti(table, rows, {
        returning,
        onStatement: ({ sql, params }, run) =>
          executeWithTiming(
            logger,
            {
              dialect: tx.dialect,
              operation: 'insert',
              strategy: 'write',
              table,
              tag,
              sql,
              params,
            },
            run,
            (count) => count,
          ),
      })

      return returning
        ? written.rows.map((row) => toInsertedKey(row, ctx))
        : written.count
    })
  } catch (error) {
    throw wrapError(error, ctx, 'WRITE_ERROR')
  }
}
