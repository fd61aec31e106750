import type { ApplyFunc, Row, SequenceRecord } from './types'

export type RowMapper<T> = (row: Row) => T

export type RowReducer<T, TResult> = (
  rows: AsyncIterable<T>,
) => TResult | Promise<TResult>

async function* mapRows<T>(
  rows: AsyncIterable<Row>,
  rowFn: RowMapper<T>,
): AsyncGenerator<T, void, undefined> {
  for await (const row of rows) {
    yield rowFn(row)
  }
}

/**
 * Hands the mapped rows to `reduce` one at a time. Whatever way the reducer
 * exits, the row source is closed before this resolves.
 */
export async function reduceRows<T, TResult>(
  rows: AsyncIterable<Row>,
  rowFn: RowMapper<T>,
  reduce: RowReducer<T, TResult>,
): Promise<TResult> {
  const mapped = mapRows(rows, rowFn)
  try {
    return await reduce(mapped)
  } finally {
    await mapped.return(undefined)
  }
}

async function* noRecords(): AsyncGenerator<SequenceRecord, void, undefined> {}

export function emptyRecords(): AsyncIterable<SequenceRecord> {
  return noRecords()
}

/**
 * Builds an `applyFunc` that folds the records into one value, like
 * `Array.prototype.reduce` over the stream.
 */
export function fold<TResult>(
  initial: TResult,
  step: (acc: TResult, record: SequenceRecord) => TResult,
): ApplyFunc<TResult> {
  return async (records) => {
    let acc = initial
    for await (const record of records) {
      acc = step(acc, record)
    }
    return acc
  }
}
