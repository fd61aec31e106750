import { buildInsertMulti } from '../builder/insert'
import type { EncodedRow } from '../types'
import type {
  InsertMultiOptions,
  InsertMultiResult,
  Session,
} from './types'

/** All chunks of a multi-row insert run in one transaction. */
export function runInsertMulti(
  session: Session,
  table: string,
  rows: readonly EncodedRow[],
  options: InsertMultiOptions = {},
): Promise<InsertMultiResult> {
  const { returning = false, onStatement = (_, run) => run() } = options
  const statements = buildInsertMulti(table, rows, session.dialect, {
    returning,
  })
  if (statements.length === 0) {
    return Promise.resolve({ count: 0, rows: [] })
  }

  return session.withTransaction(async (tx) => {
    const result: InsertMultiResult = { count: 0, rows: [] }

    for (const statement of statements) {
      const { sql, params } = statement
      result.count += await onStatement(statement, async () => {
        if (!returning) return tx.executeDML(sql, params)

        const inserted = await tx.query(sql, params, (row) => row)
        result.rows.push(...inserted)
        return inserted.length
      })
    }

    return result
  })
}
