import { createReadStream } from 'node:fs'
import { pipeline } from 'node:stream/promises'
import type postgres from 'postgres'
import { CURSOR_BATCH_SIZE } from '../builder/shared/constants'
import { isRow } from '../builder/shared/validators/type-guards'
import { reduceRows } from '../result-transformers'
import { copyFromStdin } from '../sql-builder-dialect'
import type { BoundValue, Row } from '../types'
import { runInsertMulti } from './insert-multi'
import type { Session } from './types'

type PgQueryable = Pick<postgres.Sql, 'unsafe'>

function toRow(value: unknown): Row {
  if (!isRow(value)) {
    throw new Error(`Driver returned a non-object row: ${String(value)}`)
  }
  return value
}

async function* streamRows(
  client: PgQueryable,
  sql: string,
  params: readonly BoundValue[],
): AsyncGenerator<Row, void, undefined> {
  const cursor = client.unsafe(sql, [...params]).cursor(CURSOR_BATCH_SIZE)
  for await (const batch of cursor) {
    for (const row of batch) yield toRow(row)
  }
}

function createSessionFor(
  client: PgQueryable,
  root: postgres.Sql,
  inTransaction: boolean,
): Session {
  const session: Session = {
    dialect: 'postgres',
    inTransaction,

    async executeDDL(sql) {
      await client.unsafe(sql)
    },

    async executeDML(sql, params = []) {
      const result = await client.unsafe(sql, [...params])
      return result.count
    },

    async query(sql, params, rowFn) {
      const rows = await client.unsafe(sql, [...params])
      return rows.map((row) => rowFn(toRow(row)))
    },

    fold(sql, params, rowFn, reduce) {
      return reduceRows(streamRows(client, sql, params), rowFn, reduce)
    },

    insertMulti(table, rows, options) {
      return runInsertMulti(session, table, rows, options)
    },

    async copyFromFile(table, column, path) {
      const writable = await client
        .unsafe(copyFromStdin(table, column))
        .writable()
      await pipeline(createReadStream(path), writable)
    },

    async withTransaction(fn) {
      if (inTransaction) return fn(session)
      const { value } = await root.begin(async (tx) => ({
        value: await fn(createSessionFor(tx, root, true)),
      }))
      return value
    },

    async close() {
      if (inTransaction) {
        throw new Error('Cannot close a session from inside a transaction')
      }
      await root.end()
    },
  }

  return session
}

/** Session over a `postgres` pool. `close` ends the pool. */
export function createPostgresSession(sql: postgres.Sql): Session {
  return createSessionFor(sql, sql, false)
}
