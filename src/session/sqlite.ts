import type Database from 'better-sqlite3'
import { isRow } from '../builder/shared/validators/type-guards'
import { reduceRows } from '../result-transformers'
import type { BoundValue, Row } from '../types'
import { runInsertMulti } from './insert-multi'
import type { Session } from './types'

function toRow(value: unknown): Row {
  if (!isRow(value)) {
    throw new Error(`Driver returned a non-object row: ${String(value)}`)
  }
  return value
}

/**
 * `iterate` keeps the connection busy until the iterator is closed, so the
 * reducer cannot issue other statements on this database meanwhile.
 */
async function* iterateRows(
  db: Database.Database,
  sql: string,
  params: readonly BoundValue[],
): AsyncGenerator<Row, void, undefined> {
  for (const row of db.prepare(sql).iterate(...params)) {
    yield toRow(row)
  }
}

type Exclusive = <T>(fn: () => Promise<T>) => Promise<T>

/** Runs callers one after another, in the order they asked. */
function createExclusive(): Exclusive {
  let tail: Promise<void> = Promise.resolve()

  return (fn) => {
    const run = tail.then(fn)
    tail = run.then(
      () => undefined,
      () => undefined,
    )
    return run
  }
}

function createSessionFor(
  db: Database.Database,
  exclusive: Exclusive,
  inTransaction: boolean,
): Session {
  // Outside a transaction every call waits for the connection, so a
  // statement can never land inside another caller's BEGIN.
  const guard: Exclusive = inTransaction ? (fn) => fn() : exclusive

  const session: Session = {
    dialect: 'sqlite',
    inTransaction,

    executeDDL(sql) {
      return guard(async () => {
        db.exec(sql)
      })
    },

    executeDML(sql, params = []) {
      return guard(async () => db.prepare(sql).run(...params).changes)
    },

    query(sql, params, rowFn) {
      return guard(async () =>
        db
          .prepare(sql)
          .all(...params)
          .map((row) => rowFn(toRow(row))),
      )
    },

    fold(sql, params, rowFn, reduce) {
      return guard(() =>
        reduceRows(iterateRows(db, sql, params), rowFn, reduce),
      )
    },

    insertMulti(table, rows, options) {
      return runInsertMulti(session, table, rows, options)
    },

    async withTransaction(fn) {
      if (inTransaction) return fn(session)

      return exclusive(async () => {
        db.exec('BEGIN')
        try {
          const result = await fn(createSessionFor(db, exclusive, true))
          db.exec('COMMIT')
          return result
        } catch (error) {
          if (db.inTransaction) db.exec('ROLLBACK')
          throw error
        }
      })
    },

    async close() {
      if (inTransaction) {
        throw new Error('Cannot close a session from inside a transaction')
      }
      await exclusive(async () => {
        db.close()
      })
    },
  }

  return session
}

/**
 * Session over a `better-sqlite3` database. Statements run synchronously;
 * transactions are plain BEGIN/COMMIT so the callback may await. Only the
 * session handed to a `withTransaction` callback joins that transaction;
 * other callers wait until it commits or rolls back.
 */
export function createSqliteSession(db: Database.Database): Session {
  return createSessionFor(db, createExclusive(), false)
}
