import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { deduplicatePreserveOrder } from './builder/shared/array-utils'
import { ACCESSION_COLUMN } from './builder/shared/constants'
import { createError, wrapError } from './builder/shared/errors'
import type { ErrorContext } from './builder/shared/types'
import {
  executeWithTiming,
  type QueryLogger,
  type QueryMeta,
} from './query-log'
import type { Session } from './session/types'
import {
  copyFromStdin,
  createTempTable,
  dropTempTable,
  stagingStrategy,
} from './sql-builder-dialect'

export interface StagingTarget {
  session: Session
  logger: QueryLogger
  /** Table and record type of the lookup the staging table serves. */
  table: string
  tag: string
}

/** Escapes a value for PostgreSQL's COPY text format. */
export function escapeCopyText(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t')
}

function meta(
  target: StagingTarget,
  operation: string,
  sql: string,
): QueryMeta {
  return {
    dialect: target.session.dialect,
    operation,
    strategy: 'staged',
    table: target.table,
    tag: target.tag,
    sql,
    params: [],
  }
}

async function copyAccessions(
  target: StagingTarget,
  name: string,
  accessions: readonly string[],
): Promise<void> {
  const { dialect, copyFromFile } = target.session
  if (!copyFromFile) {
    throw new Error(`A ${dialect} session cannot bulk copy from a file`)
  }

  const dir = await mkdtemp(join(tmpdir(), 'accessions-'))
  try {
    const file = join(dir, `${name}.txt`)
    const lines = accessions.map((accession) => escapeCopyText(accession))
    await writeFile(file, `${lines.join('\n')}\n`, 'utf8')

    await executeWithTiming(
      target.logger,
      meta(target, 'stage', copyFromStdin(name, ACCESSION_COLUMN)),
      () => copyFromFile(name, ACCESSION_COLUMN, file),
      () => accessions.length,
    )
  } finally {
    await rm(dir, { recursive: true, force: true })
  }
}

async function insertAccessions(
  target: StagingTarget,
  name: string,
  accessions: readonly string[],
): Promise<void> {
  const rows = accessions.map((accession) => ({
    [ACCESSION_COLUMN]: accession,
  }))

  await target.session.insertMulti(name, rows, {
    onStatement: ({ sql, params }, run) =>
      executeWithTiming(
        target.logger,
        { ...meta(target, 'stage', sql), params },
        run,
        (count) => count,
      ),
  })
}

/**
 * Creates the temporary table `name` on the session's open transaction and
 * fills it with the distinct accessions. Any failure surfaces as a
 * `StagingError`; the caller's rollback discards the table.
 */
export async function stageAccessions(
  target: StagingTarget,
  name: string,
  accessions: readonly string[],
): Promise<number> {
  const ctx: ErrorContext = {
    operation: 'stage',
    table: target.table,
    tag: target.tag,
  }
  const { session } = target

  if (!session.inTransaction) {
    throw createError(
      'Staging tables must be created inside a transaction',
      ctx,
      'STAGING_ERROR',
    )
  }

  const distinct = deduplicatePreserveOrder(accessions)

  try {
    const ddl = createTempTable(name, ACCESSION_COLUMN, session.dialect)
    await executeWithTiming(target.logger, meta(target, 'stage', ddl), () =>
      session.executeDDL(ddl),
    )

    if (stagingStrategy(session.dialect) === 'copy') {
      await copyAccessions(target, name, distinct)
    } else {
      await insertAccessions(target, name, distinct)
    }
  } catch (error) {
    throw wrapError(error, ctx, 'STAGING_ERROR')
  }

  return distinct.length
}

/**
 * Drops the staging table before the lookup's transaction ends, so it is
 * gone even when that transaction is a caller's longer one.
 */
export async function dropStaging(
  target: StagingTarget,
  name: string,
): Promise<void> {
  const sql = dropTempTable(name, target.session.dialect)
  await executeWithTiming(target.logger, meta(target, 'unstage', sql), () =>
    target.session.executeDDL(sql),
  )
}
