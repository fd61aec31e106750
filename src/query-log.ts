import type { QueryInfo } from './types'

export interface QueryLogger {
  debug: boolean
  onQuery?: (info: QueryInfo) => void
}

export type QueryMeta = Omit<QueryInfo, 'duration' | 'rowCount'>

function describe(meta: QueryMeta): string {
  const target = [meta.table, meta.tag].filter(Boolean).join('/')
  const header = `[${meta.dialect}] ${meta.operation}`
  return target ? `${header} ${target}` : header
}

function logFailure(logger: QueryLogger, meta: QueryMeta, error: unknown) {
  if (!logger.debug) return
  console.error(`${describe(meta)} failed:`, error)
}

/**
 * Runs one statement, printing it first in debug mode and reporting it to
 * `onQuery` once it has finished.
 */
export async function executeWithTiming<T>(
  logger: QueryLogger,
  meta: QueryMeta,
  exec: () => Promise<T>,
  countRows?: (result: T) => number,
): Promise<T> {
  const startTime = Date.now()

  if (logger.debug) {
    console.log(describe(meta))
    console.log('SQL:', meta.sql)
    console.log('Params:', meta.params)
  }

  let result: T
  try {
    result = await exec()
  } catch (error) {
    logFailure(logger, meta, error)
    throw error
  }

  const duration = Date.now() - startTime

  logger.onQuery?.({
    ...meta,
    rowCount: countRows ? countRows(result) : undefined,
    duration,
  })

  return result
}
