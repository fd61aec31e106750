import { buildDirectLookup, buildStagedLookup } from './builder/lookup'
import { STAGING_THRESHOLD } from './builder/shared/constants'
import { wrapError } from './builder/shared/errors'
import { createStagingName } from './builder/shared/staging-name'
import type { BuiltQuery } from './builder/shared/types'
import type { SequenceCodec } from './codec/types'
import type { CodecRegistry } from './codec/registry'
import {
  executeWithTiming,
  type QueryLogger,
  type QueryMeta,
} from './query-log'
import { emptyRecords } from './result-transformers'
import type { Session } from './session/types'
import { dropStaging, stageAccessions } from './staging'
import { normalizeParams } from './utils/normalize-value'
import type {
  ApplyFunc,
  QueryModifiers,
  QueryStrategy,
  ReducingModifiers,
  Row,
  SequenceRecord,
  SqlResult,
} from './types'

export interface PlannerDeps {
  session: Session
  registry: CodecRegistry
  logger: QueryLogger
}

type AnyModifiers<T> = QueryModifiers & { applyFunc?: ApplyFunc<T> }

type StatementMeta = Omit<QueryMeta, 'sql' | 'params'>

/**
 * Runs a built query and shapes its rows through the codec: all at once,
 * or streamed into `applyFunc` when one is given.
 */
async function consume<T>(
  session: Session,
  logger: QueryLogger,
  statement: StatementMeta,
  query: BuiltQuery,
  codec: SequenceCodec,
  applyFunc: ApplyFunc<T> | undefined,
): Promise<T | SequenceRecord[]> {
  const decode = (row: Row) => codec.decode(row)
  const { sql, params } = query
  const meta: QueryMeta = { ...statement, sql, params }

  if (!applyFunc) {
    return executeWithTiming(
      logger,
      meta,
      () => session.query(sql, params, decode),
      (records) => records.length,
    )
  }

  return executeWithTiming(logger, meta, () =>
    session.fold(sql, params, decode, applyFunc),
  )
}

function lookupStatement(
  session: Session,
  table: string,
  tag: string,
  strategy: QueryStrategy,
): StatementMeta {
  return {
    dialect: session.dialect,
    operation: 'lookup',
    strategy,
    table,
    tag,
  }
}

/**
 * Fetches the records of `table` whose accession is in `accessions`.
 *
 * Up to `STAGING_THRESHOLD` accessions are bound straight into an `IN`
 * list, duplicates included. Longer lists are deduplicated into a
 * temporary table joined against `table`, all inside one transaction.
 * Placeholders are bound as accessions, then `parameters`, then `offset`,
 * then `limit`.
 */
export function lookupByAccession<T>(
  deps: PlannerDeps,
  table: string,
  tag: string,
  accessions: readonly string[],
  modifiers: ReducingModifiers<T>,
): Promise<T>
export function lookupByAccession(
  deps: PlannerDeps,
  table: string,
  tag: string,
  accessions: readonly string[],
  modifiers?: QueryModifiers,
): Promise<SequenceRecord[]>
export async function lookupByAccession<T>(
  deps: PlannerDeps,
  table: string,
  tag: string,
  accessions: readonly string[],
  modifiers: AnyModifiers<T> = {},
): Promise<T | SequenceRecord[]> {
  const ctx = { operation: 'lookup', table, tag }
  const { session, logger } = deps
  const { applyFunc } = modifiers

  try {
    const codec = deps.registry.resolve(tag, ctx)

    if (accessions.length === 0) {
      return applyFunc ? await applyFunc(emptyRecords()) : []
    }

    if (accessions.length <= STAGING_THRESHOLD) {
      const query = buildDirectLookup(
        table,
        accessions,
        modifiers,
        session.dialect,
      )
      const statement = lookupStatement(session, table, tag, 'direct')
      return await consume(
        session,
        logger,
        statement,
        query,
        codec,
        applyFunc,
      )
    }

    const staging = createStagingName()
    const query = buildStagedLookup(
      table,
      staging,
      modifiers,
      session.dialect,
    )

    return await session.withTransaction(async (tx) => {
      const target = { session: tx, logger, table, tag }
      await stageAccessions(target, staging, accessions)

      const statement = lookupStatement(tx, table, tag, 'staged')
      const result = await consume(
        tx,
        logger,
        statement,
        query,
        codec,
        applyFunc,
      )

      await dropStaging(target, staging)
      return result
    })
  } catch (error) {
    throw wrapError(error, ctx, 'QUERY_ERROR')
  }
}

/**
 * Executes caller-written SQL as is and decodes every row with the codec
 * of `tag`. Of the modifiers only `applyFunc` applies.
 */
export function runQuery<T>(
  deps: PlannerDeps,
  query: SqlResult,
  tag: string,
  modifiers: ReducingModifiers<T>,
): Promise<T>
export function runQuery(
  deps: PlannerDeps,
  query: SqlResult,
  tag: string,
  modifiers?: QueryModifiers,
): Promise<SequenceRecord[]>
export async function runQuery<T>(
  deps: PlannerDeps,
  query: SqlResult,
  tag: string,
  modifiers: AnyModifiers<T> = {},
): Promise<T | SequenceRecord[]> {
  const ctx = { operation: 'query', tag }
  const { session, logger } = deps

  try {
    const codec = deps.registry.resolve(tag, ctx)
    const built: BuiltQuery = {
      sql: query.sql,
      params: normalizeParams(query.params ?? [], session.dialect),
    }
    const statement: StatementMeta = {
      dialect: session.dialect,
      operation: 'query',
      strategy: 'raw',
      tag,
    }
    return await consume(
      session,
      logger,
      statement,
      built,
      codec,
      modifiers.applyFunc,
    )
  } catch (error) {
    throw wrapError(error, ctx, 'QUERY_ERROR')
  }
}
