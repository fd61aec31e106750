// src/index.ts
import { insertAll, type InsertedKey } from './batch'
import { DEFAULT_CODEC_TAG } from './builder/shared/constants'
import { createError, wrapError } from './builder/shared/errors'
import {
  globalCodecRegistry,
  type CodecRegistry,
} from './codec/registry'
import { connect, type ConnectionParams } from './config'
import { lookupByAccession, runQuery, type PlannerDeps } from './planner'
import { executeWithTiming, type QueryLogger } from './query-log'
import { createTableDDL } from './schema'
import type { Session } from './session/types'
import { normalizeParams } from './utils/normalize-value'
import type {
  InsertOptions,
  QueryInfo,
  QueryModifiers,
  ReducingModifiers,
  SequenceRecord,
  SqlResult,
} from './types'

export interface SequenceStoreConfig {
  /** An open session; the store closes it on `close()`. */
  session?: Session
  /** Connection parameters, used when no session is given. */
  connection?: ConnectionParams
  /** Defaults to the process-wide registry. */
  registry?: CodecRegistry
  debug?: boolean
  onQuery?: (info: QueryInfo) => void
}

export interface SequenceStore {
  readonly session: Session
  readonly registry: CodecRegistry

  /** Creates `table` with the schema of record type `tag`. */
  createTable(table: string, tag?: string): Promise<void>

  insertSequences(
    table: string,
    tag: string,
    records: Iterable<SequenceRecord>,
    options: InsertOptions & { returning: true },
  ): Promise<InsertedKey[]>
  insertSequences(
    table: string,
    tag: string,
    records: Iterable<SequenceRecord>,
    options?: InsertOptions,
  ): Promise<number>

  getSequences<T>(
    table: string,
    tag: string,
    accessions: readonly string[],
    modifiers: ReducingModifiers<T>,
  ): Promise<T>
  getSequences(
    table: string,
    tag: string,
    accessions: readonly string[],
    modifiers?: QueryModifiers,
  ): Promise<SequenceRecord[]>

  querySequences<T>(
    query: SqlResult,
    tag: string,
    modifiers: ReducingModifiers<T>,
  ): Promise<T>
  querySequences(
    query: SqlResult,
    tag: string,
    modifiers?: QueryModifiers,
  ): Promise<SequenceRecord[]>

  /** Runs a statement that returns no records; resolves to rows affected. */
  doCommand(query: SqlResult): Promise<number>

  /** Every store call made through `store` joins one transaction. */
  withTransaction<T>(fn: (store: SequenceStore) => Promise<T>): Promise<T>

  close(): Promise<void>
}

function resolveSession(config: SequenceStoreConfig): Session {
  if (config.session && config.connection) {
    throw createError(
      'Pass either session or connection, not both',
      { operation: 'connect' },
      'CONFIG_ERROR',
    )
  }
  if (config.session) return config.session
  if (config.connection) return connect(config.connection)

  throw createError(
    'A session or connection parameters are required',
    { operation: 'connect' },
    'CONFIG_ERROR',
  )
}

function bindStore(
  session: Session,
  registry: CodecRegistry,
  logger: QueryLogger,
): SequenceStore {
  const deps: PlannerDeps = { session, registry, logger }

  async function createTable(
    table: string,
    tag: string = DEFAULT_CODEC_TAG,
  ): Promise<void> {
    const ctx = { operation: 'createTable', table, tag }
    const codec = registry.resolve(tag, ctx)

    try {
      const sql = createTableDDL(table, codec.schema(), session.dialect)
      await executeWithTiming(
        logger,
        {
          dialect: session.dialect,
          operation: 'createTable',
          strategy: 'ddl',
          table,
          tag,
          sql,
          params: [],
        },
        () => session.executeDDL(sql),
      )
    } catch (error) {
      throw wrapError(error, ctx, 'QUERY_ERROR')
    }
  }

  function insertSequences(
    table: string,
    tag: string,
    records: Iterable<SequenceRecord>,
    options: InsertOptions & { returning: true },
  ): Promise<InsertedKey[]>
  function insertSequences(
    table: string,
    tag: string,
    records: Iterable<SequenceRecord>,
    options?: InsertOptions,
  ): Promise<number>
  function insertSequences(
    table: string,
    tag: string,
    records: Iterable<SequenceRecord>,
    options: InsertOptions = {},
  ): Promise<number | InsertedKey[]> {
    if (options.returning === true) {
      return insertAll(deps, table, tag, records, { returning: true })
    }
    return insertAll(deps, table, tag, records, options)
  }

  function getSequences<T>(
    table: string,
    tag: string,
    accessions: readonly string[],
    modifiers: ReducingModifiers<T>,
  ): Promise<T>
  function getSequences(
    table: string,
    tag: string,
    accessions: readonly string[],
    modifiers?: QueryModifiers,
  ): Promise<SequenceRecord[]>
  function getSequences<T>(
    table: string,
    tag: string,
    accessions: readonly string[],
    modifiers?: QueryModifiers | ReducingModifiers<T>,
  ): Promise<T | SequenceRecord[]> {
    return lookupByAccession(deps, table, tag, accessions, modifiers)
  }

  function querySequences<T>(
    query: SqlResult,
    tag: string,
    modifiers: ReducingModifiers<T>,
  ): Promise<T>
  function querySequences(
    query: SqlResult,
    tag: string,
    modifiers?: QueryModifiers,
  ): Promise<SequenceRecord[]>
  function querySequences<T>(
    query: SqlResult,
    tag: string,
    modifiers?: QueryModifiers | ReducingModifiers<T>,
  ): Promise<T | SequenceRecord[]> {
    return runQuery(deps, query, tag, modifiers)
  }

  async function doCommand(query: SqlResult): Promise<number> {
    const ctx = { operation: 'command' }
    const params = normalizeParams(query.params ?? [], session.dialect)

    try {
      return await executeWithTiming(
        logger,
        {
          dialect: session.dialect,
          operation: 'command',
          strategy: 'raw',
          sql: query.sql,
          params,
        },
        () => session.executeDML(query.sql, params),
        (changes) => changes,
      )
    } catch (error) {
      throw wrapError(error, ctx, 'QUERY_ERROR')
    }
  }

  return {
    session,
    registry,
    createTable,
    insertSequences,
    getSequences,
    querySequences,
    doCommand,
    withTransaction: (fn) =>
      session.withTransaction((tx) => fn(bindStore(tx, registry, logger))),
    close: () => session.close(),
  }
}

/**
 * Creates a store over an existing session or a new connection.
 *
 * @example
 * const store = createSequenceStore({
 *   connection: { dbtype: 'sqlite', dbname: ':memory:' },
 * })
 * await store.createTable('proteins', 'fasta')
 * await store.insertSequences('proteins', 'fasta', records)
 * const found = await store.getSequences('proteins', 'fasta', ['P1'])
 */
export function createSequenceStore(
  config: SequenceStoreConfig,
): SequenceStore {
  const session = resolveSession(config)
  const registry = config.registry ?? globalCodecRegistry
  const logger: QueryLogger = {
    debug: config.debug ?? false,
    onQuery: config.onQuery,
  }

  return bindStore(session, registry, logger)
}

export { insertAll, lookupByAccession, runQuery }
export type { InsertedKey, PlannerDeps }
export type { WriterDeps } from './batch'

export {
  StoreError,
  ConfigError,
  UnknownTypeError,
  DecodeError,
  EncodeError,
  QueryError,
  StagingError,
  WriteError,
  type StoreErrorCode,
} from './builder/shared/errors'

export {
  createCodecRegistry,
  globalCodecRegistry,
  registerCodec,
  validateSchema,
  type CodecRegistry,
} from './codec/registry'
export { defaultCodec } from './codec/default-codec'
export { fastaCodec, FASTA_CODEC_TAG, type FastaRecord } from './codec/fasta'
export { freeze, thaw } from './codec/freeze'
export type { ColumnSpec, SchemaDescriptor, SequenceCodec } from './codec/types'

export { materializeSchema, createTableDDL } from './schema'
export {
  connect,
  validateConnectionParams,
  DEFAULT_DOMAIN,
  DEFAULT_PORT,
  type ConnectionParams,
} from './config'
export { createPostgresSession } from './session/postgres'
export { createSqliteSession } from './session/sqlite'
export type { InsertMultiResult, Session } from './session/types'
export { fold } from './result-transformers'
export type { QueryLogger } from './query-log'
export {
  STAGING_THRESHOLD,
  DEFAULT_CODEC_TAG,
} from './builder/shared/constants'
export type { SqlDialect } from './sql-builder-dialect'

export type {
  ApplyFunc,
  BoundValue,
  EncodedRow,
  InsertOptions,
  QueryInfo,
  QueryModifiers,
  QueryStrategy,
  ReducingModifiers,
  Row,
  SequenceRecord,
  SqlParam,
  SqlResult,
  SqlValue,
} from './types'
