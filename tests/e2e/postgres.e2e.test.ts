// tests/e2e/postgres.e2e.test.ts
import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import { fold } from '../../src'
import { QueryError } from '../../src/builder/shared/errors'
import {
  createPostgresTestStore,
  PG_URL,
  type TestStore,
} from '../helpers/db'
import {
  accessionsOf,
  makeProteins,
  protein,
  sortedAccessions,
} from '../helpers/fixtures'

const TABLE = `seqs_e2e_${process.pid}`
const FASTA_TABLE = `proteins_e2e_${process.pid}`

describe.skipIf(!PG_URL)('PostgreSQL store', () => {
  let harness: TestStore

  beforeAll(async () => {
    harness = createPostgresTestStore(PG_URL ?? '')
    const { store } = harness
    await store.doCommand({ sql: `DROP TABLE IF EXISTS ${TABLE}` })
    await store.doCommand({ sql: `DROP TABLE IF EXISTS ${FASTA_TABLE}` })
    await store.createTable(TABLE, 'default')
    await store.createTable(FASTA_TABLE, 'fasta')
    await store.insertSequences(TABLE, 'default', [
      protein('A1', 'MKV'),
      protein('A2', 'MXV'),
      protein('A3', 'MGG'),
      ...makeProteins(200, 'B'),
    ])
  })

  afterAll(async () => {
    if (!harness) return
    await harness.store.doCommand({ sql: `DROP TABLE IF EXISTS ${TABLE}` })
    await harness.store.doCommand({
      sql: `DROP TABLE IF EXISTS ${FASTA_TABLE}`,
    })
    await harness.close()
  })

  it('should look up a few accessions directly', async () => {
    const records = await harness.store.getSequences(TABLE, 'default', [
      'A3',
      'A1',
    ])
    expect(sortedAccessions(records)).toEqual(['A1', 'A3'])
  })

  it('should bind offset and limit after where params', async () => {
    const records = await harness.store.getSequences(
      TABLE,
      'default',
      ['A1', 'A2', 'A3'],
      {
        where: 'src LIKE ?',
        parameters: ['%M%'],
        order: 'accession',
        offset: 1,
        limit: 1,
      },
    )
    expect(accessionsOf(records)).toEqual(['A2'])
  })

  it('should stage 150 accessions through COPY', async () => {
    const wanted = accessionsOf(makeProteins(150, 'B'))
    const records = await harness.store.getSequences(TABLE, 'default', [
      ...wanted,
      ...wanted.slice(0, 10),
    ])

    expect(sortedAccessions(records)).toEqual(wanted)

    const copy = harness.queries.find((q) => q.sql.startsWith('COPY '))
    expect(copy?.rowCount).toBe(150)
  })

  it('should leave no staging table behind', async () => {
    await harness.store.getSequences(
      TABLE,
      'default',
      accessionsOf(makeProteins(120, 'B')),
    )
    const leftovers = await harness.store.session.query(
      `SELECT relname FROM pg_class
       WHERE relname LIKE 'tmp_accessions_%' AND relpersistence = 't'`,
      [],
      (row) => row.relname,
    )
    expect(leftovers).toEqual([])
  })

  it('should fold raw query results', async () => {
    const count = await harness.store.querySequences(
      { sql: `SELECT * FROM ${TABLE} WHERE src LIKE '%X%'` },
      'default',
      { applyFunc: fold(0, (n) => n + 1) },
    )
    expect(count).toBe(1)
  })

  it('should round trip FASTA records through bytea', async () => {
    const records = [
      { accession: 'P1', description: 'test protein', sequence: 'MKVLA' },
      { accession: 'P2', description: null, sequence: 'MGSS' },
    ]
    await harness.store.insertSequences(FASTA_TABLE, 'fasta', records)

    const found = await harness.store.getSequences(FASTA_TABLE, 'fasta', [
      'P1',
      'P2',
    ])
    expect(found).toHaveLength(2)
    expect(found).toContainEqual(records[0])
    expect(found).toContainEqual(records[1])
  })

  it('should roll back the staging transaction when the join fails', async () => {
    const error = await harness.store
      .getSequences(
        'missing_table_e2e',
        'default',
        accessionsOf(makeProteins(150, 'C')),
      )
      .catch((e: unknown) => e)

    expect(error).toBeInstanceOf(QueryError)
    expect(harness.store.session.inTransaction).toBe(false)
  })
})
