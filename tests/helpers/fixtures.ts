import type { SequenceRecord } from '../../src/types'

export interface TestProtein extends SequenceRecord {
  sequence: string
  length: number
}

export function protein(accession: string, sequence: string): TestProtein {
  return { accession, sequence, length: sequence.length }
}

/** A0001, A0002, ... each with a short made-up sequence. */
export function makeProteins(count: number, prefix = 'A'): TestProtein[] {
  const out: TestProtein[] = []
  for (let i = 1; i <= count; i++) {
    const accession = `${prefix}${String(i).padStart(4, '0')}`
    out.push(protein(accession, i % 2 === 0 ? 'MKVL' : 'MGSS'))
  }
  return out
}

export function accessionsOf(records: readonly SequenceRecord[]): string[] {
  return records.map((r) => r.accession)
}

export function sortedAccessions(
  records: readonly SequenceRecord[],
): string[] {
  return accessionsOf(records).sort()
}
