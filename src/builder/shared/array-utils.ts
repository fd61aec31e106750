export function deduplicatePreserveOrder<T>(items: readonly T[]): T[] {
  if (items.length <= 1) return [...items]

  const seen = new Set<T>()
  const out: T[] = []

  for (const item of items) {
    if (!seen.has(item)) {
      seen.add(item)
      out.push(item)
    }
  }

  return out
}

export function chunkArray<T>(arr: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new Error(`Chunk size must be integer >= 1, got ${size}`)
  }
  if (arr.length <= size) return [[...arr]]
  const chunks: T[][] = []
  for (let i = 0; i < arr.length; i += size) {
    chunks.push(arr.slice(i, i + size))
  }
  return chunks
}
