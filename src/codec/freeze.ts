import { Buffer } from 'node:buffer'

/** Serializes a structured value to UTF-8 JSON bytes for a binary column. */
export function freeze(value: unknown): Buffer {
  const text = JSON.stringify(value)
  if (text === undefined) {
    throw new Error(`Cannot freeze a value of type ${typeof value}`)
  }
  return Buffer.from(text, 'utf8')
}

export function thaw(bytes: Uint8Array): unknown {
  return JSON.parse(Buffer.from(bytes).toString('utf8'))
}
