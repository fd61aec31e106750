import { createError } from '../builder/shared/errors'
import {
  ACCESSION_COLUMN,
  DEFAULT_CODEC_TAG,
} from '../builder/shared/constants'
import type { ErrorContext } from '../builder/shared/types'
import { isNonEmptyString } from '../builder/shared/validators/type-guards'
import { defaultCodec } from './default-codec'
import { FASTA_CODEC_TAG, fastaCodec } from './fasta'
import type { SchemaDescriptor, SequenceCodec } from './types'

export interface CodecRegistry {
  register(tag: string, codec: SequenceCodec): void
  resolve(tag: string, ctx?: ErrorContext): SequenceCodec
  has(tag: string): boolean
  tags(): string[]
}

const BUILTIN_CODECS: ReadonlyArray<readonly [string, SequenceCodec]> = [
  [DEFAULT_CODEC_TAG, defaultCodec],
  [FASTA_CODEC_TAG, fastaCodec],
]

/**
 * A table needs exactly one `accession` column, and it must be the primary
 * key: staging joins and lookups go through it.
 */
export function validateSchema(tag: string, schema: SchemaDescriptor): void {
  const ctx = { operation: 'register', tag }
  const seen = new Set<string>()

  for (const column of schema) {
    if (!isNonEmptyString(column.name) || !isNonEmptyString(column.type)) {
      throw createError(
        'Every column needs a non-empty name and type',
        ctx,
        'CONFIG_ERROR',
      )
    }
    const key = column.name.toLowerCase()
    if (seen.has(key)) {
      throw createError(
        `Duplicate column '${column.name}' in schema`,
        ctx,
        'CONFIG_ERROR',
      )
    }
    seen.add(key)
  }

  const accession = schema.find((c) => c.name === ACCESSION_COLUMN)
  if (!accession) {
    throw createError(
      `Schema has no '${ACCESSION_COLUMN}' column`,
      ctx,
      'CONFIG_ERROR',
    )
  }

  if (!/\bprimary\s+key\b/i.test(accession.constraints ?? '')) {
    throw createError(
      `Column '${ACCESSION_COLUMN}' must be the PRIMARY KEY`,
      ctx,
      'CONFIG_ERROR',
    )
  }
}

export function createCodecRegistry(
  options: { builtins?: boolean } = {},
): CodecRegistry {
  const { builtins = true } = options
  const codecs = new Map<string, SequenceCodec>()

  function register(tag: string, codec: SequenceCodec): void {
    if (!isNonEmptyString(tag)) {
      throw createError(
        'Record type tag is required and cannot be empty',
        { operation: 'register' },
        'CONFIG_ERROR',
      )
    }
    validateSchema(tag, codec.schema())
    codecs.set(tag, codec)
  }

  function resolve(tag: string, ctx: ErrorContext = {}): SequenceCodec {
    const codec = codecs.get(tag)
    if (!codec) {
      throw createError(
        `No codec registered for record type '${tag}'. Registered: ${[...codecs.keys()].join(', ')}`,
        { ...ctx, tag },
        'UNKNOWN_TYPE',
      )
    }
    return codec
  }

  if (builtins) {
    for (const [tag, codec] of BUILTIN_CODECS) register(tag, codec)
  }

  return {
    register,
    resolve,
    has: (tag) => codecs.has(tag),
    tags: () => [...codecs.keys()],
  }
}

/**
 * Process-wide registry used when a store is created without one. Fill it
 * during start-up; registering while queries are running is unsupported.
 */
export const globalCodecRegistry: CodecRegistry = createCodecRegistry()

export function registerCodec(tag: string, codec: SequenceCodec): void {
  globalCodecRegistry.register(tag, codec)
}
