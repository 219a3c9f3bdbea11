/** Largest length prefix any tnetstring reader is expected to accept. */
export const MAX_LENGTH_CEILING = 999_999_999

export const DEFAULT_MAX_DEPTH = 64

export type EngineOptions = {
  /**
   * Largest accepted length prefix. Values above {@link MAX_LENGTH_CEILING}
   * are clamped to it. Default: 999,999,999
   */
  maxLength?: number

  /** Deepest accepted container nesting, for decode and encode. Default: 64 */
  maxDepth?: number

  /** Ceiling on the size of one encoded frame. Default: unlimited */
  maxOutputBytes?: number

  /**
   * Accept floats written under the `#` tag (payload holds `.`, `e` or `E`),
   * as produced by single-tag writers. Encoding always uses `^` for floats.
   * Default: false
   */
  legacyNumbers?: boolean
}

export type ResolvedEngineOptions = Readonly<{
  maxLength: number
  maxDepth: number
  maxOutputBytes: number | undefined
  legacyNumbers: boolean
}>

export function resolveEngineOptions(options: EngineOptions = {}): ResolvedEngineOptions {
  const maxLength = options.maxLength ?? MAX_LENGTH_CEILING
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH

  assertNonNegativeInteger("maxLength", maxLength)
  assertNonNegativeInteger("maxDepth", maxDepth)
  if (options.maxOutputBytes !== undefined) {
    assertNonNegativeInteger("maxOutputBytes", options.maxOutputBytes)
  }

  return {
    maxLength: Math.min(maxLength, MAX_LENGTH_CEILING),
    maxDepth,
    maxOutputBytes: options.maxOutputBytes,
    legacyNumbers: options.legacyNumbers ?? false,
  }
}

function assertNonNegativeInteger(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`)
  }
}
