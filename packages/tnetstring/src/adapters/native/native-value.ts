/**
 * Plain JavaScript values the native model reads and writes.
 *
 * Decoding produces strings (or `Uint8Array` when no text encoding is set),
 * numbers, bigints for integers beyond `Number.MAX_SAFE_INTEGER`, booleans,
 * `null`, arrays, and plain objects or `Map`s for dicts.
 */
export type NativeValue =
  | string
  | Uint8Array
  | number
  | bigint
  | boolean
  | null
  | NativeValue[]
  | NativeDict
  | Map<NativeValue, NativeValue>

export type NativeDict = { [key: string]: NativeValue }

export type NativeList = NativeValue[]
