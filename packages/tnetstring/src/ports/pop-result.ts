/**
 * A decoded value together with the bytes that followed its frame.
 *
 * `remainder` is a view into the input buffer, not a copy.
 */
export type PopResult<V> = {
  readonly value: V
  readonly remainder: Uint8Array
}
