/**
 * Codec defines a bidirectional transformation between a typed value `T`
 * and a byte representation.
 *
 * @remarks
 * Codecs are pure, synchronous transforms with no shared state, so a single
 * instance can be used from any number of call sites.
 */
export interface Codec<T> {
  /** Encode a value into its byte representation. */
  encode(value: T): Uint8Array

  /** Decode a previously encoded byte representation back into a value. */
  decode(bytes: Uint8Array): T
}
