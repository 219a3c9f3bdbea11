import type { Tag } from "./tag"

/**
 * ValueModel is the capability set a host type system supplies so the codec
 * engine can build and inspect values without knowing their representation.
 *
 * @typeParam V - Any value the model can produce or render.
 * @typeParam L - The mutable list type returned by {@link ValueModel.newList}.
 * @typeParam D - The mutable dict type returned by {@link ValueModel.newDict}.
 *
 * @remarks
 * - Constructors receive payload bytes that belong to the caller's input buffer.
 *   A model that keeps bytes must copy them.
 * - Parse failures are reported by throwing `NumericLiteralError` or
 *   `FormatError`; the engine never inspects a returned value for failure.
 * - `classify` must agree with the render methods: if it returns `Tags.Integer`,
 *   `renderInteger` must accept the value.
 * - Rendering happens back to front, but the engine takes care of reversing
 *   iteration order. Models simply yield items and entries in document order.
 *
 * @example
 * ```ts
 * const codec = createTnetstringCodec({ model: new TaggedValueModel() })
 * codec.encode(tnet.list(tnet.string("hello"), tnet.integer(42)))
 * ```
 */
export interface ValueModel<V, L extends V = V, D extends V = V> {
  /** Short identifier used in log context, e.g. "tagged" or "native". */
  readonly name: string

  /** Map a value onto its wire tag, or `undefined` if it cannot be serialized. */
  classify(value: V): Tag | undefined

  makeString(payload: Uint8Array): V
  makeInteger(payload: Uint8Array): V
  makeFloat(payload: Uint8Array): V
  makeBool(flag: boolean): V
  makeNull(): V

  newList(): L
  listAppend(list: L, item: V): void

  newDict(): D
  /**
   * Add a key/value pair. Whether duplicate keys are kept (pair-list
   * semantics) or overwritten (map semantics) is a documented property of the
   * model.
   */
  dictPut(dict: D, key: V, value: V): void

  renderString(value: V): Uint8Array
  /** Plain decimal ASCII, optional leading `-`. */
  renderInteger(value: V): string
  /** Round-trip-safe ASCII decimal. */
  renderFloat(value: V): string
  renderBool(value: V): "true" | "false"

  listItems(value: V): Iterable<V>
  dictEntries(value: V): Iterable<readonly [V, V]>
}
