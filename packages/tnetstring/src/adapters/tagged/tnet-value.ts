export type TnetString = { readonly type: "string"; readonly value: Uint8Array }
export type TnetInteger = { readonly type: "integer"; readonly value: bigint }
export type TnetFloat = { readonly type: "float"; readonly value: number }
export type TnetBool = { readonly type: "bool"; readonly value: boolean }
export type TnetNull = { readonly type: "null" }
export type TnetList = { readonly type: "list"; readonly items: TnetValue[] }
export type TnetEntry = readonly [key: TnetValue, value: TnetValue]
/** Dicts are pair lists: keys may repeat and may be any value. */
export type TnetDict = { readonly type: "dict"; readonly entries: TnetEntry[] }

export type TnetValue =
  | TnetString
  | TnetInteger
  | TnetFloat
  | TnetBool
  | TnetNull
  | TnetList
  | TnetDict

export type TnetType = TnetValue["type"]

const textEncoder = new TextEncoder()

/**
 * Builders for tagged values.
 *
 * @example
 * ```ts
 * tnet.dict([tnet.string("id"), tnet.integer(7)], [tnet.string("id"), tnet.integer(8)])
 * ```
 */
export const tnet = {
  /** Text is stored as UTF-8; bytes are copied. */
  string(value: string | Uint8Array): TnetString {
    return {
      type: "string",
      value: typeof value === "string" ? textEncoder.encode(value) : Uint8Array.from(value),
    }
  },

  integer(value: number | bigint): TnetInteger {
    return { type: "integer", value: BigInt(value) }
  },

  float(value: number): TnetFloat {
    return { type: "float", value }
  },

  bool(value: boolean): TnetBool {
    return { type: "bool", value }
  },

  null(): TnetNull {
    return { type: "null" }
  },

  list(...items: TnetValue[]): TnetList {
    return { type: "list", items }
  },

  dict(...entries: TnetEntry[]): TnetDict {
    return { type: "dict", entries }
  },
} as const

/** Structural equality; dict entries must match pairwise in order. */
export function tnetEquals(a: TnetValue, b: TnetValue): boolean {
  switch (a.type) {
    case "string":
      return b.type === "string" && Buffer.from(a.value).equals(b.value)
    case "integer":
      return b.type === "integer" && a.value === b.value
    case "float":
      return b.type === "float" && Object.is(a.value, b.value)
    case "bool":
      return b.type === "bool" && a.value === b.value
    case "null":
      return b.type === "null"
    case "list":
      return (
        b.type === "list" &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => {
          const other = b.items[i]
          return other !== undefined && tnetEquals(item, other)
        })
      )
    case "dict":
      return (
        b.type === "dict" &&
        a.entries.length === b.entries.length &&
        a.entries.every(([key, value], i) => {
          const other = b.entries[i]
          return other !== undefined && tnetEquals(key, other[0]) && tnetEquals(value, other[1])
        })
      )
  }
}

export function isTnetValue(value: unknown): value is TnetValue {
  if (typeof value !== "object" || value === null || !("type" in value)) return false

  switch (value.type) {
    case "string":
      return "value" in value && value.value instanceof Uint8Array
    case "integer":
      return "value" in value && typeof value.value === "bigint"
    case "float":
      return "value" in value && typeof value.value === "number"
    case "bool":
      return "value" in value && typeof value.value === "boolean"
    case "null":
      return true
    case "list":
      return "items" in value && Array.isArray(value.items)
    case "dict":
      return "entries" in value && Array.isArray(value.entries)
    default:
      return false
  }
}
