import { TextDecoder } from "node:util"
import { FormatError, SerializeError } from "../../core/errors/errors"
import { formatFloat, parseFloatLiteral } from "../../core/numeric/float"
import { formatInteger, parseIntegerLiteral } from "../../core/numeric/integer"
import { type Tag, Tags } from "../../ports/tag"
import type { ValueModel } from "../../ports/value-model"
import type { NativeDict, NativeList, NativeValue } from "./native-value"

export type NativeValueModelOptions = {
  /**
   * Text encoding for string payloads. `null` decodes strings to
   * `Uint8Array` and only accepts `Uint8Array` on encode for raw bytes
   * (JS strings are then written as UTF-8). Default: "utf8"
   */
  encoding?: BufferEncoding | null

  /**
   * "auto" decodes integers to `number` when safe and `bigint` otherwise;
   * "bigint" always decodes to `bigint`. Default: "auto"
   */
  integers?: "auto" | "bigint"

  /** Container used for decoded dicts. Default: "object" */
  dicts?: "object" | "map"
}

type NativeDictTarget = NativeDict | Map<NativeValue, NativeValue>

/**
 * Value model over plain JavaScript values.
 *
 * Dicts use map semantics: a repeated key overwrites the earlier value
 * (last write wins). With `dicts: "object"` keys must decode to a string,
 * number or bigint; numbers are stringified the way property keys are.
 * Objects enumerate integer-like keys ("0", "1", ...) first in ascending
 * order, so such keys come back out of wire order; `dicts: "map"` keeps
 * pair order.
 *
 * UTF-8 and UTF-16LE payloads must be well formed; anything else is a
 * `FormatError` with code "invalid_string" rather than replacement
 * characters.
 */
export class NativeValueModel implements ValueModel<NativeValue, NativeList, NativeDictTarget> {
  readonly name = "native"

  private readonly encoding: BufferEncoding | null
  private readonly integers: "auto" | "bigint"
  private readonly dicts: "object" | "map"
  private readonly strictDecoder: TextDecoder | undefined

  constructor(options: NativeValueModelOptions = {}) {
    this.encoding = options.encoding === undefined ? "utf8" : options.encoding
    this.integers = options.integers ?? "auto"
    this.dicts = options.dicts ?? "object"

    const label = this.encoding === null ? undefined : strictDecoderLabel(this.encoding)
    this.strictDecoder =
      label === undefined ? undefined : new TextDecoder(label, { fatal: true, ignoreBOM: true })
  }

  classify(value: NativeValue): Tag | undefined {
    switch (typeof value) {
      case "string":
        return Tags.String
      case "bigint":
        return Tags.Integer
      case "number":
        // -0 has no integer spelling
        return Number.isInteger(value) && !Object.is(value, -0) ? Tags.Integer : Tags.Float
      case "boolean":
        return Tags.Bool
      case "object":
        if (value === null) return Tags.Null
        if (value instanceof Uint8Array) return Tags.String
        if (Array.isArray(value)) return Tags.List
        if (value instanceof Map || isPlainObject(value)) return Tags.Dict
        return undefined
      default:
        return undefined
    }
  }

  makeString(payload: Uint8Array): NativeValue {
    if (this.encoding === null) return Uint8Array.from(payload)

    if (this.strictDecoder !== undefined) {
      try {
        return this.strictDecoder.decode(payload)
      } catch (cause) {
        throw new FormatError(
          "invalid_string",
          `Not a tnetstring: string payload is not valid ${this.encoding}`,
          { context: { encoding: this.encoding, byteLength: payload.length }, cause },
        )
      }
    }

    return Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength).toString(
      this.encoding,
    )
  }

  makeInteger(payload: Uint8Array): NativeValue {
    const parsed = parseIntegerLiteral(payload)

    if (this.integers === "bigint") return BigInt(parsed)
    if (typeof parsed === "number") return parsed

    const asNumber = Number(parsed)
    return Number.isSafeInteger(asNumber) ? asNumber : parsed
  }

  makeFloat(payload: Uint8Array): NativeValue {
    return parseFloatLiteral(payload)
  }

  makeBool(flag: boolean): NativeValue {
    return flag
  }

  makeNull(): NativeValue {
    return null
  }

  newList(): NativeList {
    return []
  }

  listAppend(list: NativeList, item: NativeValue): void {
    list.push(item)
  }

  newDict(): NativeDictTarget {
    return this.dicts === "map" ? new Map() : {}
  }

  dictPut(dict: NativeDictTarget, key: NativeValue, value: NativeValue): void {
    if (dict instanceof Map) {
      dict.set(key, value)
      return
    }

    // defineProperty so that "__proto__" lands as an own key
    Object.defineProperty(dict, this.propertyKey(key), {
      value,
      enumerable: true,
      writable: true,
      configurable: true,
    })
  }

  renderString(value: NativeValue): Uint8Array {
    if (value instanceof Uint8Array) return value
    if (typeof value === "string") return Buffer.from(value, this.encoding ?? "utf8")
    throw mismatch(value, "string")
  }

  renderInteger(value: NativeValue): string {
    if (typeof value === "number" || typeof value === "bigint") return formatInteger(value)
    throw mismatch(value, "integer")
  }

  renderFloat(value: NativeValue): string {
    if (typeof value === "number") return formatFloat(value)
    throw mismatch(value, "float")
  }

  renderBool(value: NativeValue): "true" | "false" {
    if (typeof value === "boolean") return value ? "true" : "false"
    throw mismatch(value, "bool")
  }

  listItems(value: NativeValue): Iterable<NativeValue> {
    if (Array.isArray(value)) return value
    throw mismatch(value, "list")
  }

  dictEntries(value: NativeValue): Iterable<readonly [NativeValue, NativeValue]> {
    if (value instanceof Map) return value.entries()
    if (isPlainObject(value)) return Object.entries(value)
    throw mismatch(value, "dict")
  }

  private propertyKey(key: NativeValue): string {
    if (typeof key === "string") return key
    if (typeof key === "number" || typeof key === "bigint") return String(key)
    if (key instanceof Uint8Array) return Buffer.from(key).toString("utf8")

    throw new FormatError("invalid_dict_key", "Dict key cannot be used as an object property", {
      context: { keyType: key === null ? "null" : Array.isArray(key) ? "list" : typeof key },
    })
  }
}

function strictDecoderLabel(encoding: BufferEncoding): "utf-8" | "utf-16le" | undefined {
  switch (encoding) {
    case "utf8":
    case "utf-8":
      return "utf-8"
    case "utf16le":
    case "utf-16le":
    case "ucs2":
    case "ucs-2":
      return "utf-16le"
    default:
      return undefined
  }
}

function isPlainObject(value: unknown): value is NativeDict {
  if (typeof value !== "object" || value === null) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

function mismatch(value: NativeValue, expected: string): SerializeError {
  return new SerializeError("unserializable", `Expected a ${expected} value`, {
    context: { expected, actual: typeof value },
    isOperational: false,
  })
}

export function createNativeValueModel(options?: NativeValueModelOptions): NativeValueModel {
  return new NativeValueModel(options)
}
