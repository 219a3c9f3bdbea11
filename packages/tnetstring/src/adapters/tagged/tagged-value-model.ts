import { SerializeError } from "../../core/errors/errors"
import { formatFloat, parseFloatLiteral } from "../../core/numeric/float"
import { formatInteger, parseIntegerLiteral } from "../../core/numeric/integer"
import { type Tag, Tags } from "../../ports/tag"
import type { ValueModel } from "../../ports/value-model"
import {
  isTnetValue,
  type TnetDict,
  type TnetList,
  type TnetType,
  type TnetValue,
  tnet,
} from "./tnet-value"

const TAG_BY_TYPE: Record<TnetType, Tag> = {
  string: Tags.String,
  integer: Tags.Integer,
  float: Tags.Float,
  bool: Tags.Bool,
  null: Tags.Null,
  list: Tags.List,
  dict: Tags.Dict,
}

/**
 * Value model over the {@link TnetValue} tagged union.
 *
 * Lossless in both directions: strings stay bytes, integers are `bigint`, and
 * dicts keep every pair in order, duplicates included.
 */
export class TaggedValueModel implements ValueModel<TnetValue, TnetList, TnetDict> {
  readonly name = "tagged"

  classify(value: TnetValue): Tag | undefined {
    return isTnetValue(value) ? TAG_BY_TYPE[value.type] : undefined
  }

  makeString(payload: Uint8Array): TnetValue {
    return tnet.string(payload)
  }

  makeInteger(payload: Uint8Array): TnetValue {
    return tnet.integer(parseIntegerLiteral(payload))
  }

  makeFloat(payload: Uint8Array): TnetValue {
    return tnet.float(parseFloatLiteral(payload))
  }

  makeBool(flag: boolean): TnetValue {
    return tnet.bool(flag)
  }

  makeNull(): TnetValue {
    return tnet.null()
  }

  newList(): TnetList {
    return tnet.list()
  }

  listAppend(list: TnetList, item: TnetValue): void {
    list.items.push(item)
  }

  newDict(): TnetDict {
    return tnet.dict()
  }

  dictPut(dict: TnetDict, key: TnetValue, value: TnetValue): void {
    dict.entries.push([key, value])
  }

  renderString(value: TnetValue): Uint8Array {
    if (value.type !== "string") throw mismatch(value, "string")
    return value.value
  }

  renderInteger(value: TnetValue): string {
    if (value.type !== "integer") throw mismatch(value, "integer")
    return formatInteger(value.value)
  }

  renderFloat(value: TnetValue): string {
    if (value.type !== "float") throw mismatch(value, "float")
    return formatFloat(value.value)
  }

  renderBool(value: TnetValue): "true" | "false" {
    if (value.type !== "bool") throw mismatch(value, "bool")
    return value.value ? "true" : "false"
  }

  listItems(value: TnetValue): Iterable<TnetValue> {
    if (value.type !== "list") throw mismatch(value, "list")
    return value.items
  }

  dictEntries(value: TnetValue): Iterable<readonly [TnetValue, TnetValue]> {
    if (value.type !== "dict") throw mismatch(value, "dict")
    return value.entries
  }
}

function mismatch(value: TnetValue, expected: TnetType): SerializeError {
  return new SerializeError("unserializable", `Expected a ${expected} value, got ${value.type}`, {
    context: { expected, actual: value.type },
    isOperational: false,
  })
}

export function createTaggedValueModel(): TaggedValueModel {
  return new TaggedValueModel()
}
