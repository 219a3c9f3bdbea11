import type { PopResult } from "../../ports/pop-result"
import { tagFromByte, Tags } from "../../ports/tag"
import type { ValueModel } from "../../ports/value-model"
import { FormatError } from "../errors/errors"
import { looksLikeFloat } from "../numeric/float"
import { type EngineOptions, type ResolvedEngineOptions, resolveEngineOptions } from "./engine-options"
import { readLengthPrefix } from "./length-prefix"

const TRUE_BYTES = [0x74, 0x72, 0x75, 0x65]
const FALSE_BYTES = [0x66, 0x61, 0x6c, 0x73, 0x65]

type DecodeContext<V, L extends V, D extends V> = {
  readonly model: ValueModel<V, L, D>
  readonly data: Uint8Array
  readonly options: ResolvedEngineOptions
}

/**
 * Parse one frame off the front of `data`.
 *
 * Returns the value and a view of the bytes after the frame. Any failure at
 * any depth aborts the whole call; nothing partially built escapes.
 */
export function popFrame<V, L extends V, D extends V>(
  model: ValueModel<V, L, D>,
  data: Uint8Array,
  options?: EngineOptions,
): PopResult<V> {
  const ctx = { model, data, options: resolveEngineOptions(options) }
  const [value, next] = parseFrame(ctx, 0, data.length, 0)

  return { value, remainder: data.subarray(next) }
}

/** Parse the first frame of `data`. Bytes after it are ignored. */
export function decodeFrame<V, L extends V, D extends V>(
  model: ValueModel<V, L, D>,
  data: Uint8Array,
  options?: EngineOptions,
): V {
  return popFrame(model, data, options).value
}

/** Parse a buffer of back-to-back frames; the last frame must end the buffer exactly. */
export function decodeFrames<V, L extends V, D extends V>(
  model: ValueModel<V, L, D>,
  data: Uint8Array,
  options?: EngineOptions,
): V[] {
  const ctx = { model, data, options: resolveEngineOptions(options) }
  const values: V[] = []

  let pos = 0
  while (pos < data.length) {
    const [value, next] = parseFrame(ctx, pos, data.length, 0)
    values.push(value)
    pos = next
  }

  return values
}

/**
 * Build a value from a payload whose length prefix and tag were read
 * elsewhere, e.g. by a stream reader. `data[start..end)` is the payload.
 */
export function parsePayload<V, L extends V, D extends V>(
  model: ValueModel<V, L, D>,
  tagByte: number,
  data: Uint8Array,
  start: number,
  end: number,
  options: ResolvedEngineOptions,
  depth = 0,
): V {
  return dispatch({ model, data, options }, tagByte, start, end, depth)
}

function parseFrame<V, L extends V, D extends V>(
  ctx: DecodeContext<V, L, D>,
  start: number,
  end: number,
  depth: number,
): [V, number] {
  const { length, payloadStart } = readLengthPrefix(
    ctx.data,
    start,
    end,
    ctx.options.maxLength,
  )
  const payloadEnd = payloadStart + length

  if (payloadEnd + 1 > end) {
    throw new FormatError("length_exceeds_buffer", "Not a tnetstring: length exceeds buffer", {
      context: { offset: start, length, available: end - payloadStart },
    })
  }

  const tagByte = ctx.data[payloadEnd] ?? 0
  const value = dispatch(ctx, tagByte, payloadStart, payloadEnd, depth)

  return [value, payloadEnd + 1]
}

function dispatch<V, L extends V, D extends V>(
  ctx: DecodeContext<V, L, D>,
  tagByte: number,
  start: number,
  end: number,
  depth: number,
): V {
  const { model, data } = ctx
  const payload = data.subarray(start, end)

  switch (tagFromByte(tagByte)) {
    case Tags.String:
      return model.makeString(payload)

    case Tags.Integer:
      if (ctx.options.legacyNumbers && looksLikeFloat(payload)) {
        return model.makeFloat(payload)
      }
      return model.makeInteger(payload)

    case Tags.Float:
      return model.makeFloat(payload)

    case Tags.Bool:
      if (matches(payload, TRUE_BYTES)) return model.makeBool(true)
      if (matches(payload, FALSE_BYTES)) return model.makeBool(false)
      throw new FormatError("invalid_bool", "Not a tnetstring: invalid boolean literal", {
        context: { offset: start },
      })

    case Tags.Null:
      if (payload.length !== 0) {
        throw new FormatError("invalid_null", "Not a tnetstring: invalid null literal", {
          context: { offset: start },
        })
      }
      return model.makeNull()

    case Tags.List: {
      enterContainer(ctx, depth, start)

      const list = model.newList()
      let pos = start
      while (pos < end) {
        const [item, next] = parseFrame(ctx, pos, end, depth + 1)
        model.listAppend(list, item)
        pos = next
      }
      return list
    }

    case Tags.Dict: {
      enterContainer(ctx, depth, start)

      const dict = model.newDict()
      let pos = start
      while (pos < end) {
        const [key, afterKey] = parseFrame(ctx, pos, end, depth + 1)
        if (afterKey >= end) {
          throw new FormatError("invalid_dict", "Not a tnetstring: dict key without a value", {
            context: { offset: pos },
          })
        }
        const [value, afterValue] = parseFrame(ctx, afterKey, end, depth + 1)
        model.dictPut(dict, key, value)
        pos = afterValue
      }
      return dict
    }

    default:
      throw new FormatError("invalid_tag", "Not a tnetstring: invalid type tag", {
        context: { offset: end, tag: String.fromCharCode(tagByte) },
      })
  }
}

function enterContainer<V, L extends V, D extends V>(
  ctx: DecodeContext<V, L, D>,
  depth: number,
  offset: number,
): void {
  if (depth + 1 > ctx.options.maxDepth) {
    throw new FormatError("depth_exceeded", "Not a tnetstring: nesting too deep", {
      context: { offset, maxDepth: ctx.options.maxDepth },
    })
  }
}

function matches(payload: Uint8Array, literal: readonly number[]): boolean {
  if (payload.length !== literal.length) return false
  return literal.every((byte, i) => payload[i] === byte)
}
