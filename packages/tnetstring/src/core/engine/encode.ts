import { Tags } from "../../ports/tag"
import type { ValueModel } from "../../ports/value-model"
import { OutputBuffer } from "../buffer/output-buffer"
import { SerializeError } from "../errors/errors"
import { CHAR_COLON } from "../numeric/ascii"
import { type EngineOptions, resolveEngineOptions } from "./engine-options"

/**
 * Render `value` as one frame.
 *
 * The frame is written back to front: tag, payload, then `:` and the length,
 * so the payload never moves once written. Lists render last item first and
 * dicts render each value before its key.
 */
export function encodeFrame<V, L extends V, D extends V>(
  model: ValueModel<V, L, D>,
  value: V,
  options?: EngineOptions,
): Uint8Array {
  const resolved = resolveEngineOptions(options)
  const out = new OutputBuffer({ maxBytes: resolved.maxOutputBytes })

  renderFrame(model, value, out, resolved.maxDepth, 0)

  return out.finalize()
}

function renderFrame<V, L extends V, D extends V>(
  model: ValueModel<V, L, D>,
  value: V,
  out: OutputBuffer,
  maxDepth: number,
  depth: number,
): void {
  const tag = model.classify(value)

  if (tag === undefined) {
    throw new SerializeError("unserializable", "Value has no tnetstring representation", {
      context: { type: describeValue(value), model: model.name },
    })
  }

  out.prependAscii(tag)
  const mark = out.size

  switch (tag) {
    case Tags.String:
      out.prependBytes(model.renderString(value))
      break

    case Tags.Integer:
      out.prependAscii(model.renderInteger(value))
      break

    case Tags.Float:
      out.prependAscii(model.renderFloat(value))
      break

    case Tags.Bool:
      out.prependAscii(model.renderBool(value))
      break

    case Tags.Null:
      break

    case Tags.List: {
      enterContainer(depth, maxDepth)

      const items = Array.from(model.listItems(value)).reverse()
      for (const item of items) {
        renderFrame(model, item, out, maxDepth, depth + 1)
      }
      break
    }

    case Tags.Dict: {
      enterContainer(depth, maxDepth)

      const entries = Array.from(model.dictEntries(value)).reverse()
      for (const [key, item] of entries) {
        renderFrame(model, item, out, maxDepth, depth + 1)
        renderFrame(model, key, out, maxDepth, depth + 1)
      }
      break
    }
  }

  const payloadLength = out.size - mark
  out.prependByte(CHAR_COLON)
  out.prependAscii(String(payloadLength))
}

function enterContainer(depth: number, maxDepth: number): void {
  if (depth + 1 > maxDepth) {
    throw new SerializeError("depth_exceeded", "Value is nested too deeply to serialize", {
      context: { maxDepth },
    })
  }
}

function describeValue(value: unknown): string {
  if (value === null) return "null"
  if (typeof value !== "object") return typeof value

  const ctor: unknown = Object.getPrototypeOf(value)?.constructor
  return typeof ctor === "function" && ctor.name ? ctor.name : "object"
}
