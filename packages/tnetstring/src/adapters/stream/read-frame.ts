import type { Readable } from "node:stream"
import { parsePayload } from "../../core/engine/decode"
import { type EngineOptions, resolveEngineOptions } from "../../core/engine/engine-options"
import { FormatError } from "../../core/errors/errors"
import { CHAR_0, CHAR_COLON, isDigit } from "../../core/numeric/ascii"
import type { ValueModel } from "../../ports/value-model"

/**
 * Read exactly one frame from a byte stream and decode it.
 *
 * The length prefix is consumed one byte at a time and the payload in a
 * single read, so bytes after the frame stay in the stream for the next
 * reader. A prefix above `maxLength` is rejected as soon as the ceiling is
 * crossed, leaving the rest of the prefix unread.
 *
 * The stream must not be flowing (no `data` listeners) and must yield
 * Buffers, not strings or objects.
 */
export async function readFrame<V, L extends V, D extends V>(
  stream: Readable,
  model: ValueModel<V, L, D>,
  options?: EngineOptions,
): Promise<V> {
  const resolved = resolveEngineOptions(options)
  const length = await readLength(stream, resolved.maxLength)

  const body = await readChunk(stream, length + 1)
  if (body === null || body.length < length + 1) {
    throw new FormatError("truncated", "Not a tnetstring: stream ended inside a frame", {
      context: { expected: length + 1, received: body?.length ?? 0 },
    })
  }

  return parsePayload(model, body[length] ?? 0, body, 0, length, resolved)
}

async function readLength(stream: Readable, maxLength: number): Promise<number> {
  const first = await readByte(stream)

  if (first === undefined) {
    throw new FormatError("missing_length_prefix", "Not a tnetstring: missing length prefix")
  }
  if (!isDigit(first)) {
    throw new FormatError("invalid_length_prefix", "Not a tnetstring: invalid length prefix")
  }

  let length = first - CHAR_0
  let next = await readByte(stream)

  if (length === 0 && next !== undefined && isDigit(next)) {
    throw new FormatError(
      "invalid_length_prefix",
      "Not a tnetstring: length prefix has a leading zero",
    )
  }

  while (length !== 0 && next !== undefined && isDigit(next)) {
    length = length * 10 + (next - CHAR_0)
    if (length > maxLength) break
    next = await readByte(stream)
  }

  if (length > maxLength) {
    throw new FormatError(
      "length_prefix_too_large",
      "Not a tnetstring: absurdly large length prefix",
      { context: { maxLength } },
    )
  }

  if (next !== CHAR_COLON) {
    throw new FormatError("missing_length_prefix", "Not a tnetstring: missing length prefix")
  }

  return length
}

async function readByte(stream: Readable): Promise<number | undefined> {
  const chunk = await readChunk(stream, 1)
  return chunk?.[0]
}

/**
 * Read `size` bytes, waiting for more data as needed. Returns fewer bytes if
 * the stream ends first, and `null` if it had already ended.
 */
async function readChunk(stream: Readable, size: number): Promise<Buffer | null> {
  if (size === 0) return Buffer.alloc(0)

  for (;;) {
    const chunk: unknown = stream.read(size)

    if (chunk !== null) {
      if (!Buffer.isBuffer(chunk)) {
        throw new TypeError("readFrame requires a stream of Buffers")
      }
      return chunk
    }

    if (stream.readableEnded || stream.destroyed) return null

    await waitForData(stream)
  }
}

function waitForData(stream: Readable): Promise<void> {
  return new Promise((resolve, reject) => {
    const onReady = () => {
      cleanup()
      resolve()
    }
    const onError = (err: Error) => {
      cleanup()
      reject(err)
    }
    const cleanup = () => {
      stream.off("readable", onReady)
      stream.off("end", onReady)
      stream.off("close", onReady)
      stream.off("error", onError)
    }

    stream.on("readable", onReady)
    stream.on("end", onReady)
    stream.on("close", onReady)
    stream.on("error", onError)
  })
}
