import type { Writable } from "node:stream"
import { encodeFrame } from "../../core/engine/encode"
import type { EngineOptions } from "../../core/engine/engine-options"
import type { ValueModel } from "../../ports/value-model"

/**
 * Encode `value` and write it to `stream` as one chunk.
 *
 * Resolves with the number of bytes written once the stream has accepted
 * the chunk. Encoding errors are thrown before anything is written.
 */
export async function writeFrame<V, L extends V, D extends V>(
  stream: Writable,
  model: ValueModel<V, L, D>,
  value: V,
  options?: EngineOptions,
): Promise<number> {
  const bytes = encodeFrame(model, value, options)

  await new Promise<void>((resolve, reject) => {
    stream.write(bytes, (err) => {
      if (err) reject(err)
      else resolve()
    })
  })

  return bytes.length
}
