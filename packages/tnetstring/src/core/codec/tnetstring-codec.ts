import type { Readable, Writable } from "node:stream"
import { createNullLogger, type Logger } from "@tnetkit/logger"
import { readFrame } from "../../adapters/stream/read-frame"
import { writeFrame } from "../../adapters/stream/write-frame"
import type { Codec } from "../../ports/codec"
import type { PopResult } from "../../ports/pop-result"
import type { ValueModel } from "../../ports/value-model"
import { decodeFrame, decodeFrames, popFrame } from "../engine/decode"
import { encodeFrame } from "../engine/encode"
import {
  type EngineOptions,
  type ResolvedEngineOptions,
  resolveEngineOptions,
} from "../engine/engine-options"
import { isTnetstringError } from "../errors/tnetstring-error"

export type TnetstringCodecDeps = {
  /** Receives a debug entry for every failed operation. Default: no-op */
  logger?: Logger
}

export type TnetstringCodecOptions<V, L extends V = V, D extends V = V> = EngineOptions & {
  model: ValueModel<V, L, D>
}

/**
 * A tnetstring codec bound to one value model and one set of limits.
 *
 * Every method runs to completion on the calling thread (stream methods
 * aside) and keeps no state between calls.
 */
export class TnetstringCodec<V, L extends V = V, D extends V = V> implements Codec<V> {
  private readonly model: ValueModel<V, L, D>
  private readonly options: ResolvedEngineOptions
  private readonly logger: Logger

  constructor(options: TnetstringCodecOptions<V, L, D>, deps: TnetstringCodecDeps = {}) {
    this.model = options.model
    this.options = resolveEngineOptions(options)
    this.logger = (deps.logger ?? createNullLogger()).child({ codec: this.model.name })
  }

  get limits(): ResolvedEngineOptions {
    return this.options
  }

  encode(value: V): Uint8Array {
    return this.run("encode", undefined, () => encodeFrame(this.model, value, this.options))
  }

  /** Decode the first frame in `bytes`; trailing bytes are ignored. */
  decode(bytes: Uint8Array): V {
    return this.run("decode", bytes.length, () => decodeFrame(this.model, bytes, this.options))
  }

  /** Decode the first frame and return the bytes that follow it. */
  pop(bytes: Uint8Array): PopResult<V> {
    return this.run("pop", bytes.length, () => popFrame(this.model, bytes, this.options))
  }

  /** Decode every frame in a buffer of back-to-back frames. */
  decodeAll(bytes: Uint8Array): V[] {
    const values = this.run("decodeAll", bytes.length, () =>
      decodeFrames(this.model, bytes, this.options),
    )
    this.logger.trace("tnetstring decodeAll", {
      operation: "decodeAll",
      byteLength: bytes.length,
      frameCount: values.length,
    })
    return values
  }

  async readFrame(stream: Readable): Promise<V> {
    try {
      return await readFrame(stream, this.model, this.options)
    } catch (err) {
      this.logFailure("readFrame", undefined, err)
      throw err
    }
  }

  async writeFrame(stream: Writable, value: V): Promise<number> {
    try {
      return await writeFrame(stream, this.model, value, this.options)
    } catch (err) {
      this.logFailure("writeFrame", undefined, err)
      throw err
    }
  }

  private run<T>(operation: string, byteLength: number | undefined, fn: () => T): T {
    try {
      return fn()
    } catch (err) {
      this.logFailure(operation, byteLength, err)
      throw err
    }
  }

  private logFailure(operation: string, byteLength: number | undefined, err: unknown): void {
    this.logger.debug(`tnetstring ${operation} failed`, {
      operation,
      ...(byteLength !== undefined && { byteLength }),
      code: isTnetstringError(err) ? err.code : "unknown",
      err,
    })
  }
}

export function createTnetstringCodec<V, L extends V = V, D extends V = V>(
  options: TnetstringCodecOptions<V, L, D>,
  deps: TnetstringCodecDeps = {},
): TnetstringCodec<V, L, D> {
  return new TnetstringCodec(options, deps)
}
