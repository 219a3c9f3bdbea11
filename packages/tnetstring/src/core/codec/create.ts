import { createPinoLogger, type Logger } from "@tnetkit/logger"
import {
  NativeValueModel,
  type NativeValueModelOptions,
} from "../../adapters/native/native-value-model"
import type { NativeDict, NativeList, NativeValue } from "../../adapters/native/native-value"
import { TaggedValueModel } from "../../adapters/tagged/tagged-value-model"
import type { TnetDict, TnetList, TnetValue } from "../../adapters/tagged/tnet-value"
import { type CodecConfig, loadCodecConfig } from "../../config/codec-config"
import type { ValueModel } from "../../ports/value-model"
import type { EngineOptions } from "../engine/engine-options"
import { TnetstringCodec, type TnetstringCodecDeps } from "./tnetstring-codec"

export type TaggedCodec = TnetstringCodec<TnetValue, TnetList, TnetDict>

export type NativeCodec = TnetstringCodec<
  NativeValue,
  NativeList,
  NativeDict | Map<NativeValue, NativeValue>
>

/** Codec over the lossless {@link TnetValue} tagged union. */
export function createTaggedCodec(
  options: EngineOptions = {},
  deps: TnetstringCodecDeps = {},
): TaggedCodec {
  return new TnetstringCodec({ ...options, model: new TaggedValueModel() }, deps)
}

/** Codec over plain JavaScript values. */
export function createNativeCodec(
  options: EngineOptions & NativeValueModelOptions = {},
  deps: TnetstringCodecDeps = {},
): NativeCodec {
  const { encoding, integers, dicts, ...engine } = options
  const model = new NativeValueModel({
    ...(encoding !== undefined && { encoding }),
    ...(integers !== undefined && { integers }),
    ...(dicts !== undefined && { dicts }),
  })

  return new TnetstringCodec({ ...engine, model }, deps)
}

export type ConfiguredCodecOptions = {
  /** Settings to use. Default: loaded from `TNETSTRING_*` environment variables */
  config?: CodecConfig
  /** Default: a pino logger at the configured `LOG_LEVEL` */
  logger?: Logger
}

/**
 * Build a codec whose limits and logger come from {@link CodecConfig}.
 */
export function createConfiguredCodec<V, L extends V, D extends V>(
  model: ValueModel<V, L, D>,
  options: ConfiguredCodecOptions = {},
): TnetstringCodec<V, L, D> {
  const config = options.config ?? loadCodecConfig()
  const logger = options.logger ?? createPinoLogger({}, { level: config.value.LOG_LEVEL })

  return new TnetstringCodec({ ...config.toEngineOptions(), model }, { logger })
}
