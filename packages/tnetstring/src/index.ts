import { createTaggedCodec } from "./core/codec/create"
import type { PopResult } from "./ports/pop-result"
import type { TnetValue } from "./adapters/tagged/tnet-value"

export { NativeValueModel, createNativeValueModel } from "./adapters/native/native-value-model"
export type { NativeValueModelOptions } from "./adapters/native/native-value-model"
export type { NativeDict, NativeList, NativeValue } from "./adapters/native/native-value"
export { readFrame } from "./adapters/stream/read-frame"
export { writeFrame } from "./adapters/stream/write-frame"
export { TaggedValueModel, createTaggedValueModel } from "./adapters/tagged/tagged-value-model"
export { isTnetValue, tnet, tnetEquals } from "./adapters/tagged/tnet-value"
export type {
  TnetBool,
  TnetDict,
  TnetEntry,
  TnetFloat,
  TnetInteger,
  TnetList,
  TnetNull,
  TnetString,
  TnetType,
  TnetValue,
} from "./adapters/tagged/tnet-value"
export { CodecConfig, codecConfigSchema, ENV_PREFIX, loadCodecConfig } from "./config/codec-config"
export type {
  CodecSettingKey,
  CodecSettings,
  LoadCodecConfigOptions,
} from "./config/codec-config"
export { DEFAULT_INITIAL_CAPACITY, OutputBuffer } from "./core/buffer/output-buffer"
export type { OutputBufferOptions } from "./core/buffer/output-buffer"
export { createConfiguredCodec, createNativeCodec, createTaggedCodec } from "./core/codec/create"
export type { ConfiguredCodecOptions, NativeCodec, TaggedCodec } from "./core/codec/create"
export { createTnetstringCodec, TnetstringCodec } from "./core/codec/tnetstring-codec"
export type { TnetstringCodecDeps, TnetstringCodecOptions } from "./core/codec/tnetstring-codec"
export { decodeFrame, decodeFrames, parsePayload, popFrame } from "./core/engine/decode"
export { encodeFrame } from "./core/engine/encode"
export {
  DEFAULT_MAX_DEPTH,
  MAX_LENGTH_CEILING,
  resolveEngineOptions,
} from "./core/engine/engine-options"
export type { EngineOptions, ResolvedEngineOptions } from "./core/engine/engine-options"
export { readLengthPrefix } from "./core/engine/length-prefix"
export type { LengthPrefix } from "./core/engine/length-prefix"
export {
  BufferAllocationError,
  FormatError,
  NumericLiteralError,
  SerializeError,
} from "./core/errors/errors"
export type {
  BufferAllocationErrorCode,
  FormatErrorCode,
  NumericLiteralErrorCode,
  SerializeErrorCode,
} from "./core/errors/errors"
export { isTnetstringError, serializeError, TnetstringError } from "./core/errors/tnetstring-error"
export type {
  ErrorContext,
  SerializedError,
  SerializeOptions,
  TnetstringErrorOptions,
} from "./core/errors/tnetstring-error"
export { formatFloat, parseFloatLiteral } from "./core/numeric/float"
export { formatInteger, parseIntegerLiteral } from "./core/numeric/integer"
export type { Codec } from "./ports/codec"
export type { PopResult } from "./ports/pop-result"
export { isTag, tagFromByte, Tags } from "./ports/tag"
export type { Tag, TagName } from "./ports/tag"
export type { ValueModel } from "./ports/value-model"

const defaultCodec = createTaggedCodec()

/** Decode the first frame of `bytes` into a {@link TnetValue}. */
export function decode(bytes: Uint8Array): TnetValue {
  return defaultCodec.decode(bytes)
}

/** Decode the first frame of `bytes` and return the bytes after it. */
export function pop(bytes: Uint8Array): PopResult<TnetValue> {
  return defaultCodec.pop(bytes)
}

export function encode(value: TnetValue): Uint8Array {
  return defaultCodec.encode(value)
}
