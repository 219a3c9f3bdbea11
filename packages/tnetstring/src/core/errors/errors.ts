import { TnetstringError, type TnetstringErrorOptions } from "./tnetstring-error"

export type FormatErrorCode =
  | "invalid_length_prefix"
  | "missing_length_prefix"
  | "length_prefix_too_large"
  | "length_exceeds_buffer"
  | "invalid_tag"
  | "invalid_bool"
  | "invalid_null"
  | "invalid_string"
  | "invalid_dict"
  | "invalid_dict_key"
  | "depth_exceeded"
  | "truncated"

export type NumericLiteralErrorCode = "invalid_integer" | "invalid_float"

export type SerializeErrorCode = "unserializable" | "depth_exceeded"

export type BufferAllocationErrorCode = "buffer_limit_exceeded" | "allocation_failed"

type Options<C extends string> = Omit<TnetstringErrorOptions<C>, "code">

/** Malformed framing: length prefix, tag, payload/length mismatch, bool or null literal, undecodable text. */
export class FormatError extends TnetstringError<FormatErrorCode> {
  constructor(code: FormatErrorCode, message: string, options?: Options<FormatErrorCode>) {
    super(message, { ...options, code })
  }
}

/** Integer or float payload rejected by the numeric literal policy. */
export class NumericLiteralError extends TnetstringError<NumericLiteralErrorCode> {
  constructor(
    code: NumericLiteralErrorCode,
    message: string,
    options?: Options<NumericLiteralErrorCode>,
  ) {
    super(message, { ...options, code })
  }
}

/** A value the model cannot map onto any wire tag. */
export class SerializeError extends TnetstringError<SerializeErrorCode> {
  constructor(code: SerializeErrorCode, message: string, options?: Options<SerializeErrorCode>) {
    super(message, { ...options, code })
  }
}

/** The output buffer could not grow to hold the rendered frame. */
export class BufferAllocationError extends TnetstringError<BufferAllocationErrorCode> {
  constructor(
    code: BufferAllocationErrorCode,
    message: string,
    options?: Options<BufferAllocationErrorCode>,
  ) {
    super(message, { isOperational: code === "buffer_limit_exceeded", ...options, code })
  }
}
