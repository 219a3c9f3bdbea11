/**
 * Well-known fields attached to codec log entries.
 */
export type LogContext = {
  /** Name of the value model a codec was built with (e.g. "tagged"). */
  codec: string
  /** Codec operation that produced the entry: "decode", "pop", "encode", ... */
  operation: string
  /** Size in bytes of the input (decode) or output (encode). */
  byteLength: number
  /** Number of frames a multi-frame decode produced. */
  frameCount: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
