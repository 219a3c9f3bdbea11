import { FormatError } from "../errors/errors"
import { CHAR_0, CHAR_COLON, isDigit } from "../numeric/ascii"

export type LengthPrefix = {
  /** Declared payload length. */
  readonly length: number
  /** Index of the first payload byte (just past the colon). */
  readonly payloadStart: number
}

/**
 * Read `<digits>:` from `data[start..end)`.
 *
 * A leading `0` must be the only digit. The running value is checked
 * against `maxLength` after every digit, so an absurd prefix is rejected
 * before it is ever used as an index.
 */
export function readLengthPrefix(
  data: Uint8Array,
  start: number,
  end: number,
  maxLength: number,
): LengthPrefix {
  if (start >= end) {
    throw new FormatError("missing_length_prefix", "Not a tnetstring: missing length prefix", {
      context: { offset: start },
    })
  }

  const first = data[start] ?? 0
  if (!isDigit(first)) {
    throw new FormatError("invalid_length_prefix", "Not a tnetstring: invalid length prefix", {
      context: { offset: start },
    })
  }

  let pos = start + 1
  let length = first - CHAR_0

  if (length === 0) {
    if (pos < end && isDigit(data[pos] ?? 0)) {
      throw new FormatError(
        "invalid_length_prefix",
        "Not a tnetstring: length prefix has a leading zero",
        { context: { offset: start } },
      )
    }
  } else {
    while (pos < end && isDigit(data[pos] ?? 0)) {
      length = length * 10 + ((data[pos] ?? CHAR_0) - CHAR_0)
      if (length > maxLength) {
        throw new FormatError(
          "length_prefix_too_large",
          "Not a tnetstring: absurdly large length prefix",
          { context: { offset: start, maxLength } },
        )
      }
      pos++
    }
  }

  if (length > maxLength) {
    throw new FormatError("length_prefix_too_large", "Not a tnetstring: absurdly large length prefix", {
      context: { offset: start, maxLength },
    })
  }

  if (pos >= end || data[pos] !== CHAR_COLON) {
    throw new FormatError("missing_length_prefix", "Not a tnetstring: missing length prefix", {
      context: { offset: pos },
    })
  }

  return { length, payloadStart: pos + 1 }
}
