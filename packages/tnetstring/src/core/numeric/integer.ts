import { NumericLiteralError } from "../errors/errors"
import { asciiText, CHAR_0, CHAR_MINUS, CHAR_PLUS, isDigit } from "./ascii"

/**
 * Payloads shorter than this many bytes are accumulated by hand. Fifteen
 * digits stay below `Number.MAX_SAFE_INTEGER` (16 digits), so the fast path
 * cannot lose precision.
 */
export const FAST_INTEGER_MAX_LENGTH = 16

/**
 * Parse an integer payload: an optional `+` or `-` followed by one or more
 * ASCII digits, nothing else.
 *
 * Short literals come back as a `number`; long ones as a `bigint`.
 */
export function parseIntegerLiteral(payload: Uint8Array): number | bigint {
  return payload.length < FAST_INTEGER_MAX_LENGTH
    ? parseIntegerFast(payload)
    : parseIntegerBig(payload)
}

export function parseIntegerFast(payload: Uint8Array): number {
  if (payload.length >= FAST_INTEGER_MAX_LENGTH) {
    throw new RangeError(
      `parseIntegerFast only accepts payloads shorter than ${FAST_INTEGER_MAX_LENGTH} bytes`,
    )
  }

  const digitsStart = signLength(payload)
  let negative = false
  if (digitsStart === 1) negative = payload[0] === CHAR_MINUS

  if (digitsStart === payload.length) throw invalidInteger(payload)

  let value = 0
  for (let i = digitsStart; i < payload.length; i++) {
    const byte = payload[i] ?? 0
    if (!isDigit(byte)) throw invalidInteger(payload)
    value = value * 10 + (byte - CHAR_0)
  }

  if (value === 0) return 0
  return negative ? -value : value
}

export function parseIntegerBig(payload: Uint8Array): bigint {
  const digitsStart = signLength(payload)

  if (digitsStart === payload.length) throw invalidInteger(payload)

  for (let i = digitsStart; i < payload.length; i++) {
    if (!isDigit(payload[i] ?? 0)) throw invalidInteger(payload)
  }

  return BigInt(asciiText(payload))
}

/** Render an integer as plain decimal with an optional leading `-`. */
export function formatInteger(value: number | bigint): string {
  if (typeof value === "bigint") return value.toString(10)

  if (!Number.isInteger(value)) {
    throw new RangeError(`Not an integer: ${value}`)
  }

  return BigInt(value).toString(10)
}

function signLength(payload: Uint8Array): number {
  const first = payload[0]
  return first === CHAR_PLUS || first === CHAR_MINUS ? 1 : 0
}

function invalidInteger(payload: Uint8Array): NumericLiteralError {
  return new NumericLiteralError("invalid_integer", "Not a tnetstring: invalid integer literal", {
    context: { literal: preview(payload) },
  })
}

export function preview(payload: Uint8Array, max = 32): string {
  const text = asciiText(payload.subarray(0, max))
  return payload.length > max ? `${text}...` : text
}
