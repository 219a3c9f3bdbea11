import { NumericLiteralError } from "../errors/errors"
import { asciiText, CHAR_DOT, CHAR_LOWER_E, CHAR_UPPER_E } from "./ascii"
import { preview } from "./integer"

const DECIMAL_FLOAT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/
const SPECIAL_FLOAT = /^([+-]?)(inf|infinity|nan)$/i

/**
 * Parse a float payload. The whole payload must be a decimal literal or one
 * of `inf`, `infinity`, `nan` (any case, optional sign). Whitespace, hex
 * notation and trailing bytes are rejected.
 */
export function parseFloatLiteral(payload: Uint8Array): number {
  const text = asciiText(payload)

  if (DECIMAL_FLOAT.test(text)) return Number(text)

  const special = SPECIAL_FLOAT.exec(text)
  if (special) {
    if (special[2]?.toLowerCase() === "nan") return Number.NaN
    return special[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY
  }

  throw new NumericLiteralError("invalid_float", "Not a tnetstring: invalid float literal", {
    context: { literal: preview(payload) },
  })
}

/**
 * Shortest round-trip text for a float. Integral values keep a `.0` suffix
 * so readers that share one tag between integers and floats still see a
 * float.
 */
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return "nan"
  if (value === Number.POSITIVE_INFINITY) return "inf"
  if (value === Number.NEGATIVE_INFINITY) return "-inf"
  if (Object.is(value, -0)) return "-0.0"

  const text = String(value)
  return /[.eE]/.test(text) ? text : `${text}.0`
}

/** Single-tag numbers: a `#` payload holding `.`, `e` or `E` is a float. */
export function looksLikeFloat(payload: Uint8Array): boolean {
  for (const byte of payload) {
    if (byte === CHAR_DOT || byte === CHAR_LOWER_E || byte === CHAR_UPPER_E) return true
  }
  return false
}
