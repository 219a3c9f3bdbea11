import { NumericLiteralError } from "../../errors/errors"
import { ascii } from "../../../tests/utils/bytes"
import { thrownBy } from "../../../tests/utils/errors"
import {
  FAST_INTEGER_MAX_LENGTH,
  formatInteger,
  parseIntegerBig,
  parseIntegerFast,
  parseIntegerLiteral,
  preview,
} from "../integer"

describe("parseIntegerLiteral", () => {
  it.each([
    ["0", 0],
    ["42", 42],
    ["-17", -17],
    ["+5", 5],
    ["007", 7],
    ["123456789012345", 123456789012345],
  ])("parses %s on the fast path", (literal, expected) => {
    expect(parseIntegerLiteral(ascii(literal))).toBe(expected)
  })

  it("turns -0 into 0", () => {
    expect(Object.is(parseIntegerLiteral(ascii("-0")), 0)).toBe(true)
  })

  it("switches to bigint at the fast-path threshold", () => {
    const literal = "1234567890123456"
    expect(literal).toHaveLength(FAST_INTEGER_MAX_LENGTH)

    expect(parseIntegerLiteral(ascii(literal))).toBe(1234567890123456n)
  })

  it.each([
    ["9223372036854775807", 9223372036854775807n],
    ["-9223372036854775808", -9223372036854775808n],
    ["18446744073709551616", 18446744073709551616n],
    ["123456789012345678901234567890", 123456789012345678901234567890n],
  ])("parses %s exactly", (literal, expected) => {
    expect(parseIntegerLiteral(ascii(literal))).toBe(expected)
  })

  it.each(["", "-", "+", "1.5", " 1", "1 ", "12a", "--1", "0x10", "1e3"])(
    "rejects %j",
    (literal) => {
      expect(() => parseIntegerLiteral(ascii(literal))).toThrow(NumericLiteralError)
    },
  )

  it("rejects junk in long literals", () => {
    expect(() => parseIntegerLiteral(ascii("1234567890123456x"))).toThrow(NumericLiteralError)
    expect(() => parseIntegerLiteral(ascii("-12345678901234567.0"))).toThrow(NumericLiteralError)
  })

  it("reports the offending literal", () => {
    expect(thrownBy(() => parseIntegerLiteral(ascii("abc")))).toMatchObject({
      code: "invalid_integer",
      context: { literal: "abc" },
    })
  })
})

describe("fast and big paths", () => {
  it.each(["0", "7", "-7", "+99", "999999999999999", "-99999999999999", "+10000000000000"])(
    "agree on %s",
    (literal) => {
      const bytes = ascii(literal)
      expect(bytes.length).toBeLessThan(FAST_INTEGER_MAX_LENGTH)
      expect(BigInt(parseIntegerFast(bytes))).toBe(parseIntegerBig(bytes))
    },
  )

  it("sends a signed fifteen-digit literal down the big path", () => {
    const literal = "-999999999999999"
    expect(literal).toHaveLength(FAST_INTEGER_MAX_LENGTH)

    expect(parseIntegerLiteral(ascii(literal))).toBe(-999999999999999n)
  })

  it("parseIntegerFast refuses payloads at the threshold", () => {
    expect(() => parseIntegerFast(ascii("1".repeat(FAST_INTEGER_MAX_LENGTH)))).toThrow(RangeError)
  })

  it("parseIntegerBig applies the same grammar", () => {
    expect(() => parseIntegerBig(ascii("-"))).toThrow(NumericLiteralError)
    expect(() => parseIntegerBig(ascii("1_000"))).toThrow(NumericLiteralError)
  })
})

describe("formatInteger", () => {
  it("renders numbers and bigints as plain decimal", () => {
    expect(formatInteger(42)).toBe("42")
    expect(formatInteger(-7n)).toBe("-7")
    expect(formatInteger(-0)).toBe("0")
    expect(formatInteger(1e21)).toBe("1000000000000000000000")
    expect(formatInteger(2n ** 64n)).toBe("18446744073709551616")
  })

  it("refuses non-integers", () => {
    expect(() => formatInteger(1.5)).toThrow(RangeError)
    expect(() => formatInteger(Number.NaN)).toThrow(RangeError)
  })
})

describe("preview", () => {
  it("truncates long payloads", () => {
    expect(preview(ascii("x".repeat(40)))).toBe(`${"x".repeat(32)}...`)
    expect(preview(ascii("short"))).toBe("short")
  })
})
