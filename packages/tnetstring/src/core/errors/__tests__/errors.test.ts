import {
  BufferAllocationError,
  FormatError,
  NumericLiteralError,
  SerializeError,
} from "../errors"
import { isTnetstringError, serializeError, TnetstringError } from "../tnetstring-error"

describe("TnetstringError taxonomy", () => {
  it("carries code, frozen context and subclass name", () => {
    const err = new FormatError("invalid_tag", "Not a tnetstring: invalid type tag", {
      context: { offset: 3, tag: "x" },
    })

    expect(err).toBeInstanceOf(Error)
    expect(err).toBeInstanceOf(TnetstringError)
    expect(err.name).toBe("FormatError")
    expect(err.code).toBe("invalid_tag")
    expect(err.message).toBe("Not a tnetstring: invalid type tag")
    expect(err.context).toStrictEqual({ offset: 3, tag: "x" })
    expect(Object.isFrozen(err.context)).toBe(true)
    expect(err.isOperational).toBe(true)
    expect(err.timestamp).toBeInstanceOf(Date)
  })

  it("names each subclass after itself", () => {
    expect(new NumericLiteralError("invalid_float", "m").name).toBe("NumericLiteralError")
    expect(new SerializeError("unserializable", "m").name).toBe("SerializeError")
    expect(new BufferAllocationError("allocation_failed", "m").name).toBe(
      "BufferAllocationError",
    )
  })

  it("marks only limit breaches as operational allocation failures", () => {
    expect(new BufferAllocationError("buffer_limit_exceeded", "m").isOperational).toBe(true)
    expect(new BufferAllocationError("allocation_failed", "m").isOperational).toBe(false)
  })

  it("keeps the cause", () => {
    const cause = new RangeError("Array buffer allocation failed")
    const err = new BufferAllocationError("allocation_failed", "m", { cause })

    expect(err.cause).toBe(cause)
  })

  it("isTnetstringError narrows codec errors only", () => {
    expect(isTnetstringError(new SerializeError("depth_exceeded", "m"))).toBe(true)
    expect(isTnetstringError(new Error("m"))).toBe(false)
    expect(isTnetstringError("m")).toBe(false)
  })
})

describe("serializeError", () => {
  it("serializes codec errors with nested causes", () => {
    const err = new FormatError("length_exceeds_buffer", "outer", {
      context: { offset: 0 },
      cause: new Error("inner"),
    })

    const json = serializeError(err)

    expect(json).toMatchObject({
      name: "FormatError",
      code: "length_exceeds_buffer",
      message: "outer",
      context: { offset: 0 },
      isOperational: true,
      cause: { name: "Error", code: "unknown", message: "inner", isOperational: false },
    })
    expect(json.stack).toBeUndefined()
    expect(json.timestamp).toBe(err.timestamp.toISOString())
  })

  it("includes stacks only when asked", () => {
    const json = serializeError(new Error("m"), { includeStack: true })

    expect(typeof json.stack).toBe("string")
  })

  it("wraps thrown non-errors", () => {
    expect(serializeError("boom")).toMatchObject({
      name: "NonErrorThrown",
      code: "unknown",
      message: "boom",
      context: { value: "boom" },
    })
    expect(serializeError(42).message).toBe("Unknown error")
  })

  it("is what JSON.stringify writes for codec errors", () => {
    const err = new NumericLiteralError("invalid_integer", "bad", { context: { literal: "1x" } })
    const parsed: unknown = JSON.parse(JSON.stringify(err))

    expect(parsed).toMatchObject({ code: "invalid_integer", context: { literal: "1x" } })
  })
})
