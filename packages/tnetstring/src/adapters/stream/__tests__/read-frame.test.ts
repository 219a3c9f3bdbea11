import { Readable } from "node:stream"
import { FormatError } from "../../../core/errors/errors"
import { readableOf } from "../../../tests/utils/bytes"
import { rejectionOf } from "../../../tests/utils/errors"
import { TaggedValueModel } from "../../tagged/tagged-value-model"
import { tnet } from "../../tagged/tnet-value"
import { readFrame } from "../read-frame"

const model = new TaggedValueModel()

describe("readFrame", () => {
  it("reads one frame", async () => {
    await expect(readFrame(readableOf("5:hello,"), model)).resolves.toStrictEqual(
      tnet.string("hello"),
    )
    await expect(readFrame(readableOf("0:~"), model)).resolves.toStrictEqual(tnet.null())
  })

  it("leaves the next frame in the stream", async () => {
    const stream = readableOf("5:hello,2:42#")

    await expect(readFrame(stream, model)).resolves.toStrictEqual(tnet.string("hello"))
    await expect(readFrame(stream, model)).resolves.toStrictEqual(tnet.integer(42))
    expect(await rejectionOf(readFrame(stream, model))).toMatchObject({
      code: "missing_length_prefix",
    })
  })

  it("reads across chunk boundaries", async () => {
    const stream = readableOf("1", "3:5:hel", "lo,2:42#]")

    await expect(readFrame(stream, model)).resolves.toStrictEqual(
      tnet.list(tnet.string("hello"), tnet.integer(42)),
    )
  })

  it("waits for data that has not arrived yet", async () => {
    const stream = new Readable({ read() {} })
    const pending = readFrame(stream, model)

    stream.push(Buffer.from("5:hel"))
    stream.push(Buffer.from("lo,"))

    await expect(pending).resolves.toStrictEqual(tnet.string("hello"))
  })

  it("reports a stream that ends inside a frame", async () => {
    const err = await rejectionOf(readFrame(readableOf("5:hel"), model))

    expect(err).toBeInstanceOf(FormatError)
    expect(err).toMatchObject({ code: "truncated", context: { expected: 6, received: 3 } })
  })

  it("stops reading as soon as the prefix passes maxLength", async () => {
    const stream = readableOf("9999999999:x")

    expect(await rejectionOf(readFrame(stream, model))).toMatchObject({
      code: "length_prefix_too_large",
    })
    expect(String(stream.read())).toBe(":x")
  })

  it("honours a lower maxLength", async () => {
    expect(
      await rejectionOf(readFrame(readableOf("11:hello world,"), model, { maxLength: 10 })),
    ).toMatchObject({ code: "length_prefix_too_large", context: { maxLength: 10 } })
  })

  it.each([
    ["01:x,", "invalid_length_prefix"],
    ["x", "invalid_length_prefix"],
    ["5x", "missing_length_prefix"],
    ["3:abc]", "invalid_length_prefix"],
    ["1:xX", "invalid_tag"],
  ])("rejects %j with %s", async (input, code) => {
    expect(await rejectionOf(readFrame(readableOf(input), model))).toMatchObject({ code })
  })

  it("applies maxDepth to the payload", async () => {
    expect(
      await rejectionOf(readFrame(readableOf("3:0:]]"), model, { maxDepth: 1 })),
    ).toMatchObject({ code: "depth_exceeded" })
  })

  it("requires a stream of Buffers", async () => {
    const stream = readableOf("0:~")
    stream.setEncoding("latin1")

    expect(await rejectionOf(readFrame(stream, model))).toBeInstanceOf(TypeError)
  })

  it("rejects with the stream's own error", async () => {
    const stream = new Readable({ read() {} })
    const pending = readFrame(stream, model)

    stream.destroy(new Error("socket reset"))

    expect(await rejectionOf(pending)).toMatchObject({ message: "socket reset" })
  })
})
