import { decodeFrame } from "../../core/engine/decode"
import { encodeFrame } from "../../core/engine/encode"
import { NumericLiteralError } from "../../core/errors/errors"
import { ascii, text } from "../../tests/utils/bytes"
import { type Tag, Tags } from "../tag"
import type { ValueModel } from "../value-model"

/** One value of every kind, built the model's own way. */
export type ValueModelSamples<V> = Readonly<Record<Tag, V>>

export function describeValueModelContract<V, L extends V, D extends V>(
  name: string,
  createModel: () => ValueModel<V, L, D>,
  samples: ValueModelSamples<V>,
) {
  describe(`ValueModel contract: ${name}`, () => {
    let model: ValueModel<V, L, D>

    beforeEach(() => {
      model = createModel()
    })

    it("has a name", () => {
      expect(model.name).toBe(name)
    })

    it("classifies every kind of sample", () => {
      for (const tag of Object.values(Tags)) {
        expect(model.classify(samples[tag])).toBe(tag)
      }
    })

    describe("constructors agree with renderers", () => {
      it("strings", () => {
        const value = model.makeString(ascii("hello"))

        expect(model.classify(value)).toBe(Tags.String)
        expect(text(model.renderString(value))).toBe("hello")
      })

      it.each(["0", "42", "-5", "123456789012345678901"])("integer %s", (literal) => {
        const value = model.makeInteger(ascii(literal))

        expect(model.classify(value)).toBe(Tags.Integer)
        expect(model.renderInteger(value)).toBe(literal)
      })

      it("signed integers lose a redundant plus", () => {
        expect(model.renderInteger(model.makeInteger(ascii("+8")))).toBe("8")
      })

      it("floats", () => {
        const value = model.makeFloat(ascii("2.5"))

        expect(model.classify(value)).toBe(Tags.Float)
        expect(model.renderFloat(value)).toBe("2.5")
      })

      it("bools and null", () => {
        expect(model.renderBool(model.makeBool(true))).toBe("true")
        expect(model.renderBool(model.makeBool(false))).toBe("false")
        expect(model.classify(model.makeNull())).toBe(Tags.Null)
      })
    })

    it("keeps list items in append order", () => {
      const list = model.newList()
      model.listAppend(list, model.makeInteger(ascii("1")))
      model.listAppend(list, model.makeInteger(ascii("2")))

      expect(model.classify(list)).toBe(Tags.List)
      expect(Array.from(model.listItems(list), (item) => model.renderInteger(item))).toStrictEqual(
        ["1", "2"],
      )
    })

    it("stores dict entries", () => {
      const dict = model.newDict()
      model.dictPut(dict, model.makeString(ascii("k")), model.makeInteger(ascii("1")))

      const entries = Array.from(model.dictEntries(dict))

      expect(model.classify(dict)).toBe(Tags.Dict)
      expect(entries).toHaveLength(1)
      expect(entries.map(([k, v]) => [text(model.renderString(k)), model.renderInteger(v)])).toStrictEqual(
        [["k", "1"]],
      )
    })

    it("does not keep references to the caller's bytes", () => {
      const payload = ascii("abc")
      const value = model.makeString(payload)
      payload[0] = 0x7a

      expect(text(model.renderString(value))).toBe("abc")
    })

    it("rejects bad numeric payloads", () => {
      expect(() => model.makeInteger(ascii("4x"))).toThrow(NumericLiteralError)
      expect(() => model.makeFloat(ascii("x4"))).toThrow(NumericLiteralError)
    })

    it("re-encodes every decoded sample to the same bytes", () => {
      for (const tag of Object.values(Tags)) {
        const encoded = encodeFrame(model, samples[tag])
        const again = encodeFrame(model, decodeFrame(model, encoded))

        expect(text(again)).toBe(text(encoded))
      }
    })
  })
}
