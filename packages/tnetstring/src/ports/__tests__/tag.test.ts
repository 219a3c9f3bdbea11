import { isTag, tagFromByte, Tags } from "../tag"

describe("Tags", () => {
  it("maps every tag byte back to its tag", () => {
    for (const tag of Object.values(Tags)) {
      expect(tagFromByte(tag.charCodeAt(0))).toBe(tag)
    }
  })

  it("returns undefined for bytes that are not tags", () => {
    expect(tagFromByte("a".charCodeAt(0))).toBeUndefined()
    expect(tagFromByte(":".charCodeAt(0))).toBeUndefined()
    expect(tagFromByte(0)).toBeUndefined()
  })

  it("isTag accepts single tag characters only", () => {
    expect(isTag("}")).toBe(true)
    expect(isTag("^")).toBe(true)
    expect(isTag("}}")).toBe(false)
    expect(isTag("x")).toBe(false)
    expect(isTag(44)).toBe(false)
  })
})
