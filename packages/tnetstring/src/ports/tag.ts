/**
 * Type tag bytes that terminate every tnetstring frame.
 */
export const Tags = {
  String: ",",
  Integer: "#",
  Float: "^",
  Bool: "!",
  Null: "~",
  Dict: "}",
  List: "]",
} as const

export type TagName = keyof typeof Tags

export type Tag = (typeof Tags)[TagName]

const TAG_CODES: ReadonlyMap<number, Tag> = new Map(
  Object.values(Tags).map((tag) => [tag.charCodeAt(0), tag] as const),
)

/** Look up the tag for a raw byte, or `undefined` if the byte is not a tag. */
export function tagFromByte(byte: number): Tag | undefined {
  return TAG_CODES.get(byte)
}

export function isTag(value: unknown): value is Tag {
  return typeof value === "string" && value.length === 1 && TAG_CODES.has(value.charCodeAt(0))
}
