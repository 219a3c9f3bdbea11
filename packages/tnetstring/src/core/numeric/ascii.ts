/** Read a byte span as latin1 text without copying the bytes first. */
export function asciiText(payload: Uint8Array): string {
  return Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength).toString("latin1")
}

export const CHAR_0 = 0x30
export const CHAR_9 = 0x39
export const CHAR_PLUS = 0x2b
export const CHAR_MINUS = 0x2d
export const CHAR_DOT = 0x2e
export const CHAR_LOWER_E = 0x65
export const CHAR_UPPER_E = 0x45
export const CHAR_COLON = 0x3a

export function isDigit(byte: number): boolean {
  return byte >= CHAR_0 && byte <= CHAR_9
}
