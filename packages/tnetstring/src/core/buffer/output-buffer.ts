import { BufferAllocationError } from "../errors/errors"

export const DEFAULT_INITIAL_CAPACITY = 64

export type OutputBufferOptions = {
  /** Starting capacity in bytes. Default: 64 */
  initialCapacity?: number
  /** Hard ceiling on the rendered size. Default: the largest allocatable Uint8Array. */
  maxBytes?: number
}

/**
 * Growable byte buffer that is written from back to front.
 *
 * A frame's length prefix is only known once its payload has been rendered,
 * so the encoder writes the tag byte first, then the payload (last item
 * first), then `:` and the length digits. Prepending keeps every write
 * O(length) and the finished bytes already in wire order.
 *
 * Layout: `bytes[head..capacity)` holds the data written so far.
 */
export class OutputBuffer {
  private bytes: Uint8Array
  private head: number
  private finalized = false
  private readonly maxBytes: number

  constructor(options: OutputBufferOptions = {}) {
    const initial = Math.max(1, options.initialCapacity ?? DEFAULT_INITIAL_CAPACITY)

    this.maxBytes = options.maxBytes ?? Number.MAX_SAFE_INTEGER
    this.bytes = allocate(initial)
    this.head = initial
  }

  /** Number of bytes written so far. */
  get size(): number {
    return this.bytes.length - this.head
  }

  get capacity(): number {
    return this.bytes.length
  }

  prependByte(byte: number): void {
    this.reserve(1)
    this.head -= 1
    this.bytes[this.head] = byte
  }

  prependBytes(data: Uint8Array): void {
    if (data.length === 0) return

    this.reserve(data.length)
    this.head -= data.length
    this.bytes.set(data, this.head)
  }

  /** Prepend a string made only of ASCII characters (digits, literals, tags). */
  prependAscii(text: string): void {
    if (text.length === 0) return

    this.reserve(text.length)
    this.head -= text.length
    for (let i = 0; i < text.length; i++) {
      this.bytes[this.head + i] = text.charCodeAt(i)
    }
  }

  /**
   * Return an owned copy of the written bytes. The buffer cannot be used
   * afterwards.
   */
  finalize(): Uint8Array {
    this.assertWritable()
    this.finalized = true

    const out = this.bytes.slice(this.head)
    this.bytes = new Uint8Array(0)
    this.head = 0

    return out
  }

  private reserve(extra: number): void {
    this.assertWritable()

    const used = this.size
    const needed = used + extra

    if (needed > this.maxBytes) {
      throw new BufferAllocationError(
        "buffer_limit_exceeded",
        `Rendered output would exceed ${this.maxBytes} bytes`,
        { context: { size: used, requested: extra, maxBytes: this.maxBytes } },
      )
    }

    if (this.head >= extra) return

    let next = this.bytes.length * 2
    while (next < needed) next *= 2
    next = Math.min(next, this.maxBytes)

    const grown = allocate(next)
    grown.set(this.bytes.subarray(this.head), next - used)

    this.bytes = grown
    this.head = next - used
  }

  private assertWritable(): void {
    if (this.finalized) {
      throw new Error("Output buffer already finalized")
    }
  }
}

function allocate(size: number): Uint8Array {
  try {
    return new Uint8Array(size)
  } catch (err) {
    throw new BufferAllocationError("allocation_failed", `Could not allocate ${size} bytes`, {
      cause: err,
      context: { size },
      isOperational: false,
    })
  }
}
