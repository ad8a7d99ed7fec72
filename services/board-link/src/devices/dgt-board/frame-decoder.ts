import { FRAME_HEADER_LENGTH } from './constants.js'
import { FramingError } from './errors.js'

export interface Frame {
  id: number
  payload: Buffer
}

/** Anything that hands out at most `maxBytes` of what it currently holds. */
export interface ByteSource {
  read(maxBytes: number): Buffer
}

/** Declared total frame length from the two 7-bit length bytes. */
export function declaredFrameLength(lenHi: number, lenLo: number): number {
  return (lenHi << 7) | lenLo
}

export function encodeFrame(id: number, payload: Uint8Array): Buffer {
  const total = payload.length + FRAME_HEADER_LENGTH
  return Buffer.concat([Buffer.from([id, (total >> 7) & 0x7f, total & 0x7f]), payload])
}

/**
 * Rebuilds `[id][len_hi][len_lo][payload]` frames from a byte stream that
 * arrives in arbitrary pieces.
 *
 * Each `pump()` reads only what the current frame still needs (never past
 * the header into the payload, never past the payload into the next frame),
 * so state carries across any number of partial reads.
 */
export class FrameDecoder {
  private header: number[] = []
  private payloadParts: Buffer[] = []
  private payloadLength = 0
  private payloadReceived = 0

  get hasPartialFrame(): boolean {
    return this.header.length > 0
  }

  reset(): void {
    this.header = []
    this.payloadParts = []
    this.payloadLength = 0
    this.payloadReceived = 0
  }

  /**
   * One readiness step: top up the header, then the payload. Returns the
   * frame once its last byte has arrived, otherwise null.
   */
  pump(source: ByteSource): Frame | null {
    if (this.header.length < FRAME_HEADER_LENGTH) {
      const part = source.read(FRAME_HEADER_LENGTH - this.header.length)
      for (const b of part) this.header.push(b)
      if (this.header.length < FRAME_HEADER_LENGTH) return null

      const declared = declaredFrameLength(this.header[1], this.header[2])
      if (declared < FRAME_HEADER_LENGTH) {
        const id = this.header[0]
        this.reset()
        throw new FramingError(
          `frame 0x${id.toString(16)} declares length ${declared}, below the ${FRAME_HEADER_LENGTH}-byte header`
        )
      }
      this.payloadLength = declared - FRAME_HEADER_LENGTH
    }

    const missing = this.payloadLength - this.payloadReceived
    if (missing > 0) {
      const part = source.read(missing)
      if (part.length > 0) {
        this.payloadParts.push(part)
        this.payloadReceived += part.length
      }
      if (this.payloadReceived < this.payloadLength) return null
    }

    const frame: Frame = {
      id: this.header[0],
      payload: Buffer.concat(this.payloadParts, this.payloadLength),
    }
    this.reset()
    return frame
  }

  /** Push a chunk through the decoder and collect every frame it completes. */
  feed(chunk: Uint8Array): Frame[] {
    let offset = 0
    const source: ByteSource = {
      read: (maxBytes: number) => {
        const end = Math.min(chunk.length, offset + maxBytes)
        const part = Buffer.from(chunk.subarray(offset, end))
        offset = end
        return part
      },
    }

    const frames: Frame[] = []
    while (offset < chunk.length) {
      const frame = this.pump(source)
      if (frame) frames.push(frame)
    }
    return frames
  }
}
