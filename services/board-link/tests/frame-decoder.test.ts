import { describe, it, expect } from 'vitest'

import { DGT_MSG_BOARD_DUMP, DGT_MSG_VERSION } from '../src/devices/dgt-board/constants.js'
import { FramingError } from '../src/devices/dgt-board/errors.js'
import {
  type ByteSource,
  FrameDecoder,
  declaredFrameLength,
  encodeFrame,
} from '../src/devices/dgt-board/frame-decoder.js'

function boardDumpFrame(): Buffer {
  const squares = new Uint8Array(64)
  for (let i = 0; i < 64; i++) squares[i] = i % 13
  return encodeFrame(DGT_MSG_BOARD_DUMP, squares)
}

describe('frame length', () => {
  it('joins two 7-bit length bytes', () => {
    expect(declaredFrameLength(0, 67)).toBe(67)
    expect(declaredFrameLength(1, 72)).toBe(200)
  })

  it('writes the total length, header included', () => {
    expect([...encodeFrame(DGT_MSG_VERSION, Uint8Array.from([1, 2]))]).toEqual([0x93, 0x00, 0x05, 1, 2])
    expect([...boardDumpFrame().subarray(0, 3)]).toEqual([0x86, 0x00, 0x43])
  })
})

describe('FrameDecoder', () => {
  it('decodes a frame fed one byte at a time', () => {
    const bytes = boardDumpFrame()
    const decoder = new FrameDecoder()
    const frames = []
    for (const b of bytes) frames.push(...decoder.feed(Uint8Array.of(b)))

    expect(frames).toHaveLength(1)
    expect(frames[0].id).toBe(DGT_MSG_BOARD_DUMP)
    expect(frames[0].payload.equals(bytes.subarray(3))).toBe(true)
    expect(decoder.hasPartialFrame).toBe(false)
  })

  it('decodes the same frame whatever the chunk boundary', () => {
    const bytes = boardDumpFrame()
    for (let cut = 1; cut < bytes.length; cut++) {
      const decoder = new FrameDecoder()
      const first = decoder.feed(bytes.subarray(0, cut))
      expect(first).toHaveLength(0)
      expect(decoder.hasPartialFrame).toBe(true)

      const rest = decoder.feed(bytes.subarray(cut))
      expect(rest).toHaveLength(1)
      expect(rest[0].payload.equals(bytes.subarray(3))).toBe(true)
    }
  })

  it('splits back-to-back frames', () => {
    const a = encodeFrame(DGT_MSG_VERSION, Uint8Array.from([1, 2]))
    const b = encodeFrame(0x91, Buffer.from('12345'))
    const frames = new FrameDecoder().feed(Buffer.concat([a, b]))

    expect(frames.map((f) => f.id)).toEqual([0x93, 0x91])
    expect(frames[1].payload.toString('ascii')).toBe('12345')
  })

  it('emits frames with an empty payload', () => {
    const frames = new FrameDecoder().feed(Uint8Array.from([0xa0, 0x00, 0x03]))
    expect(frames).toHaveLength(1)
    expect(frames[0].payload.length).toBe(0)
  })

  it('never reads past the bytes the current frame still needs', () => {
    const stream = Buffer.concat([
      encodeFrame(DGT_MSG_VERSION, Uint8Array.from([3, 4])),
      encodeFrame(DGT_MSG_VERSION, Uint8Array.from([5, 6])),
    ])
    let offset = 0
    const requests: number[] = []
    const source: ByteSource = {
      read(maxBytes) {
        requests.push(maxBytes)
        const part = stream.subarray(offset, offset + maxBytes)
        offset += part.length
        return Buffer.from(part)
      },
    }

    const decoder = new FrameDecoder()
    const frame = decoder.pump(source)
    expect(frame?.payload.equals(Buffer.from([3, 4]))).toBe(true)
    expect(requests).toEqual([3, 2])
    expect(offset).toBe(5)
  })

  it('waits across pumps that return nothing', () => {
    const decoder = new FrameDecoder()
    const empty: ByteSource = { read: () => Buffer.alloc(0) }
    expect(decoder.pump(empty)).toBeNull()
    expect(decoder.hasPartialFrame).toBe(false)

    expect(decoder.feed(Uint8Array.from([0x93, 0x00]))).toEqual([])
    expect(decoder.pump(empty)).toBeNull()
    expect(decoder.hasPartialFrame).toBe(true)
  })

  it('rejects a declared length shorter than the header and starts over', () => {
    const decoder = new FrameDecoder()
    expect(() => decoder.feed(Uint8Array.from([0x86, 0x00, 0x02]))).toThrow(FramingError)
    expect(decoder.hasPartialFrame).toBe(false)

    const frames = decoder.feed(encodeFrame(DGT_MSG_VERSION, Uint8Array.from([1, 0])))
    expect(frames).toHaveLength(1)
  })
})
