import {
  CLOCK_ACK_NIBBLE,
  CLOCK_BEEP_INTERVAL_MS,
  CLOCK_BEEP_MAX_SECONDS,
  DGT_CLOCK_ASCII,
  DGT_CLOCK_BEEP,
  DGT_CLOCK_DISPLAY,
  DGT_CLOCK_END_MESSAGE,
  DGT_CLOCK_MESSAGE,
  DGT_CLOCK_SEND_VERSION,
  DGT_CLOCK_START_MESSAGE,
} from './constants.js'
import { ConfigurationError, ProtocolDecodeError } from './errors.js'

/** Remaining time on both sides of the clock plus the lever position. */
export interface ClockState {
  readonly leftSeconds: number
  readonly rightSeconds: number
  readonly leftLeverDown: boolean
}

export interface ClockAck {
  ack0: number
  ack1: number
  ack2: number
  ack3: number
}

export function clockStatesEqual(a: ClockState | null, b: ClockState | null): boolean {
  if (a === null || b === null) return a === b
  return (
    a.leftSeconds === b.leftSeconds &&
    a.rightSeconds === b.rightSeconds &&
    a.leftLeverDown === b.leftLeverDown
  )
}

function bcd(byte: number): number {
  return (byte >> 4) * 10 + (byte & 0x0f)
}

export const BWTIME_PAYLOAD_LENGTH = 7

function assertBwtimeLength(payload: Uint8Array): void {
  if (payload.length < BWTIME_PAYLOAD_LENGTH) {
    throw new ProtocolDecodeError(
      `clock message must carry ${BWTIME_PAYLOAD_LENGTH} bytes, got ${payload.length}`
    )
  }
}

export function isClockAck(payload: Uint8Array): boolean {
  assertBwtimeLength(payload)
  return (payload[0] & 0x0f) === CLOCK_ACK_NIBBLE || payload[3] === CLOCK_ACK_NIBBLE
}

/**
 * Rebuild the four ack bytes. The device strips bit 7 from each ack byte and
 * carries it in byte 3 (acks 0 and 1) or byte 0 (acks 2 and 3).
 */
export function decodeClockAck(payload: Uint8Array): ClockAck {
  assertBwtimeLength(payload)
  return {
    ack0: (payload[1] & 0x7f) | ((payload[3] << 3) & 0x80),
    ack1: (payload[2] & 0x7f) | ((payload[3] << 2) & 0x80),
    ack2: (payload[4] & 0x7f) | ((payload[0] << 3) & 0x80),
    ack3: (payload[5] & 0x7f) | ((payload[0] << 2) & 0x80),
  }
}

export function decodeClockTime(payload: Uint8Array): ClockState {
  assertBwtimeLength(payload)

  const rightHours = payload[0] & 0x0f
  const rightMinutes = bcd(payload[1])
  const rightSeconds = bcd(payload[2])

  const leftHours = payload[3] & 0x0f
  const leftMinutes = bcd(payload[4])
  const leftSeconds = bcd(payload[5])

  return {
    leftSeconds: leftHours * 3600 + leftMinutes * 60 + leftSeconds,
    rightSeconds: rightHours * 3600 + rightMinutes * 60 + rightSeconds,
    leftLeverDown: (payload[6] & 0x10) !== 0,
  }
}

export function formatClockVersion(ack2: number): string {
  return `${ack2 >> 4}.${ack2 & 0x0f}`
}

/* -------------------------------------------------------------------------- */
/*  Outbound clock commands                                                    */
/* -------------------------------------------------------------------------- */

function clockFrame(subcommand: number, args: number[]): Buffer {
  return Buffer.from([
    DGT_CLOCK_MESSAGE,
    args.length + 3,
    DGT_CLOCK_START_MESSAGE,
    subcommand,
    ...args,
    DGT_CLOCK_END_MESSAGE,
  ])
}

export function encodeClockVersionRequest(): Buffer {
  return clockFrame(DGT_CLOCK_SEND_VERSION, [])
}

/** Number of 64 ms beep intervals for a duration in seconds (clamped to 10 s). */
export function beepIntervals(seconds: number): number {
  const s = Number.isFinite(seconds) ? Math.min(seconds, CLOCK_BEEP_MAX_SECONDS) : 0
  return Math.max(Math.round((s * 1000) / CLOCK_BEEP_INTERVAL_MS), 1)
}

export function encodeClockBeep(intervals: number): Buffer {
  return clockFrame(DGT_CLOCK_BEEP, [intervals & 0xff])
}

export interface CenteredText {
  bytes: Buffer
  truncated: boolean
}

/** Pad `text` on both sides to `width` (extra space on the left) and encode as ASCII. */
export function centerText(text: string, width: number): CenteredText {
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) > 0x7f) {
      throw new ConfigurationError(`clock text must be ASCII: ${JSON.stringify(text)}`)
    }
  }

  const leftAligned = text.padEnd(Math.floor((text.length + width) / 2))
  const padded = leftAligned.padStart(width)
  const bytes = Buffer.from(padded, 'ascii')

  if (bytes.length > width) {
    return { bytes: bytes.subarray(0, width), truncated: true }
  }
  return { bytes, truncated: false }
}

/** 8-character ASCII frame for clocks with 2.x firmware (DGT 3000). */
export function encodeClockAscii(text: string): { frame: Buffer; truncated: boolean } {
  const t = centerText(text, 8)
  return {
    frame: clockFrame(DGT_CLOCK_ASCII, [...t.bytes, 0x01]),
    truncated: t.truncated,
  }
}

/**
 * 6-character frame for older clocks (DGT XL). Characters go out in groups of
 * three, reversed, to match the segment display wiring.
 */
export function encodeClockDisplay(text: string): { frame: Buffer; truncated: boolean } {
  const { bytes: t, truncated } = centerText(text, 6)
  return {
    frame: clockFrame(DGT_CLOCK_DISPLAY, [t[2], t[1], t[0], t[5], t[4], t[3], 0x00, 0x01]),
    truncated,
  }
}
