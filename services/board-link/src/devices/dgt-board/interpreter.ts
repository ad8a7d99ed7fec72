import { BoardState } from './board.js'
import {
  type ClockAck,
  type ClockState,
  clockStatesEqual,
  decodeClockAck,
  decodeClockTime,
  formatClockVersion,
  isClockAck,
} from './clock.js'
import {
  CLOCK_ACK_BUTTON,
  CLOCK_ACK_SENTINEL,
  CLOCK_ACK_VERSION,
  DGT_MSG_BATTERY_STATUS,
  DGT_MSG_BOARD_DUMP,
  DGT_MSG_BWTIME,
  DGT_MSG_FIELD_UPDATE,
  DGT_MSG_LONG_SERIALNR,
  DGT_MSG_SERIALNR,
  DGT_MSG_VERSION,
} from './constants.js'
import { ProtocolDecodeError } from './errors.js'
import type { Frame } from './frame-decoder.js'

/**
 * What a single frame meant. The connection turns these into pending-query
 * completions and subscriber events.
 */
export type InterpreterEffect =
  | { kind: 'board-dump'; board: BoardState; changed: boolean }
  | { kind: 'field-update'; board: BoardState; square: number; piece: number }
  | { kind: 'version'; version: string }
  | { kind: 'serial-number'; value: string }
  | { kind: 'long-serial-number'; value: string }
  | { kind: 'battery-status'; value: string }
  | { kind: 'clock-ack'; ack: ClockAck }
  | { kind: 'clock-button'; ack: ClockAck; button: number }
  | { kind: 'clock-version'; ack: ClockAck; version: string }
  | { kind: 'clock-time'; clock: ClockState; changed: boolean }
  | { kind: 'protocol-error'; error: ProtocolDecodeError }
  | { kind: 'ignored'; id: number }

function chars(payload: Uint8Array, skipZero = false): string {
  let out = ''
  for (const c of payload) {
    if (skipZero && c === 0) continue
    out += String.fromCharCode(c)
  }
  return out
}

function hex(id: number): string {
  return `0x${id.toString(16).padStart(2, '0')}`
}

/**
 * Holds the board and clock model for one connection and maps frames onto
 * it. Change detection lives here: board dumps and clock times only report
 * `changed` when they differ from what was last reported.
 */
export class ProtocolInterpreter {
  private board = new BoardState()
  private lastReportedBoard: BoardState | null = null
  private lastReportedClock: ClockState | null = null

  reset(): void {
    this.board.clear()
    this.lastReportedBoard = null
    this.lastReportedClock = null
  }

  /** Copy of the current board model. */
  getBoard(): BoardState {
    return this.board.copy()
  }

  getClock(): ClockState | null {
    return this.lastReportedClock
  }

  interpret(frame: Frame): InterpreterEffect {
    try {
      return this.dispatch(frame)
    } catch (err) {
      if (err instanceof ProtocolDecodeError) {
        const error =
          err.messageId === null ? new ProtocolDecodeError(err.message, frame.id) : err
        return { kind: 'protocol-error', error }
      }
      throw err
    }
  }

  private dispatch({ id, payload }: Frame): InterpreterEffect {
    switch (id) {
      case DGT_MSG_BOARD_DUMP: {
        this.board = BoardState.fromBytes(payload)
        const changed = !this.board.equals(this.lastReportedBoard)
        if (changed) this.lastReportedBoard = this.board.copy()
        return { kind: 'board-dump', board: this.board.copy(), changed }
      }

      case DGT_MSG_FIELD_UPDATE: {
        if (payload.length < 2) {
          throw new ProtocolDecodeError(`field update must carry 2 bytes, got ${payload.length}`)
        }
        const [square, piece] = payload
        this.board.setPiece(square, piece)
        this.lastReportedBoard = this.board.copy()
        return { kind: 'field-update', board: this.board.copy(), square, piece }
      }

      case DGT_MSG_VERSION: {
        if (payload.length < 2) {
          throw new ProtocolDecodeError(`version must carry 2 bytes, got ${payload.length}`)
        }
        return { kind: 'version', version: `${payload[0]}.${payload[1]}` }
      }

      case DGT_MSG_SERIALNR:
        return { kind: 'serial-number', value: chars(payload) }

      case DGT_MSG_LONG_SERIALNR:
        return { kind: 'long-serial-number', value: chars(payload) }

      case DGT_MSG_BATTERY_STATUS:
        return { kind: 'battery-status', value: chars(payload, true) }

      case DGT_MSG_BWTIME:
        return this.interpretBwtime(payload)

      default:
        return { kind: 'ignored', id }
    }
  }

  private interpretBwtime(payload: Uint8Array): InterpreterEffect {
    if (isClockAck(payload)) {
      const ack = decodeClockAck(payload)
      if (ack.ack0 !== CLOCK_ACK_SENTINEL) {
        throw new ProtocolDecodeError(`clock ack error: ack0=${hex(ack.ack0)}`)
      }

      if (ack.ack1 === CLOCK_ACK_BUTTON) {
        const digit = String.fromCharCode(ack.ack3)
        if (digit < '0' || digit > '9') {
          throw new ProtocolDecodeError(`clock button ack carries a non-digit button id ${hex(ack.ack3)}`)
        }
        return { kind: 'clock-button', ack, button: Number(digit) }
      }

      if (ack.ack1 === CLOCK_ACK_VERSION) {
        return { kind: 'clock-version', ack, version: formatClockVersion(ack.ack2) }
      }

      return { kind: 'clock-ack', ack }
    }

    if (payload.subarray(0, 6).some((b) => b !== 0)) {
      const clock = decodeClockTime(payload)
      const changed = !clockStatesEqual(this.lastReportedClock, clock)
      if (changed) this.lastReportedClock = clock
      return { kind: 'clock-time', clock, changed }
    }

    throw new ProtocolDecodeError('unknown clock message')
  }
}
