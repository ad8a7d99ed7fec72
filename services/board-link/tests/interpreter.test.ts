import { describe, it, expect } from 'vitest'

import {
  DGT_MSG_BATTERY_STATUS,
  DGT_MSG_BOARD_DUMP,
  DGT_MSG_BWTIME,
  DGT_MSG_FIELD_UPDATE,
  DGT_MSG_LONG_SERIALNR,
  DGT_MSG_SERIALNR,
  DGT_MSG_VERSION,
} from '../src/devices/dgt-board/constants.js'
import type { Frame } from '../src/devices/dgt-board/frame-decoder.js'
import { type InterpreterEffect, ProtocolInterpreter } from '../src/devices/dgt-board/interpreter.js'

function frame(id: number, payload: number[]): Frame {
  return { id, payload: Buffer.from(payload) }
}

function dump(pieces: Record<number, number> = {}): Frame {
  const squares = new Array<number>(64).fill(0)
  for (const [square, piece] of Object.entries(pieces)) squares[Number(square)] = piece
  return frame(DGT_MSG_BOARD_DUMP, squares)
}

function isKind<K extends InterpreterEffect['kind']>(
  effect: InterpreterEffect,
  kind: K
): effect is Extract<InterpreterEffect, { kind: K }> {
  return effect.kind === kind
}

function expectKind<K extends InterpreterEffect['kind']>(
  effect: InterpreterEffect,
  kind: K
): Extract<InterpreterEffect, { kind: K }> {
  const actual = effect.kind
  if (!isKind(effect, kind)) throw new Error(`expected ${kind}, got ${actual}`)
  return effect
}

describe('ProtocolInterpreter board messages', () => {
  it('reports a board dump only when it differs from the last one reported', () => {
    const interp = new ProtocolInterpreter()

    const first = expectKind(interp.interpret(dump({ 4: 0x0b, 60: 0x05 })), 'board-dump')
    expect(first.changed).toBe(true)
    expect(first.board.fen()).toBe('4k3/8/8/8/8/8/8/4K3')

    expect(expectKind(interp.interpret(dump({ 4: 0x0b, 60: 0x05 })), 'board-dump').changed).toBe(false)
    expect(expectKind(interp.interpret(dump({ 4: 0x0b })), 'board-dump').changed).toBe(true)
  })

  it('applies field updates and reports every one of them', () => {
    const interp = new ProtocolInterpreter()
    interp.interpret(dump())

    const a = expectKind(interp.interpret(frame(DGT_MSG_FIELD_UPDATE, [36, 0x01])), 'field-update')
    const b = expectKind(interp.interpret(frame(DGT_MSG_FIELD_UPDATE, [36, 0x01])), 'field-update')
    expect(a.square).toBe(36)
    expect(a.piece).toBe(0x01)
    expect(b.board.fen()).toBe('8/8/8/8/4P3/8/8/8')
    expect(interp.getBoard().fen()).toBe('8/8/8/8/4P3/8/8/8')
  })

  it('hands out copies of the board', () => {
    const interp = new ProtocolInterpreter()
    const effect = expectKind(interp.interpret(dump({ 0: 0x08 })), 'board-dump')
    effect.board.setPiece(0, 0)
    expect(interp.getBoard().pieceAt(0)).toBe(0x08)
  })

  it('drops a dump with an unknown piece code and keeps the old board', () => {
    const interp = new ProtocolInterpreter()
    interp.interpret(dump({ 0: 0x08 }))

    const err = expectKind(interp.interpret(dump({ 5: 0x0f })), 'protocol-error')
    expect(err.error.messageId).toBe(DGT_MSG_BOARD_DUMP)
    expect(err.error.message).toBe('unknown piece code 0x0f on square 5')
    expect(interp.getBoard().fen()).toBe('r7/8/8/8/8/8/8/8')
  })

  it('decodes version, serial numbers and battery status', () => {
    const interp = new ProtocolInterpreter()
    expect(interp.interpret(frame(DGT_MSG_VERSION, [3, 7]))).toEqual({ kind: 'version', version: '3.7' })
    expect(interp.interpret(frame(DGT_MSG_SERIALNR, [...Buffer.from('00417')]))).toEqual({
      kind: 'serial-number',
      value: '00417',
    })
    expect(interp.interpret(frame(DGT_MSG_LONG_SERIALNR, [...Buffer.from('1.2 00417')]))).toEqual({
      kind: 'long-serial-number',
      value: '1.2 00417',
    })
    expect(interp.interpret(frame(DGT_MSG_BATTERY_STATUS, [0x4f, 0x00, 0x4b, 0x00]))).toEqual({
      kind: 'battery-status',
      value: 'OK',
    })
  })

  it('ignores messages it does not know', () => {
    expect(new ProtocolInterpreter().interpret(frame(0xa3, [1]))).toEqual({ kind: 'ignored', id: 0xa3 })
  })
})

describe('ProtocolInterpreter clock messages', () => {
  it('turns a button ack into a button press', () => {
    const effect = expectKind(
      new ProtocolInterpreter().interpret(frame(DGT_MSG_BWTIME, [0x0a, 0x10, 0x08, 0x2a, 0x00, 0x31, 0x00])),
      'clock-button'
    )
    expect(effect.button).toBe(1)
  })

  it('reads the clock firmware version from a version ack', () => {
    const effect = expectKind(
      new ProtocolInterpreter().interpret(frame(DGT_MSG_BWTIME, [0x0a, 0x10, 0x09, 0x00, 0x21, 0x00, 0x00])),
      'clock-version'
    )
    expect(effect.version).toBe('2.1')
  })

  it('treats any other ack as a plain acknowledgement', () => {
    const effect = expectKind(
      new ProtocolInterpreter().interpret(frame(DGT_MSG_BWTIME, [0x0a, 0x10, 0x0b, 0x00, 0x00, 0x00, 0x00])),
      'clock-ack'
    )
    expect(effect.ack.ack1).toBe(0x0b)
  })

  it('reports an ack with a bad sentinel without failing', () => {
    const effect = expectKind(
      new ProtocolInterpreter().interpret(frame(DGT_MSG_BWTIME, [0x0a, 0x11, 0x0b, 0x00, 0x00, 0x00, 0x00])),
      'protocol-error'
    )
    expect(effect.error.message).toBe('clock ack error: ack0=0x11')
  })

  it('reports a clock time only when it changes', () => {
    const interp = new ProtocolInterpreter()
    const running = [0x01, 0x23, 0x45, 0x00, 0x05, 0x30, 0x10]

    const first = expectKind(interp.interpret(frame(DGT_MSG_BWTIME, running)), 'clock-time')
    expect(first.changed).toBe(true)
    expect(first.clock).toEqual({ rightSeconds: 5025, leftSeconds: 330, leftLeverDown: true })

    expect(expectKind(interp.interpret(frame(DGT_MSG_BWTIME, running)), 'clock-time').changed).toBe(false)
    expect(interp.getClock()).toEqual({ rightSeconds: 5025, leftSeconds: 330, leftLeverDown: true })

    const next = [0x01, 0x23, 0x44, 0x00, 0x05, 0x30, 0x10]
    expect(expectKind(interp.interpret(frame(DGT_MSG_BWTIME, next)), 'clock-time').changed).toBe(true)
  })

  it('reports an all-zero clock message as unknown', () => {
    const effect = expectKind(
      new ProtocolInterpreter().interpret(frame(DGT_MSG_BWTIME, [0, 0, 0, 0, 0, 0, 0])),
      'protocol-error'
    )
    expect(effect.error.message).toBe('unknown clock message')
    expect(effect.error.messageId).toBe(DGT_MSG_BWTIME)
  })

  it('forgets what it reported after a reset', () => {
    const interp = new ProtocolInterpreter()
    interp.interpret(dump({ 0: 0x08 }))
    interp.reset()

    expect(interp.getBoard().isEmpty()).toBe(true)
    expect(interp.getClock()).toBeNull()
    expect(expectKind(interp.interpret(dump({ 0: 0x08 })), 'board-dump').changed).toBe(true)
  })
})
