import { BOARD_SQUARES, CHAR_TO_PIECE, PIECE_TO_CHAR } from './constants.js'
import { ConfigurationError, ProtocolDecodeError } from './errors.js'

export const EMPTY_BOARD_FEN = '8/8/8/8/8/8/8/8'

export function isPieceCode(code: number): boolean {
  return Object.prototype.hasOwnProperty.call(PIECE_TO_CHAR, code)
}

function isEmptyDigit(c: string): boolean {
  return c >= '1' && c <= '8'
}

/**
 * Piece layout of the 64 board squares.
 *
 * Index 0 is a8 (far rank, left), index 63 is h1. Each square holds 0 for an
 * empty square or one of the 12 DGT piece codes; nothing else is accepted.
 */
export class BoardState {
  private squares: Uint8Array

  constructor(fen?: string) {
    this.squares = new Uint8Array(BOARD_SQUARES)
    if (fen !== undefined) this.setFen(fen)
  }

  /** Decode a raw board dump. Unknown piece codes are a decode error. */
  static fromBytes(bytes: Uint8Array): BoardState {
    if (bytes.length !== BOARD_SQUARES) {
      throw new ProtocolDecodeError(
        `board dump must carry ${BOARD_SQUARES} squares, got ${bytes.length}`
      )
    }
    for (let i = 0; i < bytes.length; i++) {
      const code = bytes[i]
      if (code !== 0 && !isPieceCode(code)) {
        throw new ProtocolDecodeError(
          `unknown piece code 0x${code.toString(16).padStart(2, '0')} on square ${i}`
        )
      }
    }
    const board = new BoardState()
    board.squares = Uint8Array.from(bytes)
    return board
  }

  static fromFen(fen: string): BoardState {
    return new BoardState(fen)
  }

  pieceAt(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= BOARD_SQUARES) {
      throw new ConfigurationError(`square index out of range: ${index}`)
    }
    return this.squares[index]
  }

  /** Replace a single square, as a field update does. */
  setPiece(index: number, code: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= BOARD_SQUARES) {
      throw new ProtocolDecodeError(`field update for square ${index} is out of range`)
    }
    if (code !== 0 && !isPieceCode(code)) {
      throw new ProtocolDecodeError(
        `unknown piece code 0x${code.toString(16).padStart(2, '0')} on square ${index}`
      )
    }
    this.squares[index] = code
  }

  fen(): string {
    const out: string[] = []
    let empty = 0

    for (let index = 0; index < BOARD_SQUARES; index++) {
      const code = this.squares[index]
      if (code === 0) empty += 1

      const endOfRank = (index + 1) % 8 === 0
      if (empty > 0 && (code !== 0 || endOfRank)) {
        out.push(String(empty))
        empty = 0
      }

      if (code !== 0) out.push(PIECE_TO_CHAR[code])
      if (endOfRank && index < BOARD_SQUARES - 1) out.push('/')
    }

    return out.join('')
  }

  /**
   * Replace the layout with the position described by `fen` (piece placement
   * field only). Validation runs before any square is touched, so a rejected
   * notation leaves the board unchanged.
   */
  setFen(fen: string): void {
    const rows = fen.split('/')
    if (rows.length !== 8) {
      throw new ConfigurationError(`expected 8 rows in the fen, got ${rows.length}: ${JSON.stringify(fen)}`)
    }

    const next = new Uint8Array(BOARD_SQUARES)
    let square = 0

    rows.forEach((row, rowIndex) => {
      let columns = 0
      let previousWasDigit = false

      for (const c of row) {
        if (isEmptyDigit(c)) {
          if (previousWasDigit) {
            throw new ConfigurationError(
              `two subsequent digits in row ${rowIndex + 1} of the fen: ${JSON.stringify(fen)}`
            )
          }
          const run = Number(c)
          columns += run
          square += run
          previousWasDigit = true
          continue
        }

        const code = CHAR_TO_PIECE[c]
        if (code === undefined) {
          throw new ConfigurationError(
            `invalid character ${JSON.stringify(c)} in row ${rowIndex + 1} of the fen: ${JSON.stringify(fen)}`
          )
        }
        next[square] = code
        columns += 1
        square += 1
        previousWasDigit = false
      }

      if (columns !== 8) {
        throw new ConfigurationError(
          `expected 8 columns in row ${rowIndex + 1} of the fen, got ${columns}: ${JSON.stringify(fen)}`
        )
      }
    })

    this.squares = next
  }

  clear(): void {
    this.squares = new Uint8Array(BOARD_SQUARES)
  }

  isEmpty(): boolean {
    return this.squares.every((c) => c === 0)
  }

  copy(): BoardState {
    return BoardState.fromBytes(this.squares)
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.squares)
  }

  equals(other: BoardState | null | undefined): boolean {
    if (!other) return false
    for (let i = 0; i < BOARD_SQUARES; i++) {
      if (this.squares[i] !== other.squares[i]) return false
    }
    return true
  }

  /** 8x8 diagram, far rank first, `.` for empty squares. */
  toString(): string {
    const ranks: string[] = []
    for (let rank = 0; rank < 8; rank++) {
      const cells: string[] = []
      for (let file = 0; file < 8; file++) {
        const code = this.squares[rank * 8 + file]
        cells.push(code === 0 ? '.' : PIECE_TO_CHAR[code])
      }
      ranks.push(cells.join(' '))
    }
    return ranks.join('\n')
  }
}
