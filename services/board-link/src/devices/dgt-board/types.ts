/* -------------------------------------------------------------------------- */
/*  DgtBoardService                                                           */
/*                                                                            */
/*  Responsibilities:                                                         */
/*  - Own the serial link to a DGT e-board (and the clock behind it)          */
/*  - Connect / reconnect with backoff over an ordered list of candidates     */
/*  - Pair queries with their response frames                                 */
/*  - Emit board, clock and lifecycle events for logging + state adapters     */
/*                                                                            */
/*  Non-responsibilities:                                                     */
/*  - No chess rules, no move detection                                       */
/*  - No HTTP handling                                                        */
/* -------------------------------------------------------------------------- */

import type { BoardState } from './board.js'
import type { ClockState } from './clock.js'
import type { DriverKind } from './drivers/types.js'
import type { CandidateFailure } from './errors.js'

export type DgtBoardPhase = 'disconnected' | 'connecting' | 'connected' | 'closed'

export type DgtErrorScope =
  | 'transport'
  | 'protocol'
  | 'connect'
  | 'config'
  | 'connection'
  | 'unknown'

export interface DgtBoardError {
  at: number
  scope: DgtErrorScope
  message: string
  retryable?: boolean
}

export type DgtDisconnectReason = 'io-error' | 'explicit-close'

/** Values the board and clock report on request. */
export type DgtInfoField =
  | 'version'
  | 'serialNumber'
  | 'longSerialNumber'
  | 'batteryStatus'
  | 'clockVersion'

/* -------------------------------------------------------------------------- */
/*  Environment-driven config                                                 */
/* -------------------------------------------------------------------------- */

export type DgtDriverPreference = 'auto' | DriverKind

export interface DgtBoardReconnectConfig {
  baseDelayMs: number
  maxDelayMs: number
}

export interface DgtBoardConfig {
  /** Device paths or glob patterns, tried in order. */
  ports: string[]
  baudRate: number
  /** Request OS-level exclusive access when opening the port. */
  lockPort: boolean
  driver: DgtDriverPreference
  reconnect: DgtBoardReconnectConfig
  /** Start the reconnect supervisor when the host starts. */
  autoConnect: boolean
  /** Caller-side bound for HTTP queries; the service itself never times out. */
  queryTimeoutMs: number
  state: {
    maxErrorHistory: number
  }
}

/* -------------------------------------------------------------------------- */
/*  Service -> plugin observability events                                    */
/* -------------------------------------------------------------------------- */

export interface DgtBoardEventSink {
  publish(evt: DgtBoardEvent): void
}

export type DgtBoardListener = (evt: DgtBoardEvent) => void

export type DgtBoardEvent =
  | {
      kind: 'board-connecting'
      at: number
      candidates: string[]
    }
  | {
      kind: 'board-connected'
      at: number
      path: string
      driver: DriverKind
      exclusive: boolean
    }
  | {
      kind: 'board-disconnected'
      at: number
      path: string
      reason: DgtDisconnectReason
      error?: DgtBoardError
    }
  | {
      kind: 'board-connect-failed'
      at: number
      error: DgtBoardError
      failures: CandidateFailure[]
    }
  | {
      kind: 'board-reconnect-scheduled'
      at: number
      attempt: number
      delayMs: number
    }
  | {
      kind: 'board-closed'
      at: number
    }
  | {
      kind: 'board-changed'
      at: number
      board: BoardState
      source: 'dump' | 'field-update'
    }
  | {
      kind: 'clock-changed'
      at: number
      clock: ClockState
    }
  | {
      kind: 'clock-button-pressed'
      at: number
      button: number
    }
  | {
      kind: 'board-info'
      at: number
      field: DgtInfoField
      value: string
    }
  | {
      kind: 'clock-text-truncated'
      at: number
      text: string
      width: number
    }
  | {
      kind: 'port-lock-failed'
      at: number
      path: string
      error: DgtBoardError
    }
  | {
      kind: 'frame-ignored'
      at: number
      id: number
    }
  | {
      kind: 'protocol-error'
      at: number
      messageId: number | null
      error: DgtBoardError
    }
  | {
      kind: 'recoverable-error'
      at: number
      error: DgtBoardError
    }

/* -------------------------------------------------------------------------- */
/*  State slice (adapter output, served over HTTP)                            */
/* -------------------------------------------------------------------------- */

export interface DgtBoardStateSlice {
  phase: DgtBoardPhase
  path: string | null
  driver: DriverKind | null
  exclusive: boolean

  fen: string | null
  clock: ClockState | null
  lastButton: { button: number; at: number } | null

  version: string | null
  serialNumber: string | null
  longSerialNumber: string | null
  batteryStatus: string | null
  clockVersion: string | null

  reconnectAttempt: number
  nextReconnectDelayMs: number | null

  lastError: DgtBoardError | null
  errorHistory: DgtBoardError[]

  updatedAt: number
}
