import type {
  DgtBoardError,
  DgtBoardEvent,
  DgtBoardStateSlice,
} from '../devices/dgt-board/types.js'

/**
 * Folds board events into the state slice served at /api/board/state.
 */
export class DgtBoardStateAdapter {
  private state: DgtBoardStateSlice
  private readonly maxErrorHistory: number

  constructor(opts: { maxErrorHistory?: number } = {}) {
    this.maxErrorHistory = opts.maxErrorHistory ?? 25
    this.state = this.initialState()
  }

  public handle(evt: DgtBoardEvent): void {
    switch (evt.kind) {
      /* ---------------- Connection lifecycle ---------------------------- */
      case 'board-connecting': {
        this.state.phase = 'connecting'
        this.touch(evt.at)
        break
      }

      case 'board-connected': {
        this.state.phase = 'connected'
        this.state.path = evt.path
        this.state.driver = evt.driver
        this.state.exclusive = evt.exclusive
        this.state.reconnectAttempt = 0
        this.state.nextReconnectDelayMs = null
        this.touch(evt.at)
        break
      }

      case 'board-disconnected': {
        this.state.phase = evt.reason === 'explicit-close' ? 'closed' : 'disconnected'
        this.state.path = null
        this.state.exclusive = false
        // nothing cached survives the link: a different board or clock may be plugged in next
        this.state.fen = null
        this.state.clock = null
        this.state.version = null
        this.state.serialNumber = null
        this.state.longSerialNumber = null
        this.state.batteryStatus = null
        this.state.clockVersion = null
        this.pushError(evt.error)
        this.touch(evt.at)
        break
      }

      case 'board-connect-failed': {
        this.state.phase = 'disconnected'
        this.pushError(evt.error)
        this.touch(evt.at)
        break
      }

      case 'board-reconnect-scheduled': {
        this.state.reconnectAttempt = evt.attempt
        this.state.nextReconnectDelayMs = evt.delayMs
        this.touch(evt.at)
        break
      }

      case 'board-closed': {
        this.state.phase = 'closed'
        this.state.nextReconnectDelayMs = null
        this.touch(evt.at)
        break
      }

      /* ---------------- Board + clock ----------------------------------- */
      case 'board-changed': {
        this.state.fen = evt.board.fen()
        this.touch(evt.at)
        break
      }

      case 'clock-changed': {
        this.state.clock = { ...evt.clock }
        this.touch(evt.at)
        break
      }

      case 'clock-button-pressed': {
        this.state.lastButton = { button: evt.button, at: evt.at }
        this.touch(evt.at)
        break
      }

      case 'board-info': {
        this.state[evt.field] = evt.value
        this.touch(evt.at)
        break
      }

      /* ---------------- Errors ------------------------------------------ */
      case 'port-lock-failed':
      case 'protocol-error':
      case 'recoverable-error': {
        this.pushError(evt.error)
        this.touch(evt.at)
        break
      }

      // logs only
      case 'clock-text-truncated':
      case 'frame-ignored': {
        break
      }
    }
  }

  public getState(): DgtBoardStateSlice {
    return {
      ...this.state,
      clock: this.state.clock ? { ...this.state.clock } : null,
      lastButton: this.state.lastButton ? { ...this.state.lastButton } : null,
      errorHistory: [...this.state.errorHistory],
    }
  }

  /* ---------------------------------------------------------------------- */
  /*  Internal helpers                                                      */
  /* ---------------------------------------------------------------------- */

  private initialState(): DgtBoardStateSlice {
    return {
      phase: 'disconnected',
      path: null,
      driver: null,
      exclusive: false,

      fen: null,
      clock: null,
      lastButton: null,

      version: null,
      serialNumber: null,
      longSerialNumber: null,
      batteryStatus: null,
      clockVersion: null,

      reconnectAttempt: 0,
      nextReconnectDelayMs: null,

      lastError: null,
      errorHistory: [],

      updatedAt: Date.now(),
    }
  }

  private touch(at: number): void {
    this.state.updatedAt = at
  }

  private pushError(err?: DgtBoardError): void {
    if (!err) return
    this.state.lastError = err
    this.state.errorHistory.unshift(err)
    if (this.state.errorHistory.length > this.maxErrorHistory) {
      this.state.errorHistory.length = this.maxErrorHistory
    }
  }
}
