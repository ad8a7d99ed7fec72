import type { BoardState } from './board.js'
import {
  type ClockAck,
  beepIntervals,
  encodeClockAscii,
  encodeClockBeep,
  encodeClockDisplay,
  encodeClockVersionRequest,
} from './clock.js'
import {
  CLOCK_BEEP_INTERVAL_MS,
  DGT_RETURN_LONG_SERIALNR,
  DGT_RETURN_SERIALNR,
  DGT_SEND_BATTERY_STATUS,
  DGT_SEND_BRD,
  DGT_SEND_RESET,
  DGT_SEND_UPDATE_NICE,
  DGT_SEND_VERSION,
} from './constants.js'
import { createDriver, selectDriverKind } from './drivers/select.js'
import type { DriverKind, IODriver } from './drivers/types.js'
import {
  type CandidateFailure,
  ConnectionClosedError,
  ConnectionLostError,
  ExclusiveLockError,
  NoCandidateAvailableError,
  type TransportError,
  toBoardError,
} from './errors.js'
import type { Frame } from './frame-decoder.js'
import { ProtocolInterpreter } from './interpreter.js'
import { ReconnectSupervisor } from './reconnect.js'
import { Mutex, PendingSignal } from './sync.js'
import { NodeReadinessLoop } from './transport/NodeReadinessLoop.js'
import { serialPortTransportFactory } from './transport/SerialPortTransport.js'
import { SerialCandidateSource } from './transport/candidates.js'
import type {
  CandidateSource,
  ReadinessLoop,
  SerialTransport,
  TransportFactory,
} from './transport/types.js'
import type {
  DgtBoardConfig,
  DgtBoardEvent,
  DgtBoardEventSink,
  DgtBoardListener,
  DgtBoardPhase,
  DgtDisconnectReason,
} from './types.js'
import { errorMessage, now, sleep } from './utils.js'

export interface DgtBoardServiceDeps {
  events: DgtBoardEventSink
  /** Defaults to the configured port patterns. */
  candidates?: CandidateSource
  /** Defaults to `serialport`. */
  transportFactory?: TransportFactory
  /** Defaults to a loop on Node's own event loop. */
  loop?: ReadinessLoop
  /** Overrides the platform-based driver choice. */
  driverKind?: DriverKind
}

export interface DgtBoardServiceState {
  phase: DgtBoardPhase
  path: string | null
  driver: DriverKind
  exclusive: boolean
  autoConnect: boolean
  clockVersion: string | null
}

/**
 * Connection to one DGT board.
 *
 * All state lives on the control context (Node's event loop). The driver
 * hands frames and failures back through its host callbacks; queries and
 * clock commands suspend the caller only.
 *
 * The protocol has no request ids: two concurrent queries of the same kind
 * are both satisfied by whichever matching response arrives next.
 */
export class DgtBoardService {
  private readonly cfg: DgtBoardConfig
  private readonly events: DgtBoardEventSink
  private readonly candidates: CandidateSource
  private readonly transportFactory: TransportFactory
  private readonly driver: IODriver
  private readonly interpreter = new ProtocolInterpreter()
  private readonly supervisor: ReconnectSupervisor
  private readonly listeners = new Set<DgtBoardListener>()

  private phase: DgtBoardPhase = 'disconnected'
  private transport: SerialTransport | null = null
  private path: string | null = null
  private exclusive = false
  /** Bumped on every attach/detach; commands that span a sleep check it. */
  private epoch = 0

  private closed = false
  private autoMode = false
  private connectInFlight: Promise<string> | null = null

  private clockVersion: string | null = null
  private readonly clockLock = new Mutex()

  private readonly connectedGate = new PendingSignal<void>()
  private readonly pending = {
    version: new PendingSignal<string>(),
    board: new PendingSignal<BoardState>(),
    serialNumber: new PendingSignal<string>(),
    longSerialNumber: new PendingSignal<string>(),
    batteryStatus: new PendingSignal<string>(),
    clockVersion: new PendingSignal<string>(),
    clockAck: new PendingSignal<ClockAck>(),
  }

  constructor(cfg: DgtBoardConfig, deps: DgtBoardServiceDeps) {
    this.cfg = cfg
    this.events = deps.events
    this.candidates = deps.candidates ?? new SerialCandidateSource(cfg.ports)
    this.transportFactory = deps.transportFactory ?? serialPortTransportFactory

    const kind = deps.driverKind ?? selectDriverKind(cfg.driver)
    this.driver = createDriver(kind, {
      host: {
        onFrame: (frame) => this.handleFrame(frame),
        onTransportError: (err) => this.handleTransportError(err),
      },
      loop: deps.loop ?? new NodeReadinessLoop(),
    })

    this.supervisor = new ReconnectSupervisor(cfg.reconnect, {
      attempt: () => this.connectOnce(),
      onAttemptFailed: (err) => {
        const failures = err instanceof NoCandidateAvailableError ? err.failures : []
        this.publish({
          kind: 'board-connect-failed',
          at: now(),
          error: toBoardError(err, 'connect'),
          failures,
        })
      },
      onScheduled: (attempt, delayMs) => {
        this.publish({ kind: 'board-reconnect-scheduled', at: now(), attempt, delayMs })
      },
      onHookError: (err) => {
        this.events.publish({ kind: 'recoverable-error', at: now(), error: toBoardError(err, 'connect') })
      },
    })
  }

  /* ---------------------------------------------------------------------- */
  /*  Lifecycle                                                             */
  /* ---------------------------------------------------------------------- */

  /**
   * Open the first candidate that works. Resolves with its path; rejects
   * with `NoCandidateAvailableError` listing every failed candidate.
   */
  public async connectOnce(): Promise<string> {
    if (this.closed) throw new ConnectionClosedError()
    if (this.transport && this.path) return this.path
    if (this.connectInFlight) return this.connectInFlight

    this.connectInFlight = this.connectFirstCandidate().finally(() => {
      this.connectInFlight = null
    })
    return this.connectInFlight
  }

  /** Connect in the background and keep reconnecting until `close()`. */
  public autoConnect(): void {
    if (this.closed) throw new ConnectionClosedError()
    this.autoMode = true
    if (!this.transport) this.supervisor.start()
  }

  /** Resolves with the device path once connected; rejects after `close()`. */
  public async waitUntilConnected(): Promise<string> {
    await this.ensureConnected()
    if (this.path === null) throw new ConnectionLostError()
    return this.path
  }

  /**
   * Terminal. Stops reconnection and fails every suspended query and
   * command with `ConnectionClosedError`.
   */
  public async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    this.autoMode = false
    this.supervisor.stop()

    const err = new ConnectionClosedError()
    this.connectedGate.fail(err, true)
    this.failPending(err, true)
    this.phase = 'closed'

    // A pass in flight notices `closed` after its current open and backs out.
    await Promise.allSettled(this.connectInFlight ? [this.connectInFlight] : [])
    await this.detach('explicit-close')

    this.publish({ kind: 'board-closed', at: now() })
  }

  public subscribe(listener: DgtBoardListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  public getState(): DgtBoardServiceState {
    return {
      phase: this.phase,
      path: this.path,
      driver: this.driver.kind,
      exclusive: this.exclusive,
      autoConnect: this.autoMode,
      clockVersion: this.clockVersion,
    }
  }

  /* ---------------------------------------------------------------------- */
  /*  Queries                                                               */
  /* ---------------------------------------------------------------------- */

  public getVersion(): Promise<string> {
    return this.query(this.pending.version, Buffer.from([DGT_SEND_VERSION]))
  }

  public getBoard(): Promise<BoardState> {
    return this.query(this.pending.board, Buffer.from([DGT_SEND_BRD]))
  }

  public getSerialNumber(): Promise<string> {
    return this.query(this.pending.serialNumber, Buffer.from([DGT_RETURN_SERIALNR]))
  }

  public getLongSerialNumber(): Promise<string> {
    return this.query(this.pending.longSerialNumber, Buffer.from([DGT_RETURN_LONG_SERIALNR]))
  }

  public getBatteryStatus(): Promise<string> {
    return this.query(this.pending.batteryStatus, Buffer.from([DGT_SEND_BATTERY_STATUS]))
  }

  public async getClockVersion(): Promise<string> {
    return await this.clockLock.runExclusive(() => this.fetchClockVersion())
  }

  /** Put the board back into idle mode. No response is expected. */
  public async resetBoardMode(): Promise<void> {
    await this.ensureConnected()
    this.driver.write(Buffer.from([DGT_SEND_RESET]))
  }

  /* ---------------------------------------------------------------------- */
  /*  Clock commands (one in flight at a time)                              */
  /* ---------------------------------------------------------------------- */

  /** Beep for up to 10 seconds and wait for the clock's acknowledgement. */
  public async clockBeep(seconds: number): Promise<void> {
    await this.clockLock.runExclusive(async () => {
      const intervals = beepIntervals(seconds)

      this.pending.clockAck.clear()
      const epoch = await this.ensureConnected()
      this.driver.write(encodeClockBeep(intervals))

      // The ack only comes once the beep has finished.
      await sleep(intervals * CLOCK_BEEP_INTERVAL_MS)
      this.assertSameConnection(epoch)

      await this.pending.clockAck.wait()
    })
  }

  /**
   * Show text on the clock. 2.x firmware takes 8 characters (`longText`
   * when given), older clocks 6. Text is centred; overflow is cut off and
   * reported as `clock-text-truncated`.
   */
  public async clockText(text: string, longText?: string): Promise<void> {
    await this.clockLock.runExclusive(async () => {
      const version = this.clockVersion ?? (await this.fetchClockVersion())

      const ascii = version.startsWith('2.')
      const shown = ascii ? longText ?? text : text
      const { frame, truncated } = ascii ? encodeClockAscii(shown) : encodeClockDisplay(shown)
      if (truncated) {
        this.publish({ kind: 'clock-text-truncated', at: now(), text: shown, width: ascii ? 8 : 6 })
      }

      await this.ensureConnected()
      this.driver.write(frame)
    })
  }

  /* ---------------------------------------------------------------------- */
  /*  Connect / disconnect                                                  */
  /* ---------------------------------------------------------------------- */

  private async connectFirstCandidate(): Promise<string> {
    const candidates = await this.candidates.list()
    if (this.closed) throw new ConnectionClosedError()

    this.phase = 'connecting'
    this.publish({ kind: 'board-connecting', at: now(), candidates })

    const failures: CandidateFailure[] = []
    for (const path of candidates) {
      let opened: { transport: SerialTransport; exclusive: boolean }
      try {
        opened = await this.openCandidate(path)
      } catch (err) {
        failures.push({ path, reason: errorMessage(err) })
        continue
      }

      if (this.closed) {
        await this.closeTransport(opened.transport)
        throw new ConnectionClosedError()
      }

      this.attach(path, opened.transport, opened.exclusive)
      return path
    }

    this.phase = 'disconnected'
    throw new NoCandidateAvailableError(failures)
  }

  /** Open, close and reopen once so a session interrupted earlier starts clean. */
  private async openCandidate(path: string): Promise<{ transport: SerialTransport; exclusive: boolean }> {
    const transport = this.transportFactory(path, { baudRate: this.cfg.baudRate })

    try {
      const exclusive = await this.openTransport(transport, this.cfg.lockPort)
      await transport.close()
      await this.openTransport(transport, exclusive)
      return { transport, exclusive }
    } catch (err) {
      if (transport.isOpen) await this.closeTransport(transport)
      throw err
    }
  }

  /** Returns whether the exclusive lock is held. */
  private async openTransport(transport: SerialTransport, exclusive: boolean): Promise<boolean> {
    if (!exclusive) {
      await transport.open({ exclusive: false })
      return false
    }

    try {
      await transport.open({ exclusive: true })
      return true
    } catch (err) {
      if (!(err instanceof ExclusiveLockError)) throw err
      this.publish({
        kind: 'port-lock-failed',
        at: now(),
        path: transport.path,
        error: toBoardError(err, 'transport'),
      })
    }

    await transport.open({ exclusive: false })
    return false
  }

  private attach(path: string, transport: SerialTransport, exclusive: boolean): void {
    this.transport = transport
    this.path = path
    this.exclusive = exclusive
    this.epoch += 1
    this.interpreter.reset()

    this.driver.connect(transport)
    this.driver.write(Buffer.from([DGT_SEND_UPDATE_NICE]))
    this.driver.write(Buffer.from([DGT_SEND_BRD]))

    this.phase = 'connected'
    this.publish({ kind: 'board-connected', at: now(), path, driver: this.driver.kind, exclusive })
    this.connectedGate.set()
  }

  private async detach(reason: DgtDisconnectReason, error?: TransportError): Promise<void> {
    const transport = this.transport
    const path = this.path
    if (!transport || path === null) return

    this.transport = null
    this.path = null
    this.exclusive = false
    this.epoch += 1
    this.clockVersion = null

    this.driver.disconnect()
    this.connectedGate.clear()
    if (!this.closed) {
      this.failPending(new ConnectionLostError(`connection to ${path} was lost`))
      this.phase = 'disconnected'
    }

    this.publish({
      kind: 'board-disconnected',
      at: now(),
      path,
      reason,
      ...(error ? { error: toBoardError(error, 'transport') } : {}),
    })

    await this.closeTransport(transport)
  }

  private handleTransportError(err: TransportError): void {
    if (!this.transport) return

    this.detach('io-error', err)
      .then(() => {
        if (this.autoMode && !this.closed) this.supervisor.start()
      })
      .catch((detachErr: unknown) => {
        this.events.publish({ kind: 'recoverable-error', at: now(), error: toBoardError(detachErr, 'connection') })
      })
  }

  private async closeTransport(transport: SerialTransport): Promise<void> {
    try {
      await transport.close()
    } catch (err) {
      this.publish({ kind: 'recoverable-error', at: now(), error: toBoardError(err, 'transport') })
    }
  }

  /* ---------------------------------------------------------------------- */
  /*  Frames                                                                */
  /* ---------------------------------------------------------------------- */

  private handleFrame(frame: Frame): void {
    const effect = this.interpreter.interpret(frame)
    const at = now()

    switch (effect.kind) {
      case 'board-dump': {
        // getBoard() callers and subscribers each get their own board
        this.pending.board.set(effect.board.copy())
        if (effect.changed) {
          this.publish({ kind: 'board-changed', at, board: effect.board, source: 'dump' })
        }
        break
      }
      case 'field-update': {
        this.publish({ kind: 'board-changed', at, board: effect.board, source: 'field-update' })
        break
      }
      case 'version': {
        this.pending.version.set(effect.version)
        this.publish({ kind: 'board-info', at, field: 'version', value: effect.version })
        break
      }
      case 'serial-number': {
        this.pending.serialNumber.set(effect.value)
        this.publish({ kind: 'board-info', at, field: 'serialNumber', value: effect.value })
        break
      }
      case 'long-serial-number': {
        this.pending.longSerialNumber.set(effect.value)
        this.publish({ kind: 'board-info', at, field: 'longSerialNumber', value: effect.value })
        break
      }
      case 'battery-status': {
        this.pending.batteryStatus.set(effect.value)
        this.publish({ kind: 'board-info', at, field: 'batteryStatus', value: effect.value })
        break
      }
      case 'clock-ack': {
        this.pending.clockAck.set(effect.ack)
        break
      }
      case 'clock-button': {
        this.pending.clockAck.set(effect.ack)
        this.publish({ kind: 'clock-button-pressed', at, button: effect.button })
        break
      }
      case 'clock-version': {
        this.clockVersion = effect.version
        this.pending.clockVersion.set(effect.version)
        this.pending.clockAck.set(effect.ack)
        this.publish({ kind: 'board-info', at, field: 'clockVersion', value: effect.version })
        break
      }
      case 'clock-time': {
        if (effect.changed) this.publish({ kind: 'clock-changed', at, clock: effect.clock })
        break
      }
      case 'protocol-error': {
        this.publish({
          kind: 'protocol-error',
          at,
          messageId: effect.error.messageId,
          error: toBoardError(effect.error, 'protocol'),
        })
        break
      }
      case 'ignored': {
        this.publish({ kind: 'frame-ignored', at, id: effect.id })
        break
      }
    }
  }

  /* ---------------------------------------------------------------------- */
  /*  Helpers                                                               */
  /* ---------------------------------------------------------------------- */

  private async query<T>(signal: PendingSignal<T>, command: Buffer): Promise<T> {
    signal.clear()
    await this.ensureConnected()
    this.driver.write(command)
    return await signal.wait()
  }

  /** Must run inside the clock lock. */
  private async fetchClockVersion(): Promise<string> {
    this.pending.clockVersion.clear()
    await this.ensureConnected()
    this.driver.write(encodeClockVersionRequest())
    return await this.pending.clockVersion.wait()
  }

  /** Suspends until connected; returns the connection epoch. */
  private async ensureConnected(): Promise<number> {
    if (this.closed) throw new ConnectionClosedError()
    while (!this.driver.connected) {
      await this.connectedGate.wait()
    }
    return this.epoch
  }

  private assertSameConnection(epoch: number): void {
    if (this.closed) throw new ConnectionClosedError()
    if (epoch !== this.epoch) throw new ConnectionLostError()
  }

  private failPending(err: Error, sticky = false): void {
    for (const signal of Object.values(this.pending)) signal.fail(err, sticky)
  }

  private publish(evt: DgtBoardEvent): void {
    this.events.publish(evt)

    for (const listener of this.listeners) {
      try {
        listener(evt)
      } catch (err) {
        this.events.publish({
          kind: 'recoverable-error',
          at: now(),
          error: toBoardError(err, 'unknown'),
        })
      }
    }
  }
}
