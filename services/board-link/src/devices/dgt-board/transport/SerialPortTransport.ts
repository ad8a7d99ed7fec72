import { SerialPort } from 'serialport'

import { ExclusiveLockError, TransportClosedError, TransportError } from '../errors.js'
import type {
  SerialTransport,
  TransportFactory,
  TransportListener,
  TransportOpenOptions,
  TransportSignal,
} from './types.js'

interface ReadWaiter {
  n: number
  resolve: (buf: Buffer) => void
  reject: (err: Error) => void
}

/**
 * SerialTransport backed by the `serialport` package.
 *
 * Incoming `data` chunks are buffered so the driver can pull exactly the
 * bytes it needs, either synchronously (`read`) or by awaiting them
 * (`readExactly`).
 */
export class SerialPortTransport implements SerialTransport {
  readonly path: string
  private readonly baudRate: number

  private port: SerialPort | null = null
  /** Port being closed on purpose; its `close` event is not a failure. */
  private closingPort: SerialPort | null = null

  private rx: Buffer = Buffer.alloc(0)
  /** Set by a port `error` event; surfaced by the next read. */
  private failure: TransportError | null = null
  /** Set when the port closes underneath us; buffered bytes stay readable. */
  private lost = false
  private readWaiter: ReadWaiter | null = null
  private readonly listeners = new Set<TransportListener>()

  constructor(path: string, baudRate: number) {
    this.path = path
    this.baudRate = baudRate
  }

  get isOpen(): boolean {
    return !this.lost && (this.port?.isOpen ?? false)
  }

  async open(opts: TransportOpenOptions): Promise<void> {
    if (this.port?.isOpen) return

    const port = new SerialPort({
      path: this.path,
      baudRate: this.baudRate,
      autoOpen: false,
      dataBits: 8,
      parity: 'none',
      stopBits: 1,
      lock: opts.exclusive,
    })

    try {
      await new Promise<void>((resolve, reject) => {
        const onOpen = () => { cleanup(); resolve() }
        const onError = (err: Error) => { cleanup(); reject(err) }
        const cleanup = () => { port.off('open', onOpen); port.off('error', onError) }

        port.on('open', onOpen)
        port.on('error', onError)
        port.open()
      })
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      if (opts.exclusive && /lock/i.test(message)) {
        throw new ExclusiveLockError(`cannot lock ${this.path}: ${message}`, { cause: err })
      }
      throw new TransportError(`cannot open ${this.path}: ${message}`, { cause: err })
    }

    this.port = port
    this.rx = Buffer.alloc(0)
    this.failure = null
    this.lost = false

    port.on('data', (chunk: Buffer) => this.handleData(chunk))
    port.on('error', (err: Error) => this.handleError(port, err))
    port.on('close', () => this.handleClose(port))
    port.on('drain', () => this.notify({ kind: 'writable' }))
  }

  async close(): Promise<void> {
    const port = this.port
    this.port = null
    this.rx = Buffer.alloc(0)
    this.failReadWaiter(new TransportClosedError(this.path))

    if (!port || !port.isOpen) return

    this.closingPort = port
    try {
      await new Promise<void>((resolve, reject) => {
        port.close((err) => (err ? reject(err) : resolve()))
      })
    } catch (err) {
      throw new TransportError(
        `error closing ${this.path}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      )
    } finally {
      this.closingPort = null
    }
  }

  bytesAvailable(): number {
    return this.rx.length
  }

  read(maxBytes: number): Buffer {
    if (this.failure) throw this.failure
    if (this.rx.length === 0) {
      if (!this.isOpen) throw new TransportClosedError(this.path)
      return Buffer.alloc(0)
    }
    const n = Math.min(maxBytes, this.rx.length)
    const out = this.rx.subarray(0, n)
    this.rx = this.rx.subarray(n)
    return Buffer.from(out)
  }

  canWrite(): boolean {
    const port = this.port
    return port !== null && port.isOpen && !port.writableNeedDrain
  }

  write(data: Buffer): number {
    const port = this.port
    if (!port || !port.isOpen) throw new TransportClosedError(this.path)
    if (port.writableNeedDrain) return 0
    port.write(data)
    return data.length
  }

  readExactly(n: number): Promise<Buffer> {
    if (this.readWaiter) {
      return Promise.reject(new TransportError(`concurrent blocking reads on ${this.path}`))
    }
    if (this.failure) return Promise.reject(this.failure)
    if (this.rx.length >= n) return Promise.resolve(this.read(n))
    if (!this.isOpen) return Promise.reject(new TransportClosedError(this.path))

    return new Promise<Buffer>((resolve, reject) => {
      this.readWaiter = { n, resolve, reject }
    })
  }

  async writeAll(data: Buffer): Promise<void> {
    const port = this.port
    if (!port || !port.isOpen) throw new TransportClosedError(this.path)

    await new Promise<void>((resolve, reject) => {
      port.write(data, (err) => (err ? reject(err) : resolve()))
    })
    await new Promise<void>((resolve, reject) => {
      port.drain((err) => (err ? reject(err) : resolve()))
    })
  }

  subscribe(listener: TransportListener): () => void {
    this.listeners.add(listener)
    return () => { this.listeners.delete(listener) }
  }

  /* ---------------------------------------------------------------------- */
  /*  Port events                                                           */
  /* ---------------------------------------------------------------------- */

  private handleData(chunk: Buffer): void {
    this.rx = this.rx.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.rx, chunk])

    const waiter = this.readWaiter
    if (waiter && this.rx.length >= waiter.n) {
      this.readWaiter = null
      waiter.resolve(this.read(waiter.n))
    }

    this.notify({ kind: 'readable' })
  }

  private handleError(port: SerialPort, err: Error): void {
    if (port !== this.port) return
    const error = new TransportError(`serial error on ${this.path}: ${err.message}`, { cause: err })
    this.failure = error
    this.failReadWaiter(error)
    this.notify({ kind: 'error', error })
  }

  private handleClose(port: SerialPort): void {
    if (this.closingPort === port) return
    if (port !== this.port) return
    // Unplugged or closed underneath us.
    this.lost = true
    this.failReadWaiter(new TransportClosedError(this.path))
    this.notify({ kind: 'closed' })
  }

  private failReadWaiter(err: Error): void {
    const waiter = this.readWaiter
    if (!waiter) return
    this.readWaiter = null
    waiter.reject(err)
  }

  private notify(signal: TransportSignal): void {
    for (const l of this.listeners) l(signal)
  }
}

export const serialPortTransportFactory: TransportFactory = (path, opts) =>
  new SerialPortTransport(path, opts.baudRate)
