import { ExclusiveLockError, TransportClosedError, TransportError } from '../../src/devices/dgt-board/errors.js'
import type {
  SerialTransport,
  TransportFactory,
  TransportListener,
  TransportOpenOptions,
  TransportSignal,
} from '../../src/devices/dgt-board/transport/types.js'

interface ReadWaiter {
  n: number
  resolve: (buf: Buffer) => void
  reject: (err: Error) => void
}

export interface FakeTransportOptions {
  /** Every open() rejects with this. */
  openError?: Error
  /** Exclusive opens fail with ExclusiveLockError; plain opens succeed. */
  lockUnavailable?: boolean
  /** Max bytes accepted per non-blocking write() call. */
  writeChunk?: number
}

/**
 * In-process stand-in for a serial port. `receive()` plays the device side,
 * `written` records everything the host sent.
 */
export class FakeTransport implements SerialTransport {
  readonly path: string
  isOpen = false

  readonly opens: TransportOpenOptions[] = []
  closes = 0
  readonly written: Buffer[] = []
  /** Called with each chunk the host writes; use it to script replies. */
  onWrite: ((data: Buffer) => void) | null = null

  private readonly opts: FakeTransportOptions
  private rx: Buffer = Buffer.alloc(0)
  private readWaiter: ReadWaiter | null = null
  private readonly listeners = new Set<TransportListener>()

  constructor(path: string, opts: FakeTransportOptions = {}) {
    this.path = path
    this.opts = opts
  }

  async open(opts: TransportOpenOptions): Promise<void> {
    this.opens.push(opts)
    if (this.opts.openError) throw this.opts.openError
    if (opts.exclusive && this.opts.lockUnavailable) {
      throw new ExclusiveLockError(`cannot lock ${this.path}: resource temporarily unavailable`)
    }
    this.isOpen = true
    this.rx = Buffer.alloc(0)
  }

  async close(): Promise<void> {
    this.closes += 1
    this.isOpen = false
    this.rx = Buffer.alloc(0)
    this.failReadWaiter(new TransportClosedError(this.path))
  }

  bytesAvailable(): number {
    return this.rx.length
  }

  read(maxBytes: number): Buffer {
    if (this.rx.length === 0) {
      if (!this.isOpen) throw new TransportClosedError(this.path)
      return Buffer.alloc(0)
    }
    const n = Math.min(maxBytes, this.rx.length)
    const out = Buffer.from(this.rx.subarray(0, n))
    this.rx = this.rx.subarray(n)
    return out
  }

  canWrite(): boolean {
    return this.isOpen
  }

  write(data: Buffer): number {
    if (!this.isOpen) throw new TransportClosedError(this.path)
    const n = Math.min(data.length, this.opts.writeChunk ?? data.length)
    this.record(Buffer.from(data.subarray(0, n)))
    return n
  }

  readExactly(n: number): Promise<Buffer> {
    if (this.readWaiter) return Promise.reject(new TransportError('concurrent blocking reads'))
    if (this.rx.length >= n) return Promise.resolve(this.read(n))
    if (!this.isOpen) return Promise.reject(new TransportClosedError(this.path))
    return new Promise<Buffer>((resolve, reject) => {
      this.readWaiter = { n, resolve, reject }
    })
  }

  async writeAll(data: Buffer): Promise<void> {
    if (!this.isOpen) throw new TransportClosedError(this.path)
    this.record(Buffer.from(data))
  }

  subscribe(listener: TransportListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /* ---------------------------------------------------------------------- */
  /*  Device side                                                           */
  /* ---------------------------------------------------------------------- */

  /** Bytes arriving from the device. */
  receive(bytes: Uint8Array): void {
    this.rx = Buffer.concat([this.rx, Buffer.from(bytes)])
    const waiter = this.readWaiter
    if (waiter && this.rx.length >= waiter.n) {
      this.readWaiter = null
      waiter.resolve(this.read(waiter.n))
    }
    this.notify({ kind: 'readable' })
  }

  /** The device vanishes underneath the host. */
  unplug(): void {
    this.isOpen = false
    this.failReadWaiter(new TransportClosedError(this.path))
    this.notify({ kind: 'closed' })
  }

  /** Everything written so far, as one flat list of byte values. */
  get writtenBytes(): number[] {
    return this.written.flatMap((b) => [...b])
  }

  get listenerCount(): number {
    return this.listeners.size
  }

  private record(data: Buffer): void {
    this.written.push(data)
    this.onWrite?.(data)
  }

  private failReadWaiter(err: Error): void {
    const waiter = this.readWaiter
    if (!waiter) return
    this.readWaiter = null
    waiter.reject(err)
  }

  private notify(signal: TransportSignal): void {
    for (const l of [...this.listeners]) l(signal)
  }
}

/**
 * Factory over a fixed set of fake devices. Unknown paths produce a
 * transport whose open() fails, like a missing device node.
 */
export class FakeSerialBus {
  private readonly devices = new Map<string, FakeTransport>()
  readonly requested: string[] = []

  add(path: string, opts: FakeTransportOptions = {}): FakeTransport {
    const t = new FakeTransport(path, opts)
    this.devices.set(path, t)
    return t
  }

  readonly factory: TransportFactory = (path) => {
    this.requested.push(path)
    return (
      this.devices.get(path) ??
      new FakeTransport(path, { openError: new TransportError(`cannot open ${path}: no such file or directory`) })
    )
  }
}
