import { TransportError, toTransportError } from '../errors.js'
import { FrameDecoder, type Frame } from '../frame-decoder.js'
import type { ReadinessLoop, SerialTransport } from '../transport/types.js'
import type { DriverDeps, DriverHost, DriverKind, IODriver } from './types.js'

/**
 * Non-blocking driver. One read attempt per readiness notification, and a
 * write interest that exists only while the outbound buffer holds bytes.
 */
export class ReactorDriver implements IODriver {
  readonly kind: DriverKind = 'reactor'

  private readonly host: DriverHost
  private readonly loop: ReadinessLoop
  private readonly decoder = new FrameDecoder()

  private transport: SerialTransport | null = null
  private writeBuffer: Buffer = Buffer.alloc(0)

  constructor(deps: DriverDeps) {
    this.host = deps.host
    this.loop = deps.loop
  }

  get connected(): boolean {
    return this.transport !== null
  }

  /** Bytes queued but not yet accepted by the transport. */
  get pendingWriteBytes(): number {
    return this.writeBuffer.length
  }

  connect(transport: SerialTransport): void {
    this.disconnect()
    this.transport = transport
    this.loop.addReader(transport, () => this.onReadable(transport))
  }

  disconnect(): void {
    const transport = this.transport
    if (transport) {
      this.loop.removeReader(transport)
      this.loop.removeWriter(transport)
    }
    this.transport = null
    this.decoder.reset()
    this.writeBuffer = Buffer.alloc(0)
  }

  write(data: Buffer): void {
    const transport = this.transport
    if (!transport) throw new TransportError('write on a disconnected driver')
    if (data.length === 0) return

    if (this.writeBuffer.length === 0) {
      this.loop.addWriter(transport, () => this.onWritable(transport))
    }
    this.writeBuffer = Buffer.concat([this.writeBuffer, data])
  }

  private onReadable(transport: SerialTransport): void {
    if (transport !== this.transport) return

    let frame: Frame | null
    try {
      frame = this.decoder.pump(transport)
    } catch (err) {
      // One report per failure; the host decides whether to reconnect.
      this.loop.removeReader(transport)
      this.host.onTransportError(toTransportError(err, 'error reading from serial port'))
      return
    }
    if (frame) this.host.onFrame(frame)
  }

  private onWritable(transport: SerialTransport): void {
    if (transport !== this.transport) {
      this.loop.removeWriter(transport)
      return
    }

    try {
      const written = transport.write(this.writeBuffer)
      this.writeBuffer = this.writeBuffer.subarray(written)
    } catch (err) {
      this.loop.removeWriter(transport)
      this.host.onTransportError(toTransportError(err, 'error writing to serial port'))
      return
    }

    // Drained: drop write interest right away or the loop keeps firing.
    if (this.writeBuffer.length === 0) this.loop.removeWriter(transport)
  }
}
