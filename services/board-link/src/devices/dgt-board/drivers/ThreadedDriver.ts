import { FRAME_HEADER_LENGTH } from '../constants.js'
import { FramingError, TransportError, toTransportError } from '../errors.js'
import { declaredFrameLength } from '../frame-decoder.js'
import { BlockingQueue } from '../sync.js'
import type { ReadinessLoop, SerialTransport } from '../transport/types.js'
import type { DriverDeps, DriverHost, DriverKind, IODriver } from './types.js'

const SHUTDOWN = Symbol('shutdown')

type WriteItem = Buffer | typeof SHUTDOWN

/**
 * Blocking-style driver: a read loop that awaits the 3-byte header and then
 * the declared payload, and a write loop that drains a queue.
 *
 * The loops own only the transport and the queue. Frames and failures are
 * handed to the control context through `loop.callSoon`; they never call
 * into the connection directly.
 */
export class ThreadedDriver implements IODriver {
  readonly kind: DriverKind = 'threaded'

  private readonly host: DriverHost
  private readonly loop: ReadinessLoop

  private transport: SerialTransport | null = null
  private writeQueue = new BlockingQueue<WriteItem>()
  /** Bumped on every connect/disconnect so stale loops exit quietly. */
  private generation = 0

  private readLoopDone: Promise<void> = Promise.resolve()
  private writeLoopDone: Promise<void> = Promise.resolve()

  constructor(deps: DriverDeps) {
    this.host = deps.host
    this.loop = deps.loop
  }

  get connected(): boolean {
    return this.transport !== null
  }

  connect(transport: SerialTransport): void {
    if (this.transport === transport) return
    this.disconnect()

    this.transport = transport
    this.generation += 1
    this.writeQueue = new BlockingQueue<WriteItem>()

    const generation = this.generation
    const queue = this.writeQueue
    this.writeLoopDone = this.writeLoop(transport, queue, generation)
    this.readLoopDone = this.readLoop(transport, generation)
  }

  disconnect(): void {
    if (!this.transport) return
    this.transport = null
    this.generation += 1

    // Unblock the write loop; the read loop ends when the transport closes.
    this.writeQueue.clear()
    this.writeQueue.put(SHUTDOWN)
  }

  write(data: Buffer): void {
    if (!this.transport) throw new TransportError('write on a disconnected driver')
    if (data.length === 0) return
    this.writeQueue.put(data)
  }

  /** Resolves once both loops of the current or last connection have exited. */
  async settled(): Promise<void> {
    await Promise.all([this.readLoopDone, this.writeLoopDone])
  }

  private async readLoop(transport: SerialTransport, generation: number): Promise<void> {
    try {
      while (generation === this.generation) {
        const header = await transport.readExactly(FRAME_HEADER_LENGTH)
        const id = header[0]
        const declared = declaredFrameLength(header[1], header[2])
        if (declared < FRAME_HEADER_LENGTH) {
          throw new FramingError(
            `frame 0x${id.toString(16)} declares length ${declared}, below the ${FRAME_HEADER_LENGTH}-byte header`
          )
        }

        const payload =
          declared > FRAME_HEADER_LENGTH
            ? await transport.readExactly(declared - FRAME_HEADER_LENGTH)
            : Buffer.alloc(0)

        if (generation !== this.generation) return
        this.loop.callSoon(() => {
          if (generation === this.generation) this.host.onFrame({ id, payload })
        })
      }
    } catch (err) {
      this.reportFailure(generation, toTransportError(err, 'error reading from serial port'))
    }
  }

  private async writeLoop(
    transport: SerialTransport,
    queue: BlockingQueue<WriteItem>,
    generation: number
  ): Promise<void> {
    try {
      while (generation === this.generation) {
        const item = await queue.take()
        if (item === SHUTDOWN) return
        await transport.writeAll(item)
      }
    } catch (err) {
      this.reportFailure(generation, toTransportError(err, 'error writing to serial port'))
    }
  }

  private reportFailure(generation: number, err: TransportError): void {
    // Failures after our own disconnect are the expected way the loops end.
    if (generation !== this.generation) return
    this.loop.callSoon(() => {
      if (generation === this.generation) this.host.onTransportError(err)
    })
  }
}
