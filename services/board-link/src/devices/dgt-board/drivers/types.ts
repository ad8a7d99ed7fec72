import type { TransportError } from '../errors.js'
import type { Frame } from '../frame-decoder.js'
import type { ReadinessLoop, SerialTransport } from '../transport/types.js'

export type DriverKind = 'reactor' | 'threaded'

/** Callbacks the driver raises on the control context. */
export interface DriverHost {
  onFrame(frame: Frame): void
  onTransportError(err: TransportError): void
}

/**
 * Moves bytes between the transport and the connection. Exactly one
 * implementation is chosen per process; both deliver frames in arrival
 * order and report every transport failure through `onTransportError`.
 */
export interface IODriver {
  readonly kind: DriverKind
  readonly connected: boolean
  connect(transport: SerialTransport): void
  disconnect(): void
  /** Queue bytes for sending; returns immediately. */
  write(data: Buffer): void
}

export interface DriverDeps {
  host: DriverHost
  loop: ReadinessLoop
}
