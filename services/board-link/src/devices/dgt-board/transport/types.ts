/* -------------------------------------------------------------------------- */
/*  Transport + readiness loop contracts                                      */
/*                                                                            */
/*  The driver only talks to these interfaces. SerialPortTransport and        */
/*  NodeReadinessLoop are the production implementations; tests substitute    */
/*  an in-process fake transport.                                             */
/* -------------------------------------------------------------------------- */

export type TransportSignal =
  | { kind: 'readable' }
  | { kind: 'writable' }
  | { kind: 'error'; error: Error }
  | { kind: 'closed' }

export type TransportListener = (signal: TransportSignal) => void

export interface TransportOpenOptions {
  /** Ask the OS for exclusive access to the device. */
  exclusive: boolean
}

export interface SerialTransport {
  readonly path: string
  readonly isOpen: boolean

  open(opts: TransportOpenOptions): Promise<void>
  close(): Promise<void>

  /* Non-blocking side (reactor driver) */

  /** Bytes that `read()` could return right now. */
  bytesAvailable(): number
  /** Up to `maxBytes` already-received bytes; empty when none. Throws once the port is gone. */
  read(maxBytes: number): Buffer
  /** Whether `write()` would accept bytes right now. */
  canWrite(): boolean
  /** Hand bytes to the port without waiting; returns how many were accepted. */
  write(data: Buffer): number

  /* Blocking-style side (threaded driver) */

  /** Resolves with exactly `n` bytes; rejects when the port closes or fails. */
  readExactly(n: number): Promise<Buffer>
  /** Resolves once every byte has been handed to the device. */
  writeAll(data: Buffer): Promise<void>

  /** Subscribe to readiness and failure notifications. Returns an unsubscribe. */
  subscribe(listener: TransportListener): () => void
}

export interface TransportFactoryOptions {
  baudRate: number
}

export type TransportFactory = (path: string, opts: TransportFactoryOptions) => SerialTransport

/**
 * Single-threaded readiness notification loop.
 *
 * Readers and writers are level-triggered: a registered callback keeps
 * firing while the condition holds, so a writer must be removed as soon as
 * it has nothing left to send.
 */
export interface ReadinessLoop {
  addReader(transport: SerialTransport, callback: () => void): void
  removeReader(transport: SerialTransport): void
  addWriter(transport: SerialTransport, callback: () => void): void
  removeWriter(transport: SerialTransport): void
  /** Run `callback` on the control context at the next opportunity. */
  callSoon(callback: () => void): void
}

/** Ordered list of device paths to try when connecting. */
export interface CandidateSource {
  list(): Promise<string[]>
}
