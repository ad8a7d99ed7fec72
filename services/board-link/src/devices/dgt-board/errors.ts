import type { DgtBoardError, DgtErrorScope } from './types.js'

export class DgtError extends Error {
  readonly scope: DgtErrorScope
  readonly retryable: boolean

  constructor(message: string, scope: DgtErrorScope, retryable: boolean, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.scope = scope
    this.retryable = retryable
  }
}

/** I/O failure, device removal or a broken frame header. Always ends the connection. */
export class TransportError extends DgtError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'transport', true, options)
  }
}

export function toTransportError(err: unknown, what: string): TransportError {
  if (err instanceof TransportError) return err
  const message = err instanceof Error ? err.message : String(err)
  return new TransportError(`${what}: ${message}`, { cause: err })
}

export class FramingError extends TransportError {}

export class TransportClosedError extends TransportError {
  constructor(path: string) {
    super(`serial port ${path} is closed`)
  }
}

export class ExclusiveLockError extends TransportError {}

/** A frame that cannot be interpreted. The frame is dropped and processing continues. */
export class ProtocolDecodeError extends DgtError {
  readonly messageId: number | null

  constructor(message: string, messageId: number | null = null) {
    super(message, 'protocol', false)
    this.messageId = messageId
  }
}

export interface CandidateFailure {
  path: string
  reason: string
}

export class NoCandidateAvailableError extends DgtError {
  readonly failures: CandidateFailure[]

  constructor(failures: CandidateFailure[]) {
    const detail =
      failures.length === 0
        ? 'no candidate ports matched'
        : failures.map((f) => `${f.path}: ${f.reason}`).join('; ')
    super(`no DGT board could be opened (${detail})`, 'connect', true)
    this.failures = failures
  }
}

/** Invalid caller input, e.g. malformed board notation passed to a setter. */
export class ConfigurationError extends DgtError {
  constructor(message: string) {
    super(message, 'config', false)
  }
}

export class ConnectionLostError extends DgtError {
  constructor(message = 'connection to the DGT board was lost') {
    super(message, 'connection', true)
  }
}

export class ConnectionClosedError extends DgtError {
  constructor(message = 'connection to the DGT board was closed') {
    super(message, 'connection', false)
  }
}

export function toBoardError(err: unknown, fallbackScope: DgtErrorScope = 'unknown'): DgtBoardError {
  const at = Date.now()
  if (err instanceof DgtError) {
    return { at, scope: err.scope, message: err.message, retryable: err.retryable }
  }
  if (err instanceof Error) return { at, scope: fallbackScope, message: err.message }
  if (typeof err === 'string') return { at, scope: fallbackScope, message: err }
  return { at, scope: fallbackScope, message: 'unknown error' }
}
