import type { ReadinessLoop, SerialTransport } from './types.js'

interface Registration {
  callback: () => void
  scheduled: boolean
  unsubscribe: () => void
}

/**
 * ReadinessLoop on top of Node's own event loop.
 *
 * Transports announce `readable` / `writable` / `error` / `closed`; callbacks
 * run from `setImmediate`, never synchronously inside the notification, and
 * are re-armed while the condition still holds. A closed port stays
 * readable until the reader is removed, so a `closed` signal that lands in
 * an already scheduled read is not lost.
 */
export class NodeReadinessLoop implements ReadinessLoop {
  private readonly readers = new Map<SerialTransport, Registration>()
  private readonly writers = new Map<SerialTransport, Registration>()

  addReader(transport: SerialTransport, callback: () => void): void {
    this.removeReader(transport)

    const reg: Registration = { callback, scheduled: false, unsubscribe: () => undefined }
    reg.unsubscribe = transport.subscribe((signal) => {
      // A failed or vanished port reports as readable so the next read surfaces the error.
      if (signal.kind !== 'writable') this.scheduleReader(transport, reg)
    })
    this.readers.set(transport, reg)

    if (transport.bytesAvailable() > 0 || !transport.isOpen) {
      this.scheduleReader(transport, reg)
    }
  }

  removeReader(transport: SerialTransport): void {
    const reg = this.readers.get(transport)
    if (!reg) return
    this.readers.delete(transport)
    reg.unsubscribe()
  }

  addWriter(transport: SerialTransport, callback: () => void): void {
    const existing = this.writers.get(transport)
    if (existing) {
      existing.callback = callback
      return
    }

    const reg: Registration = { callback, scheduled: false, unsubscribe: () => undefined }
    reg.unsubscribe = transport.subscribe((signal) => {
      if (signal.kind === 'writable') this.scheduleWriter(transport, reg)
    })
    this.writers.set(transport, reg)
    this.scheduleWriter(transport, reg)
  }

  removeWriter(transport: SerialTransport): void {
    const reg = this.writers.get(transport)
    if (!reg) return
    this.writers.delete(transport)
    reg.unsubscribe()
  }

  callSoon(callback: () => void): void {
    setImmediate(callback)
  }

  /** Number of transports with a registered writer. */
  get activeWriters(): number {
    return this.writers.size
  }

  private scheduleReader(transport: SerialTransport, reg: Registration): void {
    if (reg.scheduled) return
    reg.scheduled = true

    setImmediate(() => {
      reg.scheduled = false
      if (this.readers.get(transport) !== reg) return
      reg.callback()
      if (this.readers.get(transport) === reg && (transport.bytesAvailable() > 0 || !transport.isOpen)) {
        this.scheduleReader(transport, reg)
      }
    })
  }

  private scheduleWriter(transport: SerialTransport, reg: Registration): void {
    if (reg.scheduled) return
    // Wait for the port's `writable` signal instead of spinning on a full buffer.
    if (transport.isOpen && !transport.canWrite()) return
    reg.scheduled = true

    setImmediate(() => {
      reg.scheduled = false
      if (this.writers.get(transport) !== reg) return
      reg.callback()
      if (this.writers.get(transport) === reg) this.scheduleWriter(transport, reg)
    })
  }
}
