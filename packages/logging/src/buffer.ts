import {
    type ClientLog,
    type ClientLogBuffer,
    type ClientLogListener
} from './types.js'

const DEFAULT_LIMIT = 500

/**
 * Fixed-capacity ring of the newest client log lines. Once full, each push
 * overwrites the oldest slot.
 */
export function makeClientBuffer(limit: number = Number(process.env.CLIENT_LOGS_TO_KEEP ?? DEFAULT_LIMIT)): ClientLogBuffer {
    const capacity = Number.isFinite(limit) && limit > 0 ? Math.floor(limit) : DEFAULT_LIMIT
    const ring: Array<ClientLog | undefined> = new Array<ClientLog | undefined>(capacity)
    const listeners = new Set<ClientLogListener>()

    let next = 0   // slot the next push writes
    let count = 0

    const push = (log: ClientLog): void => {
        ring[next] = log
        next = (next + 1) % capacity
        count = Math.min(count + 1, capacity)

        for (const l of listeners) {
            l(log)
        }
    }

    // oldest first
    const getLatest = (n: number): ClientLog[] => {
        if (!Number.isFinite(n) || n <= 0) return []
        const take = Math.min(Math.floor(n), count)
        const out: ClientLog[] = []
        for (let i = take; i > 0; i--) {
            const entry = ring[(next - i + capacity) % capacity]
            if (entry) out.push(entry)
        }
        return out
    }

    const subscribe = (listener: ClientLogListener): () => void => {
        listeners.add(listener)
        return () => { listeners.delete(listener) }
    }

    return { push, getLatest, subscribe, size: () => count }
}
