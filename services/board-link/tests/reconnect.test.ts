import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'

import { ReconnectSupervisor, backoffDelay } from '../src/devices/dgt-board/reconnect.js'

describe('backoffDelay', () => {
  it('doubles from the base delay up to the cap', () => {
    const cfg = { baseDelayMs: 500, maxDelayMs: 10_000 }
    expect([1, 2, 3, 4, 5, 6, 7].map((n) => backoffDelay(cfg, n))).toEqual([
      500, 1000, 2000, 4000, 8000, 10_000, 10_000,
    ])
  })
})

describe('ReconnectSupervisor', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('retries with growing delays until stopped', async () => {
    const scheduled: Array<[number, number]> = []
    const failed: unknown[] = []
    const attempt = vi.fn(() => Promise.reject(new Error('no board')))
    const sup = new ReconnectSupervisor(
      { baseDelayMs: 500, maxDelayMs: 3000 },
      {
        attempt,
        onAttemptFailed: (err) => failed.push(err),
        onScheduled: (n, delay) => scheduled.push([n, delay]),
        onHookError: () => undefined,
      }
    )

    sup.start()
    await vi.advanceTimersByTimeAsync(0)
    expect(attempt).toHaveBeenCalledTimes(1)
    expect(scheduled).toEqual([[1, 500]])

    await vi.advanceTimersByTimeAsync(499)
    expect(attempt).toHaveBeenCalledTimes(1)
    await vi.advanceTimersByTimeAsync(1)
    expect(attempt).toHaveBeenCalledTimes(2)

    await vi.advanceTimersByTimeAsync(1000)
    await vi.advanceTimersByTimeAsync(2000)
    await vi.advanceTimersByTimeAsync(3000)
    await vi.advanceTimersByTimeAsync(0)
    expect(attempt).toHaveBeenCalledTimes(5)
    expect(scheduled).toEqual([
      [1, 500],
      [2, 1000],
      [3, 2000],
      [4, 3000],
      [5, 3000],
    ])
    expect(failed).toHaveLength(5)
    expect(sup.active).toBe(true)

    sup.stop()
    await vi.advanceTimersByTimeAsync(60_000)
    expect(attempt).toHaveBeenCalledTimes(5)
    expect(sup.active).toBe(false)
    expect(sup.isStopped).toBe(true)
  })

  it('goes idle after a success and starts over from the base delay', async () => {
    const scheduled: Array<[number, number]> = []
    const attempt = vi.fn<() => Promise<string>>()
    attempt.mockRejectedValueOnce(new Error('no board')).mockResolvedValue('/dev/ttyACM0')
    const sup = new ReconnectSupervisor(
      { baseDelayMs: 500, maxDelayMs: 3000 },
      {
        attempt,
        onAttemptFailed: () => undefined,
        onScheduled: (n, delay) => scheduled.push([n, delay]),
        onHookError: () => undefined,
      }
    )

    sup.start()
    await vi.advanceTimersByTimeAsync(500)
    await vi.advanceTimersByTimeAsync(0)
    expect(attempt).toHaveBeenCalledTimes(2)
    expect(sup.active).toBe(false)

    attempt.mockRejectedValueOnce(new Error('unplugged'))
    sup.start()
    await vi.advanceTimersByTimeAsync(0)
    expect(scheduled).toEqual([
      [1, 500],
      [1, 500],
    ])
    sup.stop()
  })

  it('drops the result of a pass that finishes after stop', async () => {
    let rejectPass: (err: Error) => void = () => undefined
    const attempt = vi.fn(
      () =>
        new Promise<never>((_resolve, reject) => {
          rejectPass = reject
        })
    )
    const onAttemptFailed = vi.fn()
    const onScheduled = vi.fn()
    const sup = new ReconnectSupervisor(
      { baseDelayMs: 500, maxDelayMs: 3000 },
      { attempt, onAttemptFailed, onScheduled, onHookError: vi.fn() }
    )

    sup.start()
    sup.stop()
    rejectPass(new Error('closed'))
    await vi.advanceTimersByTimeAsync(5000)

    expect(attempt).toHaveBeenCalledTimes(1)
    expect(onAttemptFailed).not.toHaveBeenCalled()
    expect(onScheduled).not.toHaveBeenCalled()
  })

  it('never starts again once stopped', async () => {
    const attempt = vi.fn(() => Promise.resolve('/dev/ttyACM0'))
    const sup = new ReconnectSupervisor(
      { baseDelayMs: 500, maxDelayMs: 3000 },
      { attempt, onAttemptFailed: () => undefined, onScheduled: () => undefined, onHookError: () => undefined }
    )

    sup.stop()
    sup.start()
    await vi.advanceTimersByTimeAsync(0)
    expect(attempt).not.toHaveBeenCalled()
  })

  it('keeps retrying when a hook throws', async () => {
    const hookErrors: unknown[] = []
    const attempt = vi.fn(() => Promise.reject(new Error('no board')))
    const sup = new ReconnectSupervisor(
      { baseDelayMs: 500, maxDelayMs: 3000 },
      {
        attempt,
        onAttemptFailed: () => {
          throw new Error('sink broke')
        },
        onScheduled: () => {
          throw new Error('sink broke again')
        },
        onHookError: (err) => hookErrors.push(err),
      }
    )

    sup.start()
    await vi.advanceTimersByTimeAsync(0)
    await vi.advanceTimersByTimeAsync(500)
    await vi.advanceTimersByTimeAsync(0)

    expect(attempt).toHaveBeenCalledTimes(2)
    expect(hookErrors.map((e) => (e instanceof Error ? e.message : e))).toEqual([
      'sink broke',
      'sink broke again',
      'sink broke',
      'sink broke again',
    ])
    expect(sup.active).toBe(true)
    sup.stop()
  })
})
