import type { FastifyPluginAsync, FastifyReply } from 'fastify'

import {
  ConfigurationError,
  ConnectionClosedError,
  ConnectionLostError,
} from '../devices/dgt-board/errors.js'

export class QueryTimeoutError extends Error {
  constructor(ms: number) {
    super(`no answer from the board within ${ms} ms`)
    this.name = 'QueryTimeoutError'
  }
}

/**
 * Bound a suspendable board call. The call itself keeps waiting for its
 * response; only this caller gives up.
 */
export function withTimeout<T>(work: Promise<T>, ms: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new QueryTimeoutError(ms)), ms)
    work.then(
      (value) => {
        clearTimeout(timer)
        resolve(value)
      },
      (err: unknown) => {
        clearTimeout(timer)
        reject(err)
      }
    )
  })
}

export function statusForError(err: unknown): number {
  if (err instanceof ConfigurationError) return 400
  if (err instanceof ConnectionLostError || err instanceof ConnectionClosedError) return 503
  if (err instanceof QueryTimeoutError) return 504
  return 500
}

interface BeepBody {
  seconds: number
}

interface TextBody {
  text: string
  longText?: string
}

const boardRoutes: FastifyPluginAsync = async (app) => {
  const board = app.dgtBoard
  const timeoutMs = app.dgtBoardConfig.queryTimeoutMs

  async function run<T>(reply: FastifyReply, work: () => Promise<T>): Promise<T | { ok: false; error: string }> {
    try {
      return await withTimeout(work(), timeoutMs)
    } catch (err) {
      reply.code(statusForError(err))
      return { ok: false, error: err instanceof Error ? err.message : String(err) }
    }
  }

  app.get('/api/board/state', async () => app.getDgtBoardState())

  app.get('/api/board', async (_req, reply) =>
    run(reply, async () => {
      const state = await board.getBoard()
      return { fen: state.fen(), diagram: state.toString() }
    })
  )

  app.get('/api/board/version', async (_req, reply) =>
    run(reply, async () => ({ version: await board.getVersion() }))
  )

  app.get('/api/board/serial-number', async (_req, reply) =>
    run(reply, async () => ({ serialNumber: await board.getSerialNumber() }))
  )

  app.get('/api/board/long-serial-number', async (_req, reply) =>
    run(reply, async () => ({ longSerialNumber: await board.getLongSerialNumber() }))
  )

  app.get('/api/board/battery', async (_req, reply) =>
    run(reply, async () => ({ batteryStatus: await board.getBatteryStatus() }))
  )

  app.post('/api/board/reset', async (_req, reply) =>
    run(reply, async () => {
      await board.resetBoardMode()
      return { ok: true }
    })
  )

  app.get('/api/clock/version', async (_req, reply) =>
    run(reply, async () => ({ version: await board.getClockVersion() }))
  )

  app.post<{ Body: BeepBody }>(
    '/api/clock/beep',
    {
      schema: {
        body: {
          type: 'object',
          required: ['seconds'],
          properties: { seconds: { type: 'number', minimum: 0 } },
        },
      },
    },
    async (req, reply) =>
      run(reply, async () => {
        await board.clockBeep(req.body.seconds)
        return { ok: true }
      })
  )

  app.post<{ Body: TextBody }>(
    '/api/clock/text',
    {
      schema: {
        body: {
          type: 'object',
          required: ['text'],
          properties: {
            text: { type: 'string' },
            longText: { type: 'string' },
          },
        },
      },
    },
    async (req, reply) =>
      run(reply, async () => {
        await board.clockText(req.body.text, req.body.longText)
        return { ok: true }
      })
  )
}

export default boardRoutes
