import Fastify, {
    type FastifyInstance,
    type FastifyServerOptions,
    type FastifyRequest,
    type FastifyReply
} from 'fastify'
import cors from '@fastify/cors'

import {
    createLogger,
    makeClientBuffer,
    LogChannel,
    type ClientLogBuffer
} from '@dgtlink/logging'

import dgtBoardPlugin, { type DgtBoardPluginOptions } from './plugins/dgtBoard.js'
import boardRoutes from './routes/board.js'

declare module 'fastify' {
    interface FastifyInstance {
        clientBuf: ClientLogBuffer
    }
}

interface LogsQuery {
    n?: string
}

export interface BuildAppOptions {
    fastify?: FastifyServerOptions
    board?: DgtBoardPluginOptions
    clientBuf?: ClientLogBuffer
}

// ---- Request logging config (env) ----
const REQUEST_VERBOSE = String(process.env.REQUEST_VERBOSE ?? 'false').toLowerCase() === 'true'
const REQUEST_SAMPLE = Math.max(1, Number(process.env.REQUEST_SAMPLE ?? '1') || 1)
// --------------------------------------

const DEFAULT_LOGS_N = 100

export function buildApp(opts: BuildAppOptions = {}): FastifyInstance {
    const clientBuf = opts.clientBuf ?? makeClientBuffer()
    const { channel } = createLogger('board-link', clientBuf)
    const logApp = channel(LogChannel.app)
    const logReq = channel(LogChannel.request)

    const startedAt = new Map<string, number>()
    let reqCounter = 0

    const app = Fastify({ logger: false, ...opts.fastify })
    app.decorate('clientBuf', clientBuf)

    // CORS
    void app.register(cors, { origin: true })

    // Board link (creates app.dgtBoard and the state slice), then its routes
    void app.register(dgtBoardPlugin, opts.board ?? {})
    void app.register(boardRoutes)

    // ---------- Request/Response logging hooks ----------
    app.addHook('onRequest', async (req: FastifyRequest) => {
        const shouldLog = ++reqCounter % REQUEST_SAMPLE === 0
        if (!shouldLog) return

        startedAt.set(req.id, Date.now())
        logReq.info(`${req.method} ${req.url}`)

        if (REQUEST_VERBOSE) {
            logReq.debug('request detail', { id: req.id, ip: req.ip })
        }
    })

    app.addHook('onResponse', async (req: FastifyRequest, reply: FastifyReply) => {
        const start = startedAt.get(req.id)
        if (start === undefined) return
        startedAt.delete(req.id)

        const ms = Date.now() - start
        logReq.info(`${req.method} ${req.url} → ${reply.statusCode} (${ms} ms)`)
    })
    // ---------------------------------------------------

    // Health
    app.get('/health', async () => ({ status: 'ok' }))

    app.get('/version', async () => ({ name: 'board-link', version: '0.1.0' }))

    // Recent client logs, oldest first
    app.get<{ Querystring: LogsQuery }>('/api/logs', async (req) => {
        const raw = Number.parseInt(req.query.n ?? '', 10)
        const n = Number.isFinite(raw) ? raw : DEFAULT_LOGS_N
        return { kept: clientBuf.size(), logs: clientBuf.getLatest(n) }
    })

    logApp.info('board-link app built')
    return app
}
