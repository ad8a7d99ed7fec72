import fs from 'node:fs'
import path from 'node:path'
import { config as dotenvConfig } from 'dotenv'
import type { FastifyInstance } from 'fastify'
import { buildApp } from './app.js'
import {
    createLogger,
    LogChannel
} from '@dgtlink/logging'

/**
 * Load environment variables with a clear precedence:
 *   1) .env
 *   2) .env.{NODE_ENV}
 *   3) .env.local
 * Later files override earlier ones.
 */
(function loadEnv() {
    const cwd = process.cwd()
    const env = String(process.env.NODE_ENV || 'development')
    const files = [
        path.resolve(cwd, '.env'),
        path.resolve(cwd, `.env.${env}`),
        path.resolve(cwd, '.env.local')
    ]

    for (const file of files) {
        if (fs.existsSync(file)) {
            dotenvConfig({ path: file, override: true })
        }
    }
})()

function errMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}

async function start() {
    const { channel } = createLogger('board-link')
    const logApp = channel(LogChannel.app)

    const PORT = Number(process.env.API_PORT ?? 3000)
    const HOST = process.env.API_HOST ?? '0.0.0.0'

    let app: FastifyInstance | null = null

    try {
        app = buildApp()
        await app.listen({ port: PORT, host: HOST })

        const env = process.env.NODE_ENV ?? 'development'
        logApp.info(`listening host=${HOST} port=${PORT} env=${env}`)

        const cfg = app.dgtBoardConfig
        logApp.info(
            `board config ports=${cfg.ports.join(',')} baud=${cfg.baudRate} driver=${cfg.driver} lock=${cfg.lockPort ? 'true' : 'false'}`
        )

        // Graceful shutdown
        const running = app
        const shutdown = async (signal: NodeJS.Signals) => {
            try {
                logApp.info(`received ${signal}, shutting down`)
                await running.close()
                logApp.info('board-link closed')
                process.exit(0)
            } catch (err) {
                logApp.error('error during shutdown', { err: errMessage(err) })
                process.exit(1)
            }
        }
        process.on('SIGINT', () => void shutdown('SIGINT'))
        process.on('SIGTERM', () => void shutdown('SIGTERM'))
    } catch (err) {
        logApp.error(`failed to start err="${errMessage(err)}"`)
        if (app) {
            await app.close().catch((closeErr: unknown) => {
                logApp.error(`error closing after failed start err="${errMessage(closeErr)}"`)
            })
        }
        process.exit(1)
    }
}

void start()
