import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'

import { createLogger, LogChannel, type ChannelLogger } from '@dgtlink/logging'

import { DgtBoardService, type DgtBoardServiceDeps } from '../devices/dgt-board/DgtBoardService.js'
import type {
  DgtBoardConfig,
  DgtBoardEvent,
  DgtBoardEventSink,
  DgtBoardStateSlice,
} from '../devices/dgt-board/types.js'
import { buildDgtBoardConfigFromEnv } from '../devices/dgt-board/utils.js'
import { DgtBoardStateAdapter } from '../adapters/dgtBoard.adapter.js'

// ---- Fastify decoration ----------------------------------------------------

declare module 'fastify' {
  interface FastifyInstance {
    dgtBoard: DgtBoardService
    dgtBoardConfig: DgtBoardConfig
    getDgtBoardState: () => DgtBoardStateSlice
  }
}

export interface DgtBoardPluginOptions {
  /** Defaults to the config built from process.env. */
  config?: DgtBoardConfig
  /** Collaborator overrides (candidate source, transport, loop); tests use these. */
  deps?: Omit<DgtBoardServiceDeps, 'events'>
}

// ---- Event sink using service logging --------------------------------------

function hex(id: number | null): string {
  return id === null ? 'none' : `0x${id.toString(16).padStart(2, '0')}`
}

function fmtSeconds(total: number): string {
  const h = Math.floor(total / 3600)
  const m = Math.floor((total % 3600) / 60)
  const s = total % 60
  return `${h}:${String(m).padStart(2, '0')}:${String(s).padStart(2, '0')}`
}

export class DgtBoardLoggerEventSink implements DgtBoardEventSink {
  private readonly logSerial: ChannelLogger
  private readonly logBoard: ChannelLogger
  private readonly logClock: ChannelLogger

  constructor(app: FastifyInstance) {
    const { channel } = createLogger('dgt-board', app.clientBuf)
    this.logSerial = channel(LogChannel.serial)
    this.logBoard = channel(LogChannel.board)
    this.logClock = channel(LogChannel.clock)
  }

  publish(evt: DgtBoardEvent): void {
    switch (evt.kind) {
      case 'board-connecting': {
        this.logSerial.debug(`kind=${evt.kind} candidates=${evt.candidates.join(',') || '(none)'}`)
        break
      }
      case 'board-connected': {
        this.logSerial.info(
          `kind=${evt.kind} path=${evt.path} driver=${evt.driver} exclusive=${evt.exclusive ? 'true' : 'false'}`
        )
        break
      }
      case 'board-disconnected': {
        const line = `kind=${evt.kind} path=${evt.path} reason=${evt.reason}`
        if (evt.reason === 'explicit-close') this.logSerial.info(line)
        else this.logSerial.warn(`${line} error=${evt.error?.message ?? 'unknown'}`)
        break
      }
      case 'board-connect-failed': {
        // retried silently; visible at debug level only
        this.logSerial.debug(`kind=${evt.kind} error=${evt.error.message}`)
        break
      }
      case 'board-reconnect-scheduled': {
        this.logSerial.debug(`kind=${evt.kind} attempt=${evt.attempt} delayMs=${evt.delayMs}`)
        break
      }
      case 'board-closed': {
        this.logSerial.info(`kind=${evt.kind}`)
        break
      }
      case 'port-lock-failed': {
        this.logSerial.warn(`kind=${evt.kind} path=${evt.path} error=${evt.error.message}`)
        break
      }
      case 'frame-ignored': {
        this.logSerial.debug(`kind=${evt.kind} id=${hex(evt.id)}`)
        break
      }
      case 'board-changed': {
        this.logBoard.debug(`kind=${evt.kind} source=${evt.source} fen=${evt.board.fen()}`)
        break
      }
      case 'board-info': {
        const log = evt.field === 'clockVersion' ? this.logClock : this.logBoard
        log.info(`kind=${evt.kind} ${evt.field}=${evt.value}`)
        break
      }
      case 'protocol-error': {
        this.logBoard.warn(`kind=${evt.kind} id=${hex(evt.messageId)} error=${evt.error.message}`)
        break
      }
      case 'clock-changed': {
        const { leftSeconds, rightSeconds, leftLeverDown } = evt.clock
        this.logClock.debug(
          `kind=${evt.kind} left=${fmtSeconds(leftSeconds)} right=${fmtSeconds(rightSeconds)} lever=${leftLeverDown ? 'left' : 'right'}`
        )
        break
      }
      case 'clock-button-pressed': {
        this.logClock.info(`kind=${evt.kind} button=${evt.button}`)
        break
      }
      case 'clock-text-truncated': {
        this.logClock.warn(`kind=${evt.kind} width=${evt.width} text=${JSON.stringify(evt.text)}`)
        break
      }
      case 'recoverable-error': {
        this.logSerial.warn(`kind=${evt.kind} scope=${evt.error.scope} error=${evt.error.message}`)
        break
      }
    }
  }
}

export class FanoutDgtBoardEventSink implements DgtBoardEventSink {
  private readonly sinks: DgtBoardEventSink[]
  private readonly onSinkError: (err: unknown) => void

  constructor(sinks: DgtBoardEventSink[], onSinkError: (err: unknown) => void) {
    this.sinks = sinks
    this.onSinkError = onSinkError
  }

  publish(evt: DgtBoardEvent): void {
    for (const sink of this.sinks) {
      try {
        sink.publish(evt)
      } catch (err) {
        // one failing sink must not starve the others or reach the driver
        this.onSinkError(err)
      }
    }
  }
}

// ---- Plugin implementation -------------------------------------------------

const dgtBoardPlugin: FastifyPluginAsync<DgtBoardPluginOptions> = async (
  app: FastifyInstance,
  opts: DgtBoardPluginOptions
) => {
  const { channel } = createLogger('dgt-board-plugin', app.clientBuf)
  const logPlugin = channel(LogChannel.app)

  const cfg = opts.config ?? buildDgtBoardConfigFromEnv(process.env)

  const loggerSink = new DgtBoardLoggerEventSink(app)
  const stateAdapter = new DgtBoardStateAdapter({ maxErrorHistory: cfg.state.maxErrorHistory })

  const events = new FanoutDgtBoardEventSink(
    [loggerSink, { publish: (evt) => stateAdapter.handle(evt) }],
    (err) => {
      logPlugin.warn('board event sink failed', {
        err: err instanceof Error ? err.message : String(err),
      })
    }
  )

  const svc = new DgtBoardService(cfg, { ...opts.deps, events })

  app.decorate('dgtBoard', svc)
  app.decorate('dgtBoardConfig', cfg)
  app.decorate('getDgtBoardState', () => stateAdapter.getState())

  app.addHook('onReady', async () => {
    if (!cfg.autoConnect) {
      logPlugin.info('board auto-connect disabled')
      return
    }
    logPlugin.info(`starting board link ports=${cfg.ports.join(',')} driver=${svc.getState().driver}`)
    svc.autoConnect()
  })

  app.addHook('onClose', async () => {
    logPlugin.info('stopping board link')
    await svc.close().catch((err: unknown) => {
      logPlugin.warn('error stopping board link', {
        err: err instanceof Error ? err.message : String(err),
      })
    })
  })
}

export default fp(dgtBoardPlugin, {
  name: 'dgt-board-plugin',
})
