import type { DgtBoardConfig, DgtDriverPreference } from './types.js'

/* -------------------------------------------------------------------------- */
/*  Env parsing helpers (strict + predictable)                                */
/* -------------------------------------------------------------------------- */

function envString(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
  const v = env[name]
  if (v == null) return fallback
  const t = v.trim()
  return t.length === 0 ? fallback : t
}

function envInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]
  if (raw == null || raw === '') return fallback
  const n = Number.parseInt(raw, 10)
  return Number.isFinite(n) ? n : fallback
}

function envBool(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = env[name]
  if (raw == null || raw === '') return fallback
  const v = raw.trim().toLowerCase()
  if (v === '1' || v === 'true' || v === 'yes' || v === 'on') return true
  if (v === '0' || v === 'false' || v === 'no' || v === 'off') return false
  return fallback
}

function envList(env: NodeJS.ProcessEnv, name: string, fallback: string[]): string[] {
  const raw = env[name]
  if (raw == null) return fallback
  const items = raw
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
  return items.length > 0 ? items : fallback
}

function envDriver(env: NodeJS.ProcessEnv, name: string, fallback: DgtDriverPreference): DgtDriverPreference {
  const v = envString(env, name, fallback).toLowerCase()
  if (v === 'auto' || v === 'reactor' || v === 'threaded') return v
  return fallback
}

export function clampInt(n: number, min: number, max: number): number {
  if (!Number.isFinite(n)) return min
  return Math.max(min, Math.min(max, n))
}

/* -------------------------------------------------------------------------- */
/*  DGT board config builder                                                  */
/* -------------------------------------------------------------------------- */

export const DEFAULT_DGT_PORTS = ['/dev/ttyACM*']

export function buildDgtBoardConfigFromEnv(env: NodeJS.ProcessEnv): DgtBoardConfig {
  // The board only speaks 9600 8N1.
  const baudRate = clampInt(envInt(env, 'DGT_BAUD', 9600), 300, 2_000_000)

  const baseDelayMs = clampInt(envInt(env, 'DGT_RECONNECT_BASE_DELAY_MS', 500), 1, 60_000)
  const maxDelayMs = clampInt(envInt(env, 'DGT_RECONNECT_MAX_DELAY_MS', 10_000), baseDelayMs, 300_000)

  return {
    ports: envList(env, 'DGT_PORTS', DEFAULT_DGT_PORTS),
    baudRate,
    lockPort: envBool(env, 'DGT_LOCK_PORT', false),
    driver: envDriver(env, 'DGT_DRIVER', 'auto'),
    reconnect: { baseDelayMs, maxDelayMs },
    autoConnect: envBool(env, 'DGT_AUTO_CONNECT', true),
    queryTimeoutMs: clampInt(envInt(env, 'DGT_QUERY_TIMEOUT_MS', 5_000), 100, 120_000),
    state: {
      maxErrorHistory: clampInt(envInt(env, 'DGT_STATE_MAX_ERROR_HISTORY', 25), 0, 500),
    },
  }
}

/* -------------------------------------------------------------------------- */
/*  Misc helpers used by the service                                          */
/* -------------------------------------------------------------------------- */

export function sleep(ms: number): Promise<void> {
  const n = Number.isFinite(ms) ? ms : 0
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, n)))
}

export function now(): number {
  return Date.now()
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
