import type { DgtDriverPreference } from '../types.js'
import { ReactorDriver } from './ReactorDriver.js'
import { ThreadedDriver } from './ThreadedDriver.js'
import type { DriverDeps, DriverKind, IODriver } from './types.js'

/**
 * Serial handles on Windows have no readiness notification, so they get
 * the threaded driver; every other platform uses the reactor. Decided once
 * per process.
 */
export function selectDriverKind(
  preference: DgtDriverPreference = 'auto',
  platform: NodeJS.Platform = process.platform
): DriverKind {
  if (preference !== 'auto') return preference
  return platform === 'win32' ? 'threaded' : 'reactor'
}

export function createDriver(kind: DriverKind, deps: DriverDeps): IODriver {
  switch (kind) {
    case 'reactor':
      return new ReactorDriver(deps)
    case 'threaded':
      return new ThreadedDriver(deps)
  }
}
