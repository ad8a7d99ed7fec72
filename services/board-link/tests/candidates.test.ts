import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'

import { afterEach, beforeEach, describe, it, expect } from 'vitest'

import {
  SerialCandidateSource,
  StaticCandidateSource,
  globToRegExp,
  hasWildcard,
  uniquePaths,
} from '../src/devices/dgt-board/transport/candidates.js'

describe('path patterns', () => {
  it('supports * and ? and nothing else', () => {
    expect(globToRegExp('/dev/ttyACM*').test('/dev/ttyACM12')).toBe(true)
    expect(globToRegExp('/dev/ttyUSB?').test('/dev/ttyUSB0')).toBe(true)
    expect(globToRegExp('/dev/ttyUSB?').test('/dev/ttyUSB10')).toBe(false)
    expect(globToRegExp('/dev/tty.usb(1)').test('/dev/tty.usb(1)')).toBe(true)
    expect(globToRegExp('/dev/tty.usb').test('/dev/ttyXusb')).toBe(false)
  })

  it('detects wildcards', () => {
    expect(hasWildcard('COM3')).toBe(false)
    expect(hasWildcard('/dev/ttyACM*')).toBe(true)
  })

  it('keeps the first of each duplicate', () => {
    expect(uniquePaths(['b', 'a', 'b', 'c', 'a'])).toEqual(['b', 'a', 'c'])
  })
})

describe('StaticCandidateSource', () => {
  it('lists the given paths once each, in order', async () => {
    const source = new StaticCandidateSource(['no-such-device', 'validdevice', 'no-such-device'])
    await expect(source.list()).resolves.toEqual(['no-such-device', 'validdevice'])
  })
})

describe('SerialCandidateSource', () => {
  let dir = ''

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'dgt-candidates-'))
    for (const name of ['ttyACM1', 'ttyACM0', 'ttyUSB0']) {
      await fs.writeFile(path.join(dir, name), '')
    }
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it('puts sorted filesystem matches first, then matching enumerated ports', async () => {
    const lister = {
      list: async () => [
        { path: path.join(dir, 'ttyACM1') },
        { path: '/dev/ttyS0' },
        { path: 'COM3' },
        { path: path.join(dir, 'ttyACM7') },
      ],
    }
    const source = new SerialCandidateSource([path.join(dir, 'ttyACM*'), 'COM3'], lister)

    await expect(source.list()).resolves.toEqual([
      path.join(dir, 'ttyACM0'),
      path.join(dir, 'ttyACM1'),
      'COM3',
      path.join(dir, 'ttyACM7'),
    ])
  })

  it('includes literal paths that exist', async () => {
    const literal = path.join(dir, 'ttyUSB0')
    const source = new SerialCandidateSource([' ', literal], { list: async () => [] })
    await expect(source.list()).resolves.toEqual([literal])
  })

  it('returns nothing when no pattern matches', async () => {
    const source = new SerialCandidateSource([path.join(dir, 'missing', 'tty*')], { list: async () => [] })
    await expect(source.list()).resolves.toEqual([])
  })
})
