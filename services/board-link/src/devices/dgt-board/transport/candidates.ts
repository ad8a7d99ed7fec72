import fs from 'node:fs/promises'
import path from 'node:path'
import { SerialPort } from 'serialport'

import type { CandidateSource } from './types.js'

/** `*` and `?` wildcards; everything else matches literally. */
export function globToRegExp(glob: string): RegExp {
  let out = ''
  for (const c of glob) {
    if (c === '*') out += '.*'
    else if (c === '?') out += '.'
    else out += c.replace(/[\\^$.+()|[\]{}]/g, '\\$&')
  }
  return new RegExp(`^${out}$`)
}

export function hasWildcard(pattern: string): boolean {
  return /[*?]/.test(pattern)
}

/** Keep the first occurrence of each path, preserving order. */
export function uniquePaths(paths: Iterable<string>): string[] {
  const seen = new Set<string>()
  const out: string[] = []
  for (const p of paths) {
    if (seen.has(p)) continue
    seen.add(p)
    out.push(p)
  }
  return out
}

export class StaticCandidateSource implements CandidateSource {
  private readonly paths: string[]

  constructor(paths: string[]) {
    this.paths = uniquePaths(paths)
  }

  async list(): Promise<string[]> {
    return [...this.paths]
  }
}

export interface SerialPortLister {
  list(): Promise<Array<{ path: string }>>
}

/**
 * Candidates from path patterns like `/dev/ttyACM*` or `COM3`.
 *
 * Filesystem matches of each pattern come first (in pattern order), then
 * any port reported by `SerialPort.list()` that matches one of the patterns.
 */
export class SerialCandidateSource implements CandidateSource {
  private readonly patterns: string[]
  private readonly lister: SerialPortLister

  constructor(patterns: string[], lister: SerialPortLister = SerialPort) {
    this.patterns = patterns.filter((p) => p.trim() !== '').map((p) => p.trim())
    this.lister = lister
  }

  async list(): Promise<string[]> {
    const found: string[] = []

    for (const pattern of this.patterns) {
      found.push(...(await this.matchFilesystem(pattern)))
    }

    const matchers = this.patterns.map(globToRegExp)
    const ports = await this.lister.list()
    for (const port of ports) {
      if (matchers.some((re) => re.test(port.path))) found.push(port.path)
    }

    return uniquePaths(found)
  }

  private async matchFilesystem(pattern: string): Promise<string[]> {
    if (!hasWildcard(pattern)) {
      try {
        await fs.access(pattern)
        return [pattern]
      } catch {
        return []
      }
    }

    const dir = path.dirname(pattern)
    if (hasWildcard(dir)) return []

    const re = globToRegExp(path.basename(pattern))
    try {
      const entries = await fs.readdir(dir)
      return entries
        .filter((name) => re.test(name))
        .sort()
        .map((name) => path.join(dir, name))
    } catch {
      return []
    }
  }
}
