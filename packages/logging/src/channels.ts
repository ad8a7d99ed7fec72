import { type ChannelColor, LogChannel } from './types.js'

export const CHANNELS: Record<LogChannel, { emoji: string, color: ChannelColor }> = {
    [LogChannel.app]:     { emoji: '📦', color: 'blue' },
    [LogChannel.request]: { emoji: '📝', color: 'purple' },
    // Port open/close, candidate scans, driver selection
    [LogChannel.serial]:  { emoji: '🔌', color: 'yellow' },
    [LogChannel.board]:   { emoji: '♟️', color: 'cyan' },
    [LogChannel.clock]:   { emoji: '⏱️', color: 'green' },
}

export const ANSI: Record<ChannelColor, string> = {
    blue: '\x1b[34m',
    yellow: '\x1b[33m',
    green: '\x1b[32m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    red: '\x1b[31m',
    white: '\x1b[37m',
    purple: '\x1b[95m' // bright magenta (purple-ish)
}

export const RESET = '\x1b[0m'

export function isLogChannel(value: unknown): value is LogChannel {
    return typeof value === 'string' && Object.prototype.hasOwnProperty.call(CHANNELS, value)
}
