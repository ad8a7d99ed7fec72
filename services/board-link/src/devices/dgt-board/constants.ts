/* -------------------------------------------------------------------------- */
/*  DGT wire protocol constants                                               */
/* -------------------------------------------------------------------------- */

// Board commands (single byte, host -> board)
export const DGT_SEND_RESET = 0x40
export const DGT_SEND_BRD = 0x42
export const DGT_SEND_UPDATE_NICE = 0x4b
export const DGT_RETURN_SERIALNR = 0x45
export const DGT_SEND_BATTERY_STATUS = 0x4c
export const DGT_SEND_VERSION = 0x4d
export const DGT_RETURN_LONG_SERIALNR = 0x55

// Board messages (board -> host), always received with MESSAGE_BIT set
export const MESSAGE_BIT = 0x80

export const DGT_MSG_BOARD_DUMP = MESSAGE_BIT | 0x06
export const DGT_MSG_BWTIME = MESSAGE_BIT | 0x0d
export const DGT_MSG_FIELD_UPDATE = MESSAGE_BIT | 0x0e
export const DGT_MSG_SERIALNR = MESSAGE_BIT | 0x11
export const DGT_MSG_VERSION = MESSAGE_BIT | 0x13
export const DGT_MSG_BATTERY_STATUS = MESSAGE_BIT | 0x20
export const DGT_MSG_LONG_SERIALNR = MESSAGE_BIT | 0x22

/** Size of the `[id][len_hi][len_lo]` header; the declared length includes it. */
export const FRAME_HEADER_LENGTH = 3

// Clock frames: [0x2b][len][0x03][sub][...args][0x00]
export const DGT_CLOCK_MESSAGE = 0x2b
export const DGT_CLOCK_START_MESSAGE = 0x03
export const DGT_CLOCK_END_MESSAGE = 0x00
export const DGT_CLOCK_DISPLAY = 0x01
export const DGT_CLOCK_SEND_VERSION = 0x09
export const DGT_CLOCK_BEEP = 0x0b
export const DGT_CLOCK_ASCII = 0x0c

// Clock acknowledgement decoding
export const CLOCK_ACK_NIBBLE = 0x0a
export const CLOCK_ACK_SENTINEL = 0x10
export const CLOCK_ACK_BUTTON = 0x88
export const CLOCK_ACK_VERSION = 0x09

export const CLOCK_BEEP_INTERVAL_MS = 64
export const CLOCK_BEEP_MAX_SECONDS = 10

export const BOARD_SQUARES = 64

export const PIECE_TO_CHAR: Readonly<Record<number, string>> = {
  0x01: 'P',
  0x02: 'R',
  0x03: 'N',
  0x04: 'B',
  0x05: 'K',
  0x06: 'Q',
  0x07: 'p',
  0x08: 'r',
  0x09: 'n',
  0x0a: 'b',
  0x0b: 'k',
  0x0c: 'q',
}

export const CHAR_TO_PIECE: Readonly<Record<string, number | undefined>> = Object.fromEntries(
  Object.entries(PIECE_TO_CHAR).map(([code, ch]) => [ch, Number(code)])
)
