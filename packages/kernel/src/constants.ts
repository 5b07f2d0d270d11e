// =============================================================================
// CoBridge - Shared Memory Constants
// =============================================================================
// Memory layout, status codes and opcodes for the interpreter/host bridge.

/**
 * Magic number identifying a bridge SAB: "CBDG" as ASCII bytes.
 */
export const BRIDGE_MAGIC = 0x43424447

/**
 * Current bridge layout version.
 */
export const BRIDGE_VERSION = 0x01

/**
 * Request id reserved for "no request". Never issued.
 */
export const INVALID_ID = 0

/**
 * Highest request id before the generator wraps back to 1.
 */
export const MAX_REQUEST_ID = 0x7fffffff

/**
 * Maximum params or response payload carried by one slot, in bytes.
 */
export const MAX_PAYLOAD = 256

/**
 * Raw clock ticks per millisecond (32 kHz crystal).
 */
export const TICKS_PER_MS = 32

/**
 * Defaults used by createBridgeSAB().
 */
export const DEFAULT_SLOT_CAPACITY = 32
export const DEFAULT_PIN_COUNT = 64
export const DEFAULT_I2C_BUS_COUNT = 8
export const DEFAULT_SPI_BUS_COUNT = 4
export const DEFAULT_UART_BUS_COUNT = 2
export const DEFAULT_CPU_FREQUENCY_HZ = 48_000_000

// =============================================================================
// PHYSICAL MEMORY MAP
// =============================================================================
/**
 * SharedArrayBuffer Memory Layout
 *
 * All offsets in bytes. Region offsets are stored in the header so a host can
 * locate them without sharing this module.
 *
 * ┌─────────────────────────────────────────────────────────────────────┐
 * │ HEADER (0-127)                                         128 bytes    │
 * ├────────┬───────────┬────────────────────┬───────────────────────────┤
 * │ 0      │ 0         │ MAGIC              │ 0x43424447                │
 * │ 4      │ 1         │ VERSION            │ Layout version            │
 * │ 8      │ 2         │ SLOT_CAPACITY      │ Request slots             │
 * │ 12     │ 3         │ SLOT_TABLE_PTR     │ Slot region offset        │
 * │ 16     │ 4         │ PIN_COUNT          │ Addressable pins          │
 * │ 20     │ 5         │ PIN_TABLE_PTR      │ Pin region offset         │
 * │ 24     │ 6         │ ANALOG_TABLE_PTR   │ Analog region offset      │
 * │ 28     │ 7         │ I2C_BUS_COUNT      │ I2C bus records           │
 * │ 32     │ 8         │ SPI_BUS_COUNT      │ SPI bus records           │
 * │ 36     │ 9         │ BUS_TABLE_PTR      │ Bus region offset         │
 * │ 40     │ 10        │ CLOCK_PTR          │ Clock region offset       │
 * │ 44     │ 11        │ NEXT_REQUEST_ID    │ [ATOMIC] id generator     │
 * │ 48-76  │ 12-19     │ STAT_*             │ [ATOMIC] table counters   │
 * │ 80     │ 20        │ TICKS_PER_MS       │ Clock divisor             │
 * │ 84     │ 21        │ UART_BUS_COUNT     │ UART bus records          │
 * ├─────────────────────────────────────────────────────────────────────┤
 * │ CLOCK (128-191)                                         64 bytes    │
 * ├─────────────────────────────────────────────────────────────────────┤
 * │ [+0] RAW_TICKS i64 │ [+8] YIELD_COUNT i64 │ [+16] HEARTBEATS i64    │
 * │ [+24] MODE_BASELINE i64 │ [+32] MODE │ [+36] TICK_ENABLED │ [+40] HZ │
 * ├─────────────────────────────────────────────────────────────────────┤
 * │ REQUEST SLOTS (192+)                       slotCapacity × 544 bytes │
 * ├─────────────────────────────────────────────────────────────────────┤
 * │ [+0] KIND u32 │ [+4] STATUS u32 │ [+8] REQUEST_ID u32               │
 * │ [+12] PARAMS_LEN │ [+16] PARAMS[256] │ [+272] RESPONSE_LEN          │
 * │ [+276] RESPONSE[256] │ [+532] ERROR_CODE i32 │ [+536] ISSUED_AT_MS  │
 * │ [+540] FLAGS                                                        │
 * ├─────────────────────────────────────────────────────────────────────┤
 * │ PIN TABLE                                      pinCount × 8 bytes   │
 * │ ANALOG TABLE                                   pinCount × 4 bytes   │
 * │ BUS TABLE (I2C, then SPI, then UART records)   busCount × 80 bytes  │
 * └─────────────────────────────────────────────────────────────────────┘
 *
 * OWNERSHIP:
 * - Interpreter side writes KIND, PARAMS, ISSUED_AT and moves Idle → Pending
 * - Host side writes RESPONSE, ERROR_CODE and moves Pending → Complete/Error
 * - STATUS is always written last (Atomics.store) so the reader that observes
 *   a new status also observes the payload written before it
 */

// =============================================================================
// Header Offsets - i32 indices
// =============================================================================

export const HDR = {
  MAGIC: 0,
  VERSION: 1,
  SLOT_CAPACITY: 2,
  /** Byte offset to slot region */
  SLOT_TABLE_PTR: 3,
  PIN_COUNT: 4,
  /** Byte offset to pin region */
  PIN_TABLE_PTR: 5,
  /** Byte offset to analog region */
  ANALOG_TABLE_PTR: 6,
  I2C_BUS_COUNT: 7,
  SPI_BUS_COUNT: 8,
  /** Byte offset to bus region */
  BUS_TABLE_PTR: 9,
  /** Byte offset to clock region */
  CLOCK_PTR: 10,
  /** [ATOMIC] Next request id to hand out (monotonic, starts at 1) */
  NEXT_REQUEST_ID: 11,
  /** [ATOMIC] Requests issued since init */
  STAT_TOTAL: 12,
  /** [ATOMIC] Slots currently Pending */
  STAT_PENDING: 13,
  /** [ATOMIC] Requests completed by the host */
  STAT_COMPLETED: 14,
  /** [ATOMIC] Requests failed by the host */
  STAT_ERRORS: 15,
  /** [ATOMIC] Allocations refused because every slot was live */
  STAT_QUEUE_FULL: 16,
  /** [ATOMIC] Slots freed while still Pending, or flagged after a timeout */
  STAT_ABANDONED: 17,
  /** [ATOMIC] Abandoned slots reclaimed by the reaper */
  STAT_REAPED: 18,
  /** [ATOMIC] Retract notices sent to the host */
  STAT_RETRACTED: 19,
  TICKS_PER_MS: 20,
  UART_BUS_COUNT: 21
} as const

export const HEADER_SIZE_BYTES = 128

// =============================================================================
// Clock Region - byte offsets
// =============================================================================

export const CLOCK = {
  /** [ATOMIC] i64 raw 32 kHz tick counter, never decreases */
  RAW_TICKS: 0,
  /** [ATOMIC] i64 cooperative yields observed */
  YIELD_COUNT: 8,
  /** [ATOMIC] i64 heartbeat quanta received */
  HEARTBEAT_COUNT: 16,
  /** [ATOMIC] i64 raw tick value at the last mode switch */
  MODE_BASELINE: 24,
  /** [ATOMIC] i32 CLOCK_MODE */
  MODE: 32,
  /** [ATOMIC] i32 1 = timeouts evaluated, 0 = waits unbounded */
  TICK_ENABLED: 36,
  /** i32 virtual CPU frequency in Hz */
  CPU_FREQUENCY_HZ: 40,
  SIZE_BYTES: 64
} as const

export const CLOCK_OFFSET = HEADER_SIZE_BYTES

export const CLOCK_MODE = {
  /** Heartbeat driven, 1:1 with wall clock */
  REALTIME: 0,
  /** Advanced explicitly, step by step */
  MANUAL: 1,
  /** Advanced explicitly; sleeps skip ahead instantly */
  FAST_FORWARD: 2
} as const

// =============================================================================
// Request Slot - byte offsets within one record
// =============================================================================

export const SLOT = {
  KIND: 0,
  /** [ATOMIC] SLOT_STATUS */
  STATUS: 4,
  /** [ATOMIC] Correlation id (0 = none) */
  REQUEST_ID: 8,
  PARAMS_LEN: 12,
  PARAMS: 16,
  RESPONSE_LEN: 16 + MAX_PAYLOAD,
  RESPONSE: 20 + MAX_PAYLOAD,
  ERROR_CODE: 20 + MAX_PAYLOAD * 2,
  /** Virtual ms at allocation, for the reaper */
  ISSUED_AT_MS: 24 + MAX_PAYLOAD * 2,
  /** [ATOMIC] SLOT_FLAG bits */
  FLAGS: 28 + MAX_PAYLOAD * 2,
  SIZE_BYTES: 32 + MAX_PAYLOAD * 2
} as const

export const SLOT_TABLE_OFFSET = CLOCK_OFFSET + CLOCK.SIZE_BYTES

export const SLOT_STATUS = {
  IDLE: 0,
  PENDING: 1,
  COMPLETE: 2,
  ERROR: 3
} as const

export const SLOT_FLAG = {
  /** Delivered to the host */
  SENT: 1 << 0,
  /** Caller stopped waiting; nobody will read the result */
  ABANDONED: 1 << 1,
  /** Host was told to drop the request */
  RETRACTED: 1 << 2
} as const

// =============================================================================
// Pin Record - byte offsets (u8 fields)
// =============================================================================

export const PIN = {
  /** Output latch, last written output value */
  VALUE: 0,
  DIRECTION: 1,
  PULL: 2,
  DRIVE: 3,
  /** 1 = claimed, 0 = disabled */
  ENABLED: 4,
  NEVER_RESET: 5,
  /** Externally injected input level */
  INPUT_VALUE: 6,
  /** 1 when INPUT_VALUE holds an injected level */
  INPUT_INJECTED: 7,
  SIZE_BYTES: 8
} as const

export const DIRECTION = {
  INPUT: 0,
  OUTPUT: 1
} as const

export const PULL = {
  NONE: 0,
  UP: 1,
  DOWN: 2
} as const

export const DRIVE_MODE = {
  PUSH_PULL: 0,
  OPEN_DRAIN: 1
} as const

// =============================================================================
// Analog Record - byte offsets
// =============================================================================

export const ANALOG = {
  /** u16 ADC reading or DAC output */
  VALUE: 0,
  IS_OUTPUT: 2,
  ENABLED: 3,
  SIZE_BYTES: 4
} as const

/** ADC mid-scale, the reading of an input nobody has driven */
export const ANALOG_MID_SCALE = 32768

// =============================================================================
// Bus Record - i32 indices within one record
// =============================================================================

export const BUS = {
  KIND: 0,
  /** Bumped on every deinit/reset; part of the handle */
  GENERATION: 1,
  ENABLED: 2,
  /** [ATOMIC] 0 = unlocked, otherwise the owner token */
  LOCK_OWNER: 3,
  NEVER_RESET: 4,
  /** SCL (I2C), clock (SPI) or TX (UART) */
  PIN_A: 5,
  /** SDA (I2C), MOSI (SPI) or RX (UART) */
  PIN_B: 6,
  /** MISO (SPI), NO_PIN otherwise */
  PIN_C: 7,
  /** Frequency (I2C) or baudrate (SPI, UART) in Hz */
  FREQUENCY: 8,
  POLARITY: 9,
  PHASE: 10,
  BITS: 11,
  LAST_ADDRESS: 12,
  LAST_WRITE_LEN: 13,
  LAST_READ_LEN: 14,
  /** UART: bytes waiting in the receive buffer */
  RX_BUFFERED: 15,
  /** UART: bytes written and not yet drained by the host */
  TX_BUFFERED: 16,
  /** UART: PARITY */
  PARITY: 17,
  /** UART: 1 or 2 */
  STOP_BITS: 18,
  SIZE_I32: 20,
  SIZE_BYTES: 80
} as const

export const BUS_KIND = {
  NONE: 0,
  I2C: 1,
  SPI: 2,
  UART: 3
} as const

export const PARITY = {
  NONE: 0,
  EVEN: 1,
  ODD: 2
} as const

/** Pin field value for "not assigned" */
export const NO_PIN = 0xff

export const BUS_HANDLE = {
  INDEX_MASK: 0xff,
  GENERATION_SHIFT: 8
} as const

/** Highest 7-bit I2C address */
export const MAX_I2C_ADDRESS = 0x7f

/** Highest SPI chip-select number */
export const MAX_CHIP_SELECT = 0xff

export const DEFAULT_I2C_FREQUENCY = 100_000
export const DEFAULT_SPI_BAUDRATE = 250_000
export const DEFAULT_UART_BAUDRATE = 9600

/** Capacity of each UART receive and transmit buffer */
export const UART_BUFFER_SIZE = 512

/** Register space of one simulated device */
export const DEVICE_REGISTER_COUNT = 256

// =============================================================================
// Operation Kinds (wire discriminant)
// =============================================================================

export const OP = {
  GPIO_SET: 1,
  GPIO_GET: 2,
  GPIO_SET_DIRECTION: 3,
  GPIO_SET_PULL: 4,
  ANALOG_READ: 12,
  ANALOG_WRITE: 13,
  I2C_WRITE: 22,
  I2C_READ: 23,
  I2C_WRITE_READ: 24,
  I2C_PROBE: 25,
  SPI_TRANSFER: 32,
  SPI_WRITE: 33,
  SPI_READ: 34,
  SPI_CONFIGURE: 35,
  TIME_SLEEP: 40,
  TIME_GET_MONOTONIC: 41,
  UART_WRITE: 50,
  UART_READ: 51,
  UART_SET_BAUDRATE: 52,
  UART_RX_AVAILABLE: 53,
  UART_CLEAR_RX: 54
} as const

// =============================================================================
// Zero-Allocation Error Codes
// =============================================================================

/**
 * RequestTable error codes. allocate() returns a positive id or one of these.
 */
export const TABLE_ERR = {
  OK: 0,
  /** Every slot is live */
  QUEUE_FULL: -1,
  /** Id is 0, stale, or its slot is Idle */
  INVALID_HANDLE: -2,
  /** Payload larger than MAX_PAYLOAD */
  PAYLOAD_OVERFLOW: -3,
  /** Status change not allowed from the current status */
  INVALID_TRANSITION: -4
} as const

export const CLOCK_ERR = {
  OK: 0,
  /** Operation not valid in the current CLOCK_MODE */
  WRONG_MODE: -1,
  NEGATIVE_DELTA: -2
} as const

export const PIN_ERR = {
  OK: 0,
  INVALID_PIN: -1,
  /** Pin is not claimed */
  DISABLED: -2,
  /** Pin is already claimed */
  IN_USE: -3,
  /** Output write on an input pin (or analog write on an ADC) */
  WRONG_DIRECTION: -4
} as const

export const BUS_ERR = {
  OK: 0,
  /** Handle never issued or made stale by deinit/reset */
  INVALID_HANDLE: -1,
  NO_FREE_BUS: -2,
  /** Held by another owner */
  LOCKED: -3,
  NOT_OWNER: -4,
  /** No device answers at the address (NACK) */
  NO_DEVICE: -5,
  INVALID_ADDRESS: -6,
  PAYLOAD_OVERFLOW: -7,
  /** Operation not supported by this kind of bus */
  WRONG_KIND: -8,
  /** UART direction without a pin */
  NOT_CONNECTED: -9
} as const

/**
 * errno-style codes a host reports through HostPort.error().
 */
export const HOST_ERR = {
  IO: 5,
  BUSY: 16,
  NO_DEVICE: 19,
  INVALID: 22,
  UNSUPPORTED: 95
} as const

// =============================================================================
// Memory calculation
// =============================================================================

export function getPinTableOffset(slotCapacity: number): number {
  return SLOT_TABLE_OFFSET + slotCapacity * SLOT.SIZE_BYTES
}

export function getAnalogTableOffset(slotCapacity: number, pinCount: number): number {
  return getPinTableOffset(slotCapacity) + pinCount * PIN.SIZE_BYTES
}

/**
 * Bus records are i32-addressed, so the region is rounded up to 8 bytes.
 */
export function getBusTableOffset(slotCapacity: number, pinCount: number): number {
  const end = getAnalogTableOffset(slotCapacity, pinCount) + pinCount * ANALOG.SIZE_BYTES
  return (end + 7) & ~7
}

export function calculateBridgeSize(
  slotCapacity: number,
  pinCount: number,
  busCount: number
): number {
  return getBusTableOffset(slotCapacity, pinCount) + busCount * BUS.SIZE_BYTES
}

// =============================================================================
// Type Exports
// =============================================================================

export type Opcode = (typeof OP)[keyof typeof OP]
export type SlotStatus = (typeof SLOT_STATUS)[keyof typeof SLOT_STATUS]
export type ClockMode = (typeof CLOCK_MODE)[keyof typeof CLOCK_MODE]
export type Direction = (typeof DIRECTION)[keyof typeof DIRECTION]
export type Pull = (typeof PULL)[keyof typeof PULL]
export type DriveMode = (typeof DRIVE_MODE)[keyof typeof DRIVE_MODE]
export type BusKind = (typeof BUS_KIND)[keyof typeof BUS_KIND]
export type Parity = (typeof PARITY)[keyof typeof PARITY]
export type HostErrorCode = (typeof HOST_ERR)[keyof typeof HOST_ERR]

// =============================================================================
// Narrowing
// =============================================================================

const OPCODES: ReadonlySet<number> = new Set<number>(Object.values(OP))

export function isOpcode(value: number): value is Opcode {
  return OPCODES.has(value)
}

export function toSlotStatus(raw: number): SlotStatus {
  if (raw === SLOT_STATUS.PENDING) return SLOT_STATUS.PENDING
  if (raw === SLOT_STATUS.COMPLETE) return SLOT_STATUS.COMPLETE
  if (raw === SLOT_STATUS.ERROR) return SLOT_STATUS.ERROR
  return SLOT_STATUS.IDLE
}
