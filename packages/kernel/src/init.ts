// =============================================================================
// CoBridge - SAB Initialization
// =============================================================================
// Factory functions for creating and initializing the bridge SharedArrayBuffer.

import {
  BRIDGE_MAGIC,
  BRIDGE_VERSION,
  DEFAULT_SLOT_CAPACITY,
  DEFAULT_PIN_COUNT,
  DEFAULT_I2C_BUS_COUNT,
  DEFAULT_SPI_BUS_COUNT,
  DEFAULT_UART_BUS_COUNT,
  DEFAULT_CPU_FREQUENCY_HZ,
  DEFAULT_I2C_FREQUENCY,
  DEFAULT_SPI_BAUDRATE,
  DEFAULT_UART_BAUDRATE,
  HDR,
  CLOCK,
  CLOCK_OFFSET,
  CLOCK_MODE,
  SLOT,
  SLOT_STATUS,
  SLOT_TABLE_OFFSET,
  PIN,
  ANALOG,
  ANALOG_MID_SCALE,
  BUS,
  BUS_KIND,
  NO_PIN,
  TICKS_PER_MS,
  INVALID_ID,
  BUS_HANDLE,
  calculateBridgeSize,
  getPinTableOffset,
  getAnalogTableOffset,
  getBusTableOffset
} from './constants'
import type { BusKind, ClockMode } from './constants'
import type { BridgeConfig } from './types'

/**
 * Default configuration values.
 */
export const DEFAULT_BRIDGE_CONFIG: Required<BridgeConfig> = {
  slotCapacity: DEFAULT_SLOT_CAPACITY,
  pinCount: DEFAULT_PIN_COUNT,
  i2cBusCount: DEFAULT_I2C_BUS_COUNT,
  spiBusCount: DEFAULT_SPI_BUS_COUNT,
  uartBusCount: DEFAULT_UART_BUS_COUNT,
  clockMode: CLOCK_MODE.REALTIME,
  cpuFrequencyHz: DEFAULT_CPU_FREQUENCY_HZ
}

/**
 * Create and initialize a new SharedArrayBuffer for the bridge.
 *
 * The buffer is fully initialized with:
 * - Magic number, version and region offsets
 * - Clock at tick 0 in the configured mode, timeouts enabled
 * - Every request slot Idle, id generator at 1
 * - Every pin disabled, input, no pull
 * - Every bus record disabled at generation 1 (I2C, then SPI, then UART)
 *
 * @param config - Optional configuration overrides
 * @returns Initialized SharedArrayBuffer
 */
export function createBridgeSAB(config?: BridgeConfig): SharedArrayBuffer {
  const cfg = { ...DEFAULT_BRIDGE_CONFIG, ...config }

  if (cfg.slotCapacity < 1 || cfg.pinCount < 1 || cfg.pinCount > 0xff) {
    throw new Error('slotCapacity must be >= 1 and pinCount in 1..255')
  }
  const busCount = cfg.i2cBusCount + cfg.spiBusCount + cfg.uartBusCount
  if (busCount > BUS_HANDLE.INDEX_MASK + 1) {
    throw new Error('At most 256 bus records')
  }

  const buffer = new SharedArrayBuffer(calculateBridgeSize(cfg.slotCapacity, cfg.pinCount, busCount))
  const sab = new Int32Array(buffer)

  initializeHeader(sab, cfg)
  initializeClock(buffer, cfg.clockMode, cfg.cpuFrequencyHz)
  initializeSlots(sab, cfg.slotCapacity)
  initializePins(buffer, cfg.slotCapacity, cfg.pinCount)
  initializeBuses(sab, cfg)

  return buffer
}

/**
 * Check that a buffer carries a bridge layout this build understands.
 */
export function validateBridgeSAB(buffer: SharedArrayBuffer): boolean {
  if (buffer.byteLength < SLOT_TABLE_OFFSET) return false
  const sab = new Int32Array(buffer)
  return sab[HDR.MAGIC] === BRIDGE_MAGIC && sab[HDR.VERSION] === BRIDGE_VERSION
}

/**
 * Read the layout configuration back from an initialized buffer.
 */
export function getBridgeConfig(buffer: SharedArrayBuffer): Required<BridgeConfig> {
  const sab = new Int32Array(buffer)
  const clockI32 = sab[HDR.CLOCK_PTR] / 4
  return {
    slotCapacity: sab[HDR.SLOT_CAPACITY],
    pinCount: sab[HDR.PIN_COUNT],
    i2cBusCount: sab[HDR.I2C_BUS_COUNT],
    spiBusCount: sab[HDR.SPI_BUS_COUNT],
    uartBusCount: sab[HDR.UART_BUS_COUNT],
    clockMode: toClockMode(Atomics.load(sab, clockI32 + CLOCK.MODE / 4)),
    cpuFrequencyHz: sab[clockI32 + CLOCK.CPU_FREQUENCY_HZ / 4]
  }
}

function toClockMode(raw: number): ClockMode {
  if (raw === CLOCK_MODE.MANUAL) return CLOCK_MODE.MANUAL
  if (raw === CLOCK_MODE.FAST_FORWARD) return CLOCK_MODE.FAST_FORWARD
  return CLOCK_MODE.REALTIME
}

function initializeHeader(sab: Int32Array, cfg: Required<BridgeConfig>): void {
  sab[HDR.MAGIC] = BRIDGE_MAGIC
  sab[HDR.VERSION] = BRIDGE_VERSION

  sab[HDR.SLOT_CAPACITY] = cfg.slotCapacity
  sab[HDR.SLOT_TABLE_PTR] = SLOT_TABLE_OFFSET
  sab[HDR.PIN_COUNT] = cfg.pinCount
  sab[HDR.PIN_TABLE_PTR] = getPinTableOffset(cfg.slotCapacity)
  sab[HDR.ANALOG_TABLE_PTR] = getAnalogTableOffset(cfg.slotCapacity, cfg.pinCount)
  sab[HDR.I2C_BUS_COUNT] = cfg.i2cBusCount
  sab[HDR.SPI_BUS_COUNT] = cfg.spiBusCount
  sab[HDR.UART_BUS_COUNT] = cfg.uartBusCount
  sab[HDR.BUS_TABLE_PTR] = getBusTableOffset(cfg.slotCapacity, cfg.pinCount)
  sab[HDR.CLOCK_PTR] = CLOCK_OFFSET
  sab[HDR.TICKS_PER_MS] = TICKS_PER_MS

  // Counters and id generator are owned by RequestTable.init(); start them clean here too
  sab[HDR.NEXT_REQUEST_ID] = 1
  let i: number = HDR.STAT_TOTAL
  while (i <= HDR.STAT_RETRACTED) {
    sab[i] = 0
    i = i + 1
  }
}

function initializeClock(buffer: SharedArrayBuffer, mode: ClockMode, cpuFrequencyHz: number): void {
  const sab64 = new BigInt64Array(buffer)
  const sab = new Int32Array(buffer)
  const base64 = CLOCK_OFFSET / 8
  const baseI32 = CLOCK_OFFSET / 4

  sab64[base64 + CLOCK.RAW_TICKS / 8] = 0n
  sab64[base64 + CLOCK.YIELD_COUNT / 8] = 0n
  sab64[base64 + CLOCK.HEARTBEAT_COUNT / 8] = 0n
  sab64[base64 + CLOCK.MODE_BASELINE / 8] = 0n
  sab[baseI32 + CLOCK.MODE / 4] = mode
  sab[baseI32 + CLOCK.TICK_ENABLED / 4] = 1
  sab[baseI32 + CLOCK.CPU_FREQUENCY_HZ / 4] = cpuFrequencyHz
}

/**
 * Zero every slot record. Status Idle and id INVALID_ID are both 0.
 */
export function initializeSlots(sab: Int32Array, slotCapacity: number): void {
  const startI32 = SLOT_TABLE_OFFSET / 4
  const totalI32 = (slotCapacity * SLOT.SIZE_BYTES) / 4
  let i = 0
  while (i < totalI32) {
    sab[startI32 + i] = 0
    i = i + 1
  }

  let slot = 0
  while (slot < slotCapacity) {
    const base = startI32 + (slot * SLOT.SIZE_BYTES) / 4
    Atomics.store(sab, base + SLOT.STATUS / 4, SLOT_STATUS.IDLE)
    Atomics.store(sab, base + SLOT.REQUEST_ID / 4, INVALID_ID)
    slot = slot + 1
  }
}

function initializePins(buffer: SharedArrayBuffer, slotCapacity: number, pinCount: number): void {
  const bytes = new Uint8Array(buffer)
  const u16 = new Uint16Array(buffer)
  const pinBase = getPinTableOffset(slotCapacity)
  const analogBase = getAnalogTableOffset(slotCapacity, pinCount)

  let pin = 0
  while (pin < pinCount) {
    // All-zero pin record: disabled, input, no pull, push-pull, nothing injected
    bytes.fill(0, pinBase + pin * PIN.SIZE_BYTES, pinBase + (pin + 1) * PIN.SIZE_BYTES)

    const analog = analogBase + pin * ANALOG.SIZE_BYTES
    u16[(analog + ANALOG.VALUE) / 2] = ANALOG_MID_SCALE
    bytes[analog + ANALOG.IS_OUTPUT] = 0
    bytes[analog + ANALOG.ENABLED] = 0
    pin = pin + 1
  }
}

function initializeBuses(sab: Int32Array, cfg: Required<BridgeConfig>): void {
  const baseI32 = getBusTableOffset(cfg.slotCapacity, cfg.pinCount) / 4
  const spiEnd = cfg.i2cBusCount + cfg.spiBusCount
  const busCount = spiEnd + cfg.uartBusCount

  let index = 0
  while (index < busCount) {
    const rec = baseI32 + index * BUS.SIZE_I32
    const kind = index < cfg.i2cBusCount ? BUS_KIND.I2C : index < spiEnd ? BUS_KIND.SPI : BUS_KIND.UART
    sab[rec + BUS.KIND] = kind
    sab[rec + BUS.GENERATION] = 1
    sab[rec + BUS.ENABLED] = 0
    sab[rec + BUS.LOCK_OWNER] = 0
    sab[rec + BUS.NEVER_RESET] = 0
    sab[rec + BUS.PIN_A] = NO_PIN
    sab[rec + BUS.PIN_B] = NO_PIN
    sab[rec + BUS.PIN_C] = NO_PIN
    sab[rec + BUS.FREQUENCY] = defaultFrequency(kind)
    sab[rec + BUS.POLARITY] = 0
    sab[rec + BUS.PHASE] = 0
    sab[rec + BUS.BITS] = 8
    sab[rec + BUS.LAST_ADDRESS] = 0
    sab[rec + BUS.LAST_WRITE_LEN] = 0
    sab[rec + BUS.LAST_READ_LEN] = 0
    sab[rec + BUS.RX_BUFFERED] = 0
    sab[rec + BUS.TX_BUFFERED] = 0
    sab[rec + BUS.PARITY] = 0
    sab[rec + BUS.STOP_BITS] = kind === BUS_KIND.UART ? 1 : 0
    index = index + 1
  }
}

/**
 * Frequency a bus record of `kind` starts with.
 */
export function defaultFrequency(kind: BusKind): number {
  if (kind === BUS_KIND.I2C) return DEFAULT_I2C_FREQUENCY
  if (kind === BUS_KIND.UART) return DEFAULT_UART_BAUDRATE
  return DEFAULT_SPI_BAUDRATE
}
