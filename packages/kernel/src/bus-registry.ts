// =============================================================================
// CoBridge - Bus Registry
// =============================================================================
// I2C, SPI and UART bus records, their locks, the simulated devices behind
// them and the UART byte buffers.

import {
  HDR,
  BUS,
  BUS_KIND,
  BUS_ERR,
  BUS_HANDLE,
  NO_PIN,
  MAX_PAYLOAD,
  MAX_I2C_ADDRESS,
  MAX_CHIP_SELECT,
  DEVICE_REGISTER_COUNT,
  UART_BUFFER_SIZE
} from './constants'
import type { BusKind } from './constants'
import { defaultFrequency } from './init'
import type { BusHandle, RegionLayout } from './types'

/** Generation wraps before (generation << 8) leaves the positive i32 range */
const MAX_GENERATION = 0x7fffff

/**
 * Pins a bus is created on. I2C uses `a` = SCL and `b` = SDA;
 * SPI uses `a` = clock, `b` = MOSI and `c` = MISO; UART uses `a` = TX and
 * `b` = RX. An unused pin is NO_PIN.
 */
export interface BusPins {
  a: number
  b?: number
  c?: number
}

export interface BusConfig {
  /** I2C frequency or SPI/UART baudrate, in Hz */
  frequency?: number
  polarity?: number
  phase?: number
  /** Bits per word (SPI) or data bits (UART) */
  bits?: number
  /** UART only: PARITY code */
  parity?: number
  /** UART only */
  stopBits?: number
}

/**
 * Decoded view of one bus record.
 */
export interface BusState {
  kind: BusKind
  generation: number
  enabled: boolean
  lockOwner: number
  neverReset: boolean
  pins: Required<BusPins>
  config: Required<BusConfig>
  lastAddress: number
  lastWriteLength: number
  lastReadLength: number
  /** UART receive buffer fill, 0 for other kinds */
  rxBuffered: number
  /** UART transmit buffer fill, 0 for other kinds */
  txBuffered: number
}

// =============================================================================
// Register Device
// =============================================================================

/**
 * Generic addressable device: 256 byte registers and a cursor.
 *
 * The first byte of a write selects the register; the remaining bytes are
 * stored from there. Reads continue from the cursor. The cursor
 * auto-increments and wraps at 256.
 */
export class RegisterDevice {
  readonly registers: Uint8Array = new Uint8Array(DEVICE_REGISTER_COUNT)
  private cursor = 0

  constructor(initialRegisters?: ArrayLike<number>) {
    if (initialRegisters !== undefined) {
      this.registers.set(Array.from(initialRegisters).slice(0, DEVICE_REGISTER_COUNT))
    }
  }

  write(data: Uint8Array): void {
    if (data.length === 0) return
    this.cursor = data[0]
    let i = 1
    while (i < data.length) {
      this.registers[this.cursor] = data[i]
      this.cursor = (this.cursor + 1) % DEVICE_REGISTER_COUNT
      i = i + 1
    }
  }

  readInto(out: Uint8Array): void {
    let i = 0
    while (i < out.length) {
      out[i] = this.registers[this.cursor]
      this.cursor = (this.cursor + 1) % DEVICE_REGISTER_COUNT
      i = i + 1
    }
  }

  getCursor(): number {
    return this.cursor
  }

  /**
   * Host side: read a register without moving the cursor.
   */
  peek(register: number): number {
    return this.registers[register % DEVICE_REGISTER_COUNT]
  }

  /**
   * Host side: set a register without moving the cursor.
   */
  poke(register: number, value: number): void {
    this.registers[register % DEVICE_REGISTER_COUNT] = value & 0xff
  }
}

// =============================================================================
// Bus Registry
// =============================================================================

/**
 * Bus Registry.
 *
 * Bus records live in the SAB (I2C records first, then SPI, then UART).
 * Handles are `(generation << 8) | index`; `deinit()` and `resetAll()` bump
 * the generation so earlier handles fail with BUS_ERR.INVALID_HANDLE.
 *
 * The lock is a single owner token swapped in with compareExchange. Device
 * maps and UART byte buffers are kept on this side of the boundary, keyed by
 * record index; the UART fill levels are mirrored into the record.
 */
export class BusRegistry {
  private readonly sab: Int32Array
  private readonly baseI32: number
  private readonly baseBytes: number
  readonly i2cCount: number
  readonly spiCount: number
  readonly uartCount: number
  private readonly devices = new Map<number, Map<number, RegisterDevice>>()
  private readonly rx = new Map<number, number[]>()
  private readonly tx = new Map<number, number[]>()

  constructor(buffer: SharedArrayBuffer) {
    this.sab = new Int32Array(buffer)
    this.baseBytes = this.sab[HDR.BUS_TABLE_PTR]
    this.baseI32 = this.baseBytes / 4
    this.i2cCount = this.sab[HDR.I2C_BUS_COUNT]
    this.spiCount = this.sab[HDR.SPI_BUS_COUNT]
    this.uartCount = this.sab[HDR.UART_BUS_COUNT]
  }

  get count(): number {
    return this.i2cCount + this.spiCount + this.uartCount
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Enable the first free record of `kind`.
   *
   * @returns A bus handle (> 0), or BUS_ERR.NO_FREE_BUS
   */
  create(kind: BusKind, pins: BusPins, config: BusConfig = {}): BusHandle {
    const [start, end] = this.rangeOf(kind)
    let index = start
    while (index < end) {
      const rec = this.record(index)
      if (Atomics.compareExchange(this.sab, rec + BUS.ENABLED, 0, 1) === 0) {
        this.sab[rec + BUS.PIN_A] = pins.a
        this.sab[rec + BUS.PIN_B] = pins.b ?? NO_PIN
        this.sab[rec + BUS.PIN_C] = pins.c ?? NO_PIN
        this.sab[rec + BUS.FREQUENCY] = config.frequency ?? defaultFrequency(kind)
        this.sab[rec + BUS.POLARITY] = config.polarity ?? 0
        this.sab[rec + BUS.PHASE] = config.phase ?? 0
        this.sab[rec + BUS.BITS] = config.bits ?? 8
        this.sab[rec + BUS.PARITY] = config.parity ?? 0
        this.sab[rec + BUS.STOP_BITS] = config.stopBits ?? (kind === BUS_KIND.UART ? 1 : 0)
        this.sab[rec + BUS.LAST_ADDRESS] = 0
        this.sab[rec + BUS.LAST_WRITE_LEN] = 0
        this.sab[rec + BUS.LAST_READ_LEN] = 0
        Atomics.store(this.sab, rec + BUS.RX_BUFFERED, 0)
        Atomics.store(this.sab, rec + BUS.TX_BUFFERED, 0)
        Atomics.store(this.sab, rec + BUS.LOCK_OWNER, 0)
        this.devices.set(index, new Map())
        if (kind === BUS_KIND.UART) {
          this.rx.set(index, [])
          this.tx.set(index, [])
        }
        return this.handleOf(index)
      }
      index = index + 1
    }
    return BUS_ERR.NO_FREE_BUS
  }

  /**
   * Disable the bus, drop its devices and invalidate every outstanding handle.
   */
  deinit(handle: BusHandle): number {
    const index = this.indexOf(handle)
    if (index < 0) return index
    this.release(index)
    return BUS_ERR.OK
  }

  /**
   * Record index for a live handle, or BUS_ERR.INVALID_HANDLE.
   */
  indexOf(handle: BusHandle): number {
    if (!Number.isInteger(handle) || handle <= 0) return BUS_ERR.INVALID_HANDLE
    const index = handle & BUS_HANDLE.INDEX_MASK
    const generation = handle >>> BUS_HANDLE.GENERATION_SHIFT
    if (index >= this.count) return BUS_ERR.INVALID_HANDLE
    const rec = this.record(index)
    if (Atomics.load(this.sab, rec + BUS.ENABLED) !== 1) return BUS_ERR.INVALID_HANDLE
    if (Atomics.load(this.sab, rec + BUS.GENERATION) !== generation) return BUS_ERR.INVALID_HANDLE
    return index
  }

  isValid(handle: BusHandle): boolean {
    return this.indexOf(handle) >= 0
  }

  kindOf(handle: BusHandle): BusKind {
    const index = this.indexOf(handle)
    if (index < 0) return BUS_KIND.NONE
    return this.kindAt(index)
  }

  markNeverReset(handle: BusHandle, neverReset: boolean = true): number {
    const index = this.indexOf(handle)
    if (index < 0) return index
    this.sab[this.record(index) + BUS.NEVER_RESET] = neverReset ? 1 : 0
    return BUS_ERR.OK
  }

  /**
   * Release every enabled bus not marked never-reset.
   *
   * @returns Number of buses released
   */
  resetAll(): number {
    let reset = 0
    let index = 0
    while (index < this.count) {
      const rec = this.record(index)
      if (Atomics.load(this.sab, rec + BUS.ENABLED) === 1 && this.sab[rec + BUS.NEVER_RESET] === 0) {
        this.release(index)
        reset = reset + 1
      }
      index = index + 1
    }
    return reset
  }

  // ===========================================================================
  // Locking
  // ===========================================================================

  /**
   * Non-blocking acquire. Not re-entrant: a second call by the same owner
   * fails like any other.
   *
   * @param owner - Positive owner token
   * @returns BUS_ERR.OK, LOCKED or INVALID_HANDLE
   */
  tryLock(handle: BusHandle, owner: number): number {
    const index = this.indexOf(handle)
    if (index < 0) return index
    if (!(owner > 0)) return BUS_ERR.NOT_OWNER
    const previous = Atomics.compareExchange(this.sab, this.record(index) + BUS.LOCK_OWNER, 0, owner)
    return previous === 0 ? BUS_ERR.OK : BUS_ERR.LOCKED
  }

  /**
   * Release a lock held by `owner`.
   *
   * @returns BUS_ERR.OK, NOT_OWNER or INVALID_HANDLE
   */
  unlock(handle: BusHandle, owner: number): number {
    const index = this.indexOf(handle)
    if (index < 0) return index
    if (!(owner > 0)) return BUS_ERR.NOT_OWNER
    const previous = Atomics.compareExchange(this.sab, this.record(index) + BUS.LOCK_OWNER, owner, 0)
    return previous === owner ? BUS_ERR.OK : BUS_ERR.NOT_OWNER
  }

  isLocked(handle: BusHandle): boolean {
    return this.lockOwner(handle) > 0
  }

  /**
   * @returns Owner token, 0 when unlocked, or BUS_ERR.INVALID_HANDLE
   */
  lockOwner(handle: BusHandle): number {
    const index = this.indexOf(handle)
    if (index < 0) return index
    return Atomics.load(this.sab, this.record(index) + BUS.LOCK_OWNER)
  }

  // ===========================================================================
  // Configuration
  // ===========================================================================

  configure(handle: BusHandle, config: BusConfig): number {
    const index = this.indexOf(handle)
    if (index < 0) return index
    const rec = this.record(index)
    if (config.frequency !== undefined) this.sab[rec + BUS.FREQUENCY] = config.frequency
    if (config.polarity !== undefined) this.sab[rec + BUS.POLARITY] = config.polarity
    if (config.phase !== undefined) this.sab[rec + BUS.PHASE] = config.phase
    if (config.bits !== undefined) this.sab[rec + BUS.BITS] = config.bits
    if (config.parity !== undefined) this.sab[rec + BUS.PARITY] = config.parity
    if (config.stopBits !== undefined) this.sab[rec + BUS.STOP_BITS] = config.stopBits
    return BUS_ERR.OK
  }

  state(handle: BusHandle): BusState | null {
    const index = this.indexOf(handle)
    if (index < 0) return null
    const rec = this.record(index)
    return {
      kind: this.kindAt(index),
      generation: Atomics.load(this.sab, rec + BUS.GENERATION),
      enabled: Atomics.load(this.sab, rec + BUS.ENABLED) === 1,
      lockOwner: Atomics.load(this.sab, rec + BUS.LOCK_OWNER),
      neverReset: this.sab[rec + BUS.NEVER_RESET] === 1,
      pins: {
        a: this.sab[rec + BUS.PIN_A],
        b: this.sab[rec + BUS.PIN_B],
        c: this.sab[rec + BUS.PIN_C]
      },
      config: {
        frequency: this.sab[rec + BUS.FREQUENCY],
        polarity: this.sab[rec + BUS.POLARITY],
        phase: this.sab[rec + BUS.PHASE],
        bits: this.sab[rec + BUS.BITS],
        parity: this.sab[rec + BUS.PARITY],
        stopBits: this.sab[rec + BUS.STOP_BITS]
      },
      lastAddress: this.sab[rec + BUS.LAST_ADDRESS],
      lastWriteLength: this.sab[rec + BUS.LAST_WRITE_LEN],
      lastReadLength: this.sab[rec + BUS.LAST_READ_LEN],
      rxBuffered: Atomics.load(this.sab, rec + BUS.RX_BUFFERED),
      txBuffered: Atomics.load(this.sab, rec + BUS.TX_BUFFERED)
    }
  }

  // ===========================================================================
  // Devices
  // ===========================================================================

  /**
   * Attach a simulated device. I2C addresses are 7-bit; SPI devices are
   * keyed by chip-select number (0..255). Replaces any device at `address`.
   * UART buses carry no devices.
   */
  registerDevice(handle: BusHandle, address: number, initialRegisters?: ArrayLike<number>): number {
    const index = this.indexOf(handle)
    if (index < 0) return index
    if (this.kindAt(index) === BUS_KIND.UART) return BUS_ERR.WRONG_KIND
    if (!this.isValidAddress(index, address)) return BUS_ERR.INVALID_ADDRESS
    this.deviceMap(index).set(address, new RegisterDevice(initialRegisters))
    return BUS_ERR.OK
  }

  unregisterDevice(handle: BusHandle, address: number): number {
    const index = this.indexOf(handle)
    if (index < 0) return index
    return this.deviceMap(index).delete(address) ? BUS_ERR.OK : BUS_ERR.NO_DEVICE
  }

  getDevice(handle: BusHandle, address: number): RegisterDevice | null {
    const index = this.indexOf(handle)
    if (index < 0) return null
    return this.deviceMap(index).get(address) ?? null
  }

  /**
   * Addresses that answer on the bus, ascending.
   */
  scan(handle: BusHandle): number[] {
    const index = this.indexOf(handle)
    if (index < 0) return []
    return [...this.deviceMap(index).keys()].sort((a, b) => a - b)
  }

  /**
   * @returns BUS_ERR.OK when a device answers, NO_DEVICE otherwise
   */
  probe(handle: BusHandle, address: number): number {
    const found = this.resolve(handle, address)
    return typeof found === 'number' ? found : BUS_ERR.OK
  }

  writeTo(handle: BusHandle, address: number, data: Uint8Array): number {
    if (data.length > MAX_PAYLOAD) return BUS_ERR.PAYLOAD_OVERFLOW
    const found = this.resolve(handle, address)
    if (typeof found === 'number') return found
    found.device.write(data)
    this.recordTransaction(found.index, address, data.length, 0)
    return BUS_ERR.OK
  }

  readFrom(handle: BusHandle, address: number, out: Uint8Array): number {
    if (out.length > MAX_PAYLOAD) return BUS_ERR.PAYLOAD_OVERFLOW
    const found = this.resolve(handle, address)
    if (typeof found === 'number') return found
    found.device.readInto(out)
    this.recordTransaction(found.index, address, 0, out.length)
    return BUS_ERR.OK
  }

  /**
   * Write then read without releasing the device in between.
   */
  writeThenRead(handle: BusHandle, address: number, data: Uint8Array, out: Uint8Array): number {
    if (data.length > MAX_PAYLOAD || out.length > MAX_PAYLOAD) return BUS_ERR.PAYLOAD_OVERFLOW
    const found = this.resolve(handle, address)
    if (typeof found === 'number') return found
    found.device.write(data)
    found.device.readInto(out)
    this.recordTransaction(found.index, address, data.length, out.length)
    return BUS_ERR.OK
  }

  /**
   * Full-duplex exchange: a write of `data` followed by a read of the same
   * length into `out`.
   */
  transfer(handle: BusHandle, chipSelect: number, data: Uint8Array, out: Uint8Array): number {
    if (out.length !== data.length) return BUS_ERR.PAYLOAD_OVERFLOW
    return this.writeThenRead(handle, chipSelect, data, out)
  }

  // ===========================================================================
  // UART buffers
  // ===========================================================================

  /**
   * Host side: bytes arriving on RX. Bytes beyond UART_BUFFER_SIZE are
   * dropped, as on a full hardware FIFO.
   *
   * @returns Bytes accepted, or a negative BUS_ERR code
   */
  injectRx(handle: BusHandle, data: ArrayLike<number>): number {
    const index = this.uartIndex(handle)
    if (index < 0) return index
    const buffer = this.byteQueue(this.rx, index)
    const accepted = Math.min(data.length, UART_BUFFER_SIZE - buffer.length)
    let i = 0
    while (i < accepted) {
      buffer.push(data[i] & 0xff)
      i = i + 1
    }
    Atomics.store(this.sab, this.record(index) + BUS.RX_BUFFERED, buffer.length)
    return accepted
  }

  /**
   * @returns Bytes waiting on RX, or a negative BUS_ERR code
   */
  rxAvailable(handle: BusHandle): number {
    const index = this.uartIndex(handle)
    if (index < 0) return index
    return this.byteQueue(this.rx, index).length
  }

  /**
   * Move up to `out.length` received bytes into `out`. Never waits.
   *
   * @returns Bytes read, or a negative BUS_ERR code
   */
  readRx(handle: BusHandle, out: Uint8Array): number {
    const index = this.uartIndex(handle)
    if (index < 0) return index
    if (this.sab[this.record(index) + BUS.PIN_B] === NO_PIN) return BUS_ERR.NOT_CONNECTED
    const buffer = this.byteQueue(this.rx, index)
    const count = Math.min(out.length, buffer.length)
    out.set(buffer.splice(0, count))
    Atomics.store(this.sab, this.record(index) + BUS.RX_BUFFERED, buffer.length)
    this.recordTransaction(index, 0, 0, count)
    return count
  }

  clearRx(handle: BusHandle): number {
    const index = this.uartIndex(handle)
    if (index < 0) return index
    this.rx.set(index, [])
    Atomics.store(this.sab, this.record(index) + BUS.RX_BUFFERED, 0)
    return BUS_ERR.OK
  }

  /**
   * Queue bytes for transmission, as many as the transmit buffer has room for.
   *
   * @returns Bytes accepted, or a negative BUS_ERR code
   */
  writeTx(handle: BusHandle, data: Uint8Array): number {
    const index = this.uartIndex(handle)
    if (index < 0) return index
    if (this.sab[this.record(index) + BUS.PIN_A] === NO_PIN) return BUS_ERR.NOT_CONNECTED
    const buffer = this.byteQueue(this.tx, index)
    const accepted = Math.min(data.length, UART_BUFFER_SIZE - buffer.length)
    let i = 0
    while (i < accepted) {
      buffer.push(data[i])
      i = i + 1
    }
    Atomics.store(this.sab, this.record(index) + BUS.TX_BUFFERED, buffer.length)
    this.recordTransaction(index, 0, accepted, 0)
    return accepted
  }

  /**
   * Host side: take everything transmitted since the last call.
   */
  takeTx(handle: BusHandle): Uint8Array {
    const index = this.uartIndex(handle)
    if (index < 0) return new Uint8Array(0)
    const sent = Uint8Array.from(this.byteQueue(this.tx, index))
    this.tx.set(index, [])
    Atomics.store(this.sab, this.record(index) + BUS.TX_BUFFERED, 0)
    return sent
  }

  layout(): RegionLayout {
    return { baseOffset: this.baseBytes, elementSize: BUS.SIZE_BYTES, count: this.count }
  }

  // ===========================================================================
  // Internal
  // ===========================================================================

  private resolve(
    handle: BusHandle,
    address: number
  ): { index: number; device: RegisterDevice } | number {
    const index = this.indexOf(handle)
    if (index < 0) return index
    if (!this.isValidAddress(index, address)) return BUS_ERR.INVALID_ADDRESS
    const device = this.deviceMap(index).get(address)
    if (device === undefined) return BUS_ERR.NO_DEVICE
    return { index, device }
  }

  private recordTransaction(index: number, address: number, written: number, read: number): void {
    const rec = this.record(index)
    this.sab[rec + BUS.LAST_ADDRESS] = address
    this.sab[rec + BUS.LAST_WRITE_LEN] = written
    this.sab[rec + BUS.LAST_READ_LEN] = read
  }

  private release(index: number): void {
    const rec = this.record(index)
    const generation = this.sab[rec + BUS.GENERATION]
    Atomics.store(this.sab, rec + BUS.GENERATION, generation >= MAX_GENERATION ? 1 : generation + 1)
    Atomics.store(this.sab, rec + BUS.LOCK_OWNER, 0)
    this.sab[rec + BUS.NEVER_RESET] = 0
    this.sab[rec + BUS.PIN_A] = NO_PIN
    this.sab[rec + BUS.PIN_B] = NO_PIN
    this.sab[rec + BUS.PIN_C] = NO_PIN
    this.devices.delete(index)
    this.rx.delete(index)
    this.tx.delete(index)
    Atomics.store(this.sab, rec + BUS.RX_BUFFERED, 0)
    Atomics.store(this.sab, rec + BUS.TX_BUFFERED, 0)
    Atomics.store(this.sab, rec + BUS.ENABLED, 0)
  }

  private isValidAddress(index: number, address: number): boolean {
    if (!Number.isInteger(address) || address < 0) return false
    const kind = this.kindAt(index)
    if (kind === BUS_KIND.I2C) return address <= MAX_I2C_ADDRESS
    return kind === BUS_KIND.SPI && address <= MAX_CHIP_SELECT
  }

  private kindAt(index: number): BusKind {
    if (index < this.i2cCount) return BUS_KIND.I2C
    if (index < this.i2cCount + this.spiCount) return BUS_KIND.SPI
    return BUS_KIND.UART
  }

  /**
   * Record indices [start, end) reserved for `kind`.
   */
  private rangeOf(kind: BusKind): [number, number] {
    const spiEnd = this.i2cCount + this.spiCount
    if (kind === BUS_KIND.I2C) return [0, this.i2cCount]
    if (kind === BUS_KIND.SPI) return [this.i2cCount, spiEnd]
    if (kind === BUS_KIND.UART) return [spiEnd, this.count]
    return [0, 0]
  }

  private uartIndex(handle: BusHandle): number {
    const index = this.indexOf(handle)
    if (index < 0) return index
    return this.kindAt(index) === BUS_KIND.UART ? index : BUS_ERR.WRONG_KIND
  }

  private byteQueue(queues: Map<number, number[]>, index: number): number[] {
    let queue = queues.get(index)
    if (queue === undefined) {
      queue = []
      queues.set(index, queue)
    }
    return queue
  }

  private deviceMap(index: number): Map<number, RegisterDevice> {
    let map = this.devices.get(index)
    if (map === undefined) {
      map = new Map()
      this.devices.set(index, map)
    }
    return map
  }

  private handleOf(index: number): BusHandle {
    const generation = Atomics.load(this.sab, this.record(index) + BUS.GENERATION)
    return (generation << BUS_HANDLE.GENERATION_SHIFT) | index
  }

  private record(index: number): number {
    return this.baseI32 + index * BUS.SIZE_I32
  }
}
