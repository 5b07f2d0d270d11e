// =============================================================================
// CoBridge - Pin Registry
// =============================================================================
// Digital pin state, one 8-byte record per pin at a stable offset.

import { HDR, PIN, PIN_ERR, DIRECTION, PULL, DRIVE_MODE } from './constants'
import type { Direction, Pull, DriveMode } from './constants'
import type { RegionLayout } from './types'

/**
 * Decoded view of one pin record.
 */
export interface PinState {
  /** Output latch */
  value: boolean
  direction: Direction
  pull: Pull
  driveMode: DriveMode
  enabled: boolean
  neverReset: boolean
  /** Level injected by the host, meaningful when `inputInjected` */
  inputValue: boolean
  inputInjected: boolean
}

/**
 * Pin Registry.
 *
 * The output latch (`VALUE`) and the injected input level (`INPUT_VALUE`) are
 * separate cells. The caller owns the latch and the configuration fields; the
 * host owns the input cells. Changing direction copies nothing between them.
 *
 * Reads on an Input pin return the injected level if one is set, otherwise
 * the level implied by the pull (Up reads high, Down and None read low).
 *
 * Disabled (unclaimed) pins reject everything except `claim()` and host
 * injection.
 */
export class PinRegistry {
  private readonly bytes: Uint8Array
  private readonly base: number
  readonly count: number

  constructor(buffer: SharedArrayBuffer) {
    const header = new Int32Array(buffer)
    this.bytes = new Uint8Array(buffer)
    this.base = header[HDR.PIN_TABLE_PTR]
    this.count = header[HDR.PIN_COUNT]
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Claim a pin: enabled, Input, no pull, push-pull, latch low.
   */
  claim(pin: number): number {
    if (!this.isValidPin(pin)) return PIN_ERR.INVALID_PIN
    if (this.load(pin, PIN.ENABLED) === 1) return PIN_ERR.IN_USE
    this.store(pin, PIN.DIRECTION, DIRECTION.INPUT)
    this.store(pin, PIN.PULL, PULL.NONE)
    this.store(pin, PIN.DRIVE, DRIVE_MODE.PUSH_PULL)
    this.store(pin, PIN.VALUE, 0)
    this.store(pin, PIN.ENABLED, 1)
    return PIN_ERR.OK
  }

  /**
   * Release a pin back to its disabled defaults. Clears never-reset.
   */
  deinit(pin: number): number {
    if (!this.isValidPin(pin)) return PIN_ERR.INVALID_PIN
    this.resetRecord(pin)
    this.store(pin, PIN.NEVER_RESET, 0)
    return PIN_ERR.OK
  }

  isClaimed(pin: number): boolean {
    return this.isValidPin(pin) && this.load(pin, PIN.ENABLED) === 1
  }

  /**
   * Exclude a pin from `resetAll()`.
   */
  markNeverReset(pin: number, neverReset: boolean = true): number {
    if (!this.isValidPin(pin)) return PIN_ERR.INVALID_PIN
    this.store(pin, PIN.NEVER_RESET, neverReset ? 1 : 0)
    return PIN_ERR.OK
  }

  isNeverReset(pin: number): boolean {
    return this.isValidPin(pin) && this.load(pin, PIN.NEVER_RESET) === 1
  }

  /**
   * Return every pin not marked never-reset to its disabled defaults.
   * Injected input levels belong to the outside world and are kept.
   *
   * @returns Number of pins reset
   */
  resetAll(): number {
    let reset = 0
    let pin = 0
    while (pin < this.count) {
      if (this.load(pin, PIN.NEVER_RESET) === 0) {
        this.resetRecord(pin)
        reset = reset + 1
      }
      pin = pin + 1
    }
    return reset
  }

  // ===========================================================================
  // Caller side
  // ===========================================================================

  setDirection(pin: number, direction: Direction): number {
    const check = this.checkEnabled(pin)
    if (check !== PIN_ERR.OK) return check
    this.store(pin, PIN.DIRECTION, direction)
    return PIN_ERR.OK
  }

  /**
   * @returns Direction, or a negative PIN_ERR code
   */
  getDirection(pin: number): number {
    const check = this.checkEnabled(pin)
    if (check !== PIN_ERR.OK) return check
    return this.load(pin, PIN.DIRECTION)
  }

  /**
   * Drive the output latch. Rejected with WRONG_DIRECTION on an Input pin,
   * leaving the latch untouched.
   */
  setValue(pin: number, value: boolean): number {
    const check = this.checkEnabled(pin)
    if (check !== PIN_ERR.OK) return check
    if (this.load(pin, PIN.DIRECTION) !== DIRECTION.OUTPUT) return PIN_ERR.WRONG_DIRECTION
    this.store(pin, PIN.VALUE, value ? 1 : 0)
    return PIN_ERR.OK
  }

  /**
   * @returns 1 (high), 0 (low), or a negative PIN_ERR code
   */
  getValue(pin: number): number {
    const check = this.checkEnabled(pin)
    if (check !== PIN_ERR.OK) return check
    if (this.load(pin, PIN.DIRECTION) === DIRECTION.OUTPUT) {
      return this.load(pin, PIN.VALUE)
    }
    if (this.load(pin, PIN.INPUT_INJECTED) === 1) {
      return this.load(pin, PIN.INPUT_VALUE)
    }
    return this.load(pin, PIN.PULL) === PULL.UP ? 1 : 0
  }

  setPull(pin: number, pull: Pull): number {
    const check = this.checkEnabled(pin)
    if (check !== PIN_ERR.OK) return check
    this.store(pin, PIN.PULL, pull)
    return PIN_ERR.OK
  }

  /**
   * @returns Pull, or a negative PIN_ERR code
   */
  getPull(pin: number): number {
    const check = this.checkEnabled(pin)
    if (check !== PIN_ERR.OK) return check
    return this.load(pin, PIN.PULL)
  }

  setDriveMode(pin: number, mode: DriveMode): number {
    const check = this.checkEnabled(pin)
    if (check !== PIN_ERR.OK) return check
    this.store(pin, PIN.DRIVE, mode)
    return PIN_ERR.OK
  }

  /**
   * @returns DriveMode, or a negative PIN_ERR code
   */
  getDriveMode(pin: number): number {
    const check = this.checkEnabled(pin)
    if (check !== PIN_ERR.OK) return check
    return this.load(pin, PIN.DRIVE)
  }

  // ===========================================================================
  // Host side
  // ===========================================================================

  /**
   * Set the externally driven input level. Accepted in either direction and
   * on disabled pins; it is observed once the pin reads as Input.
   */
  injectInput(pin: number, value: boolean): number {
    if (!this.isValidPin(pin)) return PIN_ERR.INVALID_PIN
    this.store(pin, PIN.INPUT_VALUE, value ? 1 : 0)
    this.store(pin, PIN.INPUT_INJECTED, 1)
    return PIN_ERR.OK
  }

  /**
   * Drop the injected level so the pin falls back to its pull.
   */
  clearInjectedInput(pin: number): number {
    if (!this.isValidPin(pin)) return PIN_ERR.INVALID_PIN
    this.store(pin, PIN.INPUT_INJECTED, 0)
    this.store(pin, PIN.INPUT_VALUE, 0)
    return PIN_ERR.OK
  }

  /**
   * Output latch as the host sees it, regardless of direction.
   */
  getOutputValue(pin: number): number {
    if (!this.isValidPin(pin)) return PIN_ERR.INVALID_PIN
    return this.load(pin, PIN.VALUE)
  }

  // ===========================================================================
  // Diagnostics
  // ===========================================================================

  state(pin: number): PinState | null {
    if (!this.isValidPin(pin)) return null
    const direction = this.load(pin, PIN.DIRECTION) === DIRECTION.OUTPUT ? DIRECTION.OUTPUT : DIRECTION.INPUT
    const rawPull = this.load(pin, PIN.PULL)
    const pull = rawPull === PULL.UP ? PULL.UP : rawPull === PULL.DOWN ? PULL.DOWN : PULL.NONE
    const driveMode =
      this.load(pin, PIN.DRIVE) === DRIVE_MODE.OPEN_DRAIN ? DRIVE_MODE.OPEN_DRAIN : DRIVE_MODE.PUSH_PULL
    return {
      value: this.load(pin, PIN.VALUE) === 1,
      direction,
      pull,
      driveMode,
      enabled: this.load(pin, PIN.ENABLED) === 1,
      neverReset: this.load(pin, PIN.NEVER_RESET) === 1,
      inputValue: this.load(pin, PIN.INPUT_VALUE) === 1,
      inputInjected: this.load(pin, PIN.INPUT_INJECTED) === 1
    }
  }

  layout(): RegionLayout {
    return { baseOffset: this.base, elementSize: PIN.SIZE_BYTES, count: this.count }
  }

  isValidPin(pin: number): boolean {
    return Number.isInteger(pin) && pin >= 0 && pin < this.count
  }

  // ===========================================================================
  // Internal
  // ===========================================================================

  private checkEnabled(pin: number): number {
    if (!this.isValidPin(pin)) return PIN_ERR.INVALID_PIN
    if (this.load(pin, PIN.ENABLED) !== 1) return PIN_ERR.DISABLED
    return PIN_ERR.OK
  }

  private resetRecord(pin: number): void {
    this.store(pin, PIN.ENABLED, 0)
    this.store(pin, PIN.DIRECTION, DIRECTION.INPUT)
    this.store(pin, PIN.PULL, PULL.NONE)
    this.store(pin, PIN.DRIVE, DRIVE_MODE.PUSH_PULL)
    this.store(pin, PIN.VALUE, 0)
  }

  private load(pin: number, field: number): number {
    return Atomics.load(this.bytes, this.base + pin * PIN.SIZE_BYTES + field)
  }

  private store(pin: number, field: number, value: number): void {
    Atomics.store(this.bytes, this.base + pin * PIN.SIZE_BYTES + field, value)
  }
}
