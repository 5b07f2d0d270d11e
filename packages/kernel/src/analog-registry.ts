// =============================================================================
// CoBridge - Analog Registry
// =============================================================================
// 16-bit ADC/DAC state, one 4-byte record per pin.

import { HDR, ANALOG, ANALOG_MID_SCALE, PIN_ERR } from './constants'
import type { RegionLayout } from './types'

const MAX_VALUE = 0xffff

/**
 * Analog Registry.
 *
 * One value cell per pin. On an input (ADC) the host writes it through
 * `injectInput()`; on an output (DAC) the caller writes it through `write()`.
 * An input nobody has driven reads mid-scale.
 */
export class AnalogRegistry {
  private readonly bytes: Uint8Array
  private readonly u16: Uint16Array
  private readonly base: number
  readonly count: number

  constructor(buffer: SharedArrayBuffer) {
    const header = new Int32Array(buffer)
    this.bytes = new Uint8Array(buffer)
    this.u16 = new Uint16Array(buffer)
    this.base = header[HDR.ANALOG_TABLE_PTR]
    this.count = header[HDR.PIN_COUNT]
  }

  /**
   * Claim a pin as an ADC input or a DAC output.
   */
  init(pin: number, isOutput: boolean): number {
    if (!this.isValidPin(pin)) return PIN_ERR.INVALID_PIN
    const rec = this.record(pin)
    if (Atomics.load(this.bytes, rec + ANALOG.ENABLED) === 1) return PIN_ERR.IN_USE
    Atomics.store(this.bytes, rec + ANALOG.IS_OUTPUT, isOutput ? 1 : 0)
    if (isOutput) {
      Atomics.store(this.u16, (rec + ANALOG.VALUE) / 2, 0)
    }
    Atomics.store(this.bytes, rec + ANALOG.ENABLED, 1)
    return PIN_ERR.OK
  }

  deinit(pin: number): number {
    if (!this.isValidPin(pin)) return PIN_ERR.INVALID_PIN
    const rec = this.record(pin)
    Atomics.store(this.bytes, rec + ANALOG.ENABLED, 0)
    Atomics.store(this.bytes, rec + ANALOG.IS_OUTPUT, 0)
    Atomics.store(this.u16, (rec + ANALOG.VALUE) / 2, ANALOG_MID_SCALE)
    return PIN_ERR.OK
  }

  isClaimed(pin: number): boolean {
    return this.isValidPin(pin) && Atomics.load(this.bytes, this.record(pin) + ANALOG.ENABLED) === 1
  }

  /**
   * ADC reading.
   *
   * @returns 0..65535, or a negative PIN_ERR code
   */
  read(pin: number): number {
    const check = this.checkMode(pin, false)
    if (check !== PIN_ERR.OK) return check
    return Atomics.load(this.u16, (this.record(pin) + ANALOG.VALUE) / 2)
  }

  /**
   * DAC output. Values are clamped to 0..65535.
   */
  write(pin: number, value: number): number {
    const check = this.checkMode(pin, true)
    if (check !== PIN_ERR.OK) return check
    Atomics.store(this.u16, (this.record(pin) + ANALOG.VALUE) / 2, clamp(value))
    return PIN_ERR.OK
  }

  /**
   * Host side: set the level an ADC input will read.
   */
  injectInput(pin: number, value: number): number {
    const check = this.checkMode(pin, false)
    if (check !== PIN_ERR.OK) return check
    Atomics.store(this.u16, (this.record(pin) + ANALOG.VALUE) / 2, clamp(value))
    return PIN_ERR.OK
  }

  /**
   * Host side: last value written to a DAC output.
   */
  getOutput(pin: number): number {
    const check = this.checkMode(pin, true)
    if (check !== PIN_ERR.OK) return check
    return Atomics.load(this.u16, (this.record(pin) + ANALOG.VALUE) / 2)
  }

  /**
   * Release every pin for which `keep` returns false.
   */
  resetAll(keep: (pin: number) => boolean = () => false): number {
    let reset = 0
    let pin = 0
    while (pin < this.count) {
      if (!keep(pin)) {
        this.deinit(pin)
        reset = reset + 1
      }
      pin = pin + 1
    }
    return reset
  }

  layout(): RegionLayout {
    return { baseOffset: this.base, elementSize: ANALOG.SIZE_BYTES, count: this.count }
  }

  isValidPin(pin: number): boolean {
    return Number.isInteger(pin) && pin >= 0 && pin < this.count
  }

  private checkMode(pin: number, wantOutput: boolean): number {
    if (!this.isValidPin(pin)) return PIN_ERR.INVALID_PIN
    const rec = this.record(pin)
    if (Atomics.load(this.bytes, rec + ANALOG.ENABLED) !== 1) return PIN_ERR.DISABLED
    const isOutput = Atomics.load(this.bytes, rec + ANALOG.IS_OUTPUT) === 1
    return isOutput === wantOutput ? PIN_ERR.OK : PIN_ERR.WRONG_DIRECTION
  }

  private record(pin: number): number {
    return this.base + pin * ANALOG.SIZE_BYTES
  }
}

function clamp(value: number): number {
  if (!(value > 0)) return 0
  return value > MAX_VALUE ? MAX_VALUE : Math.floor(value)
}
