// =============================================================================
// CoBridge - I2C
// =============================================================================

import { OP, BUS_KIND, DEFAULT_I2C_FREQUENCY, MAX_I2C_ADDRESS } from '@cobridge/kernel'
import type { HardwareBridge } from '@cobridge/kernel'
import { LockableBusPeripheral, sliceOf, unexpectedResponse } from './peripheral'
import type { BusPeripheralOptions, DuplexSlices, Slice } from './peripheral'

/** Addresses outside this range are reserved and never scanned */
const FIRST_SCAN_ADDRESS = 0x08
const LAST_SCAN_ADDRESS = 0x77

export interface I2COptions extends BusPeripheralOptions {
  scl: number
  sda: number
  /** Bus frequency in Hz (default: 100 kHz) */
  frequency?: number
}

/**
 * I2C controller.
 *
 * Every transaction needs the lock: `tryLock()` first, `unlock()` after.
 * Addresses are 7-bit; anything else is a RangeError. A device that does not
 * answer surfaces as a HostError with ENODEV.
 *
 * @example
 * ```typescript
 * const i2c = new I2C(bridge, { scl: 1, sda: 2 })
 * while (!i2c.tryLock()) await bridge.hook.yield()
 * const reading = new Uint8Array(2)
 * await i2c.writeToThenReadFrom(0x48, Uint8Array.of(0), reading)
 * i2c.unlock()
 * ```
 */
export class I2C extends LockableBusPeripheral {
  protected override readonly label = 'I2C'

  constructor(bridge: HardwareBridge, options: I2COptions) {
    super(
      bridge,
      BUS_KIND.I2C,
      bridge.buses.create(
        BUS_KIND.I2C,
        { a: options.scl, b: options.sda },
        { frequency: options.frequency ?? DEFAULT_I2C_FREQUENCY }
      ),
      options
    )
  }

  get frequency(): number {
    this.checkHandle()
    const state = this.bridge.buses.state(this.handle)
    return state === null ? 0 : state.config.frequency
  }

  // ===========================================================================
  // Discovery
  // ===========================================================================

  /**
   * Ask every non-reserved address for an acknowledgement.
   *
   * @returns Addresses that answered, ascending
   */
  async scan(): Promise<number[]> {
    this.requireLock()
    const found: number[] = []
    let address = FIRST_SCAN_ADDRESS
    while (address <= LAST_SCAN_ADDRESS) {
      if (await this.probe(address)) found.push(address)
      address = address + 1
    }
    return found
  }

  async probe(address: number): Promise<boolean> {
    this.requireLock()
    checkAddress(address)
    const response = await this.bridge.request(
      { op: OP.I2C_PROBE, bus: this.handle, address },
      this.requestOptions
    )
    if (response.op !== OP.I2C_PROBE) throw unexpectedResponse(this.label)
    return response.present
  }

  // ===========================================================================
  // Transactions
  // ===========================================================================

  async writeTo(address: number, buffer: Uint8Array, slice?: Slice): Promise<void> {
    this.requireLock()
    checkAddress(address)
    await this.bridge.request(
      { op: OP.I2C_WRITE, bus: this.handle, address, data: sliceOf(buffer, slice) },
      this.requestOptions
    )
  }

  /**
   * Fill `buffer` (or its slice) with bytes read from `address`.
   */
  async readFromInto(address: number, buffer: Uint8Array, slice?: Slice): Promise<void> {
    this.requireLock()
    checkAddress(address)
    const target = sliceOf(buffer, slice)
    const response = await this.bridge.request(
      { op: OP.I2C_READ, bus: this.handle, address, length: target.length },
      this.requestOptions
    )
    if (response.op !== OP.I2C_READ) throw unexpectedResponse(this.label)
    target.set(response.data.subarray(0, target.length))
  }

  /**
   * Write then read with a repeated start, as one request.
   */
  async writeToThenReadFrom(
    address: number,
    outBuffer: Uint8Array,
    inBuffer: Uint8Array,
    slices: DuplexSlices = {}
  ): Promise<void> {
    this.requireLock()
    checkAddress(address)
    const out = sliceOf(outBuffer, { start: slices.outStart, end: slices.outEnd })
    const target = sliceOf(inBuffer, { start: slices.inStart, end: slices.inEnd })
    const response = await this.bridge.request(
      { op: OP.I2C_WRITE_READ, bus: this.handle, address, data: out, length: target.length },
      this.requestOptions
    )
    if (response.op !== OP.I2C_WRITE_READ) throw unexpectedResponse(this.label)
    target.set(response.data.subarray(0, target.length))
  }
}

function checkAddress(address: number): void {
  if (!Number.isInteger(address) || address < 0 || address > MAX_I2C_ADDRESS) {
    throw new RangeError(`I2C address ${address} is not 7-bit`)
  }
}
