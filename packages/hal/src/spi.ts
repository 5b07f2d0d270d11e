// =============================================================================
// CoBridge - SPI
// =============================================================================

import { OP, BUS_KIND, DEFAULT_SPI_BAUDRATE, MAX_CHIP_SELECT } from '@cobridge/kernel'
import type { HardwareBridge } from '@cobridge/kernel'
import { LockableBusPeripheral, sliceOf, unexpectedResponse } from './peripheral'
import type { BusPeripheralOptions, DuplexSlices, Slice } from './peripheral'

export interface SPIOptions extends BusPeripheralOptions {
  clock: number
  mosi?: number
  miso?: number
}

export interface SPIConfiguration {
  /** Clock rate in Hz (default: 250 kHz) */
  baudrate?: number
  /** Clock idle level, 0 or 1 (default: 0) */
  polarity?: number
  /** Sampling edge, 0 or 1 (default: 0) */
  phase?: number
  /** Bits per word (default: 8) */
  bits?: number
}

export interface ReadSlice extends Slice {
  /** Byte clocked out for every byte read (default: 0) */
  writeValue?: number
}

/**
 * SPI controller.
 *
 * Devices are addressed by chip-select number, 0 to 255. Like I2C, every
 * call, `configure()` included, needs the lock.
 */
export class SPI extends LockableBusPeripheral {
  protected override readonly label = 'SPI'

  constructor(bridge: HardwareBridge, options: SPIOptions) {
    super(
      bridge,
      BUS_KIND.SPI,
      bridge.buses.create(BUS_KIND.SPI, { a: options.clock, b: options.mosi, c: options.miso }),
      options
    )
  }

  /**
   * Clock rate currently configured on the bus.
   */
  get frequency(): number {
    this.checkHandle()
    const state = this.bridge.buses.state(this.handle)
    return state === null ? 0 : state.config.frequency
  }

  async configure(configuration: SPIConfiguration = {}): Promise<void> {
    this.requireLock()
    const { baudrate = DEFAULT_SPI_BAUDRATE, polarity = 0, phase = 0, bits = 8 } = configuration
    if ((polarity !== 0 && polarity !== 1) || (phase !== 0 && phase !== 1)) {
      throw new RangeError('polarity and phase must be 0 or 1')
    }
    await this.bridge.request(
      { op: OP.SPI_CONFIGURE, bus: this.handle, frequency: baudrate, polarity, phase, bits },
      this.requestOptions
    )
  }

  // ===========================================================================
  // Transactions
  // ===========================================================================

  async write(chipSelect: number, buffer: Uint8Array, slice?: Slice): Promise<void> {
    this.requireLock()
    checkChipSelect(chipSelect)
    await this.bridge.request(
      { op: OP.SPI_WRITE, bus: this.handle, chipSelect, data: sliceOf(buffer, slice) },
      this.requestOptions
    )
  }

  async readInto(chipSelect: number, buffer: Uint8Array, slice: ReadSlice = {}): Promise<void> {
    this.requireLock()
    checkChipSelect(chipSelect)
    const target = sliceOf(buffer, slice)
    const response = await this.bridge.request(
      { op: OP.SPI_READ, bus: this.handle, chipSelect, length: target.length, fill: slice.writeValue ?? 0 },
      this.requestOptions
    )
    if (response.op !== OP.SPI_READ) throw unexpectedResponse(this.label)
    target.set(response.data.subarray(0, target.length))
  }

  /**
   * Full-duplex transfer.
   *
   * @throws Error when the two slices differ in length
   */
  async writeReadInto(
    chipSelect: number,
    outBuffer: Uint8Array,
    inBuffer: Uint8Array,
    slices: DuplexSlices = {}
  ): Promise<void> {
    this.requireLock()
    checkChipSelect(chipSelect)
    const out = sliceOf(outBuffer, { start: slices.outStart, end: slices.outEnd })
    const target = sliceOf(inBuffer, { start: slices.inStart, end: slices.inEnd })
    if (out.length !== target.length) {
      throw new Error('buffer slices must be of equal length')
    }
    const response = await this.bridge.request(
      { op: OP.SPI_TRANSFER, bus: this.handle, chipSelect, data: out },
      this.requestOptions
    )
    if (response.op !== OP.SPI_TRANSFER) throw unexpectedResponse(this.label)
    target.set(response.data.subarray(0, target.length))
  }
}

function checkChipSelect(chipSelect: number): void {
  if (!Number.isInteger(chipSelect) || chipSelect < 0 || chipSelect > MAX_CHIP_SELECT) {
    throw new RangeError(`chip select ${chipSelect} out of range`)
  }
}
