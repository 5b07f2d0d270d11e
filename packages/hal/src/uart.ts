// =============================================================================
// CoBridge - UART
// =============================================================================

import {
  OP,
  BUS_KIND,
  PARITY,
  NO_PIN,
  MAX_PAYLOAD,
  BUS_HEADER_BYTES,
  DEFAULT_UART_BAUDRATE
} from '@cobridge/kernel'
import type { BusHandle, HardwareBridge, Parity } from '@cobridge/kernel'
import { BusPeripheral, unexpectedResponse } from './peripheral'
import type { BusPeripheralOptions } from './peripheral'

/** Largest write carried by one request */
const WRITE_CHUNK = MAX_PAYLOAD - BUS_HEADER_BYTES

const NEWLINE = 0x0a

export interface UARTOptions extends BusPeripheralOptions {
  tx?: number
  rx?: number
  /** Default: 9600 */
  baudrate?: number
  /** Data bits, 5 to 9 (default: 8) */
  bits?: number
  /** Default: PARITY.NONE */
  parity?: Parity
  /** 1 or 2 (default: 1) */
  stop?: number
  /** Virtual ms a read waits for missing bytes (default: 1000) */
  readTimeoutMs?: number
}

/**
 * Serial port.
 *
 * Bytes the host injects on RX are buffered in the bus registry until read;
 * writes fill a transmit buffer the host drains. Unlike I2C and SPI there is
 * no lock. Reads wait in virtual time, yielding between attempts, until the
 * requested count arrives or `readTimeoutMs` passes.
 *
 * @example
 * ```typescript
 * const uart = new UART(bridge, { tx: 4, rx: 5, baudrate: 115200 })
 * await uart.write(new TextEncoder().encode('AT\r\n'))
 * const line = await uart.readline()
 * ```
 */
export class UART extends BusPeripheral {
  protected override readonly label = 'UART'
  readTimeoutMs: number

  constructor(bridge: HardwareBridge, options: UARTOptions) {
    super(bridge, BUS_KIND.UART, createPort(bridge, options), options)
    this.readTimeoutMs = Math.max(0, options.readTimeoutMs ?? 1000)
  }

  get baudrate(): number {
    this.checkHandle()
    const state = this.bridge.buses.state(this.handle)
    return state === null ? 0 : state.config.frequency
  }

  async setBaudrate(baudrate: number): Promise<void> {
    this.checkHandle()
    if (!Number.isInteger(baudrate) || baudrate <= 0) {
      throw new RangeError('baudrate must be a positive integer')
    }
    await this.bridge.request({ op: OP.UART_SET_BAUDRATE, bus: this.handle, baudrate }, this.requestOptions)
  }

  /**
   * Bytes waiting to be read.
   */
  async inWaiting(): Promise<number> {
    this.checkHandle()
    const response = await this.bridge.request({ op: OP.UART_RX_AVAILABLE, bus: this.handle }, this.requestOptions)
    if (response.op !== OP.UART_RX_AVAILABLE) throw unexpectedResponse(this.label)
    return response.count
  }

  // ===========================================================================
  // Reading
  // ===========================================================================

  /**
   * Read `nbytes`, or whatever is waiting when `nbytes` is omitted.
   *
   * @returns The bytes read, or null when none arrived before the timeout
   */
  async read(nbytes?: number): Promise<Uint8Array | null> {
    const wanted = nbytes ?? (await this.inWaiting())
    if (wanted <= 0) return null
    const received = await this.receive(wanted, false)
    return received.length === 0 ? null : received
  }

  /**
   * Fill `buffer` from the receive buffer.
   *
   * @returns Bytes stored, or null when none arrived before the timeout
   */
  async readInto(buffer: Uint8Array): Promise<number | null> {
    const received = await this.receive(buffer.length, false)
    if (received.length === 0) return null
    buffer.set(received)
    return received.length
  }

  /**
   * Read up to and including the next newline.
   *
   * @returns The line, or null when nothing arrived before the timeout
   */
  async readline(): Promise<Uint8Array | null> {
    const received = await this.receive(Number.MAX_SAFE_INTEGER, true)
    return received.length === 0 ? null : received
  }

  async resetInputBuffer(): Promise<void> {
    this.checkHandle()
    await this.bridge.request({ op: OP.UART_CLEAR_RX, bus: this.handle }, this.requestOptions)
  }

  // ===========================================================================
  // Writing
  // ===========================================================================

  /**
   * Queue `buffer` for transmission. Stops early when the transmit buffer is
   * full.
   *
   * @returns Bytes accepted
   */
  async write(buffer: Uint8Array): Promise<number> {
    this.checkHandle()
    let offset = 0
    while (offset < buffer.length) {
      const chunk = buffer.subarray(offset, offset + WRITE_CHUNK)
      const response = await this.bridge.request(
        { op: OP.UART_WRITE, bus: this.handle, data: chunk },
        this.requestOptions
      )
      if (response.op !== OP.UART_WRITE) throw unexpectedResponse(this.label)
      offset = offset + response.written
      if (response.written < chunk.length) break
    }
    return offset
  }

  private async receive(length: number, untilNewline: boolean): Promise<Uint8Array> {
    this.checkHandle()
    const received: number[] = []
    const deadline = this.bridge.clock.nowMs() + this.readTimeoutMs
    while (received.length < length) {
      const chunk = await this.fetch(untilNewline ? 1 : Math.min(length - received.length, MAX_PAYLOAD))
      let i = 0
      while (i < chunk.length) {
        received.push(chunk[i])
        i = i + 1
      }
      if (untilNewline && chunk.length > 0 && chunk[0] === NEWLINE) break
      if (chunk.length === 0) {
        if (this.bridge.clock.nowMs() >= deadline) break
        await this.bridge.hook.yield()
      }
    }
    return Uint8Array.from(received)
  }

  private async fetch(length: number): Promise<Uint8Array> {
    const response = await this.bridge.request(
      { op: OP.UART_READ, bus: this.handle, length },
      this.requestOptions
    )
    if (response.op !== OP.UART_READ) throw unexpectedResponse(this.label)
    return response.data
  }
}

function createPort(bridge: HardwareBridge, options: UARTOptions): BusHandle {
  if (options.tx === undefined && options.rx === undefined) {
    throw new Error('tx and rx cannot both be omitted')
  }
  const bits = options.bits ?? 8
  if (!Number.isInteger(bits) || bits < 5 || bits > 9) {
    throw new RangeError('bits must be 5 to 9')
  }
  const stop = options.stop ?? 1
  if (stop !== 1 && stop !== 2) {
    throw new RangeError('stop must be 1 or 2')
  }
  return bridge.buses.create(
    BUS_KIND.UART,
    { a: options.tx ?? NO_PIN, b: options.rx ?? NO_PIN },
    {
      frequency: options.baudrate ?? DEFAULT_UART_BAUDRATE,
      bits,
      parity: options.parity ?? PARITY.NONE,
      stopBits: stop
    }
  )
}
