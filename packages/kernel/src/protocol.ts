// =============================================================================
// CoBridge - Request / Response Codec
// =============================================================================
// Closed sum types for every request kind, and their little-endian byte
// schemas inside a slot's params and response areas. A response carries no
// length of its own; the slot's RESPONSE_LEN delimits it.

import { OP, DIRECTION, PULL } from './constants'
import type { Direction, Opcode, Pull } from './constants'
import type { BusHandle } from './types'

// =============================================================================
// Requests
// =============================================================================

export type GpioSetRequest = { op: typeof OP.GPIO_SET; pin: number; value: boolean }
export type GpioGetRequest = { op: typeof OP.GPIO_GET; pin: number }
export type GpioSetDirectionRequest = { op: typeof OP.GPIO_SET_DIRECTION; pin: number; direction: Direction }
export type GpioSetPullRequest = { op: typeof OP.GPIO_SET_PULL; pin: number; pull: Pull }
export type AnalogReadRequest = { op: typeof OP.ANALOG_READ; pin: number }
export type AnalogWriteRequest = { op: typeof OP.ANALOG_WRITE; pin: number; value: number }
export type I2CWriteRequest = { op: typeof OP.I2C_WRITE; bus: BusHandle; address: number; data: Uint8Array }
export type I2CReadRequest = { op: typeof OP.I2C_READ; bus: BusHandle; address: number; length: number }
export type I2CWriteReadRequest = {
  op: typeof OP.I2C_WRITE_READ
  bus: BusHandle
  address: number
  data: Uint8Array
  length: number
}
export type I2CProbeRequest = { op: typeof OP.I2C_PROBE; bus: BusHandle; address: number }
export type SpiConfigureRequest = {
  op: typeof OP.SPI_CONFIGURE
  bus: BusHandle
  frequency: number
  polarity: number
  phase: number
  bits: number
}
export type SpiWriteRequest = { op: typeof OP.SPI_WRITE; bus: BusHandle; chipSelect: number; data: Uint8Array }
export type SpiReadRequest = {
  op: typeof OP.SPI_READ
  bus: BusHandle
  chipSelect: number
  length: number
  /** Byte clocked out while reading */
  fill: number
}
export type SpiTransferRequest = { op: typeof OP.SPI_TRANSFER; bus: BusHandle; chipSelect: number; data: Uint8Array }
export type SleepRequest = { op: typeof OP.TIME_SLEEP; ms: number }
export type MonotonicRequest = { op: typeof OP.TIME_GET_MONOTONIC }
export type UartWriteRequest = { op: typeof OP.UART_WRITE; bus: BusHandle; data: Uint8Array }
/** Takes up to `length` buffered bytes; never waits for more */
export type UartReadRequest = { op: typeof OP.UART_READ; bus: BusHandle; length: number }
export type UartSetBaudrateRequest = { op: typeof OP.UART_SET_BAUDRATE; bus: BusHandle; baudrate: number }
export type UartRxAvailableRequest = { op: typeof OP.UART_RX_AVAILABLE; bus: BusHandle }
export type UartClearRxRequest = { op: typeof OP.UART_CLEAR_RX; bus: BusHandle }

export type RequestParams =
  | GpioSetRequest
  | GpioGetRequest
  | GpioSetDirectionRequest
  | GpioSetPullRequest
  | AnalogReadRequest
  | AnalogWriteRequest
  | I2CWriteRequest
  | I2CReadRequest
  | I2CWriteReadRequest
  | I2CProbeRequest
  | SpiConfigureRequest
  | SpiWriteRequest
  | SpiReadRequest
  | SpiTransferRequest
  | SleepRequest
  | MonotonicRequest
  | UartWriteRequest
  | UartReadRequest
  | UartSetBaudrateRequest
  | UartRxAvailableRequest
  | UartClearRxRequest

// =============================================================================
// Responses
// =============================================================================

export type AckOpcode =
  | typeof OP.GPIO_SET
  | typeof OP.GPIO_SET_DIRECTION
  | typeof OP.GPIO_SET_PULL
  | typeof OP.ANALOG_WRITE
  | typeof OP.I2C_WRITE
  | typeof OP.SPI_CONFIGURE
  | typeof OP.SPI_WRITE
  | typeof OP.TIME_SLEEP
  | typeof OP.UART_SET_BAUDRATE
  | typeof OP.UART_CLEAR_RX

export type DataOpcode =
  | typeof OP.I2C_READ
  | typeof OP.I2C_WRITE_READ
  | typeof OP.SPI_READ
  | typeof OP.SPI_TRANSFER
  | typeof OP.UART_READ

export type AckResponse = { op: AckOpcode }
export type GpioValueResponse = { op: typeof OP.GPIO_GET; value: boolean }
export type AnalogValueResponse = { op: typeof OP.ANALOG_READ; value: number }
export type DataResponse = { op: DataOpcode; data: Uint8Array }
export type ProbeResponse = { op: typeof OP.I2C_PROBE; present: boolean }
export type MonotonicResponse = { op: typeof OP.TIME_GET_MONOTONIC; ms: number }
/** Bytes the transmit buffer accepted */
export type UartWrittenResponse = { op: typeof OP.UART_WRITE; written: number }
export type UartAvailableResponse = { op: typeof OP.UART_RX_AVAILABLE; count: number }

export type ResponsePayload =
  | AckResponse
  | GpioValueResponse
  | AnalogValueResponse
  | DataResponse
  | ProbeResponse
  | MonotonicResponse
  | UartWrittenResponse
  | UartAvailableResponse

/** Bytes before the data of a bus request: handle u32, address u16, length u16 */
export const BUS_HEADER_BYTES = 8

// =============================================================================
// Encoding
// =============================================================================

/**
 * Encode request params. The result may exceed MAX_PAYLOAD; callers check
 * before staging it.
 */
export function encodeParams(params: RequestParams): Uint8Array {
  switch (params.op) {
    case OP.GPIO_SET:
      return Uint8Array.of(params.pin, params.value ? 1 : 0)
    case OP.GPIO_GET:
    case OP.ANALOG_READ:
      return Uint8Array.of(params.pin)
    case OP.GPIO_SET_DIRECTION:
      return Uint8Array.of(params.pin, params.direction)
    case OP.GPIO_SET_PULL:
      return Uint8Array.of(params.pin, params.pull)
    case OP.ANALOG_WRITE: {
      const out = new Uint8Array(3)
      const view = new DataView(out.buffer)
      view.setUint8(0, params.pin)
      view.setUint16(1, params.value, true)
      return out
    }
    case OP.I2C_WRITE:
      return busFrame(params.bus, params.address, params.data.length, params.data)
    case OP.I2C_READ:
      return busFrame(params.bus, params.address, params.length)
    case OP.I2C_WRITE_READ: {
      // Read length in the header, write length after it
      const out = new Uint8Array(BUS_HEADER_BYTES + 2 + params.data.length)
      const view = new DataView(out.buffer)
      writeBusHeader(view, params.bus, params.address, params.length)
      view.setUint16(BUS_HEADER_BYTES, params.data.length, true)
      out.set(params.data, BUS_HEADER_BYTES + 2)
      return out
    }
    case OP.I2C_PROBE: {
      const out = new Uint8Array(6)
      const view = new DataView(out.buffer)
      view.setUint32(0, params.bus, true)
      view.setUint16(4, params.address, true)
      return out
    }
    case OP.SPI_CONFIGURE: {
      const out = new Uint8Array(11)
      const view = new DataView(out.buffer)
      view.setUint32(0, params.bus, true)
      view.setUint32(4, params.frequency, true)
      view.setUint8(8, params.polarity)
      view.setUint8(9, params.phase)
      view.setUint8(10, params.bits)
      return out
    }
    case OP.SPI_WRITE:
    case OP.SPI_TRANSFER:
      return busFrame(params.bus, params.chipSelect, params.data.length, params.data)
    case OP.SPI_READ: {
      const out = busFrame(params.bus, params.chipSelect, params.length, Uint8Array.of(params.fill))
      return out
    }
    case OP.TIME_SLEEP: {
      const out = new Uint8Array(4)
      new DataView(out.buffer).setUint32(0, Math.max(0, Math.floor(params.ms)), true)
      return out
    }
    case OP.TIME_GET_MONOTONIC:
      return new Uint8Array(0)
    case OP.UART_WRITE:
      return busFrame(params.bus, 0, params.data.length, params.data)
    case OP.UART_READ:
      return busFrame(params.bus, 0, params.length)
    case OP.UART_SET_BAUDRATE: {
      const out = new Uint8Array(8)
      const view = new DataView(out.buffer)
      view.setUint32(0, params.bus, true)
      view.setUint32(4, params.baudrate, true)
      return out
    }
    case OP.UART_RX_AVAILABLE:
    case OP.UART_CLEAR_RX: {
      const out = new Uint8Array(4)
      new DataView(out.buffer).setUint32(0, params.bus, true)
      return out
    }
  }
}

/**
 * Largest response the host may write for `params`. A request whose answer
 * cannot fit in one slot is refused before it is issued.
 */
export function responseCapacity(params: RequestParams): number {
  switch (params.op) {
    case OP.I2C_READ:
    case OP.I2C_WRITE_READ:
    case OP.SPI_READ:
    case OP.UART_READ:
      return params.length
    case OP.SPI_TRANSFER:
      return params.data.length
    case OP.TIME_GET_MONOTONIC:
      return 8
    case OP.ANALOG_READ:
    case OP.UART_WRITE:
    case OP.UART_RX_AVAILABLE:
      return 2
    case OP.GPIO_GET:
    case OP.I2C_PROBE:
      return 1
    default:
      return 0
  }
}

/**
 * Decode params staged for `op`.
 *
 * @returns The request, or null when the bytes do not fit the schema
 */
export function decodeParams(op: Opcode, bytes: Uint8Array): RequestParams | null {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  switch (op) {
    case OP.GPIO_SET:
      if (bytes.length < 2) return null
      return { op, pin: bytes[0], value: bytes[1] !== 0 }
    case OP.GPIO_GET:
    case OP.ANALOG_READ:
      if (bytes.length < 1) return null
      return { op, pin: bytes[0] }
    case OP.GPIO_SET_DIRECTION: {
      if (bytes.length < 2) return null
      const direction = toDirection(bytes[1])
      return direction === null ? null : { op, pin: bytes[0], direction }
    }
    case OP.GPIO_SET_PULL: {
      if (bytes.length < 2) return null
      const pull = toPull(bytes[1])
      return pull === null ? null : { op, pin: bytes[0], pull }
    }
    case OP.ANALOG_WRITE:
      if (bytes.length < 3) return null
      return { op, pin: view.getUint8(0), value: view.getUint16(1, true) }
    case OP.I2C_WRITE: {
      const frame = readBusFrame(view, bytes)
      if (frame === null || frame.data.length !== frame.length) return null
      return { op, bus: frame.bus, address: frame.address, data: frame.data }
    }
    case OP.I2C_READ: {
      const frame = readBusFrame(view, bytes)
      if (frame === null) return null
      return { op, bus: frame.bus, address: frame.address, length: frame.length }
    }
    case OP.I2C_WRITE_READ: {
      if (bytes.length < BUS_HEADER_BYTES + 2) return null
      const writeLength = view.getUint16(BUS_HEADER_BYTES, true)
      if (bytes.length < BUS_HEADER_BYTES + 2 + writeLength) return null
      return {
        op,
        bus: view.getUint32(0, true),
        address: view.getUint16(4, true),
        length: view.getUint16(6, true),
        data: bytes.slice(BUS_HEADER_BYTES + 2, BUS_HEADER_BYTES + 2 + writeLength)
      }
    }
    case OP.I2C_PROBE:
      if (bytes.length < 6) return null
      return { op, bus: view.getUint32(0, true), address: view.getUint16(4, true) }
    case OP.SPI_CONFIGURE:
      if (bytes.length < 11) return null
      return {
        op,
        bus: view.getUint32(0, true),
        frequency: view.getUint32(4, true),
        polarity: view.getUint8(8),
        phase: view.getUint8(9),
        bits: view.getUint8(10)
      }
    case OP.SPI_WRITE:
    case OP.SPI_TRANSFER: {
      const frame = readBusFrame(view, bytes)
      if (frame === null || frame.data.length !== frame.length) return null
      return { op, bus: frame.bus, chipSelect: frame.address, data: frame.data }
    }
    case OP.SPI_READ: {
      const frame = readBusFrame(view, bytes)
      if (frame === null || frame.data.length < 1) return null
      return { op, bus: frame.bus, chipSelect: frame.address, length: frame.length, fill: frame.data[0] }
    }
    case OP.TIME_SLEEP:
      if (bytes.length < 4) return null
      return { op, ms: view.getUint32(0, true) }
    case OP.TIME_GET_MONOTONIC:
      return { op }
    case OP.UART_WRITE: {
      const frame = readBusFrame(view, bytes)
      if (frame === null || frame.data.length !== frame.length) return null
      return { op, bus: frame.bus, data: frame.data }
    }
    case OP.UART_READ: {
      const frame = readBusFrame(view, bytes)
      if (frame === null) return null
      return { op, bus: frame.bus, length: frame.length }
    }
    case OP.UART_SET_BAUDRATE:
      if (bytes.length < 8) return null
      return { op, bus: view.getUint32(0, true), baudrate: view.getUint32(4, true) }
    case OP.UART_RX_AVAILABLE:
    case OP.UART_CLEAR_RX:
      if (bytes.length < 4) return null
      return { op, bus: view.getUint32(0, true) }
  }
}

export function encodeResponse(response: ResponsePayload): Uint8Array {
  switch (response.op) {
    case OP.GPIO_GET:
      return Uint8Array.of(response.value ? 1 : 0)
    case OP.ANALOG_READ: {
      const out = new Uint8Array(2)
      new DataView(out.buffer).setUint16(0, response.value, true)
      return out
    }
    case OP.I2C_PROBE:
      return Uint8Array.of(response.present ? 1 : 0)
    case OP.TIME_GET_MONOTONIC: {
      const out = new Uint8Array(8)
      new DataView(out.buffer).setFloat64(0, response.ms, true)
      return out
    }
    case OP.UART_WRITE: {
      const out = new Uint8Array(2)
      new DataView(out.buffer).setUint16(0, response.written, true)
      return out
    }
    case OP.UART_RX_AVAILABLE: {
      const out = new Uint8Array(2)
      new DataView(out.buffer).setUint16(0, response.count, true)
      return out
    }
    case OP.I2C_READ:
    case OP.I2C_WRITE_READ:
    case OP.SPI_READ:
    case OP.SPI_TRANSFER:
    case OP.UART_READ:
      return response.data.slice()
    default:
      return new Uint8Array(0)
  }
}

/**
 * Decode the response written for `op`.
 *
 * @returns The response, or null when the bytes do not fit the schema
 */
export function decodeResponse(op: Opcode, bytes: Uint8Array): ResponsePayload | null {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  switch (op) {
    case OP.GPIO_GET:
      if (bytes.length < 1) return null
      return { op, value: bytes[0] !== 0 }
    case OP.ANALOG_READ:
      if (bytes.length < 2) return null
      return { op, value: view.getUint16(0, true) }
    case OP.I2C_PROBE:
      if (bytes.length < 1) return null
      return { op, present: bytes[0] !== 0 }
    case OP.TIME_GET_MONOTONIC:
      if (bytes.length < 8) return null
      return { op, ms: view.getFloat64(0, true) }
    case OP.UART_WRITE:
      if (bytes.length < 2) return null
      return { op, written: view.getUint16(0, true) }
    case OP.UART_RX_AVAILABLE:
      if (bytes.length < 2) return null
      return { op, count: view.getUint16(0, true) }
    case OP.I2C_READ:
    case OP.I2C_WRITE_READ:
    case OP.SPI_READ:
    case OP.SPI_TRANSFER:
    case OP.UART_READ:
      return { op, data: bytes.slice() }
    case OP.GPIO_SET:
    case OP.GPIO_SET_DIRECTION:
    case OP.GPIO_SET_PULL:
    case OP.ANALOG_WRITE:
    case OP.I2C_WRITE:
    case OP.SPI_CONFIGURE:
    case OP.SPI_WRITE:
    case OP.TIME_SLEEP:
    case OP.UART_SET_BAUDRATE:
    case OP.UART_CLEAR_RX:
      return { op }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function writeBusHeader(view: DataView, bus: BusHandle, address: number, length: number): void {
  view.setUint32(0, bus, true)
  view.setUint16(4, address, true)
  view.setUint16(6, length, true)
}

function busFrame(bus: BusHandle, address: number, length: number, data?: Uint8Array): Uint8Array {
  const out = new Uint8Array(BUS_HEADER_BYTES + (data?.length ?? 0))
  writeBusHeader(new DataView(out.buffer), bus, address, length)
  if (data !== undefined) out.set(data, BUS_HEADER_BYTES)
  return out
}

function readBusFrame(
  view: DataView,
  bytes: Uint8Array
): { bus: BusHandle; address: number; length: number; data: Uint8Array } | null {
  if (bytes.length < BUS_HEADER_BYTES) return null
  return {
    bus: view.getUint32(0, true),
    address: view.getUint16(4, true),
    length: view.getUint16(6, true),
    data: bytes.slice(BUS_HEADER_BYTES)
  }
}

function toDirection(raw: number): Direction | null {
  if (raw === DIRECTION.INPUT) return DIRECTION.INPUT
  if (raw === DIRECTION.OUTPUT) return DIRECTION.OUTPUT
  return null
}

function toPull(raw: number): Pull | null {
  if (raw === PULL.NONE) return PULL.NONE
  if (raw === PULL.UP) return PULL.UP
  if (raw === PULL.DOWN) return PULL.DOWN
  return null
}
