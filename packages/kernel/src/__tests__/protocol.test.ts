// =============================================================================
// CoBridge - Payload Codec Tests
// =============================================================================

import {
  encodeParams,
  decodeParams,
  encodeResponse,
  decodeResponse,
  responseCapacity,
  OP,
  DIRECTION,
  PULL
} from '../index'

describe('encodeParams', () => {
  it('packs a pin write as [pin, value]', () => {
    expect(Array.from(encodeParams({ op: OP.GPIO_SET, pin: 5, value: true }))).toEqual([5, 1])
  })

  it('packs an analog write little-endian', () => {
    expect(Array.from(encodeParams({ op: OP.ANALOG_WRITE, pin: 2, value: 0x1234 }))).toEqual([2, 0x34, 0x12])
  })

  it('packs bus requests as handle, address, length, data', () => {
    const bytes = encodeParams({ op: OP.I2C_WRITE, bus: 0x0102, address: 0x48, data: Uint8Array.of(9, 8) })
    expect(Array.from(bytes)).toEqual([0x02, 0x01, 0, 0, 0x48, 0, 2, 0, 9, 8])
  })

  it('carries the read length and fill byte of an SPI read', () => {
    const bytes = encodeParams({ op: OP.SPI_READ, bus: 258, chipSelect: 1, length: 3, fill: 0xff })
    expect(Array.from(bytes)).toEqual([2, 1, 0, 0, 1, 0, 3, 0, 0xff])
  })

  it('keeps addresses above 0xff intact', () => {
    const presence = decodeParams(OP.I2C_PROBE, encodeParams({ op: OP.I2C_PROBE, bus: 1, address: 0x148 }))
    expect(presence).toEqual({ op: OP.I2C_PROBE, bus: 1, address: 0x148 })

    const write = decodeParams(
      OP.SPI_WRITE,
      encodeParams({ op: OP.SPI_WRITE, bus: 1, chipSelect: 256, data: Uint8Array.of(1) })
    )
    if (write?.op !== OP.SPI_WRITE) throw new Error('wrong variant')
    expect(write.chipSelect).toBe(256)
  })

  it('packs UART requests', () => {
    expect(Array.from(encodeParams({ op: OP.UART_SET_BAUDRATE, bus: 2, baudrate: 115200 }))).toEqual([
      2, 0, 0, 0, 0x00, 0xc2, 0x01, 0
    ])
    expect(Array.from(encodeParams({ op: OP.UART_CLEAR_RX, bus: 2 }))).toEqual([2, 0, 0, 0])
    expect(decodeParams(OP.UART_READ, encodeParams({ op: OP.UART_READ, bus: 2, length: 16 }))).toEqual({
      op: OP.UART_READ,
      bus: 2,
      length: 16
    })
  })

  it('encodes a monotonic query as no bytes', () => {
    expect(encodeParams({ op: OP.TIME_GET_MONOTONIC }).length).toBe(0)
  })
})

describe('decodeParams', () => {
  it('reads back every field of a write-then-read', () => {
    const bytes = encodeParams({
      op: OP.I2C_WRITE_READ,
      bus: 256,
      address: 0x40,
      data: Uint8Array.of(0x0f),
      length: 2
    })
    const decoded = decodeParams(OP.I2C_WRITE_READ, bytes)

    expect(decoded?.op).toBe(OP.I2C_WRITE_READ)
    if (decoded?.op !== OP.I2C_WRITE_READ) return
    expect(decoded.bus).toBe(256)
    expect(decoded.address).toBe(0x40)
    expect(decoded.length).toBe(2)
    expect(Array.from(decoded.data)).toEqual([0x0f])
  })

  it('narrows direction and pull codes', () => {
    expect(decodeParams(OP.GPIO_SET_DIRECTION, Uint8Array.of(3, DIRECTION.OUTPUT))).toEqual({
      op: OP.GPIO_SET_DIRECTION,
      pin: 3,
      direction: DIRECTION.OUTPUT
    })
    expect(decodeParams(OP.GPIO_SET_PULL, Uint8Array.of(3, PULL.UP))).toEqual({
      op: OP.GPIO_SET_PULL,
      pin: 3,
      pull: PULL.UP
    })
    expect(decodeParams(OP.GPIO_SET_PULL, Uint8Array.of(3, 9))).toBeNull()
  })

  it('rejects truncated params', () => {
    expect(decodeParams(OP.GPIO_SET, Uint8Array.of(5))).toBeNull()
    expect(decodeParams(OP.TIME_SLEEP, Uint8Array.of(1, 2))).toBeNull()
    // Length field says 4, only 1 data byte present
    expect(decodeParams(OP.I2C_WRITE, Uint8Array.of(0, 1, 0, 0, 0x10, 0, 4, 0, 7))).toBeNull()
  })

  it('reads a sleep duration', () => {
    expect(decodeParams(OP.TIME_SLEEP, Uint8Array.of(0xe8, 0x03, 0, 0))).toEqual({ op: OP.TIME_SLEEP, ms: 1000 })
  })
})

describe('responses', () => {
  it('writes read data as-is, delimited by the response length', () => {
    const bytes = encodeResponse({ op: OP.I2C_READ, data: Uint8Array.of(0xab, 0xcd) })
    expect(Array.from(bytes)).toEqual([0xab, 0xcd])

    const decoded = decodeResponse(OP.I2C_READ, bytes)
    if (decoded?.op !== OP.I2C_READ) throw new Error('wrong variant')
    expect(Array.from(decoded.data)).toEqual([0xab, 0xcd])
  })

  it('fits a full-size read in one slot', () => {
    const bytes = encodeResponse({ op: OP.SPI_READ, data: new Uint8Array(256) })
    expect(bytes.length).toBe(256)
  })

  it('carries UART counts as u16', () => {
    expect(Array.from(encodeResponse({ op: OP.UART_WRITE, written: 300 }))).toEqual([0x2c, 0x01])
    expect(decodeResponse(OP.UART_RX_AVAILABLE, Uint8Array.of(3, 0))).toEqual({ op: OP.UART_RX_AVAILABLE, count: 3 })
  })

  it('decodes pin and monotonic values', () => {
    expect(decodeResponse(OP.GPIO_GET, Uint8Array.of(1))).toEqual({ op: OP.GPIO_GET, value: true })
    expect(decodeResponse(OP.TIME_GET_MONOTONIC, encodeResponse({ op: OP.TIME_GET_MONOTONIC, ms: 12.5 }))).toEqual({
      op: OP.TIME_GET_MONOTONIC,
      ms: 12.5
    })
  })

  it('acknowledges writes with an empty payload', () => {
    expect(encodeResponse({ op: OP.GPIO_SET }).length).toBe(0)
    expect(decodeResponse(OP.SPI_WRITE, new Uint8Array(0))).toEqual({ op: OP.SPI_WRITE })
  })

  it('rejects a response shorter than its schema', () => {
    expect(decodeResponse(OP.ANALOG_READ, Uint8Array.of(1))).toBeNull()
    expect(decodeResponse(OP.UART_WRITE, Uint8Array.of(1))).toBeNull()
  })
})

describe('responseCapacity', () => {
  it('sizes reads by their requested length', () => {
    expect(responseCapacity({ op: OP.I2C_READ, bus: 1, address: 0x48, length: 257 })).toBe(257)
    expect(responseCapacity({ op: OP.SPI_TRANSFER, bus: 1, chipSelect: 0, data: new Uint8Array(12) })).toBe(12)
    expect(responseCapacity({ op: OP.UART_READ, bus: 1, length: 40 })).toBe(40)
  })

  it('sizes fixed answers by their schema', () => {
    expect(responseCapacity({ op: OP.TIME_GET_MONOTONIC })).toBe(8)
    expect(responseCapacity({ op: OP.GPIO_SET, pin: 1, value: true })).toBe(0)
  })
})
