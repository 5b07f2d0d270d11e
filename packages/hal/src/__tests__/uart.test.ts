// =============================================================================
// CoBridge - UART Tests
// =============================================================================

import { HardwareBridge, CLOCK_MODE, HOST_ERR } from '@cobridge/kernel'
import { VirtualHost } from '@cobridge/host'
import { UART } from '../index'

function createBridge(): HardwareBridge {
  const bridge = HardwareBridge.create({ clockMode: CLOCK_MODE.MANUAL }, { suspend: () => Promise.resolve() })
  new VirtualHost(bridge).attach()
  return bridge
}

function bytes(text: string): number[] {
  return Array.from(text, (char) => char.charCodeAt(0))
}

describe('UART construction', () => {
  it('needs at least one pin', () => {
    expect(() => new UART(createBridge(), {})).toThrow('tx and rx cannot both be omitted')
  })

  it('checks the frame format', () => {
    const bridge = createBridge()
    expect(() => new UART(bridge, { tx: 4, bits: 10 })).toThrow(new RangeError('bits must be 5 to 9'))
    expect(() => new UART(bridge, { tx: 4, stop: 3 })).toThrow(new RangeError('stop must be 1 or 2'))
  })

  it('runs out of bus records', () => {
    const bridge = createBridge()
    new UART(bridge, { tx: 4 })
    new UART(bridge, { tx: 5 })

    expect(() => new UART(bridge, { tx: 6 })).toThrow('No free UART bus')
  })

  it('stores the line settings in the bus record', () => {
    const bridge = createBridge()
    const uart = new UART(bridge, { tx: 4, rx: 5, baudrate: 57600, stop: 2 })

    expect(uart.baudrate).toBe(57600)
    expect(bridge.buses.state(uart.busHandle)?.config.stopBits).toBe(2)
  })
})

describe('UART transfers', () => {
  let bridge: HardwareBridge
  let uart: UART

  beforeEach(() => {
    bridge = createBridge()
    uart = new UART(bridge, { tx: 4, rx: 5, readTimeoutMs: 0 })
  })

  it('hands written bytes to the host', async () => {
    expect(await uart.write(Uint8Array.of(1, 2))).toBe(2)
    expect(Array.from(bridge.buses.takeTx(uart.busHandle))).toEqual([1, 2])
  })

  it('stops writing once the transmit buffer is full', async () => {
    expect(await uart.write(new Uint8Array(600))).toBe(512)
    expect(bridge.buses.state(uart.busHandle)?.txBuffered).toBe(512)
  })

  it('reads what is waiting', async () => {
    bridge.buses.injectRx(uart.busHandle, [1, 2, 3])

    expect(await uart.inWaiting()).toBe(3)
    expect(Array.from((await uart.read(2)) ?? [])).toEqual([1, 2])
    expect(Array.from((await uart.read()) ?? [])).toEqual([3])
    expect(await uart.read()).toBeNull()
  })

  it('fills a buffer or returns null', async () => {
    const buffer = new Uint8Array(4)
    expect(await uart.readInto(buffer)).toBeNull()

    bridge.buses.injectRx(uart.busHandle, [7, 8])
    expect(await uart.readInto(buffer)).toBe(2)
    expect(Array.from(buffer)).toEqual([7, 8, 0, 0])
  })

  it('reads one line at a time', async () => {
    bridge.buses.injectRx(uart.busHandle, bytes('ab\ncd'))

    expect(Array.from((await uart.readline()) ?? [])).toEqual([0x61, 0x62, 0x0a])
    expect(await uart.inWaiting()).toBe(2)
  })

  it('discards pending input', async () => {
    bridge.buses.injectRx(uart.busHandle, [1, 2])
    await uart.resetInputBuffer()
    expect(await uart.inWaiting()).toBe(0)
  })

  it('changes baud rate through the host', async () => {
    expect(uart.baudrate).toBe(9600)
    await uart.setBaudrate(115200)
    expect(uart.baudrate).toBe(115200)
    await expect(uart.setBaudrate(0)).rejects.toThrow(RangeError)
  })

  it('waits in virtual time for late bytes', async () => {
    uart.readTimeoutMs = 10
    let injected = false
    bridge.hook.addBackgroundTask(() => {
      bridge.clock.advance(1)
    })
    bridge.hook.addBackgroundTask(() => {
      if (!injected && bridge.clock.nowMs() >= 3) {
        bridge.buses.injectRx(uart.busHandle, [0x41])
        injected = true
      }
    })

    expect(Array.from((await uart.read(2)) ?? [])).toEqual([0x41])
    expect(bridge.clock.nowMs()).toBe(10)
  })

  it('cannot read without an rx pin', async () => {
    const txOnly = new UART(bridge, { tx: 6 })
    await expect(txOnly.read(1)).rejects.toMatchObject({ kind: 'HostError', hostCode: HOST_ERR.IO })
  })

  it('releases the bus on deinit', async () => {
    const handle = uart.busHandle
    uart.deinit()

    expect(bridge.buses.isValid(handle)).toBe(false)
    await expect(uart.write(Uint8Array.of(1))).rejects.toThrow('UART has been deinitialized')
  })
})
