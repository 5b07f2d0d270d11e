// =============================================================================
// CoBridge - Hardware Bridge Tests
// =============================================================================

import {
  HardwareBridge,
  BridgeError,
  isBridgeError,
  decodeParams,
  encodeResponse,
  CLOCK_MODE,
  DIRECTION,
  OP,
  SLOT_STATUS,
  SLOT_FLAG,
  MAX_PAYLOAD,
  HOST_ERR
} from '../index'
import type { HostCompleter, Opcode, RequestId } from '../index'

// =============================================================================
// Helpers
// =============================================================================

function createBridge(slotCapacity = 4, defaultTimeoutMs = 100): HardwareBridge {
  return HardwareBridge.create(
    { slotCapacity, clockMode: CLOCK_MODE.MANUAL },
    { defaultTimeoutMs, suspend: () => Promise.resolve() }
  )
}

/**
 * Completes GPIO requests against the bridge's own registry during send().
 */
function inlineHost(bridge: HardwareBridge): HostCompleter {
  return {
    send(requestId: RequestId, op: Opcode, params: Uint8Array): void {
      const request = decodeParams(op, params)
      if (request === null) {
        bridge.host.error(requestId, HOST_ERR.INVALID)
        return
      }
      if (request.op === OP.GPIO_SET) {
        bridge.pins.setValue(request.pin, request.value)
        bridge.host.complete(requestId)
      } else if (request.op === OP.GPIO_GET) {
        const value = bridge.pins.getValue(request.pin)
        bridge.host.complete(requestId, encodeResponse({ op: OP.GPIO_GET, value: value === 1 }))
      } else {
        bridge.host.error(requestId, HOST_ERR.UNSUPPORTED)
      }
    }
  }
}

/**
 * Never answers; records what it was told. With `dropsOnRetract` it
 * acknowledges every retract.
 */
function silentHost(dropsOnRetract = false): HostCompleter & { sent: RequestId[]; retracted: RequestId[] } {
  const sent: RequestId[] = []
  const retracted: RequestId[] = []
  return {
    sent,
    retracted,
    send(requestId: RequestId): void {
      sent.push(requestId)
    },
    retract(requestId: RequestId): boolean {
      retracted.push(requestId)
      return dropsOnRetract
    }
  }
}

// =============================================================================
// Requests
// =============================================================================

describe('HardwareBridge requests', () => {
  it('completes an inline pin write and applies its effect', async () => {
    const bridge = createBridge()
    bridge.attach(inlineHost(bridge))
    bridge.pins.claim(5)
    bridge.pins.setDirection(5, DIRECTION.OUTPUT)

    const response = await bridge.request({ op: OP.GPIO_SET, pin: 5, value: true })
    expect(response).toEqual({ op: OP.GPIO_SET })
    expect(bridge.pins.getValue(5)).toBe(1)
    expect(bridge.clock.getYieldCount()).toBe(0)
    expect(bridge.table.liveIds()).toEqual([])
  })

  it('decodes the response variant', async () => {
    const bridge = createBridge()
    bridge.attach(inlineHost(bridge))
    bridge.pins.claim(2)
    bridge.pins.injectInput(2, true)

    expect(await bridge.request({ op: OP.GPIO_GET, pin: 2 })).toEqual({ op: OP.GPIO_GET, value: true })
  })

  it('surfaces host errors with the raw code', async () => {
    const bridge = createBridge()
    bridge.attach(inlineHost(bridge))

    const failure = await bridge.request({ op: OP.ANALOG_READ, pin: 0 }).catch((error: unknown) => error)
    expect(failure).toBeInstanceOf(BridgeError)
    if (!isBridgeError(failure)) return
    expect(failure.kind).toBe('HostError')
    expect(failure.hostCode).toBe(HOST_ERR.UNSUPPORTED)
    expect(failure.requestId).toBe(1)
    expect(bridge.table.liveIds()).toEqual([])
  })

  it('throws QueueFull instead of dropping a request', () => {
    const bridge = createBridge(2)
    bridge.attach(silentHost())
    bridge.issue({ op: OP.GPIO_SET, pin: 1, value: true })
    bridge.issue({ op: OP.GPIO_SET, pin: 1, value: true })

    expect(() => bridge.issue({ op: OP.GPIO_SET, pin: 1, value: true })).toThrow('QueueFull')
  })

  it('throws PayloadOverflow before allocating a slot', () => {
    const bridge = createBridge()
    bridge.attach(silentHost())
    const data = new Uint8Array(MAX_PAYLOAD)

    let caught: unknown = null
    try {
      bridge.issue({ op: OP.I2C_WRITE, bus: 256, address: 0x10, data })
    } catch (error) {
      caught = error
    }
    expect(isBridgeError(caught, 'PayloadOverflow')).toBe(true)
    expect(bridge.table.stats().totalIssued).toBe(0)
  })

  it('refuses a read whose answer cannot fit in a slot', () => {
    const bridge = createBridge()
    const host = silentHost()
    bridge.attach(host)

    bridge.issue({ op: OP.I2C_READ, bus: 256, address: 0x10, length: MAX_PAYLOAD })
    expect(() => bridge.issue({ op: OP.I2C_READ, bus: 256, address: 0x10, length: MAX_PAYLOAD + 1 })).toThrow(
      'PayloadOverflow'
    )
    expect(() => bridge.issue({ op: OP.SPI_READ, bus: 1, chipSelect: 0, length: 300, fill: 0 })).toThrow(
      'PayloadOverflow'
    )
    expect(host.sent).toEqual([1])
    expect(bridge.table.stats().totalIssued).toBe(1)
  })

  it('requires an attached host', () => {
    const bridge = createBridge()
    expect(() => bridge.issue({ op: OP.TIME_GET_MONOTONIC })).toThrow('No host attached')
  })

  it('reports every BridgeError to onError', async () => {
    const onError = jest.fn()
    const bridge = HardwareBridge.create(
      { slotCapacity: 1, clockMode: CLOCK_MODE.MANUAL },
      { onError, suspend: () => Promise.resolve() }
    )
    bridge.attach(inlineHost(bridge))

    await expect(bridge.request({ op: OP.SPI_WRITE, bus: 1, chipSelect: 0, data: Uint8Array.of(1) })).rejects.toThrow(
      'HostError'
    )
    expect(onError).toHaveBeenCalledTimes(1)
  })
})

// =============================================================================
// Timeouts, retraction and the reaper
// =============================================================================

describe('HardwareBridge timeouts', () => {
  it('times out, retracts and leaves the slot to the reaper', async () => {
    const bridge = createBridge(4, 100)
    const host = silentHost()
    bridge.attach(host)
    bridge.hook.addBackgroundTask(() => {
      bridge.clock.advance(10)
    })

    const failure = await bridge.request({ op: OP.GPIO_SET, pin: 1, value: true }).catch((error: unknown) => error)
    expect(isBridgeError(failure, 'Timeout')).toBe(true)
    expect(host.retracted).toEqual([1])

    const slot = bridge.table.get(1)
    expect(slot?.status).toBe(SLOT_STATUS.PENDING)
    expect((slot?.flags ?? 0) & SLOT_FLAG.ABANDONED).toBe(SLOT_FLAG.ABANDONED)
    expect(bridge.table.stats().retracted).toBe(1)

    // A late completion is accepted and then reclaimed
    bridge.host.complete(1)
    expect(bridge.reap()).toBe(1)
    expect(bridge.table.get(1)).toBeNull()
  })

  it('frees the slot at once when the host acknowledges the retract', async () => {
    const bridge = createBridge(2, 20)
    const host = silentHost(true)
    bridge.attach(host)
    bridge.hook.addBackgroundTask(() => {
      bridge.clock.advance(5)
    })

    expect(await bridge.tryRequest({ op: OP.GPIO_GET, pin: 0 })).toBeNull()
    expect(await bridge.tryRequest({ op: OP.GPIO_GET, pin: 1 })).toBeNull()
    expect(host.retracted).toEqual([1, 2])
    expect(bridge.table.liveIds()).toEqual([])
    expect(bridge.table.stats().pending).toBe(0)

    // Well inside reapAfterMs, the table still has room
    expect(await bridge.tryRequest({ op: OP.GPIO_GET, pin: 2 })).toBeNull()
    expect(host.sent).toEqual([1, 2, 3])
    expect(bridge.table.stats().reaped).toBe(0)
  })

  it('tryRequest() turns a timeout into null', async () => {
    const bridge = createBridge(4, 20)
    bridge.attach(silentHost())
    bridge.hook.addBackgroundTask(() => {
      bridge.clock.advance(5)
    })

    expect(await bridge.tryRequest({ op: OP.GPIO_GET, pin: 0 })).toBeNull()
  })

  it('runs the reaper from the yield hook', async () => {
    const bridge = HardwareBridge.create(
      { slotCapacity: 2, clockMode: CLOCK_MODE.MANUAL },
      { defaultTimeoutMs: 10, reapAfterMs: 50, suspend: () => Promise.resolve() }
    )
    bridge.attach(silentHost())
    bridge.hook.addBackgroundTask(() => {
      bridge.clock.advance(5)
    })

    await bridge.tryRequest({ op: OP.GPIO_GET, pin: 0 })
    expect(bridge.table.liveIds()).toEqual([1])

    // Keep yielding until the abandoned slot is older than reapAfterMs
    while (bridge.clock.nowMs() <= 60) {
      await bridge.hook.yield()
    }
    expect(bridge.table.liveIds()).toEqual([])
    expect(bridge.table.stats().reaped).toBe(1)
  })
})

// =============================================================================
// Lifecycle
// =============================================================================

describe('HardwareBridge lifecycle', () => {
  it('softReset() retracts requests and sweeps peripherals', () => {
    const bridge = createBridge()
    const host = silentHost()
    bridge.attach(host)
    bridge.pins.claim(0)
    bridge.pins.claim(1)
    bridge.pins.markNeverReset(1)
    bridge.issue({ op: OP.GPIO_GET, pin: 0 })
    bridge.clock.advance(42)

    const result = bridge.softReset()
    expect(result.retracted).toBe(1)
    expect(host.retracted).toEqual([1])
    expect(bridge.table.liveIds()).toEqual([])
    expect(bridge.pins.isClaimed(0)).toBe(false)
    expect(bridge.pins.isClaimed(1)).toBe(true)
    expect(bridge.clock.nowMs()).toBe(42)
  })

  it('teardown() stops further requests', () => {
    const bridge = createBridge()
    const host = silentHost()
    bridge.attach(host)
    bridge.issue({ op: OP.GPIO_GET, pin: 0 })

    bridge.teardown()
    expect(host.retracted).toEqual([1])
    expect(bridge.isAttached()).toBe(false)
    expect(() => bridge.issue({ op: OP.GPIO_GET, pin: 0 })).toThrow('torn down')
  })

  it('keeps independent instances apart', () => {
    const a = createBridge()
    const b = createBridge()
    a.pins.claim(3)
    expect(b.pins.isClaimed(3)).toBe(false)
    expect(a.getSAB()).not.toBe(b.getSAB())
  })

  it('can be rebuilt over an existing buffer', () => {
    const a = createBridge()
    a.pins.claim(3)
    const b = new HardwareBridge(a.getSAB())
    expect(b.pins.isClaimed(3)).toBe(true)
    expect(() => new HardwareBridge(new SharedArrayBuffer(1024))).toThrow('not an initialized bridge SAB')
  })

  it('fast-forwards sleeps without a round trip', async () => {
    const bridge = HardwareBridge.create({ clockMode: CLOCK_MODE.FAST_FORWARD, slotCapacity: 1 })
    const host = silentHost()
    bridge.attach(host)

    await bridge.sleep(250)
    expect(bridge.clock.nowMs()).toBe(250)
    expect(host.sent).toEqual([])
  })

  it('describes every region for direct access', () => {
    const bridge = createBridge(2)
    const layout = bridge.layout()
    expect(layout.slots).toEqual({ baseOffset: 192, elementSize: 544, count: 2 })
    expect(layout.pins.baseOffset).toBe(192 + 2 * 544)
    expect(layout.analog.baseOffset).toBe(192 + 2 * 544 + 64 * 8)
    expect(layout.buses.count).toBe(14)
  })
})
