// =============================================================================
// CoBridge - Request Table Tests
// =============================================================================

import {
  RequestTable,
  HostPort,
  createBridgeSAB,
  OP,
  SLOT_STATUS,
  SLOT_FLAG,
  TABLE_ERR,
  MAX_PAYLOAD,
  INVALID_ID,
  HDR,
  MAX_REQUEST_ID
} from '../index'

// =============================================================================
// Helpers
// =============================================================================

function createTable(slotCapacity = 32): { table: RequestTable; host: HostPort } {
  const table = new RequestTable(createBridgeSAB({ slotCapacity }))
  return { table, host: new HostPort(table) }
}

/**
 * Deterministic pseudo-random sequence for property runs.
 */
function lcg(seed: number): () => number {
  let state = seed
  return () => {
    state = (state * 48271) % 2147483647
    return state / 2147483647
  }
}

// =============================================================================
// Allocation
// =============================================================================

describe('RequestTable allocation', () => {
  it('hands out ids starting at 1 and marks slots Pending', () => {
    const { table } = createTable(4)
    const a = table.allocate(OP.GPIO_SET)
    const b = table.allocate(OP.GPIO_GET)

    expect(a).toBe(1)
    expect(b).toBe(2)
    expect(table.statusOf(a)).toBe(SLOT_STATUS.PENDING)
    expect(table.get(b)?.op).toBe(OP.GPIO_GET)
  })

  it('fails closed with QUEUE_FULL once every slot is live', () => {
    const { table } = createTable(32)
    const ids: number[] = []
    let i = 0
    while (i < 32) {
      ids.push(table.allocate(OP.GPIO_SET))
      i = i + 1
    }

    expect(ids.every((id) => id > 0)).toBe(true)
    expect(table.allocate(OP.GPIO_SET)).toBe(TABLE_ERR.QUEUE_FULL)
    expect(table.stats().queueFull).toBe(1)

    // Free the slot holding id 1: exactly one more allocation succeeds
    expect(table.free(ids[0])).toBe(TABLE_ERR.OK)
    const next = table.allocate(OP.GPIO_SET)
    expect(next).toBe(33)
    expect(ids.includes(next)).toBe(false)
    expect(table.allocate(OP.GPIO_SET)).toBe(TABLE_ERR.QUEUE_FULL)
  })

  it('reuses the first Idle slot but always issues a greater id', () => {
    const { table } = createTable(2)
    const first = table.allocate(OP.GPIO_SET)
    table.allocate(OP.GPIO_SET)
    table.free(first)

    const reused = table.allocate(OP.GPIO_SET)
    expect(reused).toBe(3)
    expect(table.indexOf(reused)).toBe(0)
  })

  it('wraps the id generator to 1 instead of going negative', () => {
    const buffer = createBridgeSAB({ slotCapacity: 4 })
    const table = new RequestTable(buffer)
    new Int32Array(buffer)[HDR.NEXT_REQUEST_ID] = MAX_REQUEST_ID

    const last = table.allocate(OP.GPIO_SET)
    const wrapped = table.allocate(OP.GPIO_SET)
    expect(last).toBe(MAX_REQUEST_ID)
    expect(wrapped).toBe(1)
    expect(table.statusOf(wrapped)).toBe(SLOT_STATUS.PENDING)
  })

  it('skips ids still live after a wrap', () => {
    const buffer = createBridgeSAB({ slotCapacity: 4 })
    const table = new RequestTable(buffer)
    const held = table.allocate(OP.GPIO_SET)
    new Int32Array(buffer)[HDR.NEXT_REQUEST_ID] = MAX_REQUEST_ID

    expect(table.allocate(OP.GPIO_SET)).toBe(MAX_REQUEST_ID)
    expect(table.allocate(OP.GPIO_SET)).toBe(2)
    expect(table.liveIds()).toEqual([held, MAX_REQUEST_ID, 2])
  })

  it('never has two live slots with the same id', () => {
    const { table } = createTable(8)
    const random = lcg(42)
    const live: number[] = []
    let highest = 0
    let step = 0

    while (step < 500) {
      if (live.length > 0 && random() < 0.45) {
        const victim = Math.floor(random() * live.length)
        expect(table.free(live[victim])).toBe(TABLE_ERR.OK)
        live.splice(victim, 1)
      } else {
        const id = table.allocate(OP.GPIO_SET)
        if (live.length === 8) {
          expect(id).toBe(TABLE_ERR.QUEUE_FULL)
        } else {
          expect(id).toBeGreaterThan(highest)
          expect(live.includes(id)).toBe(false)
          highest = id
          live.push(id)
        }
      }

      const ids = table.liveIds()
      expect(new Set(ids).size).toBe(ids.length)
      expect(ids.length).toBe(live.length)
      step = step + 1
    }
  })
})

// =============================================================================
// Lookup
// =============================================================================

describe('RequestTable lookup', () => {
  it('treats id 0, unknown ids and freed ids as invalid handles', () => {
    const { table } = createTable(4)
    const id = table.allocate(OP.GPIO_SET)

    expect(table.get(INVALID_ID)).toBeNull()
    expect(table.get(999)).toBeNull()
    expect(table.statusOf(INVALID_ID)).toBe(TABLE_ERR.INVALID_HANDLE)

    table.free(id)
    expect(table.get(id)).toBeNull()
    expect(table.statusOf(id)).toBe(TABLE_ERR.INVALID_HANDLE)
    expect(table.free(id)).toBe(TABLE_ERR.INVALID_HANDLE)
  })

  it('lists pending ids in slot order', () => {
    const { table, host } = createTable(4)
    const a = table.allocate(OP.GPIO_SET)
    const b = table.allocate(OP.GPIO_SET)
    const c = table.allocate(OP.GPIO_SET)
    host.complete(b)

    expect(table.pendingIds()).toEqual([a, c])
    expect(table.liveIds()).toEqual([a, b, c])
  })
})

// =============================================================================
// Payloads and transitions
// =============================================================================

describe('RequestTable payloads', () => {
  it('round-trips a completion and drops it on free', () => {
    const { table, host } = createTable(4)
    const id = table.allocate(OP.I2C_READ)
    const response = Uint8Array.of(2, 0, 0xab, 0xcd)

    expect(host.complete(id, response)).toBe(TABLE_ERR.OK)
    const slot = table.get(id)
    expect(slot?.status).toBe(SLOT_STATUS.COMPLETE)
    expect(Array.from(slot?.response ?? [])).toEqual([2, 0, 0xab, 0xcd])

    table.free(id)
    expect(table.get(id)).toBeNull()
  })

  it('stages params and copies them out', () => {
    const { table } = createTable(4)
    const id = table.allocate(OP.GPIO_SET)
    expect(table.writeParams(id, Uint8Array.of(5, 1))).toBe(TABLE_ERR.OK)

    const out = new Uint8Array(MAX_PAYLOAD)
    expect(table.readParams(id, out)).toBe(2)
    expect(out[0]).toBe(5)
    expect(out[1]).toBe(1)
  })

  it('rejects payloads over MAX_PAYLOAD', () => {
    const { table, host } = createTable(4)
    const id = table.allocate(OP.I2C_WRITE)
    const big = new Uint8Array(MAX_PAYLOAD + 1)

    expect(table.writeParams(id, big)).toBe(TABLE_ERR.PAYLOAD_OVERFLOW)
    expect(host.complete(id, big)).toBe(TABLE_ERR.PAYLOAD_OVERFLOW)
    expect(table.statusOf(id)).toBe(SLOT_STATUS.PENDING)
  })

  it('records the host error code', () => {
    const { table, host } = createTable(4)
    const id = table.allocate(OP.I2C_WRITE)

    expect(host.error(id, 19)).toBe(TABLE_ERR.OK)
    expect(table.statusOf(id)).toBe(SLOT_STATUS.ERROR)
    expect(table.errorCodeOf(id)).toBe(19)
  })

  it('only allows one terminal transition', () => {
    const { table, host } = createTable(4)
    const id = table.allocate(OP.GPIO_SET)

    expect(host.complete(id)).toBe(TABLE_ERR.OK)
    expect(host.complete(id)).toBe(TABLE_ERR.INVALID_TRANSITION)
    expect(host.error(id, 5)).toBe(TABLE_ERR.INVALID_TRANSITION)
    expect(table.markPending(id)).toBe(TABLE_ERR.INVALID_TRANSITION)
    expect(table.writeParams(id, Uint8Array.of(1))).toBe(TABLE_ERR.INVALID_TRANSITION)
  })

  it('ignores a late completion for a freed and recycled slot', () => {
    const { table, host } = createTable(1)
    const stale = table.allocate(OP.GPIO_SET)
    table.free(stale)
    const fresh = table.allocate(OP.GPIO_SET)

    expect(host.complete(stale)).toBe(TABLE_ERR.INVALID_HANDLE)
    expect(table.statusOf(fresh)).toBe(SLOT_STATUS.PENDING)
  })
})

// =============================================================================
// Counters
// =============================================================================

describe('RequestTable stats', () => {
  it('tracks issued, pending, completed and errored requests', () => {
    const { table, host } = createTable(4)
    const a = table.allocate(OP.GPIO_SET)
    const b = table.allocate(OP.GPIO_SET)
    table.allocate(OP.GPIO_SET)
    host.complete(a)
    host.error(b, 5)

    expect(table.stats()).toEqual({
      totalIssued: 3,
      pending: 1,
      completed: 1,
      errors: 1,
      queueFull: 0,
      abandoned: 0,
      reaped: 0,
      retracted: 0
    })
  })

  it('counts freeing a Pending slot as an abandonment', () => {
    const { table } = createTable(4)
    const id = table.allocate(OP.GPIO_SET)
    table.free(id)

    expect(table.stats().abandoned).toBe(1)
    expect(table.stats().pending).toBe(0)
  })

  it('init() resets slots, counters and the id generator', () => {
    const { table } = createTable(2)
    table.allocate(OP.GPIO_SET)
    table.allocate(OP.GPIO_SET)
    table.allocate(OP.GPIO_SET)

    table.init()
    expect(table.liveIds()).toEqual([])
    expect(table.stats().totalIssued).toBe(0)
    expect(table.stats().queueFull).toBe(0)
    expect(table.allocate(OP.GPIO_SET)).toBe(1)
  })
})

// =============================================================================
// Abandonment and the reaper
// =============================================================================

describe('RequestTable reaper', () => {
  it('frees abandoned slots once the host finishes them', () => {
    const { table, host } = createTable(4)
    const id = table.allocate(OP.GPIO_SET, 0)
    table.abandon(id)

    expect(table.sweep(10, 5000)).toBe(0)
    host.complete(id)
    expect(table.sweep(10, 5000)).toBe(1)
    expect(table.get(id)).toBeNull()
    expect(table.stats().reaped).toBe(1)
  })

  it('frees abandoned Pending slots older than the limit', () => {
    const { table } = createTable(4)
    const id = table.allocate(OP.GPIO_SET, 100)
    table.abandon(id)

    expect(table.sweep(5100, 5000)).toBe(0)
    expect(table.sweep(5101, 5000)).toBe(1)
    // Counted once at abandon(), not again when reaped
    expect(table.stats().abandoned).toBe(1)
    expect(table.stats().pending).toBe(0)
  })

  it('never touches slots that were not abandoned', () => {
    const { table, host } = createTable(4)
    const id = table.allocate(OP.GPIO_SET, 0)
    host.complete(id)

    expect(table.sweep(1_000_000, 0)).toBe(0)
    expect(table.statusOf(id)).toBe(SLOT_STATUS.COMPLETE)
  })

  it('counts a retract flag once', () => {
    const { table } = createTable(4)
    const id = table.allocate(OP.GPIO_SET)
    table.setFlag(id, SLOT_FLAG.RETRACTED)
    table.setFlag(id, SLOT_FLAG.RETRACTED)

    expect(table.stats().retracted).toBe(1)
    expect((table.get(id)?.flags ?? 0) & SLOT_FLAG.RETRACTED).toBe(SLOT_FLAG.RETRACTED)
  })
})

describe('RequestTable layout', () => {
  it('reports the slot region', () => {
    const { table } = createTable(4)
    expect(table.layout()).toEqual({ baseOffset: 192, elementSize: 544, count: 4 })
  })
})
