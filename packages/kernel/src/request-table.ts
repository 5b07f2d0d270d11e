// =============================================================================
// CoBridge - Request Slot Table
// =============================================================================
// Fixed-capacity correlation table for in-flight cross-boundary operations.

import {
  HDR,
  SLOT,
  SLOT_STATUS,
  SLOT_FLAG,
  TABLE_ERR,
  INVALID_ID,
  MAX_PAYLOAD,
  MAX_REQUEST_ID,
  isOpcode,
  toSlotStatus
} from './constants'
import type { Opcode, SlotStatus } from './constants'
import { initializeSlots } from './init'
import type { RegionLayout, RequestId, RequestSlot, TableStats } from './types'

/**
 * Request Slot Table.
 *
 * **Protocol:**
 * - **Caller:** `allocate()` (Idle → Pending), `writeParams()`, `free()`
 * - **Host:** `writeResponse()`, `markComplete()` / `markError()`
 *   (Pending → Complete / Error), normally through HostPort
 *
 * Neither side writes the other's fields. STATUS is stored last with
 * Atomics.store, so whoever observes the new status also sees the payload.
 *
 * **Ids:** handed out from a generator in the header. Ids increase until
 * MAX_REQUEST_ID, then wrap to 1, skipping any id still live. Between wraps a
 * recycled slot always gets a greater id, so a late completion for a freed
 * request cannot land on an unrelated one.
 *
 * @remarks
 * `allocate()` takes the first Idle slot in index order. It never grows the
 * table and never blocks: a full table returns TABLE_ERR.QUEUE_FULL.
 */
export class RequestTable {
  private readonly sab: Int32Array
  private readonly bytes: Uint8Array
  private readonly slotsI32: number
  private readonly slotsBytes: number
  readonly capacity: number

  constructor(buffer: SharedArrayBuffer) {
    this.sab = new Int32Array(buffer)
    this.bytes = new Uint8Array(buffer)
    this.slotsBytes = this.sab[HDR.SLOT_TABLE_PTR]
    this.slotsI32 = this.slotsBytes / 4
    this.capacity = this.sab[HDR.SLOT_CAPACITY]
  }

  /**
   * Reset every slot to Idle, zero the counters and restart ids at 1.
   *
   * @remarks
   * Only safe when no host still holds an id from before the reset.
   */
  init(): void {
    initializeSlots(this.sab, this.capacity)
    Atomics.store(this.sab, HDR.NEXT_REQUEST_ID, 1)
    let i: number = HDR.STAT_TOTAL
    while (i <= HDR.STAT_RETRACTED) {
      Atomics.store(this.sab, i, 0)
      i = i + 1
    }
  }

  // ===========================================================================
  // Caller side
  // ===========================================================================

  /**
   * Claim the first Idle slot.
   *
   * @param op - Operation kind stored in the slot
   * @param issuedAtMs - Virtual time of issue, used by the reaper
   * @returns The new request id (> 0), or TABLE_ERR.QUEUE_FULL
   */
  allocate(op: Opcode, issuedAtMs: number = 0): RequestId {
    let index = 0
    while (index < this.capacity) {
      const base = this.slotI32(index)
      if (Atomics.load(this.sab, base + SLOT.STATUS / 4) === SLOT_STATUS.IDLE) {
        const id = this.nextId()

        this.sab[base + SLOT.KIND / 4] = op
        this.sab[base + SLOT.PARAMS_LEN / 4] = 0
        this.sab[base + SLOT.RESPONSE_LEN / 4] = 0
        this.sab[base + SLOT.ERROR_CODE / 4] = 0
        this.sab[base + SLOT.ISSUED_AT_MS / 4] = issuedAtMs
        Atomics.store(this.sab, base + SLOT.FLAGS / 4, 0)
        Atomics.store(this.sab, base + SLOT.REQUEST_ID / 4, id)
        Atomics.store(this.sab, base + SLOT.STATUS / 4, SLOT_STATUS.PENDING)

        Atomics.add(this.sab, HDR.STAT_TOTAL, 1)
        Atomics.add(this.sab, HDR.STAT_PENDING, 1)
        return id
      }
      index = index + 1
    }

    Atomics.add(this.sab, HDR.STAT_QUEUE_FULL, 1)
    return TABLE_ERR.QUEUE_FULL
  }

  /**
   * Stage request parameters. Only while the slot is Pending.
   *
   * @returns TABLE_ERR.OK, INVALID_HANDLE, INVALID_TRANSITION or PAYLOAD_OVERFLOW
   */
  writeParams(id: RequestId, params: Uint8Array, length: number = params.length): number {
    if (length > MAX_PAYLOAD || length > params.length) return TABLE_ERR.PAYLOAD_OVERFLOW
    const index = this.indexOf(id)
    if (index < 0) return index
    const base = this.slotI32(index)
    if (Atomics.load(this.sab, base + SLOT.STATUS / 4) !== SLOT_STATUS.PENDING) {
      return TABLE_ERR.INVALID_TRANSITION
    }

    const start = this.slotByte(index) + SLOT.PARAMS
    this.bytes.set(params.subarray(0, length), start)
    this.bytes.fill(0, start + length, start + MAX_PAYLOAD)
    this.sab[base + SLOT.PARAMS_LEN / 4] = length
    return TABLE_ERR.OK
  }

  /**
   * Return a slot to Idle, whatever its status.
   * Freeing a slot that is still Pending counts as an abandonment.
   */
  free(id: RequestId): number {
    const index = this.indexOf(id)
    if (index < 0) return index
    const base = this.slotI32(index)
    const status = Atomics.load(this.sab, base + SLOT.STATUS / 4)
    if (status === SLOT_STATUS.PENDING) {
      Atomics.sub(this.sab, HDR.STAT_PENDING, 1)
      // A slot flagged at timeout was already counted
      if ((Atomics.load(this.sab, base + SLOT.FLAGS / 4) & SLOT_FLAG.ABANDONED) === 0) {
        Atomics.add(this.sab, HDR.STAT_ABANDONED, 1)
      }
    }
    Atomics.store(this.sab, base + SLOT.REQUEST_ID / 4, INVALID_ID)
    Atomics.store(this.sab, base + SLOT.FLAGS / 4, 0)
    Atomics.store(this.sab, base + SLOT.STATUS / 4, SLOT_STATUS.IDLE)
    return TABLE_ERR.OK
  }

  /**
   * Flag a slot whose caller stopped waiting. The slot stays live until the
   * host finishes it and the reaper frees it, or until it is freed explicitly.
   */
  abandon(id: RequestId): number {
    const index = this.indexOf(id)
    if (index < 0) return index
    const flagsIndex = this.slotI32(index) + SLOT.FLAGS / 4
    const previous = Atomics.or(this.sab, flagsIndex, SLOT_FLAG.ABANDONED)
    if ((previous & SLOT_FLAG.ABANDONED) === 0) {
      Atomics.add(this.sab, HDR.STAT_ABANDONED, 1)
    }
    return TABLE_ERR.OK
  }

  /**
   * Set flag bits on a live slot (SENT, RETRACTED).
   */
  setFlag(id: RequestId, flag: number): number {
    const index = this.indexOf(id)
    if (index < 0) return index
    const previous = Atomics.or(this.sab, this.slotI32(index) + SLOT.FLAGS / 4, flag)
    if ((flag & SLOT_FLAG.RETRACTED) !== 0 && (previous & SLOT_FLAG.RETRACTED) === 0) {
      Atomics.add(this.sab, HDR.STAT_RETRACTED, 1)
    }
    return TABLE_ERR.OK
  }

  /**
   * Reaper sweep. Frees abandoned slots that reached a terminal status, and
   * abandoned Pending slots issued more than `maxAgeMs` before `nowMs`.
   *
   * @returns Number of slots reclaimed
   */
  sweep(nowMs: number, maxAgeMs: number): number {
    let reaped = 0
    let index = 0
    while (index < this.capacity) {
      const base = this.slotI32(index)
      const status = Atomics.load(this.sab, base + SLOT.STATUS / 4)
      const flags = Atomics.load(this.sab, base + SLOT.FLAGS / 4)
      if (status !== SLOT_STATUS.IDLE && (flags & SLOT_FLAG.ABANDONED) !== 0) {
        const terminal = status === SLOT_STATUS.COMPLETE || status === SLOT_STATUS.ERROR
        const age = nowMs - this.sab[base + SLOT.ISSUED_AT_MS / 4]
        if (terminal || age > maxAgeMs) {
          this.free(Atomics.load(this.sab, base + SLOT.REQUEST_ID / 4))
          reaped = reaped + 1
        }
      }
      index = index + 1
    }
    if (reaped > 0) {
      Atomics.add(this.sab, HDR.STAT_REAPED, reaped)
    }
    return reaped
  }

  // ===========================================================================
  // Host side
  // ===========================================================================

  /**
   * Write the response payload. Only while the slot is Pending.
   */
  writeResponse(id: RequestId, response: Uint8Array): number {
    if (response.length > MAX_PAYLOAD) return TABLE_ERR.PAYLOAD_OVERFLOW
    const index = this.indexOf(id)
    if (index < 0) return index
    const base = this.slotI32(index)
    if (Atomics.load(this.sab, base + SLOT.STATUS / 4) !== SLOT_STATUS.PENDING) {
      return TABLE_ERR.INVALID_TRANSITION
    }
    const start = this.slotByte(index) + SLOT.RESPONSE
    this.bytes.set(response, start)
    this.bytes.fill(0, start + response.length, start + MAX_PAYLOAD)
    this.sab[base + SLOT.RESPONSE_LEN / 4] = response.length
    return TABLE_ERR.OK
  }

  /**
   * Re-assert Pending on a live slot (idempotent). Terminal slots cannot go back.
   */
  markPending(id: RequestId): number {
    const index = this.indexOf(id)
    if (index < 0) return index
    const status = Atomics.load(this.sab, this.slotI32(index) + SLOT.STATUS / 4)
    return status === SLOT_STATUS.PENDING ? TABLE_ERR.OK : TABLE_ERR.INVALID_TRANSITION
  }

  markComplete(id: RequestId): number {
    return this.finish(id, SLOT_STATUS.COMPLETE, 0)
  }

  markError(id: RequestId, errorCode: number): number {
    return this.finish(id, SLOT_STATUS.ERROR, errorCode)
  }

  private finish(id: RequestId, status: SlotStatus, errorCode: number): number {
    const index = this.indexOf(id)
    if (index < 0) return index
    const base = this.slotI32(index)
    if (Atomics.load(this.sab, base + SLOT.STATUS / 4) !== SLOT_STATUS.PENDING) {
      return TABLE_ERR.INVALID_TRANSITION
    }
    // CAS so two racing completions cannot both count
    if (status === SLOT_STATUS.ERROR) {
      this.sab[base + SLOT.ERROR_CODE / 4] = errorCode
    }
    const previous = Atomics.compareExchange(this.sab, base + SLOT.STATUS / 4, SLOT_STATUS.PENDING, status)
    if (previous !== SLOT_STATUS.PENDING) return TABLE_ERR.INVALID_TRANSITION

    Atomics.sub(this.sab, HDR.STAT_PENDING, 1)
    Atomics.add(this.sab, status === SLOT_STATUS.COMPLETE ? HDR.STAT_COMPLETED : HDR.STAT_ERRORS, 1)
    return TABLE_ERR.OK
  }

  // ===========================================================================
  // Lookup
  // ===========================================================================

  /**
   * Slot index holding a live request `id`, or TABLE_ERR.INVALID_HANDLE.
   * Id 0 and stale ids are treated the same.
   */
  indexOf(id: RequestId): number {
    if (id === INVALID_ID || id < 0) return TABLE_ERR.INVALID_HANDLE
    let index = 0
    while (index < this.capacity) {
      const base = this.slotI32(index)
      if (
        Atomics.load(this.sab, base + SLOT.REQUEST_ID / 4) === id &&
        Atomics.load(this.sab, base + SLOT.STATUS / 4) !== SLOT_STATUS.IDLE
      ) {
        return index
      }
      index = index + 1
    }
    return TABLE_ERR.INVALID_HANDLE
  }

  /**
   * Status of a live request, or TABLE_ERR.INVALID_HANDLE.
   */
  statusOf(id: RequestId): number {
    const index = this.indexOf(id)
    if (index < 0) return index
    return Atomics.load(this.sab, this.slotI32(index) + SLOT.STATUS / 4)
  }

  errorCodeOf(id: RequestId): number {
    const index = this.indexOf(id)
    if (index < 0) return index
    return this.sab[this.slotI32(index) + SLOT.ERROR_CODE / 4]
  }

  /**
   * Copy of a live slot, or null when `id` is not live.
   */
  get(id: RequestId): RequestSlot | null {
    const index = this.indexOf(id)
    if (index < 0) return null
    const base = this.slotI32(index)
    const start = this.slotByte(index)
    const paramsLen = this.sab[base + SLOT.PARAMS_LEN / 4]
    const responseLen = this.sab[base + SLOT.RESPONSE_LEN / 4]
    const op = this.sab[base + SLOT.KIND / 4]
    if (!isOpcode(op)) return null
    return {
      id,
      op,
      status: toSlotStatus(Atomics.load(this.sab, base + SLOT.STATUS / 4)),
      params: this.bytes.slice(start + SLOT.PARAMS, start + SLOT.PARAMS + paramsLen),
      response: this.bytes.slice(start + SLOT.RESPONSE, start + SLOT.RESPONSE + responseLen),
      errorCode: this.sab[base + SLOT.ERROR_CODE / 4],
      issuedAtMs: this.sab[base + SLOT.ISSUED_AT_MS / 4],
      flags: Atomics.load(this.sab, base + SLOT.FLAGS / 4)
    }
  }

  /**
   * Copy the params of a live request into `out`.
   *
   * @returns Bytes copied, or a negative TABLE_ERR code
   */
  readParams(id: RequestId, out: Uint8Array): number {
    const index = this.indexOf(id)
    if (index < 0) return index
    const length = this.sab[this.slotI32(index) + SLOT.PARAMS_LEN / 4]
    if (length > out.length) return TABLE_ERR.PAYLOAD_OVERFLOW
    const start = this.slotByte(index) + SLOT.PARAMS
    out.set(this.bytes.subarray(start, start + length))
    return length
  }

  /**
   * Copy the response of a live request into `out`.
   *
   * @returns Bytes copied, or a negative TABLE_ERR code
   */
  readResponse(id: RequestId, out: Uint8Array): number {
    const index = this.indexOf(id)
    if (index < 0) return index
    const length = this.sab[this.slotI32(index) + SLOT.RESPONSE_LEN / 4]
    if (length > out.length) return TABLE_ERR.PAYLOAD_OVERFLOW
    const start = this.slotByte(index) + SLOT.RESPONSE
    out.set(this.bytes.subarray(start, start + length))
    return length
  }

  /**
   * Ids of all Pending slots, in slot order.
   */
  pendingIds(): RequestId[] {
    const ids: RequestId[] = []
    let index = 0
    while (index < this.capacity) {
      const base = this.slotI32(index)
      if (Atomics.load(this.sab, base + SLOT.STATUS / 4) === SLOT_STATUS.PENDING) {
        ids.push(Atomics.load(this.sab, base + SLOT.REQUEST_ID / 4))
      }
      index = index + 1
    }
    return ids
  }

  /**
   * Ids of every non-Idle slot, in slot order.
   */
  liveIds(): RequestId[] {
    const ids: RequestId[] = []
    let index = 0
    while (index < this.capacity) {
      const base = this.slotI32(index)
      if (Atomics.load(this.sab, base + SLOT.STATUS / 4) !== SLOT_STATUS.IDLE) {
        ids.push(Atomics.load(this.sab, base + SLOT.REQUEST_ID / 4))
      }
      index = index + 1
    }
    return ids
  }

  // ===========================================================================
  // Diagnostics
  // ===========================================================================

  stats(): TableStats {
    return {
      totalIssued: Atomics.load(this.sab, HDR.STAT_TOTAL),
      pending: Atomics.load(this.sab, HDR.STAT_PENDING),
      completed: Atomics.load(this.sab, HDR.STAT_COMPLETED),
      errors: Atomics.load(this.sab, HDR.STAT_ERRORS),
      queueFull: Atomics.load(this.sab, HDR.STAT_QUEUE_FULL),
      abandoned: Atomics.load(this.sab, HDR.STAT_ABANDONED),
      reaped: Atomics.load(this.sab, HDR.STAT_REAPED),
      retracted: Atomics.load(this.sab, HDR.STAT_RETRACTED)
    }
  }

  layout(): RegionLayout {
    return { baseOffset: this.slotsBytes, elementSize: SLOT.SIZE_BYTES, count: this.capacity }
  }

  /**
   * Take the next id from the generator. Never INVALID_ID, never negative,
   * never an id a live slot still carries.
   */
  private nextId(): RequestId {
    while (true) {
      const current = Atomics.load(this.sab, HDR.NEXT_REQUEST_ID)
      const following = current >= MAX_REQUEST_ID || current < 1 ? 1 : current + 1
      if (Atomics.compareExchange(this.sab, HDR.NEXT_REQUEST_ID, current, following) !== current) continue
      if (current >= 1 && current <= MAX_REQUEST_ID && this.indexOf(current) < 0) return current
    }
  }

  private slotI32(index: number): number {
    return this.slotsI32 + index * (SLOT.SIZE_BYTES / 4)
  }

  private slotByte(index: number): number {
    return this.slotsBytes + index * SLOT.SIZE_BYTES
  }
}
