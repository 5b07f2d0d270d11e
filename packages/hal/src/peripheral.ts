// =============================================================================
// CoBridge - Peripheral Base
// =============================================================================

import { BUS_ERR, BUS_KIND, BridgeError } from '@cobridge/kernel'
import type { BusHandle, BusKind, HardwareBridge, RequestOptions } from '@cobridge/kernel'

/**
 * Caller-side object that owns a hardware resource until `deinit()`.
 */
export abstract class Peripheral {
  protected abstract readonly label: string
  private deinitialized = false

  constructor(protected readonly bridge: HardwareBridge) {}

  /**
   * Release the resource. Safe to call more than once.
   */
  deinit(): void {
    if (this.deinitialized) return
    this.release()
    this.deinitialized = true
  }

  deinited(): boolean {
    return this.deinitialized
  }

  protected abstract release(): void

  /**
   * @throws Error once deinitialised
   */
  protected checkAlive(): void {
    if (this.deinitialized) {
      throw new Error(`${this.label} has been deinitialized`)
    }
  }
}

export interface BusPeripheralOptions {
  /** Per-request timeout; defaults to the bridge's */
  timeoutMs?: number
}

/**
 * A bus record in the registry, released on deinit.
 */
export abstract class BusPeripheral extends Peripheral {
  protected readonly handle: BusHandle
  protected readonly requestOptions: RequestOptions

  constructor(bridge: HardwareBridge, kind: BusKind, handle: BusHandle, options: BusPeripheralOptions = {}) {
    super(bridge)
    if (handle < 0) {
      throw new Error(`No free ${busName(kind)} bus`)
    }
    this.handle = handle
    this.requestOptions = options.timeoutMs === undefined ? {} : { timeoutMs: options.timeoutMs }
  }

  /** Handle as stored in the bus registry */
  get busHandle(): BusHandle {
    return this.handle
  }

  protected override release(): void {
    this.bridge.buses.deinit(this.handle)
  }

  /**
   * @throws BridgeError InvalidHandle when a reset made the handle stale
   */
  protected checkHandle(): void {
    this.checkAlive()
    if (!this.bridge.buses.isValid(this.handle)) {
      throw new BridgeError('InvalidHandle', `${this.label} handle ${this.handle} is stale`)
    }
  }
}

/**
 * A shared bus plus the lock discipline every transaction goes through.
 *
 * Each instance carries its own owner token, so two objects on the same
 * bridge exclude each other.
 */
export abstract class LockableBusPeripheral extends BusPeripheral {
  protected readonly owner: number

  constructor(bridge: HardwareBridge, kind: BusKind, handle: BusHandle, options: BusPeripheralOptions = {}) {
    super(bridge, kind, handle, options)
    this.owner = bridge.newOwnerToken()
  }

  /**
   * Non-blocking acquire. Not re-entrant.
   */
  tryLock(): boolean {
    this.checkHandle()
    return this.bridge.buses.tryLock(this.handle, this.owner) === BUS_ERR.OK
  }

  /**
   * @throws Error when this object does not hold the lock
   */
  unlock(): void {
    this.checkHandle()
    if (this.bridge.buses.unlock(this.handle, this.owner) !== BUS_ERR.OK) {
      throw new Error(`${this.label} lock not held`)
    }
  }

  hasLock(): boolean {
    return !this.deinited() && this.bridge.buses.lockOwner(this.handle) === this.owner
  }

  protected requireLock(): void {
    this.checkHandle()
    if (this.bridge.buses.lockOwner(this.handle) !== this.owner) {
      throw new Error('Function requires lock')
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

export interface Slice {
  start?: number
  end?: number
}

/**
 * Separate slices of the outgoing and incoming buffers of one transaction.
 */
export interface DuplexSlices {
  outStart?: number
  outEnd?: number
  inStart?: number
  inEnd?: number
}

/**
 * Resolve an optional [start, end) over `buffer`, clamped to its length.
 */
export function sliceOf(buffer: Uint8Array, slice: Slice = {}): Uint8Array {
  const end = Math.min(buffer.length, slice.end ?? buffer.length)
  const start = Math.max(0, Math.min(slice.start ?? 0, end))
  return buffer.subarray(start, end)
}

export function unexpectedResponse(label: string): Error {
  return new Error(`${label} received a response of the wrong kind`)
}

function busName(kind: BusKind): string {
  if (kind === BUS_KIND.SPI) return 'SPI'
  if (kind === BUS_KIND.UART) return 'UART'
  return 'I2C'
}
