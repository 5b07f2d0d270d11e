// =============================================================================
// CoBridge - Hardware Bridge
// =============================================================================
// Context object that owns one bridge SAB and every view over it, and turns
// the slot protocol into awaitable requests.

import { OP, SLOT_FLAG, SLOT_STATUS, TABLE_ERR, MAX_PAYLOAD, HOST_ERR } from './constants'
import { createBridgeSAB, validateBridgeSAB } from './init'
import { RequestTable } from './request-table'
import { HostPort } from './host-port'
import { VirtualClock } from './virtual-clock'
import { PinRegistry } from './pin-registry'
import { AnalogRegistry } from './analog-registry'
import { BusRegistry } from './bus-registry'
import { YieldHook } from './yield-hook'
import { blockingWait } from './blocking-wait'
import { encodeParams, decodeResponse, responseCapacity } from './protocol'
import type { RequestParams, ResponsePayload } from './protocol'
import { BridgeError, isBridgeError } from './errors'
import type { BridgeConfig, HostCompleter, RegionLayout, RequestId, SuspendFn } from './types'

/**
 * Runtime options. Layout options go in BridgeConfig.
 */
export interface HardwareBridgeOptions {
  /** Timeout applied when a request names none; 0 = unbounded (default: 1000) */
  defaultTimeoutMs?: number
  /** Age after which an abandoned Pending slot is reclaimed (default: 5000) */
  reapAfterMs?: number
  /** Dispatch-loop calls between background runs (default: 100) */
  hookCallsPerYield?: number
  /** Virtual ms between requested yields (default: 100) */
  yieldIntervalMs?: number
  /** Suspension primitive used by every wait (default: one event-loop turn) */
  suspend?: SuspendFn
  /** Log protocol events to the console (default: false) */
  verbose?: boolean
  /** Called with every BridgeError before it is thrown */
  onError?: (error: BridgeError) => void
}

export interface RequestOptions {
  /** Overrides defaultTimeoutMs; 0 = unbounded */
  timeoutMs?: number
}

export interface BridgeLayout {
  slots: RegionLayout
  pins: RegionLayout
  analog: RegionLayout
  buses: RegionLayout
}

export interface SoftResetResult {
  retracted: number
  pins: number
  buses: number
}

/**
 * Hardware Bridge.
 *
 * **Lifecycle:** `create()` (or `new` over an existing buffer), `attach()` a
 * Host Completer, issue requests, `teardown()`. Each instance is independent;
 * nothing is kept in module state.
 *
 * **Requests:** `request()` encodes the params, allocates a slot, hands it to
 * the host and waits cooperatively. Failures surface as BridgeError. A
 * timed-out request is retracted: freed at once when the host acknowledges,
 * otherwise left for the reaper, which runs as a yield-hook background task.
 *
 * @example
 * ```typescript
 * const bridge = HardwareBridge.create({ clockMode: CLOCK_MODE.MANUAL })
 * bridge.attach(host)
 * await bridge.request({ op: OP.GPIO_SET, pin: 5, value: true })
 * ```
 */
export class HardwareBridge {
  readonly table: RequestTable
  readonly host: HostPort
  readonly clock: VirtualClock
  readonly pins: PinRegistry
  readonly analog: AnalogRegistry
  readonly buses: BusRegistry
  readonly hook: YieldHook

  private readonly buffer: SharedArrayBuffer
  private readonly defaultTimeoutMs: number
  private readonly reapAfterMs: number
  private readonly verbose: boolean
  private readonly onError: ((error: BridgeError) => void) | null
  private completer: HostCompleter | null = null
  private removeReaper: (() => void) | null
  private nextOwner = 1
  private tornDown = false

  /**
   * Create a bridge over a fresh buffer.
   */
  static create(config?: BridgeConfig, options?: HardwareBridgeOptions): HardwareBridge {
    return new HardwareBridge(createBridgeSAB(config), options)
  }

  constructor(buffer: SharedArrayBuffer, options: HardwareBridgeOptions = {}) {
    if (!validateBridgeSAB(buffer)) {
      throw new Error('Buffer is not an initialized bridge SAB')
    }
    this.buffer = buffer
    this.table = new RequestTable(buffer)
    this.host = new HostPort(this.table)
    this.clock = new VirtualClock(buffer)
    this.pins = new PinRegistry(buffer)
    this.analog = new AnalogRegistry(buffer)
    this.buses = new BusRegistry(buffer)
    this.hook = new YieldHook(this.clock, {
      hookCallsPerYield: options.hookCallsPerYield,
      yieldIntervalMs: options.yieldIntervalMs,
      suspend: options.suspend
    })

    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 1000
    this.reapAfterMs = options.reapAfterMs ?? 5000
    this.verbose = options.verbose ?? false
    this.onError = options.onError ?? null
    this.removeReaper = this.hook.addBackgroundTask(this.reaper)
  }

  // ===========================================================================
  // Host attachment
  // ===========================================================================

  attach(completer: HostCompleter): void {
    this.completer = completer
    this.log('Host attached')
  }

  detach(): void {
    this.completer = null
    this.log('Host detached')
  }

  isAttached(): boolean {
    return this.completer !== null
  }

  // ===========================================================================
  // Requests
  // ===========================================================================

  /**
   * Stage a request and deliver it to the host without waiting.
   *
   * @throws BridgeError PayloadOverflow or QueueFull
   * @throws Error when no host is attached or the bridge was torn down
   */
  issue(params: RequestParams): RequestId {
    const completer = this.requireHost()
    const bytes = encodeParams(params)
    if (bytes.length > MAX_PAYLOAD) {
      throw this.fail(
        new BridgeError('PayloadOverflow', `params of ${bytes.length} bytes exceed ${MAX_PAYLOAD}`)
      )
    }
    const expected = responseCapacity(params)
    if (expected > MAX_PAYLOAD) {
      throw this.fail(
        new BridgeError('PayloadOverflow', `response of ${expected} bytes would exceed ${MAX_PAYLOAD}`)
      )
    }

    const id = this.table.allocate(params.op, this.clock.nowMs())
    if (id === TABLE_ERR.QUEUE_FULL) {
      throw this.fail(new BridgeError('QueueFull', `all ${this.table.capacity} request slots are in use`))
    }

    this.table.writeParams(id, bytes)
    this.table.setFlag(id, SLOT_FLAG.SENT)
    if (this.verbose) {
      console.log(`[HardwareBridge] send #${id} op=${params.op}`)
    }
    completer.send(id, params.op, bytes)
    return id
  }

  /**
   * Issue a request and wait for its response.
   *
   * @throws BridgeError for every taxonomy kind, including Timeout
   */
  async request(params: RequestParams, options: RequestOptions = {}): Promise<ResponsePayload> {
    const id = this.issue(params)
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs
    const outcome = await blockingWait(this.table, this.hook, this.clock, id, timeoutMs > 0 ? timeoutMs : undefined)

    switch (outcome.status) {
      case 'complete': {
        const slot = this.table.get(id)
        this.table.free(id)
        const response = slot === null ? null : decodeResponse(params.op, slot.response)
        if (response === null) {
          throw this.fail(
            new BridgeError('HostError', `malformed response to #${id}`, { hostCode: HOST_ERR.IO, requestId: id })
          )
        }
        return response
      }
      case 'error':
        this.table.free(id)
        throw this.fail(
          new BridgeError('HostError', `host failed #${id} with code ${outcome.code}`, {
            hostCode: outcome.code,
            requestId: id
          })
        )
      case 'timeout':
        this.retract(id)
        throw this.fail(
          new BridgeError('Timeout', `#${id} not completed after ${outcome.elapsedMs}ms`, { requestId: id })
        )
      case 'invalid':
        throw this.fail(new BridgeError('InvalidHandle', `#${id} is no longer live`, { requestId: id }))
    }
  }

  /**
   * Like `request()`, but a timeout yields null instead of throwing.
   */
  async tryRequest(params: RequestParams, options: RequestOptions = {}): Promise<ResponsePayload | null> {
    try {
      return await this.request(params, options)
    } catch (error) {
      if (isBridgeError(error, 'Timeout')) return null
      throw error
    }
  }

  /**
   * Tell the host to drop a request nobody waits for any more. The slot is
   * flagged abandoned; it is freed at once if the host acknowledges the
   * retract, otherwise the reaper reclaims it.
   *
   * @returns false when `requestId` is not live
   */
  retract(requestId: RequestId): boolean {
    if (this.table.abandon(requestId) !== TABLE_ERR.OK) return false
    this.table.setFlag(requestId, SLOT_FLAG.RETRACTED)
    const completer = this.completer
    const dropped = completer !== null && completer.retract !== undefined && completer.retract(requestId)
    if (dropped && this.table.statusOf(requestId) === SLOT_STATUS.PENDING) {
      this.table.free(requestId)
      this.log(`retract #${requestId} acknowledged, slot freed`)
    } else {
      this.log(`retract #${requestId}`)
    }
    return true
  }

  /**
   * Run the reaper now.
   *
   * @returns Slots reclaimed
   */
  reap(): number {
    return this.table.sweep(this.clock.nowMs(), this.reapAfterMs)
  }

  private readonly reaper = (): void => {
    const reaped = this.reap()
    if (reaped > 0) this.log(`reaped ${reaped} abandoned slot(s)`)
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Interpreter soft restart: retract and free every live request, release
   * pins and buses not marked never-reset. The clock keeps running.
   */
  softReset(): SoftResetResult {
    const live = this.table.liveIds()
    let retracted = 0
    let i = 0
    while (i < live.length) {
      const id = live[i]
      if (this.table.statusOf(id) === SLOT_STATUS.PENDING && this.retract(id)) {
        retracted = retracted + 1
      }
      this.table.free(id)
      i = i + 1
    }

    const pins = this.pins.resetAll()
    this.analog.resetAll((pin) => this.pins.isNeverReset(pin))
    const buses = this.buses.resetAll()
    this.hook.resetYieldState()
    this.log(`soft reset: ${retracted} retracted, ${pins} pins, ${buses} buses`)
    return { retracted, pins, buses }
  }

  /**
   * Retract outstanding requests, stop the reaper and detach the host.
   * The instance cannot issue requests afterwards.
   */
  teardown(): void {
    if (this.tornDown) return
    const pending = this.table.pendingIds()
    let i = 0
    while (i < pending.length) {
      this.retract(pending[i])
      i = i + 1
    }
    if (this.removeReaper !== null) {
      this.removeReaper()
      this.removeReaper = null
    }
    this.completer = null
    this.tornDown = true
    this.log('Torn down')
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  getSAB(): SharedArrayBuffer {
    return this.buffer
  }

  /**
   * Region offsets for hosts that poll the registries directly.
   */
  layout(): BridgeLayout {
    return {
      slots: this.table.layout(),
      pins: this.pins.layout(),
      analog: this.analog.layout(),
      buses: this.buses.layout()
    }
  }

  /**
   * Fresh token for bus lock ownership.
   */
  newOwnerToken(): number {
    const token = this.nextOwner
    this.nextOwner = this.nextOwner + 1
    return token
  }

  /**
   * Shorthand for the interpreter's sleep: fast-forwards when the clock
   * allows it, otherwise waits for the host to complete a TIME_SLEEP.
   */
  async sleep(ms: number): Promise<void> {
    if (this.clock.onSleep(ms)) return
    await this.request({ op: OP.TIME_SLEEP, ms }, { timeoutMs: 0 })
  }

  private requireHost(): HostCompleter {
    if (this.tornDown) throw new Error('HardwareBridge has been torn down')
    if (this.completer === null) throw new Error('No host attached')
    return this.completer
  }

  private fail(error: BridgeError): BridgeError {
    if (this.onError !== null) this.onError(error)
    if (this.verbose) console.warn(`[HardwareBridge] ${error.message}`)
    return error
  }

  private log(message: string): void {
    if (this.verbose) console.log(`[HardwareBridge] ${message}`)
  }
}
