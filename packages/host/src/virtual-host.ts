// =============================================================================
// CoBridge - Virtual Host
// =============================================================================
// In-process Host Completer. Fulfils requests against the bridge's own
// registries, as a simulated board would.

import {
  OP,
  BUS_KIND,
  PIN_ERR,
  BUS_ERR,
  HOST_ERR,
  TABLE_ERR,
  decodeParams,
  encodeResponse
} from '@cobridge/kernel'
import type {
  AckOpcode,
  DataOpcode,
  HardwareBridge,
  HostCompleter,
  Opcode,
  RequestId,
  RequestParams,
  ResponsePayload
} from '@cobridge/kernel'

export type VirtualHostMode = 'inline' | 'deferred'

export interface VirtualHostOptions {
  /**
   * `inline` completes during send(); `deferred` queues the request and
   * completes it from a yield-hook background task (default: inline)
   */
  mode?: VirtualHostMode
  /** Deferred only: virtual ms between send and completion (default: 0) */
  latencyMs?: number
  /** Log every request to the console (default: false) */
  verbose?: boolean
}

export interface VirtualHostStats {
  completed: number
  failed: number
  retracted: number
  queued: number
}

interface QueuedRequest {
  id: RequestId
  request: RequestParams
  readyAtMs: number
}

type Outcome = { ok: true; response: ResponsePayload } | { ok: false; code: number }

/**
 * Virtual Host.
 *
 * Sleeps are always queued until virtual time reaches their deadline, except
 * in FastForward mode where the clock skips ahead and the sleep completes at
 * once. Anything queued is serviced by `service()`, which `attach()` registers
 * as a background task on the bridge's yield hook.
 *
 * @example
 * ```typescript
 * const bridge = HardwareBridge.create()
 * const host = new VirtualHost(bridge, { mode: 'deferred', latencyMs: 2 })
 * host.attach()
 * ```
 */
export class VirtualHost implements HostCompleter {
  private readonly mode: VirtualHostMode
  private readonly latencyMs: number
  private readonly verbose: boolean
  private queue: QueuedRequest[] = []
  private readonly faults = new Map<Opcode, number>()
  private removeTask: (() => void) | null = null
  private completed = 0
  private failed = 0
  private retracted = 0

  constructor(
    private readonly bridge: HardwareBridge,
    options: VirtualHostOptions = {}
  ) {
    this.mode = options.mode ?? 'inline'
    this.latencyMs = Math.max(0, options.latencyMs ?? 0)
    this.verbose = options.verbose ?? false
  }

  // ===========================================================================
  // Attachment
  // ===========================================================================

  attach(): void {
    if (this.removeTask !== null) return
    this.bridge.attach(this)
    this.removeTask = this.bridge.hook.addBackgroundTask(this.backgroundService)
  }

  detach(): void {
    if (this.removeTask === null) return
    this.removeTask()
    this.removeTask = null
    this.bridge.detach()
  }

  private readonly backgroundService = (): void => {
    this.service()
  }

  // ===========================================================================
  // HostCompleter
  // ===========================================================================

  send(requestId: RequestId, op: Opcode, params: Uint8Array): void {
    const request = decodeParams(op, params)
    if (request === null) {
      this.fail(requestId, HOST_ERR.INVALID)
      return
    }
    if (this.verbose) {
      console.log(`[VirtualHost] #${requestId} op=${op}`)
    }

    const now = this.bridge.clock.nowMs()
    if (request.op === OP.TIME_SLEEP) {
      if (this.bridge.clock.onSleep(request.ms)) {
        this.finish(requestId, request)
      } else {
        this.enqueue({ id: requestId, request, readyAtMs: now + request.ms })
      }
      return
    }

    if (this.mode === 'inline') {
      this.finish(requestId, request)
    } else {
      this.enqueue({ id: requestId, request, readyAtMs: now + this.latencyMs })
    }
  }

  /**
   * Drop a queued request.
   *
   * @returns true when it was still queued and will never be answered
   */
  retract(requestId: RequestId): boolean {
    const before = this.queue.length
    this.queue = this.queue.filter((entry) => entry.id !== requestId)
    if (this.queue.length === before) return false
    this.retracted = this.retracted + 1
    if (this.verbose) console.log(`[VirtualHost] #${requestId} retracted`)
    return true
  }

  // ===========================================================================
  // Servicing
  // ===========================================================================

  /**
   * Complete every queued request whose deadline has passed, in send order.
   *
   * @returns Requests completed or failed
   */
  service(): number {
    const now = this.bridge.clock.nowMs()
    const due: QueuedRequest[] = []
    const waiting: QueuedRequest[] = []
    let i = 0
    while (i < this.queue.length) {
      const entry = this.queue[i]
      if (entry.readyAtMs <= now) due.push(entry)
      else waiting.push(entry)
      i = i + 1
    }
    this.queue = waiting

    i = 0
    while (i < due.length) {
      this.finish(due[i].id, due[i].request)
      i = i + 1
    }
    return due.length
  }

  /**
   * Fail every future request of `op` with `code` until cleared.
   */
  injectFault(op: Opcode, code: number): void {
    this.faults.set(op, code)
  }

  clearFault(op: Opcode): void {
    this.faults.delete(op)
  }

  stats(): VirtualHostStats {
    return {
      completed: this.completed,
      failed: this.failed,
      retracted: this.retracted,
      queued: this.queue.length
    }
  }

  // ===========================================================================
  // Execution
  // ===========================================================================

  private enqueue(entry: QueuedRequest): void {
    this.queue.push(entry)
  }

  private finish(requestId: RequestId, request: RequestParams): void {
    const fault = this.faults.get(request.op)
    if (fault !== undefined) {
      this.fail(requestId, fault)
      return
    }

    const outcome = this.apply(request)
    if (!outcome.ok) {
      this.fail(requestId, outcome.code)
      return
    }

    const result = this.bridge.host.complete(requestId, encodeResponse(outcome.response))
    if (result === TABLE_ERR.PAYLOAD_OVERFLOW) {
      this.fail(requestId, HOST_ERR.INVALID)
    } else if (result === TABLE_ERR.OK) {
      this.completed = this.completed + 1
    }
  }

  private fail(requestId: RequestId, code: number): void {
    if (this.bridge.host.error(requestId, code) === TABLE_ERR.OK) {
      this.failed = this.failed + 1
    }
    if (this.verbose) console.warn(`[VirtualHost] #${requestId} failed with ${code}`)
  }

  private apply(request: RequestParams): Outcome {
    const { pins, analog, buses, clock } = this.bridge

    switch (request.op) {
      case OP.GPIO_SET: {
        const code = pins.setValue(request.pin, request.value)
        if (code === PIN_ERR.OK) {
          clock.recordEvent(`GPIO ${request.pin} set ${request.value ? 'HIGH' : 'LOW'}`)
        }
        return ack(request.op, pinError(code))
      }
      case OP.GPIO_GET: {
        const value = pins.getValue(request.pin)
        if (value < 0) return { ok: false, code: pinError(value) }
        return { ok: true, response: { op: request.op, value: value === 1 } }
      }
      case OP.GPIO_SET_DIRECTION:
        return ack(request.op, pinError(pins.setDirection(request.pin, request.direction)))
      case OP.GPIO_SET_PULL:
        return ack(request.op, pinError(pins.setPull(request.pin, request.pull)))
      case OP.ANALOG_READ: {
        const value = analog.read(request.pin)
        if (value < 0) return { ok: false, code: pinError(value) }
        return { ok: true, response: { op: request.op, value } }
      }
      case OP.ANALOG_WRITE:
        return ack(request.op, pinError(analog.write(request.pin, request.value)))
      case OP.I2C_WRITE:
        return ack(request.op, busError(buses.writeTo(request.bus, request.address, request.data)))
      case OP.I2C_READ: {
        const out = new Uint8Array(request.length)
        const code = buses.readFrom(request.bus, request.address, out)
        return data(request.op, code, out)
      }
      case OP.I2C_WRITE_READ: {
        const out = new Uint8Array(request.length)
        const code = buses.writeThenRead(request.bus, request.address, request.data, out)
        return data(request.op, code, out)
      }
      case OP.I2C_PROBE: {
        const code = buses.probe(request.bus, request.address)
        if (code === BUS_ERR.OK || code === BUS_ERR.NO_DEVICE) {
          return { ok: true, response: { op: request.op, present: code === BUS_ERR.OK } }
        }
        return { ok: false, code: busError(code) }
      }
      case OP.SPI_CONFIGURE:
        return ack(
          request.op,
          busError(
            buses.configure(request.bus, {
              frequency: request.frequency,
              polarity: request.polarity,
              phase: request.phase,
              bits: request.bits
            })
          )
        )
      case OP.SPI_WRITE:
        return ack(request.op, busError(buses.writeTo(request.bus, request.chipSelect, request.data)))
      case OP.SPI_READ: {
        // Register devices ignore the fill byte clocked out during a read
        const out = new Uint8Array(request.length)
        const code = buses.readFrom(request.bus, request.chipSelect, out)
        return data(request.op, code, out)
      }
      case OP.SPI_TRANSFER: {
        const out = new Uint8Array(request.data.length)
        const code = buses.transfer(request.bus, request.chipSelect, request.data, out)
        return data(request.op, code, out)
      }
      case OP.TIME_SLEEP:
        return { ok: true, response: { op: request.op } }
      case OP.TIME_GET_MONOTONIC:
        return { ok: true, response: { op: request.op, ms: clock.nowPreciseMs() } }
      case OP.UART_WRITE: {
        const written = buses.writeTx(request.bus, request.data)
        if (written < 0) return { ok: false, code: busError(written) }
        clock.recordEvent(`UART TX ${written} byte(s)`)
        return { ok: true, response: { op: request.op, written } }
      }
      case OP.UART_READ: {
        const out = new Uint8Array(request.length)
        const read = buses.readRx(request.bus, out)
        if (read < 0) return { ok: false, code: busError(read) }
        return { ok: true, response: { op: request.op, data: out.subarray(0, read) } }
      }
      case OP.UART_SET_BAUDRATE:
        if (buses.kindOf(request.bus) !== BUS_KIND.UART) return { ok: false, code: HOST_ERR.INVALID }
        return ack(request.op, busError(buses.configure(request.bus, { frequency: request.baudrate })))
      case OP.UART_RX_AVAILABLE: {
        const count = buses.rxAvailable(request.bus)
        if (count < 0) return { ok: false, code: busError(count) }
        return { ok: true, response: { op: request.op, count } }
      }
      case OP.UART_CLEAR_RX:
        return ack(request.op, busError(buses.clearRx(request.bus)))
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function ack(op: AckOpcode, hostCode: number): Outcome {
  if (hostCode !== 0) return { ok: false, code: hostCode }
  return { ok: true, response: { op } }
}

function data(op: DataOpcode, code: number, out: Uint8Array): Outcome {
  if (code !== BUS_ERR.OK) return { ok: false, code: busError(code) }
  return { ok: true, response: { op, data: out } }
}

/**
 * Map a PIN_ERR code to the errno a board would report. 0 for OK.
 */
export function pinError(code: number): number {
  switch (code) {
    case PIN_ERR.OK:
      return 0
    case PIN_ERR.IN_USE:
      return HOST_ERR.BUSY
    default:
      return HOST_ERR.INVALID
  }
}

/**
 * Map a BUS_ERR code to the errno a board would report. 0 for OK.
 */
export function busError(code: number): number {
  switch (code) {
    case BUS_ERR.OK:
      return 0
    case BUS_ERR.NO_DEVICE:
      return HOST_ERR.NO_DEVICE
    case BUS_ERR.LOCKED:
      return HOST_ERR.BUSY
    case BUS_ERR.PAYLOAD_OVERFLOW:
    case BUS_ERR.NOT_CONNECTED:
      return HOST_ERR.IO
    default:
      return HOST_ERR.INVALID
  }
}
