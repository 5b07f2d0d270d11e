// =============================================================================
// CoBridge - Kernel Types
// =============================================================================

import type { ClockMode, Opcode, SlotStatus } from './constants'

/**
 * Correlation handle of one in-flight request. 0 is never issued.
 */
export type RequestId = number

/**
 * Generation-tagged bus index: (generation << 8) | index.
 */
export type BusHandle = number

/**
 * Bridge layout configuration, fixed when the SAB is created.
 */
export interface BridgeConfig {
  /** Request slots (default: 32) */
  slotCapacity?: number
  /** Addressable pins (default: 64) */
  pinCount?: number
  /** I2C bus records (default: 8) */
  i2cBusCount?: number
  /** SPI bus records (default: 4) */
  spiBusCount?: number
  /** UART bus records (default: 2) */
  uartBusCount?: number
  /** Initial clock mode (default: REALTIME) */
  clockMode?: ClockMode
  /** Virtual CPU frequency in Hz (default: 48 MHz) */
  cpuFrequencyHz?: number
}

/**
 * Where a registry lives in the SAB, for hosts that index it directly.
 */
export interface RegionLayout {
  /** Byte offset of element 0 */
  baseOffset: number
  /** Bytes per element */
  elementSize: number
  /** Number of elements */
  count: number
}

/**
 * Read-only snapshot of one live slot.
 */
export interface RequestSlot {
  id: RequestId
  op: Opcode
  status: SlotStatus
  params: Uint8Array
  response: Uint8Array
  errorCode: number
  issuedAtMs: number
  flags: number
}

/**
 * RequestTable counters.
 */
export interface TableStats {
  totalIssued: number
  pending: number
  completed: number
  errors: number
  queueFull: number
  abandoned: number
  reaped: number
  retracted: number
}

/**
 * The embedding environment's side of the request protocol.
 *
 * After `send`, the host must eventually call exactly one of
 * HostPort.complete() or HostPort.error() for that id, unless it
 * acknowledged a retract first.
 */
export interface HostCompleter {
  /** A request exists. `params` is a copy of the slot's params bytes. */
  send(requestId: RequestId, op: Opcode, params: Uint8Array): void
  /**
   * The caller stopped waiting for `requestId`. Return true when the request
   * was dropped and will never be answered; the slot is then freed at once.
   * Otherwise the slot waits for a late answer or the reaper.
   */
  retract?(requestId: RequestId): boolean
}

/**
 * Result of a blocking wait.
 */
export type WaitOutcome =
  | { status: 'complete' }
  | { status: 'error'; code: number }
  | { status: 'timeout'; elapsedMs: number }
  | { status: 'invalid' }

/**
 * Background duty run from the yield hook. Must not block.
 */
export type BackgroundTask = () => void

/**
 * Hands control to other tasks. Resolves when the caller may continue.
 */
export type SuspendFn = () => Promise<void>

/**
 * Timeline entry recorded by the virtual clock.
 */
export interface TimelineEntry {
  /** Raw 32 kHz ticks at the time of the event */
  rawTicks: number
  event: string
}

export interface ClockStats {
  virtualTimeMs: number
  cpuFrequencyHz: number
  yields: number
  heartbeats: number
  timelineEvents: number
}
